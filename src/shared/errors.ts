export type DashboardErrorCode = 'DATA_UNAVAILABLE' | 'INVALID_CRITERIA';

export abstract class DashboardError extends Error {
  abstract readonly code: DashboardErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// The record store could not be reached, returned an error, or returned rows
// that do not match the expected shape. Never an empty-result signal.
export class DataUnavailableError extends DashboardError {
  readonly code = 'DATA_UNAVAILABLE';
}

// Rejected before any I/O is attempted
export class InvalidCriteriaError extends DashboardError {
  readonly code = 'INVALID_CRITERIA';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
