import type { NextFunction, Request, Response } from 'express';
import {
  DataUnavailableError,
  errorMessage,
  InvalidCriteriaError,
} from '../shared/errors.js';

export function statusForError(error: unknown): number {
  if (error instanceof InvalidCriteriaError) return 400;
  if (error instanceof DataUnavailableError) return 503;
  return 500;
}

// Shared failure response for route handlers
export function sendError(res: Response, error: unknown, context: string): void {
  const status = statusForError(error);

  if (status >= 500) {
    console.error(`❌ ${context}:`, error);
  } else {
    console.warn(`⚠️ ${context}: ${errorMessage(error)}`);
  }

  res.status(status).json({
    success: false,
    error: error instanceof Error ? error.message : 'Internal server error',
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
  });
}

// Last-resort handler for anything thrown outside a route's own try/catch
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  sendError(res, error, `Server error on ${req.method} ${req.path}`);
}
