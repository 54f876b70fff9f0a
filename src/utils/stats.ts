export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Rounds to `decimals` places, ties to even (6.25 -> 6.2, 200.5 -> 200).
 *
 * Works on the exact decimal expansion of the double, so a value such as
 * 2.675 (stored as 2.67499...) rounds down rather than being read as a tie.
 */
export function roundTo(value: number, decimals = 0): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const digits = Math.abs(value).toFixed(100);
  const cut = digits.indexOf('.') + 1 + decimals;
  const dropped = digits.slice(cut);
  let units = BigInt(digits.slice(0, cut).replace('.', ''));

  const first = dropped.charAt(0);
  const tie = first === '5' && !/[1-9]/.test(dropped.slice(1));
  if (first > '5' || (first === '5' && !tie) || (tie && units % 2n === 1n)) {
    units += 1n;
  }

  const rounded = Number(units) / 10 ** decimals;
  return value < 0 ? -rounded : rounded;
}

export function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}
