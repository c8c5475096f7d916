/**
 * Generic numeric helpers.
 * These utilities are used across series building, detection and scoring.
 */

/**
 * Clamp a numeric value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 2 decimal places. Returns a number (not string).
 */
export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Round to the nearest integer, exact halves to the even neighbour (12.5 -> 12, -12.5 -> -12).
 */
export function roundHalfEven(n: number): number {
  const floor = Math.floor(n);
  const diff = n - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Coerce a loosely typed field (API payloads send fatalities as strings) to a
 * finite number; anything unparseable becomes 0.
 */
export function toFiniteNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1). Returns 0 for fewer than two values.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const ss = values.reduce((a, x) => a + (x - m) * (x - m), 0);
  return Math.sqrt(ss / (values.length - 1));
}
