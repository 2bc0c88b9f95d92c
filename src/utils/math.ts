/**
 * Numeric helpers for curve sampling and yield comparison.
 */

/**
 * Lazily yields `count` evenly spaced values over the closed interval [start, stop].
 * The first value is exactly `start` and the last exactly `stop`.
 * When start equals stop every value is start.
 *
 * @example
 * ```ts
 * [...linspace(0, 1, 5)] // [0, 0.25, 0.5, 0.75, 1]
 * ```
 */
export function* linspace(start: number, stop: number, count: number): Generator<number> {
  if (count <= 0) {
    return;
  }
  if (count === 1) {
    yield start;
    return;
  }
  const step = (stop - start) / (count - 1);
  for (let i = 0; i < count - 1; i++) {
    yield start + i * step;
  }
  yield stop;
}

/**
 * Midpoint of two values.
 */
export function midpoint(a: number, b: number): number {
  return (a + b) / 2;
}

/**
 * Checks whether two values agree within a relative tolerance.
 * The tolerance is scaled by the larger magnitude; two zeros are always close.
 *
 * @param tolerance - Relative tolerance (e.g., 1e-9)
 */
export function isRelativelyClose(a: number, b: number, tolerance: number): boolean {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  if (scale === 0) {
    return true;
  }
  return Math.abs(a - b) <= tolerance * scale;
}
