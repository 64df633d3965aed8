/**
 * Arithmetic helpers for care cost and runway projections.
 */

/**
 * Performs linear interpolation between two points.
 * Returns the y-value corresponding to x, given two reference points (x1, y1) and (x2, y2).
 *
 * @param x - Input value to interpolate for
 * @param x1 - First reference x-coordinate
 * @param y1 - First reference y-coordinate
 * @param x2 - Second reference x-coordinate
 * @param y2 - Second reference y-coordinate
 * @returns Interpolated y-value
 */
export function interpolate(
  x: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number
): number {
  if (x2 === x1) {
    return y1;
  }
  return y1 + ((y2 - y1) * (x - x1)) / (x2 - x1);
}

/**
 * Rounds a money amount to cents, half away from zero.
 *
 * @example
 * ```ts
 * roundToCents(10.005) // returns 10.01
 * roundToCents(2358.333) // returns 2358.33
 * ```
 */
export function roundToCents(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

/**
 * Sums a list of amounts, ignoring non-finite entries.
 */
export function sum(values: number[]): number {
  return values.reduce((total, v) => (Number.isFinite(v) ? total + v : total), 0);
}
