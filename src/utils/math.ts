/**
 * @fileoverview Math utilities for labelbook
 *
 * Scores and averages are reported to two decimal places everywhere; keep the
 * rounding in one place so summaries and individual checks agree.
 */

/**
 * Round to two decimal places.
 * @param value - The value to round
 * @returns The rounded value
 */
export function roundToHundredths(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Share of `part` in `total` as a percentage with two decimals.
 * Returns 0 when total is 0.
 */
export function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return roundToHundredths((part / total) * 100);
}

/**
 * Arithmetic mean, 0 for an empty list.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Count occurrences of each key, returned with keys in sorted order so
 * serialized output is stable.
 */
export function countSorted(keys: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
