/**
 * Nearest-rank percentile over an ascending-sorted list.
 *
 * The index is `floor(n * p)`, clamped to the last element. No
 * interpolation: results must stay comparable with earlier gate runs.
 *
 * @param p - fraction in (0, 1), e.g. 0.95
 */
export function nearestRankPercentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (!(p > 0 && p < 1)) {
    throw new RangeError(`Percentile must be between 0 and 1 (exclusive), got ${p}`);
  }

  const index = Math.floor(sorted.length * p);
  return index < sorted.length ? sorted[index] : sorted[sorted.length - 1];
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

/**
 * Round to `decimals` places, settling exact halves on the even
 * neighbour (0.125 -> 0.12, 0.375 -> 0.38) so summaries match earlier
 * gate reports.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  const scaled = value * factor;
  const lower = Math.floor(scaled);
  const fraction = scaled - lower;

  let rounded: number;
  if (fraction > 0.5) {
    rounded = lower + 1;
  } else if (fraction < 0.5) {
    rounded = lower;
  } else {
    rounded = lower % 2 === 0 ? lower : lower + 1;
  }
  return rounded / factor;
}
