import { upperBound } from "../common/math.js";

/**
 * Exclusive percentile rank of `x` within an ascending population, matching the
 * spreadsheet PERCENTRANK.EXC convention without significance truncation.
 *
 * Positions are 1-based: for `population[k] <= x < population[k + 1]` the rank is
 * `(k + fraction) / (n + 1)`, where `fraction` interpolates linearly between the two
 * neighbours. Ties resolve to the right, past the last equal element. The minimum
 * maps to `1 / (n + 1)` and the maximum to `n / (n + 1)`; anything outside
 * `[min, max]`, or a population of fewer than two values, has no rank.
 */
export function percentRankExc(
  sortedPopulation: ArrayLike<number>,
  x: number,
): number | undefined {
  const n = sortedPopulation.length;
  if (n < 2 || !Number.isFinite(x)) {
    return undefined;
  }

  const min = sortedPopulation[0];
  const max = sortedPopulation[n - 1];
  if (x < min || x > max) {
    return undefined;
  }
  if (x === min) {
    return 1 / (n + 1);
  }
  if (x === max) {
    return n / (n + 1);
  }

  // min < x < max, so 1 <= k <= n - 1 and population[k] (1-based) exists.
  const k = upperBound(sortedPopulation, x);
  const lower = sortedPopulation[k - 1];
  const upper = sortedPopulation[k];
  const fraction = (x - lower) / (upper - lower);
  return (k + fraction) / (n + 1);
}
