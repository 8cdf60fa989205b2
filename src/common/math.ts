import type { Cell } from "../types.js";

export function isDefined(value: Cell): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/** Sample standard deviation (divisor n - 1). NaN below two values. */
export function sampleStdev(values: readonly number[], center = mean(values)): number {
  if (values.length < 2) {
    return Number.NaN;
  }
  let squares = 0;
  for (const value of values) {
    const diff = value - center;
    squares += diff * diff;
  }
  return Math.sqrt(squares / (values.length - 1));
}

/** Count of elements `<= x` in an ascending sequence. */
export function upperBound(sorted: ArrayLike<number>, x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
