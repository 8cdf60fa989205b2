import { isDefined, mean, sampleStdev } from "../common/math.js";
import type { Cell, NumericColumn } from "../types.js";

export interface ColumnMoments {
  count: number;
  mean: number;
  stdev: number;
}

export function columnMoments(column: NumericColumn): ColumnMoments {
  const defined = column.filter(isDefined);
  const center = mean(defined);
  return { count: defined.length, mean: center, stdev: sampleStdev(defined, center) };
}

/**
 * A column is degenerate when it has fewer than two defined values or no spread.
 * Identical values are caught before the deviation, since rounding in the mean can
 * leave a tiny non-zero stdev for them.
 */
export function isDegenerateColumn(column: NumericColumn, moments = columnMoments(column)): boolean {
  if (moments.count < 2 || !Number.isFinite(moments.stdev) || moments.stdev === 0) {
    return true;
  }
  let first: number | undefined;
  for (const value of column) {
    if (!isDefined(value)) {
      continue;
    }
    if (first === undefined) {
      first = value;
    } else if (value !== first) {
      return false;
    }
  }
  return true;
}

/** Z-scores with the sample deviation; a degenerate column comes back all undefined. */
export function standardizeColumn(column: NumericColumn): Cell[] {
  const moments = columnMoments(column);
  if (isDegenerateColumn(column, moments)) {
    return column.map(() => undefined);
  }
  return column.map((value) =>
    isDefined(value) ? (value - moments.mean) / moments.stdev : undefined,
  );
}
