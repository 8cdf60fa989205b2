import { isDefined } from "../common/math.js";
import type { Cell, NumericColumn } from "../types.js";
import { percentRankExc } from "./percentRank.js";

/**
 * Every defined value across all columns, sorted ascending. Built once per run and
 * only read afterwards.
 */
export type PooledPopulation = Readonly<Float64Array>;

export function buildPooledPopulation(columns: readonly NumericColumn[]): PooledPopulation {
  let size = 0;
  for (const column of columns) {
    for (const value of column) {
      if (isDefined(value)) {
        size += 1;
      }
    }
  }

  const pooled = new Float64Array(size);
  let offset = 0;
  for (const column of columns) {
    for (const value of column) {
      if (isDefined(value)) {
        pooled[offset] = value;
        offset += 1;
      }
    }
  }
  // Typed array sort is numeric ascending.
  return pooled.sort();
}

export function rankColumns(
  columns: readonly NumericColumn[],
  population: PooledPopulation,
): Cell[][] {
  return columns.map((column) =>
    column.map((value) => (isDefined(value) ? percentRankExc(population, value) : undefined)),
  );
}
