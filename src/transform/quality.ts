import type { BlankCells, DataQualityReport, NumericColumn } from "../types.js";
import { isDegenerateColumn } from "./standardize.js";

export interface QualityInput {
  factorNames: readonly string[];
  raw: readonly NumericColumn[];
  standardized: readonly NumericColumn[];
  transformed: readonly NumericColumn[];
  pooledSize: number;
}

function countUndefined(columns: readonly NumericColumn[]): number {
  let count = 0;
  for (const column of columns) {
    for (const value of column) {
      if (value === undefined) {
        count += 1;
      }
    }
  }
  return count;
}

export function summarizeQuality(input: QualityInput): DataQualityReport {
  const degenerateColumns = input.factorNames.filter((_, c) => isDegenerateColumn(input.raw[c]));

  const transformedBlanks: BlankCells[] = [];
  input.transformed.forEach((column, c) => {
    const rows: number[] = [];
    column.forEach((value, r) => {
      if (value === undefined) {
        rows.push(r);
      }
    });
    if (rows.length > 0) {
      transformedBlanks.push({ column: input.factorNames[c], rows });
    }
  });

  return {
    rows: input.raw[0]?.length ?? 0,
    factorColumns: input.factorNames.length,
    pooledSize: input.pooledSize,
    standardizedUndefined: countUndefined(input.standardized),
    transformedUndefined: countUndefined(input.transformed),
    degenerateColumns,
    transformedBlanks,
  };
}
