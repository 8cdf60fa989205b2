import { TableShapeError } from "../common/errors.js";
import type { Cell, NumericColumn, OutputTable, RawCell, RawTable, TransformResult } from "../types.js";
import { buildPooledPopulation, rankColumns } from "./pooledRank.js";
import { summarizeQuality } from "./quality.js";
import { rescalePercentRank } from "./rescale.js";
import { standardizeColumn } from "./standardize.js";

export const METADATA_COLUMNS = 2;

const numericLiteral = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/** Finite numbers and standard numeric literals; anything else is undefined. */
export function parseNumericCell(raw: RawCell): Cell {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw !== "string") {
    return undefined;
  }
  const text = raw.trim();
  if (!numericLiteral.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function assertTableShape(table: RawTable): void {
  const width = table.header.length;
  if (width < METADATA_COLUMNS + 1) {
    throw new TableShapeError(
      `Table must have at least ${METADATA_COLUMNS + 1} columns (identifier, name, ` +
        `one or more factor columns); got ${width}.`,
    );
  }
  if (table.rows.length === 0) {
    throw new TableShapeError("Table has a header but no data rows.");
  }
  table.rows.forEach((row, index) => {
    if (row.length !== width) {
      throw new TableShapeError(
        `Row ${index + 1} has ${row.length} cells; header has ${width} columns.`,
      );
    }
  });
}

function metadataText(raw: RawCell): string {
  if (raw === null || raw === undefined) {
    return "";
  }
  return String(raw);
}

/** Column-major numeric block: `columns[c][r]`. */
export function extractFactorColumns(table: RawTable): Cell[][] {
  const factorCount = table.header.length - METADATA_COLUMNS;
  const columns: Cell[][] = [];
  for (let c = 0; c < factorCount; c += 1) {
    columns.push(table.rows.map((row) => parseNumericCell(row[METADATA_COLUMNS + c])));
  }
  return columns;
}

function assembleTable(table: RawTable, columns: readonly NumericColumn[]): OutputTable {
  return {
    header: [...table.header],
    rows: table.rows.map((row, r) => ({
      id: metadataText(row[0]),
      name: metadataText(row[1]),
      values: columns.map((column) => column[r]),
    })),
  };
}

/**
 * Standardizes every factor column, ranks each z-score against the pool of all
 * z-scores in the table, and rescales the ranks. Per-cell and per-column problems
 * surface as undefined cells; only a malformed shape throws.
 */
export function transformTable(table: RawTable): TransformResult {
  assertTableShape(table);

  const raw = extractFactorColumns(table);
  const standardized = raw.map((column) => standardizeColumn(column));
  const population = buildPooledPopulation(standardized);
  const transformed = rankColumns(standardized, population).map((column) =>
    column.map((rank) => rescalePercentRank(rank)),
  );

  const factorNames = table.header.slice(METADATA_COLUMNS);
  return {
    standardized: assembleTable(table, standardized),
    transformed: assembleTable(table, transformed),
    quality: summarizeQuality({
      factorNames,
      raw,
      standardized,
      transformed,
      pooledSize: population.length,
    }),
  };
}
