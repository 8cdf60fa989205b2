import { readFile } from "node:fs/promises";
import { decodeTableText, parseDelimitedTable } from "../io/delimited.js";
import { Logger } from "../logger.js";
import { METADATA_COLUMNS, parseNumericCell } from "../transform/pipeline.js";
import type { AuditConfig, Cell, RawCell, RawTable } from "../types.js";

export interface ReferenceDivergence {
  id: string;
  column: string;
  actual: Cell;
  reference: Cell;
  /** Infinity when exactly one side is blank. */
  absDiff: number;
}

export interface ReferenceAuditSummary {
  tolerance: number;
  comparedCells: number;
  mismatches: number;
  blankMismatches: number;
  maxAbsDiff: number;
  missingRows: string[];
  extraRows: string[];
  missingColumns: string[];
  extraColumns: string[];
  topDivergences: ReferenceDivergence[];
  passed: boolean;
}

export interface CompareOptions {
  tolerance: number;
  top?: number;
}

type RowIndex = Map<string, readonly RawCell[]>;

function indexRows(table: RawTable): RowIndex {
  const index: RowIndex = new Map();
  for (const row of table.rows) {
    const id = String(row[0] ?? "");
    // First occurrence wins for duplicated identifiers.
    if (!index.has(id)) {
      index.set(id, row);
    }
  }
  return index;
}

function factorColumns(table: RawTable): Map<string, number> {
  const columns = new Map<string, number>();
  table.header.forEach((name, index) => {
    if (index >= METADATA_COLUMNS && !columns.has(name)) {
      columns.set(name, index);
    }
  });
  return columns;
}

function byDivergence(a: ReferenceDivergence, b: ReferenceDivergence): number {
  if (a.absDiff === b.absDiff) {
    return a.id.localeCompare(b.id) || a.column.localeCompare(b.column);
  }
  return b.absDiff - a.absDiff;
}

/**
 * Cell-by-cell comparison of a produced table against reference values, joined on
 * the identifier column and the factor headers.
 */
export function compareWithReference(
  actual: RawTable,
  reference: RawTable,
  options: CompareOptions,
): ReferenceAuditSummary {
  const top = options.top ?? 10;
  const actualRows = indexRows(actual);
  const referenceRows = indexRows(reference);
  const actualColumns = factorColumns(actual);
  const referenceColumns = factorColumns(reference);

  const divergences: ReferenceDivergence[] = [];
  let comparedCells = 0;
  let blankMismatches = 0;
  let maxAbsDiff = 0;

  for (const [id, referenceRow] of referenceRows) {
    const actualRow = actualRows.get(id);
    if (!actualRow) {
      continue;
    }
    for (const [column, referenceIndex] of referenceColumns) {
      const actualIndex = actualColumns.get(column);
      if (actualIndex === undefined) {
        continue;
      }
      comparedCells += 1;
      const actualValue = parseNumericCell(actualRow[actualIndex]);
      const referenceValue = parseNumericCell(referenceRow[referenceIndex]);
      if (actualValue === undefined && referenceValue === undefined) {
        continue;
      }
      if (actualValue === undefined || referenceValue === undefined) {
        blankMismatches += 1;
        divergences.push({
          id,
          column,
          actual: actualValue,
          reference: referenceValue,
          absDiff: Number.POSITIVE_INFINITY,
        });
        continue;
      }
      const absDiff = Math.abs(actualValue - referenceValue);
      maxAbsDiff = Math.max(maxAbsDiff, absDiff);
      if (absDiff > options.tolerance) {
        divergences.push({ id, column, actual: actualValue, reference: referenceValue, absDiff });
      }
    }
  }

  const missingRows = [...referenceRows.keys()].filter((id) => !actualRows.has(id));
  const extraRows = [...actualRows.keys()].filter((id) => !referenceRows.has(id));
  const missingColumns = [...referenceColumns.keys()].filter((name) => !actualColumns.has(name));
  const extraColumns = [...actualColumns.keys()].filter((name) => !referenceColumns.has(name));

  return {
    tolerance: options.tolerance,
    comparedCells,
    mismatches: divergences.length,
    blankMismatches,
    maxAbsDiff,
    missingRows,
    extraRows,
    missingColumns,
    extraColumns,
    topDivergences: [...divergences].sort(byDivergence).slice(0, top),
    passed: divergences.length === 0 && missingRows.length === 0 && missingColumns.length === 0,
  };
}

async function loadTable(path: string, delimiter: string, logger: Logger): Promise<RawTable> {
  const { text, encoding } = decodeTableText(await readFile(path));
  if (encoding !== "utf-8") {
    logger.warn(`${path} decoded as ${encoding}.`);
  }
  return parseDelimitedTable(text, delimiter);
}

export async function runReferenceAudit(
  config: AuditConfig,
  parentLogger: Logger = new Logger(),
): Promise<ReferenceAuditSummary> {
  const logger = parentLogger.child("audit");
  const actual = await loadTable(config.actualPath, config.delimiter, logger);
  const reference = await loadTable(config.referencePath, config.delimiter, logger);
  logger.info(
    `Audit: actual rows=${actual.rows.length}, reference rows=${reference.rows.length}, ` +
      `tolerance=${config.tolerance}`,
  );
  return compareWithReference(actual, reference, {
    tolerance: config.tolerance,
    top: config.top,
  });
}

function formatAuditValue(value: Cell): string {
  return value === undefined ? "blank" : String(value);
}

function formatList(values: string[]): string {
  return values.length > 0 ? values.join(", ") : "none";
}

export function formatReferenceAuditSummary(summary: ReferenceAuditSummary): string {
  const lines = [
    "REFERENCE AUDIT",
    `Tolerance: ${summary.tolerance}`,
    `Compared cells: ${summary.comparedCells}`,
    `Mismatches: ${summary.mismatches} (blank: ${summary.blankMismatches})`,
    `Max abs diff: ${summary.maxAbsDiff.toExponential(3)}`,
    `Missing rows: ${formatList(summary.missingRows)}`,
    `Extra rows: ${formatList(summary.extraRows)}`,
    `Missing columns: ${formatList(summary.missingColumns)}`,
    `Extra columns: ${formatList(summary.extraColumns)}`,
  ];
  if (summary.topDivergences.length > 0) {
    lines.push("Top divergences:");
    for (const item of summary.topDivergences) {
      const diff = Number.isFinite(item.absDiff) ? item.absDiff.toExponential(3) : "blank";
      lines.push(
        `  ${item.id} / ${item.column}: actual=${formatAuditValue(item.actual)} ` +
          `reference=${formatAuditValue(item.reference)} diff=${diff}`,
      );
    }
  }
  lines.push(`Result: ${summary.passed ? "PASS" : "FAIL"}`);
  return lines.join("\n");
}
