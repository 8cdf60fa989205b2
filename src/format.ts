import type { Cell, DataQualityReport, OutputTable, RunSummary } from "./types.js";

const SEPARATOR = "==================";
const BLANK = "-";

export function formatCell(value: Cell, digits = 4): string {
  if (value === undefined) {
    return BLANK;
  }
  return value.toFixed(digits);
}

export function formatQualityReport(quality: DataQualityReport): string[] {
  const lines = [
    `Rows: ${quality.rows}, factor columns: ${quality.factorColumns}, pooled values: ${quality.pooledSize}`,
    `Standardized blank cells: ${quality.standardizedUndefined}`,
    `Transformed blank cells: ${quality.transformedUndefined}`,
  ];
  if (quality.degenerateColumns.length > 0) {
    lines.push(`Degenerate columns: ${quality.degenerateColumns.join(", ")}`);
  }
  if (quality.transformedUndefined === 0) {
    lines.push("All transformed cells are filled");
    return lines;
  }
  lines.push("WARNING: blank cells in transformed output");
  for (const blank of quality.transformedBlanks) {
    lines.push(`  Column '${blank.column}': rows ${blank.rows.join(", ")}`);
  }
  return lines;
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    "DATA VALIDATION",
    SEPARATOR,
    `Input: ${summary.inputPath} (${summary.encoding})`,
    ...formatQualityReport(summary.quality),
    SEPARATOR,
    `Transformed: ${summary.transformedPath}`,
  ];
  if (summary.standardizedPath) {
    lines.push(`Standardized: ${summary.standardizedPath}`);
  }
  return lines.join("\n");
}

/** First `limit` rows as left-aligned columns, numbers at four decimals. */
export function formatPreview(table: OutputTable, limit: number): string {
  const body = table.rows
    .slice(0, limit)
    .map((row) => [row.id, row.name, ...row.values.map((value) => formatCell(value))]);
  const grid = [table.header, ...body];
  const widths = table.header.map((_, c) =>
    Math.max(...grid.map((cells) => (cells[c] ?? "").length)),
  );
  return grid
    .map((cells) =>
      cells
        .map((cell, c) => cell.padEnd(widths[c]))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
}
