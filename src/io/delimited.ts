import { extname } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { TableShapeError, UnsupportedInputError } from "../common/errors.js";
import { METADATA_COLUMNS } from "../transform/pipeline.js";
import type { OutputTable, RawTable, TextEncodingName } from "../types.js";
import { cleanNumericText } from "./numericText.js";

export const SUPPORTED_EXTENSIONS = [".csv", ".txt"] as const;

const recordsSchema = z.array(z.array(z.string()));

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
}

export function assertSupportedInput(path: string): void {
  const ext = extname(path).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.some((supported) => supported === ext)) {
    throw new UnsupportedInputError(
      `Unsupported input "${path}": expected one of ${SUPPORTED_EXTENSIONS.join(", ")}.`,
    );
  }
}

/** Strict UTF-8 first, latin-1 when the bytes are not valid UTF-8. */
export function decodeTableText(bytes: Uint8Array): DecodedText {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(bytes), encoding: "utf-8" };
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
  }
}

/**
 * First record is the header. Ragged rows are kept as-is so the pipeline's shape
 * check can report them; numeric columns get their text cleaned.
 */
export function parseDelimitedTable(text: string, delimiter = ","): RawTable {
  const records = recordsSchema.parse(
    parse(text, {
      bom: true,
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
  const [header, ...rows] = records;
  if (!header) {
    throw new TableShapeError("Input has no header row.");
  }
  return {
    header,
    rows: rows.map((row) =>
      row.map((cell, index) => (index < METADATA_COLUMNS ? cell : cleanNumericText(cell))),
    ),
  };
}

export function formatDelimitedTable(table: OutputTable, delimiter = ","): string {
  const records = [
    table.header,
    ...table.rows.map((row) => [
      row.id,
      row.name,
      ...row.values.map((value) => (value === undefined ? "" : String(value))),
    ]),
  ];
  return stringify(records, { delimiter });
}
