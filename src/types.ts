export type RawCell = string | number | null | undefined;

/** A numeric cell; `undefined` marks a missing or undefined value. */
export type Cell = number | undefined;

export type NumericColumn = readonly Cell[];

export interface RawTable {
  header: readonly string[];
  rows: readonly (readonly RawCell[])[];
}

export interface OutputRow {
  id: string;
  name: string;
  values: Cell[];
}

export interface OutputTable {
  header: string[];
  rows: OutputRow[];
}

export interface BlankCells {
  column: string;
  rows: number[];
}

export interface DataQualityReport {
  rows: number;
  factorColumns: number;
  pooledSize: number;
  standardizedUndefined: number;
  transformedUndefined: number;
  degenerateColumns: string[];
  transformedBlanks: BlankCells[];
}

export interface TransformResult {
  standardized: OutputTable;
  transformed: OutputTable;
  quality: DataQualityReport;
}

export interface RunConfig {
  inputPath: string;
  outputDir: string;
  outputPrefix: string;
  dateTag?: string;
  delimiter: string;
  writeStandardized: boolean;
  preview: number;
  debug: boolean;
}

export interface AuditConfig {
  actualPath: string;
  referencePath: string;
  tolerance: number;
  top: number;
  delimiter: string;
}

export type TextEncodingName = "utf-8" | "latin1";

export interface RunSummary {
  inputPath: string;
  encoding: TextEncodingName;
  dateTag: string;
  transformedPath: string;
  standardizedPath?: string;
  quality: DataQualityReport;
  transformed: OutputTable;
}
