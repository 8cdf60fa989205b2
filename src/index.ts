export { percentRankExc } from "./transform/percentRank.js";
export {
  columnMoments,
  isDegenerateColumn,
  standardizeColumn,
  type ColumnMoments,
} from "./transform/standardize.js";
export {
  buildPooledPopulation,
  rankColumns,
  type PooledPopulation,
} from "./transform/pooledRank.js";
export { RESCALE_CENTER, RESCALE_SPREAD, rescalePercentRank } from "./transform/rescale.js";
export {
  assertTableShape,
  parseNumericCell,
  transformTable,
} from "./transform/pipeline.js";
export { summarizeQuality } from "./transform/quality.js";
export { TableShapeError, UnsupportedInputError } from "./common/errors.js";
export { run, type RunOptions } from "./runner.js";
export {
  compareWithReference,
  formatReferenceAuditSummary,
  runReferenceAudit,
  type ReferenceAuditSummary,
} from "./audit/referenceAudit.js";
export type * from "./types.js";
