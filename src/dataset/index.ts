/**
 * Dataset layer: typed frames, statistics, imputation, CSV and spreadsheet I/O and the
 * per-run Dataset Store.
 */

export { DatasetStore, type StoreCheckpoint, type StatsPhase, type ColumnStatsHistory } from "./store.js";
export { InvalidInputError, ValidationError, type ValidationIssue } from "./errors.js";
export { parseCsv, toCsv, inferColumn, isMissingToken } from "./csv.js";
export { parseWorkbook } from "./excel.js";
export { loadDatasetFile, SUPPORTED_EXTENSIONS } from "./load.js";
export {
  createDataset,
  rowCount,
  columnNames,
  cloneDataset,
  findColumn,
  getColumn,
  replaceColumn,
  dropRows,
  cells,
  missingIndices,
  countMissing,
  totalMissing,
  presentNumbers,
  formatCell,
} from "./frame.js";
export { imputeColumn, PLACEHOLDERS, type Imputation, type ImputationMethod } from "./impute.js";
export {
  describeChange,
  ChangeLogEntryInputSchema,
  MAX_SAMPLED_INDICES,
  type ChangeLogEntry,
  type ChangeLogEntryInput,
} from "./changelog.js";
export { METADATA_SCHEMAS, METADATA_KEYS, isMetadataKey, type MetadataBag, type MetadataKey } from "./metadata.js";
export { summarizeColumn, type ColumnSummary } from "./stats.js";
