export const ID_COLUMN = "annotation_id";

export const CATALOG_HEADER = ["annotation_id", "annotation_url", "assembly_url"] as const;

export const SUCCESS_LOG_HEADER = [
  "annotation_id",
  "lineage",
  "busco_count",
  "complete",
  "single",
  "duplicated",
  "fragmented",
  "missing",
] as const;

export const OUTCOME_LOG_HEADER = ["annotation_id", "run_at", "result", "step"] as const;

// Older outcome logs carry no result column; headerless ones use this column order.
export const LEGACY_OUTCOME_LOG_HEADER = ["annotation_id", "run_at", "step"] as const;

export const FAILURE_STEPS = [
  "script_missing",
  "input_missing",
  "extract_proteins",
  "lineage_missing",
  "run_busco",
  "unexpected_error",
] as const;

export type FailureStep = (typeof FAILURE_STEPS)[number];

export const SUCCESS_STEP = "NA";

export const OUTCOME_RESULTS = ["success", "fail"] as const;
export type OutcomeResult = (typeof OUTCOME_RESULTS)[number];

export type WorkItem = {
  annotation_id: string;
  annotation_url: string;
  assembly_url: string;
};

export type BuscoMetrics = {
  lineage: string;
  busco_count: number;
  complete: number;
  single: number;
  duplicated: number;
  fragmented: number;
  missing: number;
};

export type SuccessRecord = BuscoMetrics & {
  annotation_id: string;
};

export type OutcomeRecord = {
  annotation_id: string;
  run_at: string;
  result: OutcomeResult;
  step: FailureStep | typeof SUCCESS_STEP;
};

export { BatchError, isBatchError } from "./errors.js";
export type { BatchErrorCode } from "./errors.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { formatTsvDocument, formatTsvRow, parseTsv, rowToRecord, splitTsvLines } from "./tsv.js";
export type { TsvTable } from "./tsv.js";
