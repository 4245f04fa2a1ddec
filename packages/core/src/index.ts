export {
  DEFAULT_LINEAGE_CANDIDATES,
  DEFAULT_MAX_CHUNKS,
  parseCount,
  resolveExecutorConfig,
  resolveMaxChunks,
  resolveStatePaths,
} from "./config.js";
export type { ExecutorConfig, StatePaths } from "./config.js";
export { TsvStateStore, inferOutcomeResult, outcomeKey } from "./state-store.js";
export type { LogRow, OutcomeEntry, StateSnapshot, StateStore } from "./state-store.js";
export { computePending, resolvePending } from "./pending.js";
export type { PendingSet } from "./pending.js";
export { partitionStride, planDispatch, sliceForChunk } from "./partition.js";
export type { DispatchOptions, DispatchPlan } from "./partition.js";
export { parseBuscoSummary, readBuscoSummary } from "./summary.js";
export { execaToolRunner } from "./tools.js";
export type { ToolInvocation, ToolOutcome, ToolRunner } from "./tools.js";
export { formatRunAt, fragmentPath } from "./fragments.js";
export { buscoOutputName, processItem, proteinArtifactPath, recordFailure } from "./executor.js";
export type { AttemptReport, ExecutorDeps, ItemState, StageResult } from "./executor.js";
export { runSlice } from "./slice-runner.js";
export type { SliceOptions, SliceSummary } from "./slice-runner.js";
export { aggregateFragments } from "./aggregate.js";
export type { AggregateOptions, AggregateReport } from "./aggregate.js";
