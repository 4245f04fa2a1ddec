import { mkdirSync } from "node:fs";
import type { Logger, WorkItem } from "@busco-tracker/shared";
import { processItem, recordFailure, type AttemptReport, type ExecutorDeps } from "./executor.js";
import { sliceForChunk } from "./partition.js";
import { resolvePending } from "./pending.js";
import type { StateStore } from "./state-store.js";

export type SliceOptions = {
  store: StateStore;
  chunkIndex: number;
  chunkCount: number;
  maxPerJob?: number | undefined;
  executor: ExecutorDeps;
  logger: Logger;
};

export type SliceSummary = {
  chunk_index: number;
  chunk_count: number;
  total: number;
  succeeded: number;
  failed: number;
  reports: AttemptReport[];
};

async function attempt(annotationId: string, item: WorkItem | undefined, executor: ExecutorDeps): Promise<AttemptReport> {
  if (!item) {
    return recordFailure(annotationId, "input_missing", `no catalog entry for ${annotationId}`, executor);
  }
  try {
    return await processItem(item, executor);
  } catch (err) {
    executor.logger.error({ annotation_id: annotationId, err }, "attempt rejected");
    return recordFailure(annotationId, "unexpected_error", err instanceof Error ? err.message : String(err), executor);
  }
}

/**
 * Processes this worker's stride of the pending set, one item at a time.
 * The snapshot is taken once, before the first item.
 */
export async function runSlice(options: SliceOptions): Promise<SliceSummary> {
  const { store, chunkIndex, chunkCount, maxPerJob, executor, logger } = options;
  mkdirSync(executor.outputDir, { recursive: true });

  const snapshot = store.snapshot();
  const pending = resolvePending(snapshot);
  const slice = sliceForChunk(pending.pending, chunkIndex, chunkCount, maxPerJob);

  logger.info(
    { chunk_index: chunkIndex, chunk_count: chunkCount, slice_size: slice.length, max_per_job: maxPerJob ?? null },
    `chunk ${chunkIndex}/${chunkCount}: ${slice.length} annotations to process`,
  );

  const reports: AttemptReport[] = [];
  for (const [index, annotationId] of slice.entries()) {
    logger.info({ annotation_id: annotationId }, `[${index + 1}/${slice.length}] processing ${annotationId}`);

    // eslint-disable-next-line no-await-in-loop
    const report = await attempt(annotationId, snapshot.catalog.get(annotationId), executor);

    if (report.status === "succeeded") {
      logger.info({ annotation_id: annotationId }, `✓ ${annotationId}`);
    } else {
      logger.warn({ annotation_id: annotationId, step: report.step }, `✗ ${annotationId} (${report.step})`);
    }
    reports.push(report);
  }

  const succeeded = reports.filter((report) => report.status === "succeeded").length;
  const failed = reports.length - succeeded;
  logger.info(
    { chunk_index: chunkIndex, succeeded, failed, total: reports.length },
    `chunk ${chunkIndex} complete: ${succeeded} succeeded, ${failed} failed out of ${reports.length}`,
  );

  return {
    chunk_index: chunkIndex,
    chunk_count: chunkCount,
    total: reports.length,
    succeeded,
    failed,
    reports,
  };
}
