import { ensureSchema } from "@busco-tracker/contracts";
import { BatchError } from "@busco-tracker/shared";
import { DEFAULT_MAX_CHUNKS } from "./config.js";

export type DispatchPlan = {
  matrix: number[];
  chunk_count: number;
  pending_count: number;
  eligible_count: number;
  deferred_count: number;
};

export type DispatchOptions = {
  maxChunks?: number | undefined;
  maxPerJob?: number | undefined;
};

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new BatchError("invalid_option", `${name} must be a positive integer, got ${value}`, { option: name });
  }
}

/**
 * Sizes one dispatch cycle. With a per-job budget only the first
 * `maxChunks * maxPerJob` pending items are scheduled; the rest wait for the
 * next cycle's snapshot.
 */
export function planDispatch(pendingCount: number, options: DispatchOptions = {}): DispatchPlan {
  const maxChunks = options.maxChunks ?? DEFAULT_MAX_CHUNKS;
  assertPositiveInteger(maxChunks, "maxChunks");
  if (options.maxPerJob !== undefined) {
    assertPositiveInteger(options.maxPerJob, "maxPerJob");
  }

  let eligible = pendingCount;
  let chunkCount = 0;
  if (pendingCount > 0) {
    if (options.maxPerJob !== undefined) {
      eligible = Math.min(maxChunks * options.maxPerJob, pendingCount);
      chunkCount = Math.min(maxChunks, Math.ceil(eligible / options.maxPerJob));
    } else {
      chunkCount = Math.min(maxChunks, pendingCount);
    }
  }

  const plan: DispatchPlan = {
    matrix: Array.from({ length: chunkCount }, (_, index) => index),
    chunk_count: chunkCount,
    pending_count: pendingCount,
    eligible_count: eligible,
    deferred_count: pendingCount - eligible,
  };
  ensureSchema("dispatchPlan", plan);
  return plan;
}

/** Index `i` goes to slice `i mod chunkCount`. */
export function partitionStride<T>(items: readonly T[], chunkCount: number): T[][] {
  if (chunkCount < 1) return [];
  const slices = Array.from({ length: chunkCount }, (): T[] => []);
  items.forEach((item, index) => {
    slices[index % chunkCount]?.push(item);
  });
  return slices;
}

export function sliceForChunk<T>(items: readonly T[], chunkIndex: number, chunkCount: number, cap?: number): T[] {
  if (!Number.isInteger(chunkCount) || chunkCount < 1) {
    throw new BatchError("invalid_chunk", `chunk count must be a positive integer, got ${chunkCount}`);
  }
  if (!Number.isInteger(chunkIndex) || chunkIndex < 0 || chunkIndex >= chunkCount) {
    throw new BatchError("invalid_chunk", `chunk index ${chunkIndex} is outside [0, ${chunkCount})`);
  }
  if (cap !== undefined) {
    assertPositiveInteger(cap, "maxPerJob");
  }

  const slice: T[] = [];
  for (let index = chunkIndex; index < items.length; index += chunkCount) {
    if (cap !== undefined && slice.length >= cap) break;
    const item = items[index];
    if (item !== undefined) slice.push(item);
  }
  return slice;
}
