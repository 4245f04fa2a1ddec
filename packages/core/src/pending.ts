import type { StateSnapshot } from "./state-store.js";

export type PendingSet = {
  pending: string[];
  never_run: string[];
  failed: string[];
};

export function computePending(
  allIds: Iterable<string>,
  successIds: ReadonlySet<string>,
  outcomeIds: ReadonlySet<string>,
): PendingSet {
  const neverRun: string[] = [];
  for (const id of new Set(allIds)) {
    if (!successIds.has(id) && !outcomeIds.has(id)) neverRun.push(id);
  }
  const failed = [...outcomeIds].filter((id) => !successIds.has(id));

  neverRun.sort();
  failed.sort();
  return {
    pending: [...neverRun, ...failed],
    never_run: neverRun,
    failed,
  };
}

export function resolvePending(snapshot: StateSnapshot): PendingSet {
  return computePending(snapshot.catalog.keys(), snapshot.successIds, snapshot.outcomeIds);
}
