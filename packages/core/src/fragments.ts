import { renameSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  OUTCOME_LOG_HEADER,
  SUCCESS_LOG_HEADER,
  formatTsvDocument,
  type OutcomeRecord,
  type SuccessRecord,
} from "@busco-tracker/shared";

export type FragmentKind = "result" | "log";

export const FRAGMENT_GLOBS: Record<FragmentKind, string> = {
  result: "result_*.tsv",
  log: "log_*.tsv",
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatRunAt(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// Percent-encoding keeps any id inside a single path segment.
export function fragmentPath(outputDir: string, kind: FragmentKind, annotationId: string): string {
  return join(outputDir, `${kind}_${encodeURIComponent(annotationId)}.tsv`);
}

function writeAtomically(path: string, content: string): void {
  const tempPath = `${path}.tmp-${process.pid}`;
  writeFileSync(tempPath, content, "utf-8");
  renameSync(tempPath, path);
}

export function writeSuccessFragment(outputDir: string, record: SuccessRecord): string {
  const path = fragmentPath(outputDir, "result", record.annotation_id);
  writeAtomically(path, formatTsvDocument(SUCCESS_LOG_HEADER, [SUCCESS_LOG_HEADER.map((name) => record[name])]));
  return path;
}

export function writeOutcomeFragment(outputDir: string, record: OutcomeRecord): string {
  const path = fragmentPath(outputDir, "log", record.annotation_id);
  writeAtomically(path, formatTsvDocument(OUTCOME_LOG_HEADER, [OUTCOME_LOG_HEADER.map((name) => record[name])]));
  return path;
}
