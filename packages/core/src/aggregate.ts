import { existsSync, readFileSync, statSync, unlinkSync } from "node:fs";
import fg from "fast-glob";
import { isValid, type SchemaName } from "@busco-tracker/contracts";
import { BatchError, parseTsv, rowToRecord, type Logger } from "@busco-tracker/shared";
import { FRAGMENT_GLOBS, type FragmentKind } from "./fragments.js";
import { inferOutcomeResult, outcomeKey, type StateStore } from "./state-store.js";

export type AggregateOptions = {
  store: StateStore;
  artifactsDir: string;
  removeFragments?: boolean;
  logger: Logger;
};

export type AggregateReport = {
  fragments_scanned: number;
  success_existing: number;
  outcome_existing: number;
  success_appended: number;
  outcome_appended: number;
  duplicates_skipped: number;
  malformed_skipped: number;
};

function scanFragments(artifactsDir: string, kind: FragmentKind): string[] {
  return fg.sync(`**/${FRAGMENT_GLOBS[kind]}`, { cwd: artifactsDir, absolute: true, onlyFiles: true }).sort();
}

function readFragmentRows(path: string, schema: SchemaName): { valid: Array<Record<string, string>>; malformed: number } {
  const table = parseTsv(readFileSync(path, "utf-8"));
  const valid: Array<Record<string, string>> = [];
  let malformed = 0;
  for (const fields of table.rows) {
    const record = rowToRecord(table.header, fields);
    if (isValid(schema, record)) {
      valid.push(record);
    } else {
      malformed += 1;
    }
  }
  return { valid, malformed };
}

/**
 * Merges worker fragments into the canonical logs. Success rows are unique
 * per annotation id, outcome rows per (annotation id, run_at); keys are added
 * as rows are accepted, so running twice over the same directory appends
 * nothing the second time.
 */
export function aggregateFragments(options: AggregateOptions): AggregateReport {
  const { store, artifactsDir, logger } = options;
  if (!existsSync(artifactsDir) || !statSync(artifactsDir).isDirectory()) {
    throw new BatchError("missing_artifacts_dir", `artifacts directory not found: ${artifactsDir}`, { path: artifactsDir });
  }

  const successKeys = store.successIds();
  const outcomeKeys = store.outcomeKeys();
  logger.info({ success_rows: successKeys.size, outcome_rows: outcomeKeys.size }, "loaded existing dedup keys");
  const report: AggregateReport = {
    fragments_scanned: 0,
    success_existing: successKeys.size,
    outcome_existing: outcomeKeys.size,
    success_appended: 0,
    outcome_appended: 0,
    duplicates_skipped: 0,
    malformed_skipped: 0,
  };

  store.ensureLogs();

  const resultFragments = scanFragments(artifactsDir, "result");
  const logFragments = scanFragments(artifactsDir, "log");
  report.fragments_scanned = resultFragments.length + logFragments.length;

  const successNew: Array<Record<string, string>> = [];
  for (const fragment of resultFragments) {
    const { valid, malformed } = readFragmentRows(fragment, "successRow");
    report.malformed_skipped += malformed;
    for (const row of valid) {
      const annotationId = row.annotation_id ?? "";
      if (successKeys.has(annotationId)) {
        report.duplicates_skipped += 1;
        logger.debug({ annotation_id: annotationId }, "success row already recorded");
        continue;
      }
      successKeys.add(annotationId);
      successNew.push(row);
      logger.info({ annotation_id: annotationId }, "+ success row");
    }
  }

  const outcomeNew: Array<Record<string, string>> = [];
  for (const fragment of logFragments) {
    const { valid, malformed } = readFragmentRows(fragment, "outcomeRow");
    report.malformed_skipped += malformed;
    for (const row of valid) {
      const annotationId = row.annotation_id ?? "";
      const runAt = row.run_at ?? "";
      const key = outcomeKey(annotationId, runAt);
      if (outcomeKeys.has(key)) {
        report.duplicates_skipped += 1;
        continue;
      }
      outcomeKeys.add(key);
      outcomeNew.push({ ...row, result: row.result ?? inferOutcomeResult(row.step ?? "") });
      logger.info({ annotation_id: annotationId, run_at: runAt }, "+ outcome row");
    }
  }

  report.success_appended = store.appendSuccess(successNew);
  report.outcome_appended = store.appendOutcomes(outcomeNew);

  if (options.removeFragments) {
    for (const fragment of [...resultFragments, ...logFragments]) {
      unlinkSync(fragment);
    }
    logger.info({ removed: report.fragments_scanned }, "removed merged fragments");
  }

  logger.info(report, `appended ${report.success_appended} success rows and ${report.outcome_appended} outcome rows`);
  return report;
}
