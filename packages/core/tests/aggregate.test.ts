import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import { isBatchError } from "@busco-tracker/shared";
import { aggregateFragments } from "../src/aggregate.js";
import { TsvStateStore } from "../src/state-store.js";
import { silentLogger, tempDir, writeLines } from "./fixtures.js";

const SUCCESS_HEADER = "annotation_id\tlineage\tbusco_count\tcomplete\tsingle\tduplicated\tfragmented\tmissing";
const OUTCOME_HEADER = "annotation_id\trun_at\tresult\tstep";

type Workspace = { root: string; artifacts: string; store: TsvStateStore; busco: string; errorLog: string };

function createWorkspace(): Workspace {
  const root = tempDir("aggregate");
  const artifacts = join(root, "artifacts");
  mkdirSync(join(artifacts, "chunk-0"), { recursive: true });
  mkdirSync(join(artifacts, "chunk-1"), { recursive: true });
  const busco = join(root, "data", "BUSCO.tsv");
  const errorLog = join(root, "data", "error_log.tsv");
  const store = new TsvStateStore({ annotations: join(root, "data", "annotations.tsv"), busco, errorLog }, silentLogger);
  return { root, artifacts, store, busco, errorLog };
}

function successFragment(workspace: Workspace, chunk: string, annotationId: string, lineage: string): void {
  writeLines(join(workspace.artifacts, chunk, `result_${annotationId}.tsv`), [
    SUCCESS_HEADER,
    `${annotationId}\t${lineage}\t129\t95.3\t93.8\t1.5\t2.3\t2.4`,
  ]);
}

function outcomeFragment(workspace: Workspace, chunk: string, annotationId: string, runAt: string, step: string): void {
  writeLines(join(workspace.artifacts, chunk, `log_${annotationId}.tsv`), [
    OUTCOME_HEADER,
    `${annotationId}\t${runAt}\t${step === "NA" ? "success" : "fail"}\t${step}`,
  ]);
}

test("fragments are merged once and a second pass appends nothing", () => {
  const workspace = createWorkspace();
  successFragment(workspace, "chunk-0", "ann1", "eukaryota_odb12");
  outcomeFragment(workspace, "chunk-0", "ann1", "2026-01-02 03:04:05", "NA");
  outcomeFragment(workspace, "chunk-1", "ann2", "2026-01-02 03:05:00", "run_busco");

  const first = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });
  assert.deepEqual(first, {
    fragments_scanned: 3,
    success_existing: 0,
    outcome_existing: 0,
    success_appended: 1,
    outcome_appended: 2,
    duplicates_skipped: 0,
    malformed_skipped: 0,
  });
  const busco = readFileSync(workspace.busco, "utf-8");
  const errorLog = readFileSync(workspace.errorLog, "utf-8");
  assert.equal(busco, `${SUCCESS_HEADER}\nann1\teukaryota_odb12\t129\t95.3\t93.8\t1.5\t2.3\t2.4\n`);
  assert.equal(
    errorLog,
    `${OUTCOME_HEADER}\nann1\t2026-01-02 03:04:05\tsuccess\tNA\nann2\t2026-01-02 03:05:00\tfail\trun_busco\n`,
  );

  const second = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });
  assert.equal(second.success_appended, 0);
  assert.equal(second.outcome_appended, 0);
  assert.equal(second.duplicates_skipped, 3);
  assert.equal(readFileSync(workspace.busco, "utf-8"), busco);
  assert.equal(readFileSync(workspace.errorLog, "utf-8"), errorLog);
});

test("duplicate success rows keep the first fragment in path order", () => {
  const workspace = createWorkspace();
  successFragment(workspace, "chunk-1", "ann1", "second_odb12");
  successFragment(workspace, "chunk-0", "ann1", "first_odb12");

  const report = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });

  assert.equal(report.success_appended, 1);
  assert.equal(report.duplicates_skipped, 1);
  assert.equal(readFileSync(workspace.busco, "utf-8"), `${SUCCESS_HEADER}\nann1\tfirst_odb12\t129\t95.3\t93.8\t1.5\t2.3\t2.4\n`);
});

test("rows already in the canonical logs are not appended again", () => {
  const workspace = createWorkspace();
  mkdirSync(join(workspace.root, "data"));
  writeLines(workspace.busco, [SUCCESS_HEADER, "ann1\teukaryota_odb12\t129\t95.3\t93.8\t1.5\t2.3\t2.4"]);
  writeLines(workspace.errorLog, [OUTCOME_HEADER, "ann2\t2026-01-01 00:00:00\tfail\textract_proteins"]);
  successFragment(workspace, "chunk-0", "ann1", "eukaryota_odb12");
  outcomeFragment(workspace, "chunk-0", "ann2", "2026-01-01 00:00:00", "extract_proteins");
  outcomeFragment(workspace, "chunk-1", "ann2", "2026-01-02 00:00:00", "run_busco");

  const report = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });

  assert.equal(report.success_existing, 1);
  assert.equal(report.outcome_existing, 1);
  assert.equal(report.success_appended, 0);
  assert.equal(report.outcome_appended, 1);
  assert.equal(report.duplicates_skipped, 2);
  assert.equal(
    readFileSync(workspace.errorLog, "utf-8"),
    `${OUTCOME_HEADER}\nann2\t2026-01-01 00:00:00\tfail\textract_proteins\nann2\t2026-01-02 00:00:00\tfail\trun_busco\n`,
  );
});

test("malformed rows are skipped and legacy outcome rows get a result", () => {
  const workspace = createWorkspace();
  writeLines(join(workspace.artifacts, "chunk-0", "log_ann1.tsv"), ["annotation_id\trun_at\tstep", "ann1\t2026-01-02 03:04:05\tNA"]);
  writeLines(join(workspace.artifacts, "chunk-0", "log_ann2.tsv"), ["annotation_id\trun_at", "ann2\t2026-01-02 03:04:05"]);
  writeLines(join(workspace.artifacts, "chunk-0", "result_ann3.tsv"), [SUCCESS_HEADER, "ann3\teukaryota_odb12\t129"]);

  const report = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });

  assert.equal(report.malformed_skipped, 2);
  assert.equal(report.success_appended, 0);
  assert.equal(report.outcome_appended, 1);
  assert.equal(readFileSync(workspace.errorLog, "utf-8"), `${OUTCOME_HEADER}\nann1\t2026-01-02 03:04:05\tsuccess\tNA\n`);
  assert.equal(readFileSync(workspace.busco, "utf-8"), `${SUCCESS_HEADER}\n`);
});

test("removeFragments deletes merged fragments", () => {
  const workspace = createWorkspace();
  successFragment(workspace, "chunk-0", "ann1", "eukaryota_odb12");
  outcomeFragment(workspace, "chunk-0", "ann1", "2026-01-02 03:04:05", "NA");

  aggregateFragments({
    store: workspace.store,
    artifactsDir: workspace.artifacts,
    removeFragments: true,
    logger: silentLogger,
  });

  assert.equal(existsSync(join(workspace.artifacts, "chunk-0", "result_ann1.tsv")), false);
  assert.equal(existsSync(join(workspace.artifacts, "chunk-0", "log_ann1.tsv")), false);
  assert.equal(existsSync(workspace.busco), true);
});

test("a missing artifacts directory fails with missing_artifacts_dir", () => {
  const workspace = createWorkspace();
  assert.throws(
    () => aggregateFragments({ store: workspace.store, artifactsDir: join(workspace.root, "absent"), logger: silentLogger }),
    (err: unknown) => isBatchError(err) && err.code === "missing_artifacts_dir",
  );
});

test("merging into a headerless outcome log appends each row once", () => {
  const workspace = createWorkspace();
  mkdirSync(join(workspace.root, "data"));
  writeFileSync(workspace.errorLog, "old\t2025-01-01 00:00:00\textract_proteins\n", "utf-8");
  outcomeFragment(workspace, "chunk-0", "ann2", "2026-01-02 03:05:00", "run_busco");

  const first = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });
  const second = aggregateFragments({ store: workspace.store, artifactsDir: workspace.artifacts, logger: silentLogger });

  assert.equal(first.outcome_existing, 1);
  assert.equal(first.outcome_appended, 1);
  assert.equal(second.outcome_existing, 2);
  assert.equal(second.outcome_appended, 0);
  assert.equal(second.duplicates_skipped, 1);
  assert.equal(
    readFileSync(workspace.errorLog, "utf-8"),
    "old\t2025-01-01 00:00:00\textract_proteins\nann2\t2026-01-02 03:05:00\trun_busco\n",
  );
});
