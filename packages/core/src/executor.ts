import { existsSync, mkdirSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  SUCCESS_STEP,
  type BuscoMetrics,
  type FailureStep,
  type Logger,
  type OutcomeRecord,
  type WorkItem,
} from "@busco-tracker/shared";
import type { ExecutorConfig } from "./config.js";
import { formatRunAt, writeOutcomeFragment, writeSuccessFragment } from "./fragments.js";
import { readBuscoSummary } from "./summary.js";
import { execaToolRunner, type ToolRunner } from "./tools.js";

/**
 * Per-item attempt:
 *
 *   pending -> extracting -> analyzing -> parsing -> succeeded
 *      \___________\____________\___________\____-> failed(step)
 *
 * Both terminal states end the attempt. A failed item is retried by a later
 * cycle; a succeeded one never is.
 */
export type ItemState = "pending" | "extracting" | "analyzing" | "parsing" | "succeeded" | "failed";

export type StageResult<T> = { ok: true; value: T } | { ok: false; step: FailureStep; message: string };

export type AttemptReport = {
  annotation_id: string;
  status: "succeeded" | "failed";
  step: OutcomeRecord["step"];
  run_at: string;
  transitions: ItemState[];
  fragments: string[];
  message?: string;
};

export type ExecutorDeps = {
  config: ExecutorConfig;
  outputDir: string;
  logger: Logger;
  runTool?: ToolRunner;
  now?: () => Date;
};

type InputPaths = {
  annotation: string;
  assembly: string;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function resolveLocator(locator: string): string {
  return locator.startsWith("file:") ? fileURLToPath(locator) : resolve(locator);
}

/** `<dir>/<base>_proteins.faa`, where base drops `.gz`, `.gff3` and `.gff` in that order. */
export function proteinArtifactPath(annotationPath: string): string {
  let base = basename(annotationPath);
  for (const suffix of [".gz", ".gff3", ".gff"]) {
    if (base.endsWith(suffix) && base.length > suffix.length) {
      base = base.slice(0, -suffix.length);
    }
  }
  return join(dirname(annotationPath), `${base}_proteins.faa`);
}

export function buscoOutputName(annotationId: string): string {
  return `busco_${encodeURIComponent(annotationId)}`;
}

function checkPreconditions(item: WorkItem, config: ExecutorConfig, log: Logger): StageResult<InputPaths> {
  for (const script of [config.extractScript, config.buscoScript]) {
    if (!existsSync(script)) {
      log.error({ script }, "script not found");
      return { ok: false, step: "script_missing", message: `script not found: ${script}` };
    }
  }

  const inputs: InputPaths = {
    annotation: resolveLocator(item.annotation_url),
    assembly: resolveLocator(item.assembly_url),
  };
  for (const input of [inputs.annotation, inputs.assembly]) {
    if (!existsSync(input)) {
      log.error({ input }, "input file not found");
      return { ok: false, step: "input_missing", message: `input file not found: ${input}` };
    }
  }
  return { ok: true, value: inputs };
}

async function invokeStage(
  step: FailureStep,
  command: string,
  args: string[],
  deps: ExecutorDeps,
  log: Logger,
): Promise<StageResult<void>> {
  const runTool = deps.runTool ?? execaToolRunner;
  log.info({ step, command, args }, `running ${step}`);
  try {
    const outcome = await runTool({ command, args, cwd: deps.config.workDir, timeoutMs: deps.config.stageTimeoutMs });
    if (outcome.timedOut) {
      log.error({ step, timeout_ms: deps.config.stageTimeoutMs }, `${step} timed out`);
      return { ok: false, step, message: `${step} timed out after ${deps.config.stageTimeoutMs}ms` };
    }
    if (outcome.exitCode !== 0) {
      log.error({ step, exit_code: outcome.exitCode, stdout: outcome.stdout, stderr: outcome.stderr }, `${step} failed`);
      return { ok: false, step, message: `${step} exited with code ${outcome.exitCode}` };
    }
  } catch (err) {
    log.error({ step, err }, `${step} could not be started`);
    return { ok: false, step, message: errorMessage(err) };
  }
  log.info({ step }, `${step} completed`);
  return { ok: true, value: undefined };
}

async function extractProteins(inputs: InputPaths, deps: ExecutorDeps, log: Logger): Promise<StageResult<string>> {
  const invoked = await invokeStage(
    "extract_proteins",
    deps.config.extractScript,
    [inputs.annotation, inputs.assembly],
    deps,
    log,
  );
  if (!invoked.ok) return invoked;

  const proteins = proteinArtifactPath(inputs.annotation);
  if (!existsSync(proteins)) {
    log.error({ proteins }, "protein file not found");
    return { ok: false, step: "extract_proteins", message: `protein file not found: ${proteins}` };
  }
  return { ok: true, value: proteins };
}

function resolveLineage(config: ExecutorConfig, log: Logger): StageResult<string> {
  const lineage = config.lineageCandidates.find((candidate) => existsSync(candidate));
  if (!lineage) {
    log.error({ tried: config.lineageCandidates }, "lineage folder not found");
    return { ok: false, step: "lineage_missing", message: `lineage folder not found: ${config.lineageCandidates.join(", ")}` };
  }
  return { ok: true, value: lineage };
}

async function runBusco(
  annotationId: string,
  proteins: string,
  lineage: string,
  deps: ExecutorDeps,
  log: Logger,
): Promise<StageResult<string>> {
  const outputName = buscoOutputName(annotationId);
  const invoked = await invokeStage("run_busco", deps.config.buscoScript, [proteins, lineage, outputName], deps, log);
  if (!invoked.ok) return invoked;
  return { ok: true, value: join(deps.config.workDir, outputName) };
}

async function runStages(
  item: WorkItem,
  deps: ExecutorDeps,
  enter: (state: ItemState) => void,
  log: Logger,
): Promise<StageResult<BuscoMetrics>> {
  const inputs = checkPreconditions(item, deps.config, log);
  if (!inputs.ok) return inputs;

  enter("extracting");
  const proteins = await extractProteins(inputs.value, deps, log);
  if (!proteins.ok) return proteins;

  enter("analyzing");
  const lineage = resolveLineage(deps.config, log);
  if (!lineage.ok) return lineage;
  const outputDir = await runBusco(item.annotation_id, proteins.value, lineage.value, deps, log);
  if (!outputDir.ok) return outputDir;

  enter("parsing");
  // A missing summary throws and surfaces as unexpected_error.
  return { ok: true, value: readBuscoSummary(outputDir.value) };
}

/** Writes the outcome fragment of a failed attempt that never reached the stages. */
export function recordFailure(
  annotationId: string,
  step: FailureStep,
  message: string,
  deps: ExecutorDeps,
): AttemptReport {
  const runAt = formatRunAt((deps.now ?? (() => new Date()))());
  const fragments: string[] = [];
  try {
    mkdirSync(deps.outputDir, { recursive: true });
    fragments.push(writeOutcomeFragment(deps.outputDir, { annotation_id: annotationId, run_at: runAt, result: "fail", step }));
  } catch (err) {
    deps.logger.error({ annotation_id: annotationId, err }, "could not write log fragment");
  }
  return {
    annotation_id: annotationId,
    status: "failed",
    step,
    run_at: runAt,
    transitions: ["pending", "failed"],
    fragments,
    message,
  };
}

/**
 * Runs one attempt and writes its fragments. Never rejects: every failure,
 * anticipated or not, ends as an outcome fragment so the rest of the slice
 * keeps going.
 */
export async function processItem(item: WorkItem, deps: ExecutorDeps): Promise<AttemptReport> {
  const runAt = formatRunAt((deps.now ?? (() => new Date()))());
  const log = deps.logger.child({ annotation_id: item.annotation_id });
  const transitions: ItemState[] = ["pending"];
  const enter = (state: ItemState): void => {
    transitions.push(state);
    log.debug({ state }, "state transition");
  };

  let result: StageResult<BuscoMetrics>;
  try {
    result = await runStages(item, deps, enter, log);
  } catch (err) {
    log.error({ err }, "unexpected error");
    result = { ok: false, step: "unexpected_error", message: errorMessage(err) };
  }

  const fragments: string[] = [];
  try {
    mkdirSync(deps.outputDir, { recursive: true });
    if (result.ok) {
      fragments.push(writeSuccessFragment(deps.outputDir, { annotation_id: item.annotation_id, ...result.value }));
    }
  } catch (err) {
    log.error({ err }, "could not write result fragment");
    result = { ok: false, step: "unexpected_error", message: errorMessage(err) };
  }

  enter(result.ok ? "succeeded" : "failed");
  const outcome: OutcomeRecord = result.ok
    ? { annotation_id: item.annotation_id, run_at: runAt, result: "success", step: SUCCESS_STEP }
    : { annotation_id: item.annotation_id, run_at: runAt, result: "fail", step: result.step };
  try {
    fragments.push(writeOutcomeFragment(deps.outputDir, outcome));
  } catch (err) {
    log.error({ err }, "could not write log fragment");
  }

  const report: AttemptReport = {
    annotation_id: item.annotation_id,
    status: result.ok ? "succeeded" : "failed",
    step: outcome.step,
    run_at: runAt,
    transitions,
    fragments,
  };
  return result.ok ? report : { ...report, message: result.message };
}
