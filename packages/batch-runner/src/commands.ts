import { appendFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  TsvStateStore,
  aggregateFragments,
  planDispatch,
  resolveExecutorConfig,
  resolveMaxChunks,
  resolvePending,
  resolveStatePaths,
  runSlice,
  type AggregateReport,
  type DispatchPlan,
  type ExecutorDeps,
  type SliceSummary,
  type ToolRunner,
} from "@busco-tracker/core";
import { BatchError, type Logger } from "@busco-tracker/shared";
import type { CliOptions } from "./options.js";

type Env = Record<string, string | undefined>;

export type OutputSink = (line: string) => void;

export type CommandContext = {
  logger: Logger;
  env?: Env;
  cwd?: string;
  writeOutput?: OutputSink;
  runTool?: ToolRunner;
  now?: () => Date;
};

/** Appends `key=value` lines to `$GITHUB_OUTPUT` when set, stdout otherwise. */
export function githubOutputSink(env: Env = process.env): OutputSink {
  const target = env.GITHUB_OUTPUT;
  if (target) {
    return (line) => appendFileSync(target, line + "\n", "utf-8");
  }
  return (line) => console.log(line);
}

function requireOption<T>(value: T | undefined, flag: string): T {
  if (value === undefined) {
    throw new BatchError("invalid_option", `${flag} is required`, { option: flag });
  }
  return value;
}

function openStore(options: CliOptions, context: CommandContext): TsvStateStore {
  const paths = resolveStatePaths(
    { annotations: options.annotations, busco: options.busco, errorLog: options.errorLog },
    context.env ?? process.env,
    context.cwd ?? process.cwd(),
  );
  return new TsvStateStore(paths, context.logger);
}

function emitPlan(plan: DispatchPlan, writeOutput: OutputSink): void {
  writeOutput(`matrix=${JSON.stringify(plan.matrix)}`);
  writeOutput(`chunk_count=${plan.chunk_count}`);
  writeOutput(`pending_count=${plan.pending_count}`);
}

export function planCommand(options: CliOptions, context: CommandContext): DispatchPlan {
  const { logger } = context;
  const env = context.env ?? process.env;
  const writeOutput = context.writeOutput ?? githubOutputSink(env);
  const snapshot = openStore(options, context).snapshot();

  if (snapshot.catalog.size === 0) {
    logger.warn({ code: "empty_catalog" }, "annotations catalog is empty, nothing to process");
    const plan = planDispatch(0);
    emitPlan(plan, writeOutput);
    return plan;
  }

  const pending = resolvePending(snapshot);
  const plan = planDispatch(pending.pending.length, {
    maxChunks: resolveMaxChunks(options.maxChunks, env),
    maxPerJob: options.maxPerJob,
  });

  logger.info(
    {
      total: snapshot.catalog.size,
      successful: snapshot.successIds.size,
      never_run: pending.never_run.length,
      failed: pending.failed.length,
      pending: plan.pending_count,
      eligible: plan.eligible_count,
      deferred: plan.deferred_count,
      chunk_count: plan.chunk_count,
    },
    plan.chunk_count === 0
      ? "no pending annotations, matrix is empty"
      : `${plan.eligible_count} annotations across ${plan.chunk_count} chunks (${plan.deferred_count} deferred)`,
  );

  emitPlan(plan, writeOutput);
  return plan;
}

export async function runCommand(options: CliOptions, context: CommandContext): Promise<SliceSummary> {
  const cwd = context.cwd ?? process.cwd();
  const executor: ExecutorDeps = {
    config: resolveExecutorConfig({}, context.env ?? process.env, cwd),
    outputDir: resolve(cwd, requireOption(options.outputDir, "--output-dir")),
    logger: context.logger,
    ...(context.runTool ? { runTool: context.runTool } : {}),
    ...(context.now ? { now: context.now } : {}),
  };

  return runSlice({
    store: openStore(options, context),
    chunkIndex: requireOption(options.chunkIndex, "--chunk-index"),
    chunkCount: requireOption(options.chunkCount, "--chunk-count"),
    maxPerJob: options.maxPerJob,
    executor,
    logger: context.logger,
  });
}

export function aggregateCommand(options: CliOptions, context: CommandContext): AggregateReport {
  const cwd = context.cwd ?? process.cwd();
  return aggregateFragments({
    store: openStore(options, context),
    artifactsDir: resolve(cwd, requireOption(options.artifactsDir, "--artifacts-dir")),
    removeFragments: options.removeFragments,
    logger: context.logger,
  });
}
