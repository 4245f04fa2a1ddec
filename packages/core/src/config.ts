import { delimiter, resolve } from "node:path";
import { BatchError } from "@busco-tracker/shared";

export const DEFAULT_MAX_CHUNKS = 256;

export const DEFAULT_LINEAGE_CANDIDATES = ["assets/busco_downloads/lineages/eukaryota_odb12", "eukaryota_odb12"];

type Env = Record<string, string | undefined>;

type Optional<T> = { [K in keyof T]?: T[K] | undefined };

export type StatePaths = {
  annotations: string;
  busco: string;
  errorLog: string;
};

export type ExecutorConfig = {
  extractScript: string;
  buscoScript: string;
  lineageCandidates: string[];
  workDir: string;
  stageTimeoutMs: number;
};

export function parseCount(raw: string, name: string, minimum = 0): number {
  const trimmed = raw.trim();
  if (!/^\d+$/u.test(trimmed)) {
    throw new BatchError("invalid_option", `${name} must be a non-negative integer, got "${raw}"`, { option: name });
  }
  const value = Number(trimmed);
  if (value < minimum) {
    throw new BatchError("invalid_option", `${name} must be at least ${minimum}, got ${value}`, { option: name });
  }
  return value;
}

export function resolveStatePaths(
  options: Optional<StatePaths> = {},
  env: Env = process.env,
  cwd: string = process.cwd(),
): StatePaths {
  return {
    annotations: resolve(cwd, options.annotations ?? env.ANNOTATIONS_TSV ?? "data/annotations.tsv"),
    busco: resolve(cwd, options.busco ?? env.BUSCO_TSV ?? "data/BUSCO.tsv"),
    errorLog: resolve(cwd, options.errorLog ?? env.ERROR_LOG_TSV ?? "data/error_log.tsv"),
  };
}

export function resolveMaxChunks(raw: number | undefined, env: Env = process.env): number {
  if (raw !== undefined) return raw;
  return env.MAX_CHUNKS ? parseCount(env.MAX_CHUNKS, "MAX_CHUNKS", 1) : DEFAULT_MAX_CHUNKS;
}

export function resolveExecutorConfig(
  options: Optional<ExecutorConfig> = {},
  env: Env = process.env,
  cwd: string = process.cwd(),
): ExecutorConfig {
  const lineageCandidates =
    options.lineageCandidates ??
    (env.BUSCO_LINEAGE_DIRS ? env.BUSCO_LINEAGE_DIRS.split(delimiter).filter(Boolean) : DEFAULT_LINEAGE_CANDIDATES);
  const stageTimeoutMs =
    options.stageTimeoutMs ?? (env.BUSCO_STAGE_TIMEOUT_MS ? parseCount(env.BUSCO_STAGE_TIMEOUT_MS, "BUSCO_STAGE_TIMEOUT_MS") : 0);

  return {
    extractScript: resolve(cwd, options.extractScript ?? env.BUSCO_EXTRACT_SCRIPT ?? "scripts/01_extract_proteins.sh"),
    buscoScript: resolve(cwd, options.buscoScript ?? env.BUSCO_RUN_SCRIPT ?? "scripts/02_run_BUSCO.sh"),
    lineageCandidates: lineageCandidates.map((candidate) => resolve(cwd, candidate)),
    workDir: resolve(cwd, options.workDir ?? env.BUSCO_WORK_DIR ?? "."),
    stageTimeoutMs,
  };
}
