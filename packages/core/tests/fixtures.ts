import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger } from "@busco-tracker/shared";
import type { ExecutorConfig } from "../src/config.js";
import { proteinArtifactPath } from "../src/executor.js";
import type { ToolInvocation, ToolOutcome, ToolRunner } from "../src/tools.js";

export const silentLogger = createLogger("test", { level: "silent" });

export const FIXED_NOW = (): Date => new Date(2026, 0, 2, 3, 4, 5);
export const FIXED_RUN_AT = "2026-01-02 03:04:05";

export const SAMPLE_SUMMARY = [
  "# BUSCO version is: 5.7.1",
  "# The lineage dataset is: eukaryota_odb12 (Creation date: 2024-01-08, number of genomes: 70, number of BUSCOs: 129)",
  "# BUSCO was run in mode: proteins",
  "",
  "\t***** Results: *****",
  "",
  "\tC:95.3%[S:93.8%,D:1.5%],F:2.3%,M:2.4%,n:129",
  "\t123\tComplete BUSCOs (C)",
  "\t121\tComplete and single-copy BUSCOs (S)",
  "\t2\tComplete and duplicated BUSCOs (D)",
  "\t3\tFragmented BUSCOs (F)",
  "\t3\tMissing BUSCOs (M)",
  "\t129\tTotal BUSCO groups searched",
  "",
].join("\n");

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `busco-${prefix}-`));
}

export function writeLines(path: string, lines: string[]): void {
  writeFileSync(path, lines.join("\n") + "\n", "utf-8");
}

const OK: ToolOutcome = { exitCode: 0, stdout: "", stderr: "", timedOut: false };

export type PipelineFixture = {
  root: string;
  config: ExecutorConfig;
  outputDir: string;
  calls: ToolInvocation[];
  runTool: ToolRunner;
  inputsFor: (annotationId: string) => { annotation_url: string; assembly_url: string };
};

type FixtureOverrides = {
  extract?: (invocation: ToolInvocation) => ToolOutcome | Promise<ToolOutcome>;
  busco?: (invocation: ToolInvocation) => ToolOutcome | Promise<ToolOutcome>;
};

/**
 * Lays out scripts, inputs and a lineage folder in a temp directory, with a
 * fake tool runner that produces the artifacts the real tools would.
 */
export function createPipelineFixture(annotationIds: string[], overrides: FixtureOverrides = {}): PipelineFixture {
  const root = tempDir("pipeline");
  const scriptsDir = join(root, "scripts");
  const inputsDir = join(root, "inputs");
  const lineageDir = join(root, "lineages", "eukaryota_odb12");
  const workDir = join(root, "work");
  for (const dir of [scriptsDir, inputsDir, lineageDir, workDir]) {
    mkdirSync(dir, { recursive: true });
  }

  const config: ExecutorConfig = {
    extractScript: join(scriptsDir, "01_extract_proteins.sh"),
    buscoScript: join(scriptsDir, "02_run_BUSCO.sh"),
    lineageCandidates: [join(root, "missing-lineage"), lineageDir],
    workDir,
    stageTimeoutMs: 0,
  };
  writeFileSync(config.extractScript, "#!/bin/sh\n", "utf-8");
  writeFileSync(config.buscoScript, "#!/bin/sh\n", "utf-8");

  const inputsFor = (annotationId: string) => ({
    annotation_url: join(inputsDir, `${annotationId}.gff3.gz`),
    assembly_url: join(inputsDir, `${annotationId}.fna.gz`),
  });
  for (const annotationId of annotationIds) {
    const inputs = inputsFor(annotationId);
    writeFileSync(inputs.annotation_url, "gff", "utf-8");
    writeFileSync(inputs.assembly_url, "fasta", "utf-8");
  }

  const calls: ToolInvocation[] = [];
  const runTool: ToolRunner = async (invocation) => {
    calls.push(invocation);
    if (invocation.command === config.extractScript) {
      if (overrides.extract) return overrides.extract(invocation);
      writeFileSync(proteinArtifactPath(invocation.args[0] ?? ""), ">p1\nMSTNPKPQRKTKRNTNRRPQDVKFPGG\n", "utf-8");
      return OK;
    }
    if (overrides.busco) return overrides.busco(invocation);
    const outputDir = join(invocation.cwd, invocation.args[2] ?? "");
    mkdirSync(outputDir, { recursive: true });
    writeFileSync(join(outputDir, "short_summary.specific.eukaryota_odb12.out.txt"), SAMPLE_SUMMARY, "utf-8");
    return OK;
  };

  return { root, config, outputDir: join(root, "fragments"), calls, runTool, inputsFor };
}
