import { parseCount } from "@busco-tracker/core";

export const COMMANDS = ["plan", "run", "aggregate"] as const;

export type Command = (typeof COMMANDS)[number];

export type CliOptions = {
  command: Command | undefined;
  annotations: string | undefined;
  busco: string | undefined;
  errorLog: string | undefined;
  maxChunks: number | undefined;
  maxPerJob: number | undefined;
  chunkIndex: number | undefined;
  chunkCount: number | undefined;
  outputDir: string | undefined;
  artifactsDir: string | undefined;
  removeFragments: boolean;
};

const BOOLEAN_FLAGS = new Set(["remove-fragments"]);

export const USAGE = [
  "usage: busco-batch <command> [options]",
  "  plan      --annotations F --busco F --error-log F [--max-chunks N] [--max-per-job N]",
  "  run       --annotations F --busco F --error-log F --chunk-index K --chunk-count N --output-dir D [--max-per-job N]",
  "  aggregate --artifacts-dir D --busco F --error-log F [--remove-fragments]",
].join("\n");

export function parseCliOptions(args: string[] = process.argv.slice(2)): CliOptions {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positional: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    const next = args[i + 1];
    if (current === undefined) continue;
    if (!current.startsWith("--")) {
      positional.push(current);
      continue;
    }
    const name = current.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags.add(name);
    } else if (next !== undefined && !next.startsWith("--")) {
      values.set(name, next);
      i += 1;
    }
  }

  const count = (name: string, minimum: number): number | undefined => {
    const raw = values.get(name);
    return raw === undefined ? undefined : parseCount(raw, `--${name}`, minimum);
  };
  const [commandName] = positional;

  return {
    command: COMMANDS.find((command) => command === commandName),
    annotations: values.get("annotations"),
    busco: values.get("busco"),
    errorLog: values.get("error-log"),
    maxChunks: count("max-chunks", 1),
    maxPerJob: count("max-per-job", 1),
    chunkIndex: count("chunk-index", 0),
    chunkCount: count("chunk-count", 1),
    outputDir: values.get("output-dir"),
    artifactsDir: values.get("artifacts-dir"),
    removeFragments: flags.has("remove-fragments"),
  };
}
