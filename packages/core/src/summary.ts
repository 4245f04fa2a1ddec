import { readFileSync } from "node:fs";
import fg from "fast-glob";
import type { BuscoMetrics } from "@busco-tracker/shared";

type PercentField = "complete" | "single" | "duplicated" | "fragmented" | "missing";

const PERCENT_PATTERNS: Record<PercentField, RegExp> = {
  complete: /C:(\d+(?:\.\d+)?)%/u,
  single: /S:(\d+(?:\.\d+)?)%/u,
  duplicated: /D:(\d+(?:\.\d+)?)%/u,
  fragmented: /F:(\d+(?:\.\d+)?)%/u,
  missing: /M:(\d+(?:\.\d+)?)%/u,
};

const LINEAGE_PATTERN = /lineage dataset is: (\S+)/u;
const COUNT_PATTERN = /(\d+)\s+total BUSCO/iu;

function matchGroup(pattern: RegExp, content: string): string | undefined {
  return pattern.exec(content)?.[1];
}

// Absent fields fall back to "" for the lineage and 0 for every number.
export function parseBuscoSummary(content: string): BuscoMetrics {
  const percent = (field: PercentField): number => {
    const raw = matchGroup(PERCENT_PATTERNS[field], content);
    return raw === undefined ? 0 : Number.parseFloat(raw);
  };
  const count = matchGroup(COUNT_PATTERN, content);

  return {
    lineage: matchGroup(LINEAGE_PATTERN, content) ?? "",
    busco_count: count === undefined ? 0 : Number.parseInt(count, 10),
    complete: percent("complete"),
    single: percent("single"),
    duplicated: percent("duplicated"),
    fragmented: percent("fragmented"),
    missing: percent("missing"),
  };
}

export function findSummaryFile(outputDir: string): string | undefined {
  return fg.sync("short_summary.*.txt", { cwd: outputDir, absolute: true, onlyFiles: true }).sort()[0];
}

export function readBuscoSummary(outputDir: string): BuscoMetrics {
  const summaryFile = findSummaryFile(outputDir);
  if (!summaryFile) {
    throw new Error(`BUSCO summary file not found in ${outputDir}`);
  }
  return parseBuscoSummary(readFileSync(summaryFile, "utf-8"));
}
