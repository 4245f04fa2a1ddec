import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { isValid } from "@busco-tracker/contracts";
import {
  BatchError,
  CATALOG_HEADER,
  ID_COLUMN,
  LEGACY_OUTCOME_LOG_HEADER,
  OUTCOME_LOG_HEADER,
  SUCCESS_LOG_HEADER,
  SUCCESS_STEP,
  formatTsvRow,
  rowToRecord,
  splitTsvLines,
  type Logger,
  type OutcomeResult,
  type WorkItem,
} from "@busco-tracker/shared";
import type { StatePaths } from "./config.js";

export type LogRow = Readonly<Record<string, string | number>>;

export type OutcomeEntry = {
  annotation_id: string;
  run_at: string;
  result: OutcomeResult;
  step: string;
};

export type StateSnapshot = {
  catalog: Map<string, WorkItem>;
  successIds: Set<string>;
  outcomeIds: Set<string>;
};

export interface StateStore {
  loadCatalog(): Map<string, WorkItem>;
  successIds(): Set<string>;
  outcomeIds(): Set<string>;
  outcomeKeys(): Set<string>;
  outcomeEntries(): OutcomeEntry[];
  snapshot(): StateSnapshot;
  ensureLogs(): void;
  appendSuccess(rows: readonly LogRow[]): number;
  appendOutcomes(rows: readonly LogRow[]): number;
}

export function outcomeKey(annotationId: string, runAt: string): string {
  return `${annotationId}\t${runAt}`;
}

export function inferOutcomeResult(step: string): OutcomeResult {
  return step === SUCCESS_STEP ? "success" : "fail";
}

type LogTable = {
  hasHeader: boolean;
  columns: readonly string[];
  rows: string[][];
};

// Recomputed from `step` on read, so a layout without it loses nothing.
const DERIVED_COLUMNS: ReadonlySet<string> = new Set(["result"]);

function readIfExists(path: string): string | undefined {
  return existsSync(path) ? readFileSync(path, "utf-8") : undefined;
}

function firstField(line: string): string {
  return (line.split("\t")[0] ?? "").trim();
}

/**
 * A log has a header when its first field is the id column. Headerless logs
 * are read positionally in `headerlessColumns`.
 */
function toLogTable(content: string, headerlessColumns: readonly string[]): LogTable {
  const lines = splitTsvLines(content);
  const [first] = lines;
  if (first !== undefined && firstField(first) === ID_COLUMN) {
    return {
      hasHeader: true,
      columns: first.split("\t").map((name) => name.trim()),
      rows: lines.slice(1).map((line) => line.split("\t")),
    };
  }
  return { hasHeader: false, columns: headerlessColumns, rows: lines.map((line) => line.split("\t")) };
}

export class TsvStateStore implements StateStore {
  constructor(
    private readonly paths: StatePaths,
    private readonly logger: Logger,
  ) {}

  loadCatalog(): Map<string, WorkItem> {
    const content = readIfExists(this.paths.annotations);
    if (content === undefined) {
      throw new BatchError("missing_catalog", `annotations catalog not found: ${this.paths.annotations}`, {
        path: this.paths.annotations,
      });
    }

    const catalog = new Map<string, WorkItem>();
    for (const line of splitTsvLines(content)) {
      if (firstField(line) === ID_COLUMN) continue;
      const record = rowToRecord(CATALOG_HEADER, line.split("\t"));
      const item: WorkItem = {
        annotation_id: record.annotation_id ?? "",
        annotation_url: record.annotation_url ?? "",
        assembly_url: record.assembly_url ?? "",
      };
      if (!isValid("catalogRow", item)) {
        this.logger.warn({ line }, "skipping malformed catalog row");
        continue;
      }
      catalog.set(item.annotation_id, item);
    }
    return catalog;
  }

  successIds(): Set<string> {
    return this.loadIdColumn(this.paths.busco);
  }

  outcomeIds(): Set<string> {
    return this.loadIdColumn(this.paths.errorLog);
  }

  outcomeKeys(): Set<string> {
    const keys = new Set<string>();
    for (const record of this.outcomeRecords()) {
      if (record.annotation_id && record.run_at) {
        keys.add(outcomeKey(record.annotation_id, record.run_at));
      }
    }
    return keys;
  }

  outcomeEntries(): OutcomeEntry[] {
    const entries: OutcomeEntry[] = [];
    for (const record of this.outcomeRecords()) {
      const annotationId = record.annotation_id;
      const runAt = record.run_at;
      const step = record.step;
      if (!annotationId || !runAt || step === undefined) continue;
      entries.push({
        annotation_id: annotationId,
        run_at: runAt,
        result: record.result === "success" || record.result === "fail" ? record.result : inferOutcomeResult(step),
        step,
      });
    }
    return entries;
  }

  snapshot(): StateSnapshot {
    return {
      catalog: this.loadCatalog(),
      successIds: this.successIds(),
      outcomeIds: this.outcomeIds(),
    };
  }

  ensureLogs(): void {
    this.ensureHeader(this.paths.busco, SUCCESS_LOG_HEADER);
    this.ensureHeader(this.paths.errorLog, OUTCOME_LOG_HEADER);
  }

  appendSuccess(rows: readonly LogRow[]): number {
    return this.appendRows(this.paths.busco, SUCCESS_LOG_HEADER, SUCCESS_LOG_HEADER, rows);
  }

  appendOutcomes(rows: readonly LogRow[]): number {
    return this.appendRows(this.paths.errorLog, OUTCOME_LOG_HEADER, LEGACY_OUTCOME_LOG_HEADER, rows);
  }

  private outcomeRecords(): Array<Record<string, string>> {
    const content = readIfExists(this.paths.errorLog);
    if (content === undefined) return [];
    const table = toLogTable(content, LEGACY_OUTCOME_LOG_HEADER);
    return table.rows.map((fields) => rowToRecord(table.columns, fields));
  }

  private loadIdColumn(path: string): Set<string> {
    const ids = new Set<string>();
    const content = readIfExists(path);
    if (content === undefined) {
      this.logger.info({ path }, "state file not found, treating as empty");
      return ids;
    }

    for (const fields of toLogTable(content, [ID_COLUMN]).rows) {
      const id = (fields[0] ?? "").trim();
      if (id) ids.add(id);
    }
    return ids;
  }

  private ensureHeader(path: string, header: readonly string[]): void {
    if (existsSync(path)) return;
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, formatTsvRow(header) + "\n", "utf-8");
  }

  // Rows are projected onto the columns already on disk, so a legacy layout keeps its shape.
  private appendRows(
    path: string,
    header: readonly string[],
    headerlessColumns: readonly string[],
    rows: readonly LogRow[],
  ): number {
    if (rows.length === 0) return 0;

    const content = readIfExists(path) ?? "";
    const table = toLogTable(content, headerlessColumns);
    const isEmpty = !table.hasHeader && table.rows.length === 0;
    const columns = isEmpty ? header : table.columns;

    const dropped = header.filter((name) => !columns.includes(name) && !DERIVED_COLUMNS.has(name));
    if (dropped.length > 0) {
      this.logger.warn({ path, dropped }, "log has no column for some fields, their values are not written");
    }

    const lines = rows.map((row) => formatTsvRow(columns.map((name) => row[name] ?? "")));
    if (isEmpty) {
      lines.unshift(formatTsvRow(columns));
    }
    const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";

    mkdirSync(dirname(path), { recursive: true });
    appendFileSync(path, separator + lines.join("\n") + "\n", "utf-8");
    return rows.length;
  }
}
