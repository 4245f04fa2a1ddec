export type TsvTable = {
  header: string[];
  rows: string[][];
};

const FIELD_BREAK = /[\t\r\n]+/gu;

export function splitTsvLines(content: string): string[] {
  return content
    .split("\n")
    .map((line) => line.replace(/\r$/u, ""))
    .filter((line) => line.trim().length > 0);
}

export function parseTsv(content: string): TsvTable {
  const [headerLine, ...dataLines] = splitTsvLines(content);
  if (headerLine === undefined) {
    return { header: [], rows: [] };
  }
  return {
    header: headerLine.split("\t").map((name) => name.trim()),
    rows: dataLines.map((line) => line.split("\t")),
  };
}

export function rowToRecord(header: readonly string[], fields: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  header.forEach((name, index) => {
    const value = fields[index];
    if (value !== undefined) {
      record[name] = value.trim();
    }
  });
  return record;
}

export function formatTsvRow(values: ReadonlyArray<string | number>): string {
  return values.map((value) => String(value).replace(FIELD_BREAK, " ")).join("\t");
}

export function formatTsvDocument(
  header: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number>>,
): string {
  return [formatTsvRow(header), ...rows.map((row) => formatTsvRow(row))].join("\n") + "\n";
}
