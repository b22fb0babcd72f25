// shared/src/history.ts

export type HistoryKind = "convert" | "arithmetic";

export type HistoryEntry = Readonly<{
  id: string;
  kind: HistoryKind;
  input: string; // the number, or the expression for arithmetic
  fromBase: number;
  toBase: number;
  output: string;
  timestamp: number;
}>;

export type ExportFormat = "json" | "csv" | "text";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "csv", "text"];

export const EXPORT_CONTENT_TYPES: Readonly<Record<ExportFormat, string>> = {
  json: "application/json",
  csv: "text/csv",
  text: "text/plain",
};

const CSV_COLUMNS = ["id", "kind", "input", "fromBase", "toBase", "output", "timestamp"] as const;

export function isExportFormat(x: unknown): x is ExportFormat {
  return typeof x === "string" && (EXPORT_FORMATS as readonly string[]).includes(x);
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvRow(e: HistoryEntry): string {
  return CSV_COLUMNS.map(col => {
    if (col === "timestamp") return new Date(e.timestamp).toISOString();
    return csvField(String(e[col]));
  }).join(",");
}

export function formatHistoryEntry(e: HistoryEntry): string {
  const when = new Date(e.timestamp).toISOString();
  if (e.kind === "arithmetic") {
    return `[${when}] ${e.input} = ${e.output} (base ${e.toBase})`;
  }
  return `[${when}] ${e.input} (base ${e.fromBase}) -> ${e.output} (base ${e.toBase})`;
}

export function exportHistory(entries: readonly HistoryEntry[], format: ExportFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(entries, null, 2);
    case "csv":
      return [CSV_COLUMNS.join(","), ...entries.map(csvRow)].join("\n");
    case "text":
      return entries.map(formatHistoryEntry).join("\n");
  }
}
