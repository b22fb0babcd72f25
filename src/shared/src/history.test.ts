import { describe, expect, it } from "vitest";

import { exportHistory, isExportFormat, type HistoryEntry } from "./history.js";

const ENTRIES: HistoryEntry[] = [
  { id: "a1", kind: "convert", input: "FF", fromBase: 16, toBase: 10, output: "255", timestamp: 0 },
  { id: "a2", kind: "arithmetic", input: "FF + 1", fromBase: 16, toBase: 16, output: "100", timestamp: 1000 },
];

describe("exportHistory", () => {
  it("writes csv with a header and ISO timestamps", () => {
    expect(exportHistory(ENTRIES, "csv")).toBe(
      [
        "id,kind,input,fromBase,toBase,output,timestamp",
        "a1,convert,FF,16,10,255,1970-01-01T00:00:00.000Z",
        "a2,arithmetic,FF + 1,16,16,100,1970-01-01T00:00:01.000Z",
      ].join("\n")
    );
  });

  it("quotes csv fields that need it", () => {
    const odd: HistoryEntry = { ...ENTRIES[0], input: 'a,"b' };
    expect(exportHistory([odd], "csv").split("\n")[1]).toBe('a1,convert,"a,""b",16,10,255,1970-01-01T00:00:00.000Z');
  });

  it("writes one text line per entry", () => {
    expect(exportHistory(ENTRIES, "text")).toBe(
      [
        "[1970-01-01T00:00:00.000Z] FF (base 16) -> 255 (base 10)",
        "[1970-01-01T00:00:01.000Z] FF + 1 = 100 (base 16)",
      ].join("\n")
    );
  });

  it("writes json that parses back to the entries", () => {
    expect(JSON.parse(exportHistory(ENTRIES, "json"))).toEqual(ENTRIES);
  });
});

describe("isExportFormat", () => {
  it("accepts only known formats", () => {
    expect(isExportFormat("csv")).toBe(true);
    expect(isExportFormat("xml")).toBe(false);
    expect(isExportFormat(undefined)).toBe(false);
  });
});
