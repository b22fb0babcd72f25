import { describe, expect, it } from "vitest";

import { formatBatchResult, formatBatchResults, runBatch } from "./batch.js";

const SAMPLE = [
  "# number from to",
  "1010 2 10",
  "",
  "FF,16,2",
  "0x1F",
  "777 oct",
  "G 16",
  "1 2 3 4",
].join("\n");

describe("runBatch", () => {
  it("converts each line and keeps going past failures", () => {
    const results = runBatch(SAMPLE);
    expect(results.map(r => r.line)).toEqual([2, 4, 5, 6, 7, 8]);

    expect(results[0]).toEqual({ ok: true, line: 2, input: "1010 2 10", fromBase: 2, toBase: 10, output: "10" });
    expect(results[1]).toMatchObject({ ok: true, output: "11111111", fromBase: 16, toBase: 2 });
    expect(results[2]).toMatchObject({ ok: true, output: "31", fromBase: 16, toBase: 10 });
    expect(results[3]).toMatchObject({ ok: true, output: "511", fromBase: 8 });
    expect(results[4]).toMatchObject({ ok: false, code: "InvalidDigit" });
    expect(results[5]).toEqual({
      ok: false,
      line: 8,
      input: "1 2 3 4",
      code: "UnsupportedOperation",
      message: 'Expected "number [from] [to]", got 4 fields.',
    });
  });

  it("uses the default target when none is given", () => {
    const [r] = runBatch("255", { defaultTarget: 16 });
    expect(r).toMatchObject({ ok: true, output: "FF", fromBase: 10, toBase: 16 });
  });

  it("handles CRLF input", () => {
    expect(runBatch("1\r\n10 2\r\n").map(r => r.ok)).toEqual([true, true]);
  });
});

describe("formatBatchResults", () => {
  it("writes one line per result", () => {
    const results = runBatch("1010 2 10\nG 16");
    expect(formatBatchResult(results[0])).toBe("1010 2 10 -> 10 (base 2 -> base 10)");
    expect(formatBatchResults(results)).toBe(
      [
        "1010 2 10 -> 10 (base 2 -> base 10)",
        'line 2: G 16 -> InvalidDigit: Invalid digit "G" for base 16 at position 0.',
      ].join("\n")
    );
  });
});
