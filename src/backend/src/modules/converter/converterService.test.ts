import { describe, expect, it } from "vitest";
import { DivisionByZero, InvalidDigit } from "@base-converter/shared";

import { InMemoryHistoryStore } from "../history/inMemoryHistory";
import { ConverterService } from "./converterService";

describe("ConverterService", () => {
  it("converts and records the conversion", async () => {
    const history = new InMemoryHistoryStore();
    const svc = new ConverterService(history);

    const out = await svc.convert(" ff ", 16, 2);
    expect(out).toEqual({ input: " ff ", fromBase: 16, toBase: 2, output: "11111111", decimal: 255n, detected: false });

    const [entry] = await history.query();
    expect(entry).toMatchObject({ kind: "convert", input: "ff", fromBase: 16, toBase: 2, output: "11111111" });
  });

  it("detects the source base when none is given", async () => {
    const svc = new ConverterService(new InMemoryHistoryStore());
    const out = await svc.convert("0o17", undefined, 10);
    expect(out).toMatchObject({ fromBase: 8, output: "15", detected: true });
  });

  it("records nothing when conversion fails", async () => {
    const history = new InMemoryHistoryStore();
    const svc = new ConverterService(history);
    await expect(svc.convert("G", 16, 10)).rejects.toThrow(InvalidDigit);
    await expect(svc.calculate("divide", "1", "0", 10)).rejects.toThrow(DivisionByZero);
    expect(await history.query()).toEqual([]);
  });

  it("calculates with a separate result base", async () => {
    const history = new InMemoryHistoryStore();
    const svc = new ConverterService(history);

    const r = await svc.calculate("*", "11", "11", 2, 10);
    expect(r.text).toBe("9");
    expect(r.expression).toBe("3 * 3 = 9");

    const [entry] = await history.query();
    expect(entry).toMatchObject({ kind: "arithmetic", input: "11 * 11", fromBase: 2, toBase: 10, output: "9" });
  });

  it("runs batches against the default target", () => {
    const svc = new ConverterService(new InMemoryHistoryStore());
    expect(svc.batch("255", 16)).toEqual([
      { ok: true, line: 1, input: "255", fromBase: 10, toBase: 16, output: "FF" },
    ]);
  });
});
