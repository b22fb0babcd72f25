// shared/src/batch.ts
import { baseToDecimal, decimalToBase, detectBase } from "./baseConversion.js";
import { isConversionError, UnsupportedOperation, type ConversionErrorCode } from "./errors.js";
import { resolveBase } from "./systems.js";

export type BatchOptions = {
  defaultTarget?: number;
};

export type BatchSuccess = Readonly<{
  ok: true;
  line: number;
  input: string;
  fromBase: number;
  toBase: number;
  output: string;
}>;

export type BatchFailure = Readonly<{
  ok: false;
  line: number;
  input: string;
  code: ConversionErrorCode;
  message: string;
}>;

export type BatchResult = BatchSuccess | BatchFailure;

/**
 * Runs one conversion per line. A line is `number`, `number from` or
 * `number from to`, separated by whitespace or commas. Blank lines and
 * `#` comments are skipped; a failing line does not stop the batch.
 */
export function runBatch(text: string, options: BatchOptions = {}): BatchResult[] {
  const { defaultTarget = 10 } = options;
  const results: BatchResult[] = [];

  text.split(/\r?\n/).forEach((raw, idx) => {
    const input = raw.trim();
    if (!input || input.startsWith("#")) return;
    const line = idx + 1;

    try {
      const [number, fromText, toText, ...extra] = input.split(/[\s,]+/);
      if (extra.length > 0) {
        throw new UnsupportedOperation(`Expected "number [from] [to]", got ${3 + extra.length} fields.`);
      }
      const fromBase = fromText ? resolveBase(fromText) : detectBase(number);
      const toBase = toText ? resolveBase(toText) : resolveBase(defaultTarget);
      const output = decimalToBase(baseToDecimal(number, fromBase), toBase);
      results.push({ ok: true, line, input, fromBase, toBase, output });
    } catch (e) {
      if (isConversionError(e)) {
        results.push({ ok: false, line, input, code: e.code, message: e.message });
        return;
      }
      throw e;
    }
  });

  return results;
}

export function formatBatchResult(r: BatchResult): string {
  if (r.ok) {
    return `${r.input} -> ${r.output} (base ${r.fromBase} -> base ${r.toBase})`;
  }
  return `line ${r.line}: ${r.input} -> ${r.code}: ${r.message}`;
}

export function formatBatchResults(results: readonly BatchResult[]): string {
  return results.map(formatBatchResult).join("\n");
}
