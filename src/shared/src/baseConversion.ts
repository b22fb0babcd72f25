// shared/src/baseConversion.ts
import { EmptyInput, InvalidBase, InvalidDigit, MalformedSign, UnsupportedOperation } from "./errors.js";

export const DIGIT_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const MIN_BASE = 2;
export const MAX_BASE = 36;

// radix prefixes, lowercase
export const PREFIXES: Readonly<Record<string, number>> = {
  "0x": 16,
  "0b": 2,
  "0o": 8,
};

const VALUE_OF: ReadonlyMap<string, number> = (() => {
  const m = new Map<string, number>();
  Array.from(DIGIT_ALPHABET).forEach((sym, i) => {
    m.set(sym, i);
    m.set(sym.toLowerCase(), i);
  });
  return m;
})();

export function assertBase(base: number): void {
  if (!Number.isInteger(base) || base < MIN_BASE || base > MAX_BASE) {
    throw new InvalidBase(base);
  }
}

export function digitValue(ch: string): number | undefined {
  return VALUE_OF.get(ch);
}

// Only strips a prefix naming this very base: "0b1" in base 16 is three hex digits.
function stripPrefix(s: string, base: number): string {
  const prefix = s.slice(0, 2).toLowerCase();
  return PREFIXES[prefix] === base ? s.slice(2) : s;
}

/**
 * Validates `input` as a number in `base` and returns its canonical text:
 * uppercase digits, no '+', no prefix, no leading zeros, "-" only for non-zero values.
 */
export function normalizeNumber(input: string, base: number): string {
  assertBase(base);

  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new EmptyInput();
  }

  let s = trimmed;
  let negative = false;
  if (s[0] === "-" || s[0] === "+") {
    negative = s[0] === "-";
    s = s.slice(1);
  }
  if (s.includes("-") || s.includes("+")) {
    throw new MalformedSign(input);
  }

  s = stripPrefix(s, base);
  if (s.length === 0) {
    throw new EmptyInput(`Missing digits in "${trimmed}".`);
  }

  const offset = trimmed.length - s.length;
  const out: string[] = [];
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    const v = digitValue(ch);
    if (v === undefined || v >= base) {
      throw new InvalidDigit(ch, base, offset + i);
    }
    out.push(DIGIT_ALPHABET[v]);
  }

  // keep at least one digit
  let body = out.join("");
  while (body.length > 1 && body.startsWith("0")) {
    body = body.slice(1);
  }

  return negative && body !== "0" ? `-${body}` : body;
}

export function validate(input: string, base: number): void {
  normalizeNumber(input, base);
}

// Check validity without throwing.
export function isValid(input: string, base: number): boolean {
  try {
    validate(input, base);
    return true;
  } catch {
    return false;
  }
}

export function baseToDecimal(input: string, base: number): bigint {
  const norm = normalizeNumber(input, base);

  let s = norm;
  let negative = false;
  if (s[0] === "-") {
    negative = true;
    s = s.slice(1);
  }

  let acc = 0n;
  const b = BigInt(base);
  for (const ch of s) {
    acc = acc * b + BigInt(DIGIT_ALPHABET.indexOf(ch));
  }
  return negative ? -acc : acc;
}

export function decimalToBase(value: bigint | number, base: number): string {
  assertBase(base);

  let n: bigint;
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new UnsupportedOperation(`Only safe integers can be converted, got ${value}.`);
    }
    n = BigInt(value);
  } else {
    n = value;
  }

  // bigint toString uses the same 0-9a-z digits, lowercase
  return n.toString(base).toUpperCase();
}

export function convertBase(input: string, sourceBase: number, targetBase: number): string {
  assertBase(targetBase);
  return decimalToBase(baseToDecimal(input, sourceBase), targetBase);
}

/**
 * Guesses the base from a radix prefix after an optional sign.
 * Anything without a prefix is decimal, whatever its digits look like.
 */
export function detectBase(input: string): number {
  let s = input.trim();
  if (s[0] === "-" || s[0] === "+") s = s.slice(1);
  return PREFIXES[s.slice(0, 2).toLowerCase()] ?? 10;
}

export function parseDetected(input: string): { base: number; value: bigint } {
  const base = detectBase(input);
  return { base, value: baseToDecimal(input, base) };
}
