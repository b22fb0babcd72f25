// shared/src/arithmetic.ts
import { assertBase, baseToDecimal, decimalToBase } from "./baseConversion.js";
import { DivisionByZero, UnsupportedOperation } from "./errors.js";

export type Operation = "add" | "subtract" | "multiply" | "divide" | "modulo" | "power";

export const OPERATIONS: readonly Operation[] = ["add", "subtract", "multiply", "divide", "modulo", "power"];

export const OPERATION_SYMBOLS: Readonly<Record<Operation, string>> = {
  add: "+",
  subtract: "-",
  multiply: "*",
  divide: "/",
  modulo: "%",
  power: "^",
};

export const MAX_EXPONENT = 100_000n;

// upper bound on bitLength(|base|) * exponent for power
export const MAX_POWER_BITS = 1_000_000n;

const OPERATION_ALIASES: ReadonlyMap<string, Operation> = new Map<string, Operation>([
  ["+", "add"],
  ["plus", "add"],
  ["-", "subtract"],
  ["sub", "subtract"],
  ["minus", "subtract"],
  ["*", "multiply"],
  ["x", "multiply"],
  ["mul", "multiply"],
  ["times", "multiply"],
  ["/", "divide"],
  ["div", "divide"],
  ["%", "modulo"],
  ["mod", "modulo"],
  ["^", "power"],
  ["**", "power"],
  ["pow", "power"],
]);

export type Operand = Readonly<{ number: string; base: number }>;

export type ArithmeticResult = Readonly<{
  operation: Operation;
  left: bigint;
  right: bigint;
  value: bigint;
  base: number; // base of `text`
  text: string;
}>;

export function isOperation(x: string): x is Operation {
  return (OPERATIONS as readonly string[]).includes(x);
}

export function parseOperation(text: string): Operation {
  const s = text.trim().toLowerCase();
  if (isOperation(s)) return s;
  const op = OPERATION_ALIASES.get(s);
  if (!op) throw new UnsupportedOperation(`Unknown operation: "${text}".`);
  return op;
}

function bitLength(n: bigint): bigint {
  return BigInt((n < 0n ? -n : n).toString(2).length);
}

function power(a: bigint, b: bigint): bigint {
  if (b < 0n) throw new UnsupportedOperation("Negative exponents are not supported in integer arithmetic.");
  if (b > MAX_EXPONENT) throw new UnsupportedOperation(`Exponent exceeds ${MAX_EXPONENT}.`);
  // 0, 1 and -1 stay small whatever the exponent
  if (a >= -1n && a <= 1n) return a ** b;
  if (bitLength(a) * b > MAX_POWER_BITS) {
    throw new UnsupportedOperation(`Result of the power would exceed ${MAX_POWER_BITS} bits.`);
  }
  return a ** b;
}

export function applyOperation(op: Operation, a: bigint, b: bigint): bigint {
  switch (op) {
    case "add":
      return a + b;
    case "subtract":
      return a - b;
    case "multiply":
      return a * b;
    case "divide":
      if (b === 0n) throw new DivisionByZero();
      return a / b;
    case "modulo":
      if (b === 0n) throw new DivisionByZero("Modulo by zero");
      return a % b;
    case "power":
      return power(a, b);
  }
}

export function evaluate(
  op: Operation | string,
  left: Operand,
  right: Operand,
  resultBase: number
): ArithmeticResult {
  const operation = parseOperation(op);
  assertBase(resultBase);
  const a = baseToDecimal(left.number, left.base);
  const b = baseToDecimal(right.number, right.base);
  const value = applyOperation(operation, a, b);
  return { operation, left: a, right: b, value, base: resultBase, text: decimalToBase(value, resultBase) };
}

export function arithmetic(op: Operation | string, a: string, b: string, base: number): string {
  return evaluate(op, { number: a, base }, { number: b, base }, base).text;
}

// "FF + 1 = 100", operands and result in the result base
export function formatExpression(r: ArithmeticResult): string {
  const a = decimalToBase(r.left, r.base);
  const b = decimalToBase(r.right, r.base);
  return `${a} ${OPERATION_SYMBOLS[r.operation]} ${b} = ${r.text}`;
}
