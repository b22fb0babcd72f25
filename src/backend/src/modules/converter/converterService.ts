import {
  baseToDecimal,
  decimalToBase,
  detectBase,
  evaluate,
  formatExpression,
  runBatch,
  assertBase,
  OPERATION_SYMBOLS,
  type ArithmeticResult,
  type BatchResult,
  type Operation,
} from "@base-converter/shared";
import type { HistoryStore } from "../../types/history";

export type ConversionOutcome = {
  input: string;
  fromBase: number;
  toBase: number;
  output: string;
  decimal: bigint;
  detected: boolean; // fromBase came from the prefix
};

export type CalculationOutcome = ArithmeticResult & { expression: string };

export class ConverterService {
  constructor(private readonly history: HistoryStore) {}

  async convert(number: string, fromBase: number | undefined, toBase: number): Promise<ConversionOutcome> {
    const detected = fromBase === undefined;
    const source = fromBase ?? detectBase(number);
    assertBase(toBase);

    const decimal = baseToDecimal(number, source);
    const output = decimalToBase(decimal, toBase);

    await this.history.record({ kind: "convert", input: number.trim(), fromBase: source, toBase, output });

    return { input: number, fromBase: source, toBase, output, decimal, detected };
  }

  async calculate(
    operation: Operation | string,
    left: string,
    right: string,
    base: number,
    resultBase: number = base
  ): Promise<CalculationOutcome> {
    const result = evaluate(operation, { number: left, base }, { number: right, base }, resultBase);
    const expression = formatExpression(result);

    // input keeps the operands as typed
    const input = `${left.trim()} ${OPERATION_SYMBOLS[result.operation]} ${right.trim()}`;
    await this.history.record({ kind: "arithmetic", input, fromBase: base, toBase: resultBase, output: result.text });

    return { ...result, expression };
  }

  batch(text: string, defaultTarget = 10): BatchResult[] {
    return runBatch(text, { defaultTarget });
  }
}
