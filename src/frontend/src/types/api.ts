import type { ConversionErrorCode, ExportFormat, HistoryEntry, Operation } from "@base-converter/shared";

export type ConvertRequest = { number: string; fromBase?: number; toBase: number };

export type ConvertResponse = {
  input: string;
  fromBase: number;
  toBase: number;
  output: string;
  decimal: string;
  detected: boolean;
};

export type CalculateRequest = { operation: Operation; left: string; right: string; base: number; resultBase?: number };

export type CalculateResponse = {
  operation: Operation;
  expression: string;
  output: string;
  decimal: string;
  base: number;
};

export type HistoryResponse = { entries: HistoryEntry[] };

export type ErrorBody = { error: string; code?: ConversionErrorCode };

export type { ExportFormat, HistoryEntry };
