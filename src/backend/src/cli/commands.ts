// backend/src/cli/commands.ts
import { readFile, writeFile } from "node:fs/promises";
import {
  NAMED_BASES,
  baseName,
  baseToDecimal,
  decimalToBase,
  detectBase,
  evaluate,
  formatBatchResults,
  formatExpression,
  resolveBase,
  runBatch,
  validate,
} from "@base-converter/shared";
import { loadConfig } from "../config";
import { startServer } from "../server";
import { reportError, type CliIO } from "./io";

export type ConvertArgs = { number: string; from?: string; to?: string; all?: boolean };

export function convertCommand(args: ConvertArgs, io: CliIO): number {
  try {
    const from = args.from && args.from !== "auto" ? resolveBase(args.from) : detectBase(args.number);
    const value = baseToDecimal(args.number, from);

    if (args.all) {
      io.out(io.colors.bold(`${args.number.trim()} (${baseName(from)})`));
      for (const nb of NAMED_BASES) {
        io.out(`  ${nb.name.padEnd(12)} ${decimalToBase(value, nb.base)}`);
      }
      return 0;
    }

    io.out(decimalToBase(value, resolveBase(args.to ?? "10")));
    return 0;
  } catch (e) {
    return reportError(io, e);
  }
}

export function detectCommand(number: string, io: CliIO): number {
  const base = detectBase(number);
  io.out(`${base} (${baseName(base)})`);
  return 0;
}

export function validateCommand(number: string, base: string, io: CliIO): number {
  try {
    const b = resolveBase(base);
    validate(number, b);
    io.out(io.colors.green(`"${number}" is a valid ${baseName(b)} number`));
    return 0;
  } catch (e) {
    return reportError(io, e);
  }
}

export type CalcArgs = { left: string; op: string; right: string; base?: string; resultBase?: string };

export function calcCommand(args: CalcArgs, io: CliIO): number {
  try {
    const base = resolveBase(args.base ?? "10");
    const resultBase = args.resultBase ? resolveBase(args.resultBase) : base;
    const r = evaluate(args.op, { number: args.left, base }, { number: args.right, base }, resultBase);
    io.out(formatExpression(r));
    return 0;
  } catch (e) {
    return reportError(io, e);
  }
}

export function listBasesCommand(io: CliIO): number {
  for (const nb of NAMED_BASES) {
    io.out(`${String(nb.base).padStart(2)}  ${nb.name.padEnd(12)} ${nb.prefix ?? ""}`.trimEnd());
  }
  return 0;
}

export type BatchArgs = { file: string; to?: string; output?: string };

// exit code 1 when any line failed
export async function batchCommand(args: BatchArgs, io: CliIO): Promise<number> {
  try {
    const text = await readFile(args.file, "utf8");
    const results = runBatch(text, { defaultTarget: resolveBase(args.to ?? "10") });
    const report = formatBatchResults(results);
    const failed = results.filter(r => !r.ok).length;

    if (args.output) {
      await writeFile(args.output, report + "\n", "utf8");
      io.out(`Wrote ${results.length} result(s) to ${args.output}`);
    } else if (report) {
      io.out(report);
    }

    if (failed > 0) {
      io.err(io.colors.yellow(`${failed} of ${results.length} line(s) failed`));
      return 1;
    }
    return 0;
  } catch (e) {
    return reportError(io, e);
  }
}

export async function guiCommand(args: { port?: number }, io: CliIO): Promise<number> {
  try {
    const config = loadConfig();
    await startServer({ ...config, port: args.port ?? config.port });
    io.out("GUI server running. Press Ctrl+C to stop.");
    return 0;
  } catch (e) {
    return reportError(io, e);
  }
}
