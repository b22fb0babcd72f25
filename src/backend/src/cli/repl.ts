// backend/src/cli/repl.ts
import readline from "node:readline";
import { writeFile } from "node:fs/promises";
import { baseName, detectBase, exportHistory, formatHistoryEntry, isExportFormat, resolveBase } from "@base-converter/shared";
import { ConverterService } from "../modules/converter/converterService";
import { InMemoryHistoryStore } from "../modules/history/inMemoryHistory";
import type { HistoryStore } from "../types/history";
import { reportError, type CliIO } from "./io";

export type ReplSession = {
  converter: ConverterService;
  history: HistoryStore;
};

export type LineOutcome = "continue" | "quit";

export function createSession(historyLimit = 500): ReplSession {
  const history = new InMemoryHistoryStore(historyLimit);
  return { history, converter: new ConverterService(history) };
}

// null once stdin is closed (Ctrl+D)
function question(rl: readline.Interface, q: string): Promise<string | null> {
  return new Promise(resolve => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(q, answer => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

export function printHelp(io: CliIO) {
  io.out(`
Commands:
  convert <number> [from|auto] [to]        convert (default: auto -> 10)
  calc <left> <op> <right> [base] [result] arithmetic: + - * / % ^ (default base 10)
  detect <number>                          guess the base from a 0x/0b/0o prefix
  history [n]                              show the last n entries (default 10)
  export <file> [json|csv|text]            write the history to a file
  clear                                    forget the history
  help                                     show this help
  quit                                     exit
`);
}

export async function handleLine(line: string, session: ReplSession, io: CliIO): Promise<LineOutcome> {
  const [cmdRaw, ...rest] = line.trim().split(/\s+/);
  const cmd = cmdRaw.toLowerCase();
  if (!cmd) return "continue";

  try {
    if (cmd === "quit" || cmd === "exit") return "quit";

    if (cmd === "help" || cmd === "h" || cmd === "?") {
      printHelp(io);
      return "continue";
    }

    if (cmd === "convert" || cmd === "c") {
      const [number, fromText, toText] = rest;
      if (!number) {
        io.out("Usage: convert <number> [from|auto] [to]");
        return "continue";
      }
      const from = fromText && fromText !== "auto" ? resolveBase(fromText) : undefined;
      const out = await session.converter.convert(number, from, resolveBase(toText ?? "10"));
      io.out(`${out.output}  (${baseName(out.fromBase)} -> ${baseName(out.toBase)}, dec ${out.decimal})`);
      return "continue";
    }

    if (cmd === "calc") {
      const [left, op, right, baseText, resultText] = rest;
      if (!left || !op || !right) {
        io.out("Usage: calc <left> <op> <right> [base] [result base]");
        return "continue";
      }
      const base = resolveBase(baseText ?? "10");
      const r = await session.converter.calculate(op, left, right, base, resultText ? resolveBase(resultText) : base);
      io.out(`${r.expression}  (dec ${r.value})`);
      return "continue";
    }

    if (cmd === "detect") {
      const base = detectBase(rest[0] ?? "");
      io.out(`${base} (${baseName(base)})`);
      return "continue";
    }

    if (cmd === "history") {
      const n = rest[0] ? Number(rest[0]) : 10;
      if (!Number.isInteger(n) || n < 1) {
        io.out("Usage: history [n]");
        return "continue";
      }
      const entries = await session.history.query({ limit: n });
      if (entries.length === 0) io.out("(no history)");
      // oldest of the slice first, like a scrollback
      [...entries].reverse().forEach(e => io.out(formatHistoryEntry(e)));
      return "continue";
    }

    if (cmd === "export") {
      const [file, formatText = "json"] = rest;
      if (!file || !isExportFormat(formatText)) {
        io.out("Usage: export <file> [json|csv|text]");
        return "continue";
      }
      const entries = await session.history.query({ limit: Number.MAX_SAFE_INTEGER });
      await writeFile(file, exportHistory([...entries].reverse(), formatText) + "\n", "utf8");
      io.out(`Exported ${entries.length} entr${entries.length === 1 ? "y" : "ies"} to ${file}`);
      return "continue";
    }

    if (cmd === "clear") {
      const removed = await session.history.clear();
      io.out(`Cleared ${removed} entr${removed === 1 ? "y" : "ies"}.`);
      return "continue";
    }

    io.out("Unknown command. Type 'help' for commands.");
  } catch (e) {
    reportError(io, e);
  }
  return "continue";
}

export async function runRepl(io: CliIO, session: ReplSession = createSession()): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  io.out("Base converter. Type 'help' for commands.");

  try {
    while (true) {
      const line = await question(rl, "> ");
      if (line === null) break;
      if ((await handleLine(line, session, io)) === "quit") break;
    }
  } finally {
    rl.close();
  }
  io.out("Bye.");
}
