// backend/src/cli/index.ts
import yargs from "yargs";
import {
  batchCommand,
  calcCommand,
  convertCommand,
  detectCommand,
  guiCommand,
  listBasesCommand,
  validateCommand,
} from "./commands";
import { consoleIO, type CliIO } from "./io";
import { runRepl } from "./repl";

/**
 * Parses `argv` (without the node and script entries) and runs one command.
 * Resolves with the exit code; `gui` leaves its server running.
 * Operands stay strings ("1e5" is hex digits, not 100000), and a dash followed
 * by anything that is not a known flag is a negative number: `calc -5 + 3`.
 * A negative number that spells known flags ("-ab") still needs `--`.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  let code = 0;
  const done = (c: number) => {
    code = c;
  };

  await yargs(argv)
    .scriptName("base-converter")
    .parserConfiguration({
      "parse-numbers": false,
      "parse-positional-numbers": false,
      "unknown-options-as-args": true,
    })
    .version("1.0.0")
    .option("list-bases", { type: "boolean", describe: "List the named bases" })
    .option("gui", { type: "boolean", describe: "Start the web GUI" })
    .command(
      "$0 [number]",
      "Convert a number between bases",
      y =>
        y
          .positional("number", { type: "string", describe: "Number to convert (prefix 0x/0b/0o to detect)" })
          .option("from", { alias: "f", type: "string", describe: "Source base (number or name); detected when omitted" })
          .option("to", { alias: "t", type: "string", default: "10", describe: "Target base" })
          .option("all", { alias: "a", type: "boolean", describe: "Show the number in every named base" }),
      async args => {
        if (args["list-bases"]) return done(listBasesCommand(io));
        if (args.gui) return done(await guiCommand({}, io));
        if (args.number === undefined) {
          io.err("Missing number. Run with --help for usage.");
          return done(1);
        }
        done(convertCommand({ number: args.number, from: args.from, to: args.to, all: args.all }, io));
      }
    )
    .command(
      "calc <left> <op> <right>",
      "Arithmetic on based numbers (+ - * / % ^)",
      y =>
        y
          .positional("left", { type: "string", demandOption: true })
          .positional("op", { type: "string", demandOption: true })
          .positional("right", { type: "string", demandOption: true })
          .option("base", { alias: "b", type: "string", default: "10", describe: "Base of both operands" })
          .option("result-base", { alias: "r", type: "string", describe: "Base of the result (defaults to --base)" }),
      args => {
        done(
          calcCommand(
            { left: args.left, op: args.op, right: args.right, base: args.base, resultBase: args["result-base"] },
            io
          )
        );
      }
    )
    .command(
      "detect <number>",
      "Guess the base from a 0x/0b/0o prefix",
      y => y.positional("number", { type: "string", demandOption: true }),
      args => {
        done(detectCommand(args.number, io));
      }
    )
    .command(
      "validate <number>",
      "Check that a number is valid in a base",
      y =>
        y
          .positional("number", { type: "string", demandOption: true })
          .option("base", { alias: "b", type: "string", demandOption: true }),
      args => {
        done(validateCommand(args.number, args.base, io));
      }
    )
    .command(
      "batch <file>",
      "Convert every line of a file (number [from] [to])",
      y =>
        y
          .positional("file", { type: "string", demandOption: true })
          .option("to", { alias: "t", type: "string", default: "10", describe: "Target base for lines without one" })
          .option("output", { alias: "o", type: "string", describe: "Write the results to a file" }),
      async args => {
        done(await batchCommand({ file: args.file, to: args.to, output: args.output }, io));
      }
    )
    .command("bases", "List the named bases", {}, () => {
      done(listBasesCommand(io));
    })
    .command(
      ["interactive", "i"],
      "Interactive prompt with history and export",
      {},
      async () => {
        await runRepl(io);
        done(0);
      }
    )
    .command(
      "gui",
      "Start the web GUI",
      y => y.option("port", { alias: "p", type: "number", describe: "Port to listen on" }),
      async args => {
        done(await guiCommand({ port: args.port }, io));
      }
    )
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      io.err(msg || (err ? err.message : "Invalid arguments"));
      done(1);
    })
    .help()
    .parseAsync();

  return code;
}
