import color from "picocolors";

export type Colors = ReturnType<typeof color.createColors>;

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  colors: Colors;
};

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  colors: color,
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// prints the failure, returns the exit code
export function reportError(io: CliIO, e: unknown): number {
  io.err(io.colors.red(`Error: ${errorMessage(e)}`));
  return 1;
}
