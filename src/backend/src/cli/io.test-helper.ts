import color from "picocolors";
import type { CliIO } from "./io";

export function captureIO(): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { out: line => out.push(line), err: line => err.push(line), colors: color.createColors(false) },
    out,
    err,
  };
}
