import type { Response } from "express";
import { InvalidBase, isConversionError, resolveBase } from "@base-converter/shared";
import { RecordNotFound } from "../types/errors";

// ConversionError -> 400, RecordNotFound -> 404, anything else is a bug
export function sendError(res: Response, e: unknown, fallback: string) {
  if (isConversionError(e)) return res.status(400).json({ error: e.message, code: e.code });
  if (e instanceof RecordNotFound) return res.status(404).json({ error: e.message });
  console.error(e);
  return res.status(500).json({ error: fallback });
}

export function readBase(value: unknown, fallback?: number): number {
  if (value === undefined || value === null || value === "") {
    if (fallback === undefined) throw new InvalidBase(String(value), "Missing base");
    return fallback;
  }
  if (typeof value === "number" || typeof value === "string") return resolveBase(value);
  throw new InvalidBase(String(value));
}
