// backend/src/config.ts
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./types/errors";

export type AppConfig = {
  port: number;
  historyLimit: number;
  corsOrigin: string;
  staticDir: string; // built GUI, served when present
};

// src/backend/src -> src/frontend/dist
const DEFAULT_STATIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../frontend/dist");

function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFromEnv(env, "PORT", 3001, 0, 65535),
    historyLimit: intFromEnv(env, "HISTORY_LIMIT", 500, 1, 1_000_000),
    corsOrigin: env.CORS_ORIGIN || "*",
    staticDir: env.STATIC_DIR || DEFAULT_STATIC_DIR,
  };
}
