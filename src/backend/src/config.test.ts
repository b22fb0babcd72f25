import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";
import { ConfigError } from "./types/errors";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(3001);
    expect(cfg.historyLimit).toBe(500);
    expect(cfg.corsOrigin).toBe("*");
    expect(cfg.staticDir.endsWith("dist")).toBe(true);
  });

  it("reads values from the environment", () => {
    const cfg = loadConfig({ PORT: "8080", HISTORY_LIMIT: "10", CORS_ORIGIN: "http://localhost:5173", STATIC_DIR: "/srv/gui" });
    expect(cfg).toEqual({ port: 8080, historyLimit: 10, corsOrigin: "http://localhost:5173", staticDir: "/srv/gui" });
  });

  it("rejects values that are not integers in range", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ConfigError);
    expect(() => loadConfig({ HISTORY_LIMIT: "0" })).toThrow('HISTORY_LIMIT must be an integer between 1 and 1000000, got "0"');
  });
});
