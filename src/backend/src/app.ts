// backend/src/app.ts
import fs from "node:fs";
import express from "express";
import cors from "cors";
import type { Request, Response, NextFunction } from "express";
import { makeV1Router } from "./api/v1";
import type { ConverterService } from "./modules/converter/converterService";
import type { HistoryStore } from "./types/history";

export function createApp(deps: {
  converter: ConverterService;
  history: HistoryStore;
  corsOrigin?: string;
  staticDir?: string;
}) {
  const app = express();
  app.use(cors({ origin: deps.corsOrigin ?? "*" }));
  app.use(express.json());

  app.use("/api/v1", makeV1Router(deps));

  // built GUI, when there is one
  if (deps.staticDir && fs.existsSync(deps.staticDir)) {
    app.use(express.static(deps.staticDir));
  }

  // body-parser rejects malformed JSON before any router sees it
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) return res.status(400).json({ error: "Malformed JSON body" });
    next(err);
  });

  return app;
}
