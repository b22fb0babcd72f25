// backend/src/api/v1.ts
import { Router } from "express";
import type { ConverterService } from "../modules/converter/converterService";
import type { HistoryStore } from "../types/history";

import { makeHealthRouter } from "./health";
import { makeBasesRouter } from "./bases";
import { makeConvertRouter } from "./convert";
import { makeCalculateRouter } from "./calculate";
import { makeBatchRouter } from "./batch";
import { makeHistoryRouter } from "./history";

export function makeV1Router(deps: { converter: ConverterService; history: HistoryStore }) {
  const router = Router();

  router.use("/health", makeHealthRouter());
  router.use("/bases", makeBasesRouter());
  router.use("/convert", makeConvertRouter(deps.converter));
  router.use("/calculate", makeCalculateRouter(deps.converter));
  router.use("/batch", makeBatchRouter(deps.converter));
  router.use("/history", makeHistoryRouter(deps.history));

  return router;
}
