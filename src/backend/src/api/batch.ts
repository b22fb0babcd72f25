import { Router } from "express";
import type { ConverterService } from "../modules/converter/converterService";
import { readBase, sendError } from "./errors";

export function makeBatchRouter(converter: ConverterService) {
  const router = Router();

  // postBatch: per-line failures are part of the results
  router.post("/", (req, res) => {
    const { text, toBase } = req.body ?? {};
    try {
      const results = converter.batch(String(text ?? ""), readBase(toBase, 10));
      res.json({ results });
    } catch (e) {
      return sendError(res, e, "batch failed");
    }
  });

  return router;
}
