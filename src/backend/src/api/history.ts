import { Router } from "express";
import { EXPORT_CONTENT_TYPES, exportHistory, isExportFormat, type ExportFormat } from "@base-converter/shared";
import type { HistoryStore } from "../types/history";
import { sendError } from "./errors";

const EXTENSIONS: Record<ExportFormat, string> = { json: "json", csv: "csv", text: "txt" };

export function makeHistoryRouter(history: HistoryStore) {
  const router = Router();

  // getHistory
  router.get("/", async (req, res) => {
    const { kind, limit } = req.query;
    if (kind !== undefined && kind !== "convert" && kind !== "arithmetic") {
      return res.status(400).json({ error: "kind must be convert or arithmetic" });
    }
    const n = typeof limit === "string" ? Number(limit) : undefined;
    if (n !== undefined && (!Number.isInteger(n) || n < 1)) {
      return res.status(400).json({ error: "limit must be a positive integer" });
    }
    try {
      const entries = await history.query({ kind, limit: n });
      res.json({ entries });
    } catch (e) {
      return sendError(res, e, "getHistory failed");
    }
  });

  // getExport
  router.get("/export", async (req, res) => {
    const format = req.query.format ?? "json";
    if (!isExportFormat(format)) {
      return res.status(400).json({ error: "format must be json, csv or text" });
    }
    try {
      const entries = await history.query({ limit: Number.MAX_SAFE_INTEGER });
      res.type(EXPORT_CONTENT_TYPES[format]);
      res.attachment(`history.${EXTENSIONS[format]}`);
      res.send(exportHistory(entries, format));
    } catch (e) {
      return sendError(res, e, "export failed");
    }
  });

  // getEntry
  router.get("/:id", async (req, res) => {
    try {
      const entry = await history.get(req.params.id);
      res.json({ entry });
    } catch (e) {
      return sendError(res, e, "getEntry failed");
    }
  });

  // deleteHistory
  router.delete("/", async (_req, res) => {
    try {
      const removed = await history.clear();
      res.json({ removed });
    } catch (e) {
      return sendError(res, e, "clear failed");
    }
  });

  return router;
}
