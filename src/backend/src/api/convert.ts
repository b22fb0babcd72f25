import { Router } from "express";
import { baseName, detectBase, isConversionError, validate } from "@base-converter/shared";
import type { ConverterService } from "../modules/converter/converterService";
import { readBase, sendError } from "./errors";

export function makeConvertRouter(converter: ConverterService) {
  const router = Router();

  // postConvert (fromBase omitted -> detect from prefix)
  router.post("/", async (req, res) => {
    const { number, fromBase, toBase } = req.body ?? {};
    try {
      const from = fromBase === undefined || fromBase === null || fromBase === "" ? undefined : readBase(fromBase);
      const out = await converter.convert(String(number ?? ""), from, readBase(toBase, 10));
      res.json({ ...out, decimal: out.decimal.toString() });
    } catch (e) {
      return sendError(res, e, "convert failed");
    }
  });

  // postValidate: an invalid number is a normal answer, not an error
  router.post("/validate", (req, res) => {
    const { number, base } = req.body ?? {};
    try {
      validate(String(number ?? ""), readBase(base));
      res.json({ valid: true });
    } catch (e) {
      if (isConversionError(e)) return res.json({ valid: false, code: e.code, error: e.message });
      return sendError(res, e, "validate failed");
    }
  });

  // getDetect
  router.get("/detect", (req, res) => {
    const number = typeof req.query.number === "string" ? req.query.number : "";
    const base = detectBase(number);
    res.json({ base, name: baseName(base) });
  });

  return router;
}
