import { Router } from "express";
import type { ConverterService } from "../modules/converter/converterService";
import { readBase, sendError } from "./errors";

export function makeCalculateRouter(converter: ConverterService) {
  const router = Router();

  // postCalculate
  router.post("/", async (req, res) => {
    const { operation, left, right, base, resultBase } = req.body ?? {};
    try {
      const b = readBase(base, 10);
      const r = await converter.calculate(
        String(operation ?? ""),
        String(left ?? ""),
        String(right ?? ""),
        b,
        readBase(resultBase, b)
      );
      res.json({
        operation: r.operation,
        expression: r.expression,
        output: r.text,
        decimal: r.value.toString(),
        base: r.base,
      });
    } catch (e) {
      return sendError(res, e, "calculate failed");
    }
  });

  return router;
}
