import { Router } from "express";
import { MAX_BASE, MIN_BASE } from "@base-converter/shared";

// getHealth: liveness plus the base range this build accepts
export function makeHealthRouter() {
  const router = Router();
  router.get("/", (_req, res) => {
    res.json({ ok: true, minBase: MIN_BASE, maxBase: MAX_BASE });
  });
  return router;
}
