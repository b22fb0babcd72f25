import { Router } from "express";
import { NAMED_BASES } from "@base-converter/shared";

export function makeBasesRouter() {
  const router = Router();
  router.get("/", (_req, res) => res.json({ bases: NAMED_BASES }));
  return router;
}
