// src/modules/health/health.controller.ts
// Liveness + store readiness. Health endpoints never throw.

import { Router, type Request, type Response } from "express";

import { errorMeta, log } from "@/lib/observability/logger";
import type { Store } from "@/lib/persistence/store.types";
import { RULE_OPERATOR_SET_VERSION } from "@/modules/rules/rule.types";

export function healthRoutes(store: Store): Router {
  const router: Router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      mode: process.env.NODE_ENV ?? "unknown",
      uptime: process.uptime(),
      ruleOperatorSet: RULE_OPERATOR_SET_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/health/store", async (_req: Request, res: Response) => {
    try {
      await store.read((repos) => repos.forms.findPrimary());
      res.status(200).json({ ok: true, checkedAt: new Date().toISOString() });
    } catch (err) {
      log("WARN", "STORE_HEALTH_CHECK_FAILED", errorMeta(err));
      res.status(503).json({
        ok: false,
        error: "Store is unreachable",
        checkedAt: new Date().toISOString(),
      });
    }
  });

  return router;
}
