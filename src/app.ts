// src/app.ts — Express application factory with request correlation and structured logging

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import { randomUUID } from "node:crypto";

import { DomainError, RequestValidationError } from "@/lib/errors/domain-error";
import { errorMeta, log } from "@/lib/observability/logger";
import { runWithRequestId } from "@/lib/observability/request-context";
import type { Store } from "@/lib/persistence/store.types";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import { assetTypeRoutes } from "@/modules/assets/assetType.routes";
import { classificationRoutes } from "@/modules/classifications/classification.routes";
import { formRoutes, primaryFormRoutes } from "@/modules/forms/form.routes";
import { healthRoutes } from "@/modules/health/health.controller";
import { meldingRoutes } from "@/modules/meldingen/melding.routes";
import { meldingStaffRoutes } from "@/modules/meldingen/melding.staff.routes";
import type { Services } from "@/services";

export interface AppDeps {
  services: Services;
  store: Store;
  staffAuth: StaffAuthenticator;
  corsOrigin: string;
}

export function createApp({ services, store, staffAuth, corsOrigin }: AppDeps): Express {
  const app: Express = express();

  // Melding state changes under the same URL; no 304s
  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Core middleware
  ////////////////////////////////////////////////////////////////

  app.use(express.json({ limit: "1mb" }));

  app.use(
    cors({
      origin: corsOrigin,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Request-Id"],
    }),
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") ?? randomUUID();
    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    runWithRequestId(requestId, () => {
      log("INFO", "HTTP_REQUEST_STARTED", { method: req.method, path: req.path });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    });
  });

  app.get("/__ping", (_req: Request, res: Response) => {
    res.status(200).send("pong");
  });

  ////////////////////////////////////////////////////////////////
  // Domain routes
  ////////////////////////////////////////////////////////////////

  app.use("/api", healthRoutes(store));
  app.use("/api/meldingen", meldingStaffRoutes(services, staffAuth));
  app.use("/api/meldingen", meldingRoutes(services, staffAuth));
  app.use("/api/classifications", classificationRoutes(services, staffAuth));
  app.use("/api/asset-types", assetTypeRoutes(services, staffAuth));
  app.use("/api/forms", formRoutes(services, staffAuth));
  app.use("/api/primary-form", primaryFormRoutes(services, staffAuth));

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "Route not found", code: "ROUTE_NOT_FOUND" });
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DomainError) {
      if (err.status >= 500) {
        log("ERROR", "HTTP_REQUEST_FAILED", { path: req.path, code: err.code, ...errorMeta(err) });
      }

      res.status(err.status).json({
        ok: false,
        error: err.message,
        code: err.code,
        ...(err instanceof RequestValidationError ? { details: err.details } : {}),
      });
      return;
    }

    // Malformed JSON body from express.json()
    if (err instanceof SyntaxError && "body" in err) {
      res.status(400).json({ ok: false, error: "Malformed JSON body", code: "MALFORMED_JSON" });
      return;
    }

    log("ERROR", "HTTP_REQUEST_FAILED", { path: req.path, ...errorMeta(err) });

    res.status(500).json({ ok: false, error: "Internal Server Error", code: "INTERNAL" });
  });

  return app;
}
