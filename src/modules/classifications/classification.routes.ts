// src/modules/classifications/classification.routes.ts

import { Router, type Router as ExpressRouter } from "express";

import { parseInput, uuidParam } from "@/lib/http/validate";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import type { Services } from "@/services";
import { ClassificationInputSchema } from "./classification.schemas";

export function classificationRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();
  router.use(auth.require);

  router.get("/", async (_req, res) => {
    res.json({ ok: true, data: await services.classifications.list() });
  });

  router.get("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    res.json({ ok: true, data: await services.classifications.get(id) });
  });

  router.post("/", async (req, res) => {
    const input = parseInput(ClassificationInputSchema, req.body);
    const created = await services.classifications.create(input);

    res.status(201).json({ ok: true, data: created });
  });

  router.put("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const input = parseInput(ClassificationInputSchema, req.body);

    res.json({ ok: true, data: await services.classifications.update(id, input) });
  });

  router.delete("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    await services.classifications.delete(id);

    res.status(204).end();
  });

  return router;
}
