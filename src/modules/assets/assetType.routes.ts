// src/modules/assets/assetType.routes.ts

import { Router, type Router as ExpressRouter } from "express";

import { parseInput, uuidParam } from "@/lib/http/validate";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import type { Services } from "@/services";
import { AssetTypeInputSchema } from "./assetType.schemas";

export function assetTypeRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();
  router.use(auth.require);

  router.get("/", async (_req, res) => {
    res.json({ ok: true, data: await services.assetTypes.list() });
  });

  router.get("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    res.json({ ok: true, data: await services.assetTypes.get(id) });
  });

  router.post("/", async (req, res) => {
    const input = parseInput(AssetTypeInputSchema, req.body);
    res.status(201).json({ ok: true, data: await services.assetTypes.create(input) });
  });

  router.put("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const input = parseInput(AssetTypeInputSchema, req.body);

    res.json({ ok: true, data: await services.assetTypes.update(id, input) });
  });

  router.delete("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    await services.assetTypes.delete(id);

    res.status(204).end();
  });

  return router;
}
