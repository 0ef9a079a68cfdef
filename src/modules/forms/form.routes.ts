// src/modules/forms/form.routes.ts
// Purpose: Form management (staff) and the two public form reads a melder
// front end needs: the primary form and the form of a classification.

import { Router, type Router as ExpressRouter } from "express";

import { parseInput, uuidParam } from "@/lib/http/validate";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import type { Services } from "@/services";
import { FormInputSchema, PrimaryFormInputSchema } from "./form.schemas";

export function formRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();

  ////////////////////////////////////////////////////////////////
  // Public
  ////////////////////////////////////////////////////////////////

  router.get("/classification/:classificationId", async (req, res) => {
    const classificationId = uuidParam(req.params.classificationId, "classificationId");
    const form = await services.forms.getByClassification(classificationId);

    res.json({ ok: true, data: form });
  });

  ////////////////////////////////////////////////////////////////
  // Staff
  ////////////////////////////////////////////////////////////////

  router.get("/", auth.require, async (_req, res) => {
    res.json({ ok: true, data: await services.forms.list() });
  });

  router.get("/:id", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    res.json({ ok: true, data: await services.forms.get(id) });
  });

  router.post("/", auth.require, async (req, res) => {
    const input = parseInput(FormInputSchema, req.body);
    res.status(201).json({ ok: true, data: await services.forms.create(input) });
  });

  router.put("/:id", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const input = parseInput(FormInputSchema, req.body);

    res.json({ ok: true, data: await services.forms.update(id, input) });
  });

  router.delete("/:id", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    await services.forms.delete(id);

    res.status(204).end();
  });

  return router;
}

export function primaryFormRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();

  router.get("/", async (_req, res) => {
    res.json({ ok: true, data: await services.forms.getPrimary() });
  });

  router.put("/", auth.require, async (req, res) => {
    const input = parseInput(PrimaryFormInputSchema, req.body);
    res.json({ ok: true, data: await services.forms.updatePrimary(input) });
  });

  return router;
}
