// src/modules/meldingen/melding.staff.routes.ts
// Purpose: Back-office view of meldingen. Every route requires a staff bearer.

import { Router, type Router as ExpressRouter } from "express";

import { parseInput, uuidParam } from "@/lib/http/validate";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import type { Services } from "@/services";
import { ListMeldingenQuerySchema, ReclassifySchema } from "./melding.schemas";
import { toMeldingView } from "./melding.view";

export function meldingStaffRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();

  router.get("/", auth.require, async (req, res) => {
    const query = parseInput(ListMeldingenQuerySchema, req.query);
    const { items, total } = await services.meldingen.list(query);

    res.json({
      ok: true,
      data: items.map(toMeldingView),
      meta: { total, limit: query.limit, offset: query.offset },
    });
  });

  router.get("/:id", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const melding = await services.meldingen.get(id);

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  router.get("/:id/transitions", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const transitions = await services.lifecycle.possibleTransitions(id);

    res.json({ ok: true, data: transitions });
  });

  router.put("/:id/classification", auth.require, async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const { classification } = parseInput(ReclassifySchema, req.body);
    const melding = await services.reclassification.reclassify(id, classification);

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  return router;
}
