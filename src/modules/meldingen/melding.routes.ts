// src/modules/meldingen/melding.routes.ts
// Purpose: Melder endpoints (token in `?token=`) plus the shared transition endpoint.

import { Router, type Router as ExpressRouter, type Request } from "express";

import { melderToken, parseInput, uuidParam } from "@/lib/http/validate";
import type { StaffAuthenticator } from "@/middleware/requireStaff";
import { AnswerPayloadSchema } from "@/modules/answers/answer.schemas";
import { AssetInputSchema } from "@/modules/assets/assetType.schemas";
import type { Services } from "@/services";
import {
  CompleteSchema,
  ContactInfoSchema,
  LocationFeatureSchema,
  MeldingTextSchema,
  TransitionNameSchema,
} from "./melding.schemas";
import { toAnswerView, toAssetView, toMeldingView } from "./melding.view";
import type { TransitionActor } from "./meldingLifecycle.service";

function resolveActor(req: Request, auth: StaffAuthenticator): TransitionActor {
  if (auth.hasCredentials(req)) {
    return { kind: "staff", subject: auth.authenticate(req).subject };
  }
  return { kind: "melder", token: melderToken(req) };
}

export function meldingRoutes(
  services: Services,
  auth: StaffAuthenticator,
): ExpressRouter {
  const router: ExpressRouter = Router();

  ////////////////////////////////////////////////////////////////
  // Create
  ////////////////////////////////////////////////////////////////

  router.post("/", async (req, res) => {
    const { text } = parseInput(MeldingTextSchema, req.body);
    const { melding, token } = await services.meldingen.create(text);

    res.status(201).json({ ok: true, data: { ...toMeldingView(melding), token } });
  });

  ////////////////////////////////////////////////////////////////
  // Melder reads
  ////////////////////////////////////////////////////////////////

  router.get("/:id/melder", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const melding = await services.meldingen.retrieve(id, melderToken(req));

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  router.get("/:id/form", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const form = await services.meldingen.questionForm(id, melderToken(req));

    res.json({ ok: true, data: form });
  });

  router.get("/:id/answers", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const answers = await services.answers.listLatest(id, melderToken(req));

    res.json({ ok: true, data: answers.map(toAnswerView) });
  });

  router.get("/:id/assets", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const assets = await services.meldingen.listAssets(id, melderToken(req));

    res.json({ ok: true, data: assets.map(toAssetView) });
  });

  ////////////////////////////////////////////////////////////////
  // Melder writes
  ////////////////////////////////////////////////////////////////

  router.patch("/:id", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const { text } = parseInput(MeldingTextSchema, req.body);
    const melding = await services.meldingen.updateText(id, melderToken(req), text);

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  router.post("/:id/questions/:questionId", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const questionId = uuidParam(req.params.questionId, "questionId");
    const payload = parseInput(AnswerPayloadSchema, req.body);

    const answer = await services.answers.submit({
      meldingId: id,
      token: melderToken(req),
      questionId,
      payload,
    });

    res.status(201).json({ ok: true, data: toAnswerView(answer) });
  });

  router.put("/:id/location", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const feature = parseInput(LocationFeatureSchema, req.body);
    const melding = await services.meldingen.addLocation(id, melderToken(req), feature);

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  router.put("/:id/contact", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const contact = parseInput(ContactInfoSchema, req.body);
    const melding = await services.meldingen.addContactInfo(id, melderToken(req), contact);

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  router.post("/:id/assets", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const input = parseInput(AssetInputSchema, req.body);

    const asset = await services.meldingen.addAsset(id, melderToken(req), {
      externalId: input.external_id,
      assetTypeId: input.asset_type_id,
    });

    res.status(201).json({ ok: true, data: toAssetView(asset) });
  });

  router.delete("/:id/assets/:assetId", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const assetId = uuidParam(req.params.assetId, "assetId");
    await services.meldingen.removeAsset(id, melderToken(req), assetId);

    res.status(204).end();
  });

  ////////////////////////////////////////////////////////////////
  // Transitions (melder token or staff bearer, per transition)
  ////////////////////////////////////////////////////////////////

  router.post("/:id/transitions/:name", async (req, res) => {
    const id = uuidParam(req.params.id, "id");
    const name = parseInput(TransitionNameSchema, req.params.name);
    const actor = resolveActor(req, auth);

    const mailBody =
      name === "complete" ? parseInput(CompleteSchema, req.body ?? {}).mail_body : undefined;

    const melding = await services.lifecycle.transition(id, actor, name, { mailBody });

    res.json({ ok: true, data: toMeldingView(melding) });
  });

  return router;
}
