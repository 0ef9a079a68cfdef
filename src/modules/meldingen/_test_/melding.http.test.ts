// src/modules/meldingen/_test_/melding.http.test.ts
// HTTP flows against the in-memory store.

import jwt from "jsonwebtoken";
import request from "supertest";
import { faker } from "@faker-js/faker";
import { randomUUID } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "@/app";
import { requiredTextFormBody, silenceLogs, testServices } from "@/_test_/support";
import { StaffAuthenticator } from "@/middleware/requireStaff";

const JWT_SECRET = "test-secret";

function staffBearer(subject = "staff-1") {
  return `Bearer ${jwt.sign({ sub: subject }, JWT_SECRET, { algorithm: "HS256" })}`;
}

function buildApp() {
  const { store, services, mailer } = testServices();
  const app = createApp({
    services,
    store,
    staffAuth: new StaffAuthenticator(JWT_SECRET),
    corsOrigin: "http://localhost:3000",
  });
  return { app, mailer };
}

describe("melding HTTP API", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("answers the ping and the health check", async () => {
    const { app } = buildApp();

    const ping = await request(app).get("/__ping");
    expect(ping.status).toBe(200);
    expect(ping.text).toBe("pong");

    const health = await request(app).get("/api/health/store");
    expect(health.status).toBe(200);
    expect(health.body.ok).toBe(true);
    expect(health.headers["cache-control"]).toBe("no-store");
  });

  it("runs the melder flow for a classification with questions", async () => {
    const { app } = buildApp();

    // Back office sets up a classification and its form
    const classification = await request(app)
      .post("/api/classifications")
      .set("Authorization", staffBearer())
      .send({ name: "boom" });
    expect(classification.status).toBe(201);
    const classificationId: string = classification.body.data.id;

    const form = await request(app)
      .post("/api/forms")
      .set("Authorization", staffBearer())
      .send(requiredTextFormBody(classificationId));
    expect(form.status).toBe(201);
    const [detailsComponent, blockingComponent] = form.body.data.components;
    const detailsQuestion: string = detailsComponent.questionId;
    const blockingQuestion: string = blockingComponent.questionId;

    const publicForm = await request(app).get(`/api/forms/classification/${classificationId}`);
    expect(publicForm.status).toBe(200);
    expect(publicForm.body.data.id).toBe(form.body.data.id);

    // Melder creates the melding
    const created = await request(app)
      .post("/api/meldingen")
      .send({ text: "De boom is omgevallen" });
    expect(created.status).toBe(201);
    expect(created.body.data.state).toBe("CLASSIFIED");
    expect(created.body.data.publicId).toMatch(/^[A-Z0-9]{6}$/);
    expect(created.body.data).not.toHaveProperty("tokenHash");
    const id: string = created.body.data.id;
    const token: string = created.body.data.token;

    const noToken = await request(app).get(`/api/meldingen/${id}/melder`);
    expect(noToken.status).toBe(401);
    expect(noToken.body.code).toBe("TOKEN_INVALID");

    const retrieved = await request(app).get(`/api/meldingen/${id}/melder`).query({ token });
    expect(retrieved.status).toBe(200);
    expect(retrieved.body.data.text).toBe("De boom is omgevallen");

    const questionForm = await request(app).get(`/api/meldingen/${id}/form`).query({ token });
    expect(questionForm.status).toBe(200);
    expect(questionForm.body.data.components).toHaveLength(2);

    // Mismatched option pair
    const mismatched = await request(app)
      .post(`/api/meldingen/${id}/questions/${blockingQuestion}`)
      .query({ token })
      .send({ type: "value_label", value: "yes", label: "Nee" });
    expect(mismatched.status).toBe(422);
    expect(mismatched.body).toEqual({
      ok: false,
      error: "Answer does not match any option",
      code: "PREDICATE_NOT_SATISFIED",
    });

    const early = await request(app)
      .post(`/api/meldingen/${id}/transitions/answer_questions`)
      .query({ token });
    expect(early.status).toBe(409);
    expect(early.body.code).toBe("INVALID_TRANSITION");

    const answer = await request(app)
      .post(`/api/meldingen/${id}/questions/${detailsQuestion}`)
      .query({ token })
      .send({ type: "text", text: "Hij ligt over het fietspad" });
    expect(answer.status).toBe(201);
    expect(answer.body.data).toMatchObject({
      questionId: detailsQuestion,
      type: "text",
      text: "Hij ligt over het fietspad",
    });

    const answers = await request(app).get(`/api/meldingen/${id}/answers`).query({ token });
    expect(answers.body.data).toHaveLength(1);

    const moved = await request(app)
      .post(`/api/meldingen/${id}/transitions/answer_questions`)
      .query({ token });
    expect(moved.status).toBe(200);
    expect(moved.body.data.state).toBe("QUESTIONS_ANSWERED");

    // Text is frozen now
    const edit = await request(app)
      .patch(`/api/meldingen/${id}`)
      .query({ token })
      .send({ text: "Nieuwe tekst" });
    expect(edit.status).toBe(409);
    expect(edit.body.code).toBe("MELDING_NOT_EDITABLE");

    // Back office view
    const list = await request(app).get("/api/meldingen").set("Authorization", staffBearer());
    expect(list.status).toBe(200);
    expect(list.body.meta).toEqual({ total: 1, limit: 50, offset: 0 });

    const possible = await request(app)
      .get(`/api/meldingen/${id}/transitions`)
      .set("Authorization", staffBearer());
    expect(possible.body.data).toEqual([
      { name: "add_attachments", to: "ATTACHMENTS_ADDED", actor: "melder" },
    ]);
  });

  it("stores the location as a point and returns it as GeoJSON", async () => {
    const { app } = buildApp();
    const created = await request(app).post("/api/meldingen").send({ text: "Losse tegel" });
    const { id, token } = created.body.data;

    const lat = faker.number.float({ min: 50.8, max: 53.5, fractionDigits: 5 });
    const lng = faker.number.float({ min: 3.4, max: 7.2, fractionDigits: 5 });

    const located = await request(app)
      .put(`/api/meldingen/${id}/location`)
      .query({ token })
      .send({ type: "Feature", geometry: { type: "Point", coordinates: [lng, lat] } });

    expect(located.status).toBe(200);
    expect(located.body.data.location.geometry.coordinates).toEqual([lng, lat]);

    const outOfRange = await request(app)
      .put(`/api/meldingen/${id}/location`)
      .query({ token })
      .send({ type: "Feature", geometry: { type: "Point", coordinates: [200, lat] } });
    expect(outOfRange.status).toBe(400);
    expect(outOfRange.body.code).toBe("REQUEST_VALIDATION_FAILED");
  });

  it("normalises the phone number of the contact info", async () => {
    const { app } = buildApp();
    const created = await request(app).post("/api/meldingen").send({ text: "Losse tegel" });
    const { id, token } = created.body.data;

    const contact = await request(app)
      .put(`/api/meldingen/${id}/contact`)
      .query({ token })
      .send({ email: "melder@example.com", phone: "06-1234 5678" });

    expect(contact.status).toBe(200);
    expect(contact.body.data.phone).toBe("0612345678");
    expect(contact.body.data.email).toBe("melder@example.com");
  });

  it("limits assets to the classification's asset type and its maximum", async () => {
    const { app } = buildApp();
    const auth = staffBearer();

    const assetType = await request(app)
      .post("/api/asset-types")
      .set("Authorization", auth)
      .send({ name: "container", class_name: "wfs.ContainerAssetType", max_assets: 1 });
    expect(assetType.status).toBe(201);
    expect(assetType.body.data.maxAssets).toBe(1);
    const assetTypeId: string = assetType.body.data.id;

    await request(app)
      .post("/api/classifications")
      .set("Authorization", auth)
      .send({ name: "afval", asset_type: assetTypeId });

    const created = await request(app).post("/api/meldingen").send({ text: "Afval naast de container" });
    const { id, token } = created.body.data;

    const wrongType = await request(app)
      .post(`/api/meldingen/${id}/assets`)
      .query({ token })
      .send({ external_id: "container-1", asset_type_id: randomUUID() });
    expect(wrongType.status).toBe(422);
    expect(wrongType.body.code).toBe("ASSET_TYPE_MISMATCH");

    const first = await request(app)
      .post(`/api/meldingen/${id}/assets`)
      .query({ token })
      .send({ external_id: "container-1", asset_type_id: assetTypeId });
    expect(first.status).toBe(201);

    const second = await request(app)
      .post(`/api/meldingen/${id}/assets`)
      .query({ token })
      .send({ external_id: "container-2", asset_type_id: assetTypeId });
    expect(second.status).toBe(422);
    expect(second.body.code).toBe("MAX_ASSETS_EXCEEDED");

    const removed = await request(app)
      .delete(`/api/meldingen/${id}/assets/${first.body.data.id}`)
      .query({ token });
    expect(removed.status).toBe(204);

    const assets = await request(app).get(`/api/meldingen/${id}/assets`).query({ token });
    expect(assets.body.data).toEqual([]);
  });

  it("lets staff reclassify and purges what no longer applies", async () => {
    const { app } = buildApp();
    const auth = staffBearer();

    const boom = await request(app)
      .post("/api/classifications")
      .set("Authorization", auth)
      .send({ name: "boom" });

    const created = await request(app).post("/api/meldingen").send({ text: "Iets onduidelijks" });
    expect(created.body.data.state).toBe("NEW");
    const id: string = created.body.data.id;

    const reclassified = await request(app)
      .put(`/api/meldingen/${id}/classification`)
      .set("Authorization", auth)
      .send({ classification: boom.body.data.id });

    expect(reclassified.status).toBe(200);
    expect(reclassified.body.data.state).toBe("CLASSIFIED");
    expect(reclassified.body.data.classificationId).toBe(boom.body.data.id);
  });

  it("takes staff transitions with a bearer and melder ones with the token", async () => {
    const { app } = buildApp();
    const created = await request(app).post("/api/meldingen").send({ text: "Iets onduidelijks" });
    const { id, token } = created.body.data;

    const melderTriesStaff = await request(app)
      .post(`/api/meldingen/${id}/transitions/classify`)
      .query({ token });
    expect(melderTriesStaff.status).toBe(401);
    expect(melderTriesStaff.body.code).toBe("STAFF_AUTH_REQUIRED");

    const badBearer = await request(app)
      .post(`/api/meldingen/${id}/transitions/classify`)
      .set("Authorization", "Bearer not-a-jwt");
    expect(badBearer.status).toBe(401);
    expect(badBearer.body.code).toBe("STAFF_AUTH_REQUIRED");

    const unclassified = await request(app)
      .post(`/api/meldingen/${id}/transitions/classify`)
      .set("Authorization", staffBearer());
    expect(unclassified.status).toBe(409);
    expect(unclassified.body.error).toBe(
      'Transition "classify" is not possible from NEW: melding has no classification',
    );

    const unknown = await request(app)
      .post(`/api/meldingen/${id}/transitions/teleport`)
      .query({ token });
    expect(unknown.status).toBe(400);
    expect(unknown.body.code).toBe("REQUEST_VALIDATION_FAILED");
  });

  it("rejects bad input at the boundary", async () => {
    const { app } = buildApp();

    const empty = await request(app).post("/api/meldingen").send({ text: "   " });
    expect(empty.status).toBe(400);
    expect(empty.body.details.text).toHaveLength(1);

    const badId = await request(app).get("/api/meldingen/not-a-uuid/melder").query({ token: "x" });
    expect(badId.status).toBe(400);
    expect(badId.body.details).toEqual({ id: ["id must be a UUID"] });

    const missing = await request(app)
      .get(`/api/meldingen/${randomUUID()}/melder`)
      .query({ token: "x" });
    expect(missing.status).toBe(404);
    expect(missing.body.code).toBe("NOT_FOUND");

    const unrouted = await request(app).get("/api/nothing-here");
    expect(unrouted.status).toBe(404);
    expect(unrouted.body.code).toBe("ROUTE_NOT_FOUND");

    const staffOnly = await request(app).get("/api/classifications");
    expect(staffOnly.status).toBe(401);
  });

  it("enforces the primary form on creation", async () => {
    const { app } = buildApp();

    const primary = await request(app)
      .put("/api/primary-form")
      .set("Authorization", staffBearer())
      .send({
        title: "Primary",
        display: "form",
        components: [
          {
            type: "textarea",
            key: "text",
            label: "Wat wilt u melden?",
            maxCharCount: 20,
            validate: {
              required: true,
              json: { if: [{ ">=": [{ length: { var: "text" } }, 5] }, true, "Te kort"] },
            },
          },
        ],
      });
    expect(primary.status).toBe(200);

    const publicPrimary = await request(app).get("/api/primary-form");
    expect(publicPrimary.body.data.kind).toBe("primary");

    const tooShort = await request(app).post("/api/meldingen").send({ text: "kort" });
    expect(tooShort.status).toBe(422);
    expect(tooShort.body).toEqual({ ok: false, error: "Te kort", code: "PRIMARY_VALIDATION_FAILED" });

    const tooLong = await request(app)
      .post("/api/meldingen")
      .send({ text: "Dit is veel te lang voor het formulier" });
    expect(tooLong.status).toBe(422);
    expect(tooLong.body.error).toBe("Text is longer than 20 characters");

    const fine = await request(app).post("/api/meldingen").send({ text: "Losse tegel" });
    expect(fine.status).toBe(201);
  });

  it("refuses a form whose rule does not compile", async () => {
    const { app } = buildApp();
    const auth = staffBearer();

    const response = await request(app)
      .post("/api/forms")
      .set("Authorization", auth)
      .send({
        title: "Broken",
        display: "form",
        components: [
          {
            type: "textfield",
            key: "where",
            label: "Waar?",
            validate: { json: { "+": [1, 2] } },
          },
        ],
      });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual({ "where.validate.json": ['Unknown operator "+"'] });
  });
});
