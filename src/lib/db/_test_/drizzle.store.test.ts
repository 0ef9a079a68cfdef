// src/lib/db/_test_/drizzle.store.test.ts
// Runs the store against an in-process PostgreSQL (PGlite) with the real migrations.

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { randomUUID } from "node:crypto";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { RecordingMailer, T0, fixedClock, requiredTextForm, silenceLogs } from "@/_test_/support";
import { MemoryFormCache } from "@/lib/cache/form-cache";
import type { Store } from "@/lib/persistence/store.types";
import { questionComponents } from "@/modules/forms/form.types";
import { MeldingState, type Melding } from "@/modules/meldingen/melding.types";
import { createServices } from "@/services";
import { DrizzleStore } from "../drizzle.store";
import { migrate } from "../migrate";

function melding(fields: Partial<Melding> = {}): Melding {
  return {
    id: randomUUID(),
    publicId: "PG0001",
    text: "Losse tegel",
    state: MeldingState.NEW,
    classificationId: null,
    token: { hash: "a".repeat(64), expiresAt: new Date("2026-03-04T12:00:00.000Z") },
    location: { lat: 52.37, lng: 4.9 },
    address: null,
    email: null,
    phone: null,
    createdAt: T0,
    updatedAt: T0,
    ...fields,
  };
}

describe("DrizzleStore on PGlite", () => {
  let client: PGlite;
  let store: Store;

  beforeAll(async () => {
    silenceLogs();
    client = new PGlite();
    await migrate((sqlText) => client.exec(sqlText));
    store = new DrizzleStore(drizzle(client));
  });

  afterAll(async () => {
    await client.close();
  });

  beforeEach(() => {
    silenceLogs();
  });

  it("applies the migrations twice without error", async () => {
    await expect(migrate((sqlText) => client.exec(sqlText))).resolves.toEqual(["0000_init.sql"]);
  });

  it("round-trips a melding through its columns", async () => {
    const original = melding({ publicId: "PG0002" });
    await store.transaction((repos) => repos.meldingen.insert(original));

    const found = await store.read((repos) => repos.meldingen.findById(original.id));
    expect(found).toEqual(original);
    await expect(store.read((repos) => repos.meldingen.publicIdExists("PG0002"))).resolves.toBe(
      true,
    );
  });

  it("commits a state change only from the expected state", async () => {
    const original = melding({ publicId: "PG0003" });
    await store.transaction((repos) => repos.meldingen.insert(original));
    const later = new Date("2026-03-01T13:00:00.000Z");

    const stale = await store.transaction((repos) =>
      repos.meldingen.compareAndSetState(
        original.id,
        MeldingState.CLASSIFIED,
        { state: MeldingState.QUESTIONS_ANSWERED },
        later,
      ),
    );
    expect(stale).toBeNull();

    const moved = await store.transaction((repos) =>
      repos.meldingen.compareAndSetState(
        original.id,
        MeldingState.NEW,
        { state: MeldingState.CLASSIFIED, token: null },
        later,
      ),
    );
    expect(moved?.state).toBe(MeldingState.CLASSIFIED);
    expect(moved?.token).toBeNull();
    expect(moved?.updatedAt).toEqual(later);
  });

  it("rolls back everything a failed transaction wrote", async () => {
    const original = melding({ publicId: "PG0004" });

    await expect(
      store.transaction(async (repos) => {
        await repos.meldingen.insert(original);
        throw new Error("rollback");
      }),
    ).rejects.toThrow("rollback");

    await expect(store.read((repos) => repos.meldingen.findById(original.id))).resolves.toBeNull();
  });

  it("keeps only the latest answer per question", async () => {
    const clock = fixedClock();
    const services = createServices({
      store,
      formCache: new MemoryFormCache(),
      mailer: new RecordingMailer(),
      tokenTtlSeconds: 3600,
      now: clock.now,
    });

    const classification = await services.classifications.create({ name: "boomstronk" });
    const form = await services.forms.create(requiredTextForm(classification.id));
    const [details] = questionComponents(form);
    const questionId = details.questionId;
    if (!questionId) throw new Error("expected a question");

    const { melding: created, token } = await services.meldingen.create("Een boomstronk op straat");
    expect(created.classificationId).toBe(classification.id);

    for (const text of ["Eerste antwoord", "Tweede antwoord"]) {
      await services.answers.submit({
        meldingId: created.id,
        token,
        questionId,
        payload: { type: "text", text },
      });
    }

    const latest = await services.answers.listLatest(created.id, token);
    expect(latest.map((a) => a.payload)).toEqual([{ type: "text", text: "Tweede antwoord" }]);

    const moved = await services.lifecycle.transition(
      created.id,
      { kind: "melder", token },
      "answer_questions",
    );
    expect(moved.state).toBe(MeldingState.QUESTIONS_ANSWERED);

    // Rebuilding the form orphans the old questions
    const rebuilt = await services.forms.update(form.id, requiredTextForm(classification.id));
    const [newDetails] = questionComponents(rebuilt);
    expect(newDetails.questionId).not.toBe(questionId);
    const orphan = await store.read((repos) => repos.questions.findById(questionId));
    expect(orphan?.formId).toBeNull();
  });

  it("deletes assets and unbinds classifications with their asset type", async () => {
    const clock = fixedClock();
    const services = createServices({
      store,
      formCache: new MemoryFormCache(),
      mailer: new RecordingMailer(),
      tokenTtlSeconds: 3600,
      now: clock.now,
    });

    const assetType = await services.assetTypes.create({
      name: "lantaarnpaal",
      class_name: "wfs.LampAssetType",
      arguments: { layer: "lampen" },
      max_assets: 2,
    });
    const classification = await services.classifications.create({
      name: "straatverlichting",
      asset_type: assetType.id,
    });
    const { melding: created, token } = await services.meldingen.create(
      "De straatverlichting is kapot",
    );
    await services.meldingen.addAsset(created.id, token, {
      externalId: "lamp-7",
      assetTypeId: assetType.id,
    });

    await services.assetTypes.delete(assetType.id);

    await expect(services.meldingen.listAssets(created.id, token)).resolves.toEqual([]);
    await expect(services.classifications.get(classification.id)).resolves.toMatchObject({
      assetTypeId: null,
    });
  });

  it("locks the meldingen bound to a classification in id order", async () => {
    const classification = {
      id: randomUUID(),
      name: "riool",
      assetTypeId: null,
      createdAt: T0,
      updatedAt: T0,
    };
    const bound = [
      melding({ publicId: "PG0010", classificationId: classification.id }),
      melding({ publicId: "PG0011", classificationId: classification.id }),
    ];
    await store.transaction(async (repos) => {
      await repos.classifications.insert(classification);
      for (const m of bound) await repos.meldingen.insert(m);
      await repos.meldingen.insert(melding({ publicId: "PG0012" }));
    });

    const locked = await store.transaction((repos) =>
      repos.meldingen.findByClassificationForUpdate(classification.id),
    );

    expect(locked.map((m) => m.id)).toEqual(bound.map((m) => m.id).sort());
  });
});
