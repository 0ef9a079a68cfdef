// src/modules/reclassification/_test_/reclassification.test.ts

import { randomUUID } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";

import {
  T0,
  seedAssetType,
  seedClassification,
  seedMelding,
  silenceLogs,
  testServices,
} from "@/_test_/support";
import { NotFoundError } from "@/lib/errors/domain-error";
import type { Store } from "@/lib/persistence/store.types";
import { MeldingNotEditableError } from "@/modules/meldingen/melding.errors";
import { MeldingState, type Melding } from "@/modules/meldingen/melding.types";
import { runReclassificationCascade } from "../reclassification.cascade";

async function attachAnswerAndAsset(store: Store, melding: Melding, assetTypeId: string) {
  await store.transaction(async (repos) => {
    await repos.answers.insert({
      id: randomUUID(),
      meldingId: melding.id,
      questionId: randomUUID(),
      payload: { type: "text", text: "Antwoord" },
      createdAt: T0,
    });
    await repos.assets.insert({
      id: randomUUID(),
      externalId: "container-42",
      assetTypeId,
      meldingId: melding.id,
      createdAt: T0,
    });
  });
}

function counts(store: Store, meldingId: string) {
  return store.read(async (repos) => ({
    answers: (await repos.answers.latestForMelding(meldingId)).length,
    assets: await repos.assets.countForMelding(meldingId),
  }));
}

describe("reclassification cascade", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("keeps assets and location when the asset type stays the same", async () => {
    const { store, services } = testServices();
    const container = await seedAssetType(store);
    const from = await seedClassification(store, { name: "afval", assetTypeId: container.id });
    const to = await seedClassification(store, { name: "grof afval", assetTypeId: container.id });
    const melding = await seedMelding(store, {
      state: MeldingState.CLASSIFIED,
      classificationId: from.id,
      location: { lat: 52.37, lng: 4.9 },
    });
    await attachAnswerAndAsset(store, melding, container.id);

    const updated = await services.reclassification.reclassify(melding.id, to.id);

    expect(updated.classificationId).toBe(to.id);
    expect(updated.location).toEqual({ lat: 52.37, lng: 4.9 });
    await expect(counts(store, melding.id)).resolves.toEqual({ answers: 0, assets: 1 });
  });

  it("empties assets and location when the new classification has another asset type", async () => {
    const { store, services } = testServices();
    const container = await seedAssetType(store, { name: "container" });
    const lamp = await seedAssetType(store, { name: "lantaarnpaal" });
    const from = await seedClassification(store, { name: "afval", assetTypeId: container.id });
    const to = await seedClassification(store, { name: "verlichting", assetTypeId: lamp.id });
    const melding = await seedMelding(store, {
      state: MeldingState.CLASSIFIED,
      classificationId: from.id,
      location: { lat: 52.37, lng: 4.9 },
    });
    await attachAnswerAndAsset(store, melding, container.id);

    const updated = await services.reclassification.reclassify(melding.id, to.id);

    expect(updated.location).toBeNull();
    expect(updated.address).toBeNull();
    await expect(counts(store, melding.id)).resolves.toEqual({ answers: 0, assets: 0 });
  });

  it("keeps the location when moving to a classification without asset type", async () => {
    const { store } = testServices();
    const container = await seedAssetType(store);
    const from = await seedClassification(store, { name: "afval", assetTypeId: container.id });
    const to = await seedClassification(store, { name: "boom" });
    const melding = await seedMelding(store, {
      state: MeldingState.CLASSIFIED,
      classificationId: from.id,
      location: { lat: 52.37, lng: 4.9 },
    });
    await attachAnswerAndAsset(store, melding, container.id);

    const result = await store.transaction((repos) =>
      runReclassificationCascade(repos, melding, to.id, T0),
    );

    expect(result.outcome).toEqual({
      changed: true,
      answersPurged: 1,
      assetsPurged: 1,
      locationPurged: false,
    });
    expect(result.melding.location).toEqual({ lat: 52.37, lng: 4.9 });
  });

  it("is idempotent", async () => {
    const { store, services } = testServices();
    const from = await seedClassification(store, { name: "afval" });
    const to = await seedClassification(store, { name: "boom" });
    const melding = await seedMelding(store, {
      state: MeldingState.CLASSIFIED,
      classificationId: from.id,
    });

    const once = await services.reclassification.reclassify(melding.id, to.id);
    const twice = await services.reclassification.reclassify(melding.id, to.id);

    expect(twice).toEqual(once);

    const again = await store.transaction((repos) =>
      runReclassificationCascade(repos, twice, to.id, T0),
    );
    expect(again.outcome.changed).toBe(false);
  });

  it("moves a NEW melding to CLASSIFIED when staff assign a classification", async () => {
    const { store, services } = testServices();
    const boom = await seedClassification(store, { name: "boom" });
    const melding = await seedMelding(store);

    const updated = await services.reclassification.reclassify(melding.id, boom.id);

    expect(updated.state).toBe(MeldingState.CLASSIFIED);
    expect(updated.classificationId).toBe(boom.id);
  });

  it("runs for every melding when its classification is deleted", async () => {
    const { store, services } = testServices();
    const container = await seedAssetType(store);
    const afval = await seedClassification(store, { name: "afval", assetTypeId: container.id });
    const melding = await seedMelding(store, {
      state: MeldingState.CLASSIFIED,
      classificationId: afval.id,
    });
    await attachAnswerAndAsset(store, melding, container.id);

    await services.classifications.delete(afval.id);

    const stored = await services.meldingen.get(melding.id);
    expect(stored.classificationId).toBeNull();
    expect(stored.state).toBe(MeldingState.CLASSIFIED);
    await expect(counts(store, melding.id)).resolves.toEqual({ answers: 0, assets: 0 });
  });

  it("rejects an unknown classification and leaves the melding alone", async () => {
    const { store, services } = testServices();
    const melding = await seedMelding(store);

    await expect(
      services.reclassification.reclassify(melding.id, randomUUID()),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect((await services.meldingen.get(melding.id)).classificationId).toBeNull();
  });
});

describe("text update", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("reclassifies from the new text and purges the old answers", async () => {
    const { store, services } = testServices();
    await seedClassification(store, { name: "boom" });
    const afval = await seedClassification(store, { name: "afval" });
    const { melding, token } = await services.meldingen.create("De boom is omgevallen");
    await store.transaction((repos) =>
      repos.answers.insert({
        id: randomUUID(),
        meldingId: melding.id,
        questionId: randomUUID(),
        payload: { type: "text", text: "Antwoord" },
        createdAt: T0,
      }),
    );

    const updated = await services.meldingen.updateText(melding.id, token, "Toch afval");

    expect(updated.text).toBe("Toch afval");
    expect(updated.classificationId).toBe(afval.id);
    expect(updated.state).toBe(MeldingState.CLASSIFIED);
    await expect(counts(store, melding.id)).resolves.toEqual({ answers: 0, assets: 0 });
  });

  it("refuses once the melding left the draft phase", async () => {
    const { store, services } = testServices();
    await seedClassification(store, { name: "boom" });
    const { melding, token } = await services.meldingen.create("boom");
    await services.lifecycle.transition(melding.id, { kind: "melder", token }, "answer_questions");

    await expect(
      services.meldingen.updateText(melding.id, token, "Iets anders"),
    ).rejects.toBeInstanceOf(MeldingNotEditableError);
  });
});
