// src/_test_/support.ts
// Shared builders for service and HTTP tests. Everything runs in process.

import { randomUUID } from "node:crypto";
import { vi } from "vitest";

import { MemoryFormCache } from "@/lib/cache/form-cache";
import { MemoryStore } from "@/lib/persistence/memory.store";
import type { Store } from "@/lib/persistence/store.types";
import type { AssetType } from "@/modules/assets/assetType.types";
import type { Classification } from "@/modules/classifications/classification.types";
import { FormInputSchema, type FormInput } from "@/modules/forms/form.schemas";
import type { Mailer } from "@/modules/mail/mailer";
import { MeldingState, type Melding } from "@/modules/meldingen/melding.types";
import { createServices, type ServiceDeps } from "@/services";

export const T0 = new Date("2026-03-01T12:00:00.000Z");

export function fixedClock(start: Date = T0) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

/** Log lines are JSON on stdout; keep test output readable. */
export function silenceLogs() {
  return vi.spyOn(console, "log").mockImplementation(() => undefined);
}

export class RecordingMailer implements Mailer {
  readonly confirmations: string[] = [];
  readonly completions: { meldingId: string; body: string | null }[] = [];

  async sendConfirmation(melding: Melding) {
    this.confirmations.push(melding.id);
  }

  async sendCompletion(melding: Melding, body: string | null) {
    this.completions.push({ meldingId: melding.id, body });
  }
}

export function testServices(overrides: Partial<ServiceDeps> = {}) {
  const store = new MemoryStore();
  const clock = fixedClock();
  const mailer = new RecordingMailer();

  const services = createServices({
    store,
    formCache: new MemoryFormCache(),
    mailer,
    tokenTtlSeconds: 3600,
    now: clock.now,
    ...overrides,
  });

  return { store, clock, mailer, services };
}

////////////////////////////////////////////////////////////////
// Seeds
////////////////////////////////////////////////////////////////

export async function seedAssetType(
  store: Store,
  fields: Partial<AssetType> = {},
): Promise<AssetType> {
  const assetType: AssetType = {
    id: randomUUID(),
    name: "container",
    className: "wfs.ContainerAssetType",
    arguments: {},
    maxAssets: 3,
    createdAt: T0,
    updatedAt: T0,
    ...fields,
  };
  await store.transaction((repos) => repos.assetTypes.insert(assetType));
  return assetType;
}

export async function seedClassification(
  store: Store,
  fields: Partial<Classification> = {},
): Promise<Classification> {
  const classification: Classification = {
    id: randomUUID(),
    name: "boom",
    assetTypeId: null,
    createdAt: T0,
    updatedAt: T0,
    ...fields,
  };
  await store.transaction((repos) => repos.classifications.insert(classification));
  return classification;
}

export async function seedMelding(
  store: Store,
  fields: Partial<Melding> = {},
): Promise<Melding> {
  const melding: Melding = {
    id: randomUUID(),
    publicId: "ABC123",
    text: "Test melding",
    state: MeldingState.NEW,
    classificationId: null,
    token: null,
    location: null,
    address: null,
    email: null,
    phone: null,
    createdAt: T0,
    updatedAt: T0,
    ...fields,
  };
  await store.transaction((repos) => repos.meldingen.insert(melding));
  return melding;
}

/**
 * Request body of a form with one required textarea ("details") and one
 * optional radio ("blocking"), bound to `classificationId`.
 */
export function requiredTextFormBody(classificationId: string) {
  return {
    title: "Boom vragen",
    display: "form",
    classification: classificationId,
    components: [
      {
        type: "textarea",
        key: "details",
        label: "Wat is er met de boom?",
        input: true,
        autoExpand: false,
        maxCharCount: 100,
        validate: { required: true },
      },
      {
        type: "radio",
        key: "blocking",
        label: "Blokkeert de boom de weg?",
        input: true,
        values: [
          { value: "yes", label: "Ja" },
          { value: "no", label: "Nee" },
        ],
        validate: { required: false },
      },
    ],
  };
}

export function requiredTextForm(classificationId: string): FormInput {
  return FormInputSchema.parse(requiredTextFormBody(classificationId));
}
