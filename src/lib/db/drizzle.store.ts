// src/lib/db/drizzle.store.ts
// Purpose: PostgreSQL-backed Store. Works against any drizzle pg driver
// (node-postgres in production, PGlite in tests).

import { and, asc, count, desc, eq, ne } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { z } from "zod";

import {
  answers,
  assetTypes,
  assets,
  classifications,
  forms,
  meldingen,
  questions,
} from "./schema";
import {
  isMeldingState,
  type Melding,
  type MeldingPatch,
} from "@/modules/meldingen/melding.types";
import type { AssetType } from "@/modules/assets/assetType.types";
import type { Form } from "@/modules/forms/form.types";
import { StoredFormSchema, JsonValueSchema } from "@/modules/forms/form.schemas";
import { AnswerPayloadSchema } from "@/modules/answers/answer.schemas";
import { TransientStoreError } from "@/lib/persistence/transaction-retry";
import type { Repositories, Store } from "@/lib/persistence/store.types";

type MeldingRow = typeof meldingen.$inferSelect;
type MeldingInsert = typeof meldingen.$inferInsert;
type AssetTypeRow = typeof assetTypes.$inferSelect;
type FormRow = typeof forms.$inferSelect;

////////////////////////////////////////////////////////////////
// Row mapping
////////////////////////////////////////////////////////////////

function meldingFromRow(row: MeldingRow): Melding {
  if (!isMeldingState(row.state)) {
    throw new Error(`Melding ${row.id} has unknown state "${row.state}"`);
  }

  const hasAddress =
    row.street !== null ||
    row.houseNumber !== null ||
    row.postalCode !== null ||
    row.city !== null;

  return {
    id: row.id,
    publicId: row.publicId,
    text: row.text,
    state: row.state,
    classificationId: row.classificationId,
    token:
      row.tokenHash !== null && row.tokenExpiresAt !== null
        ? { hash: row.tokenHash, expiresAt: row.tokenExpiresAt }
        : null,
    location:
      row.lat !== null && row.lng !== null
        ? { lat: row.lat, lng: row.lng }
        : null,
    address: hasAddress
      ? {
          street: row.street,
          houseNumber: row.houseNumber,
          postalCode: row.postalCode,
          city: row.city,
        }
      : null,
    email: row.email,
    phone: row.phone,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function patchToRow(patch: MeldingPatch): Partial<MeldingInsert> {
  const row: Partial<MeldingInsert> = {};

  if (patch.text !== undefined) row.text = patch.text;
  if (patch.state !== undefined) row.state = patch.state;
  if (patch.classificationId !== undefined) {
    row.classificationId = patch.classificationId;
  }
  if (patch.token !== undefined) {
    row.tokenHash = patch.token?.hash ?? null;
    row.tokenExpiresAt = patch.token?.expiresAt ?? null;
  }
  if (patch.location !== undefined) {
    row.lat = patch.location?.lat ?? null;
    row.lng = patch.location?.lng ?? null;
  }
  if (patch.address !== undefined) {
    row.street = patch.address?.street ?? null;
    row.houseNumber = patch.address?.houseNumber ?? null;
    row.postalCode = patch.address?.postalCode ?? null;
    row.city = patch.address?.city ?? null;
  }
  if (patch.email !== undefined) row.email = patch.email;
  if (patch.phone !== undefined) row.phone = patch.phone;

  return row;
}

function meldingToRow(melding: Melding): MeldingInsert {
  return {
    id: melding.id,
    publicId: melding.publicId,
    createdAt: melding.createdAt,
    updatedAt: melding.updatedAt,
    text: melding.text,
    state: melding.state,
    ...patchToRow({
      classificationId: melding.classificationId,
      token: melding.token,
      location: melding.location,
      address: melding.address,
      email: melding.email,
      phone: melding.phone,
    }),
  };
}

const AssetTypeArgumentsSchema = z.record(JsonValueSchema);

function assetTypeFromRow(row: AssetTypeRow): AssetType {
  return {
    ...row,
    arguments: AssetTypeArgumentsSchema.parse(row.arguments),
  };
}

function formFromRow(row: FormRow): Form {
  return StoredFormSchema.parse({
    id: row.id,
    title: row.title,
    display: row.display,
    kind: row.kind,
    classificationId: row.classificationId,
    components: row.components,
  });
}

////////////////////////////////////////////////////////////////
// Repositories
////////////////////////////////////////////////////////////////

function repositoriesFor<H extends PgQueryResultHKT>(
  db: PgDatabase<H>,
): Repositories {
  return {
    meldingen: {
      async findById(id) {
        const [row] = await db
          .select()
          .from(meldingen)
          .where(eq(meldingen.id, id))
          .limit(1);
        return row ? meldingFromRow(row) : null;
      },

      async findByIdForUpdate(id) {
        const [row] = await db
          .select()
          .from(meldingen)
          .where(eq(meldingen.id, id))
          .limit(1)
          .for("update");
        return row ? meldingFromRow(row) : null;
      },

      async publicIdExists(publicId) {
        const [row] = await db
          .select({ id: meldingen.id })
          .from(meldingen)
          .where(eq(meldingen.publicId, publicId))
          .limit(1);
        return row !== undefined;
      },

      async list({ limit, offset, state }) {
        const where = state ? eq(meldingen.state, state) : undefined;

        const rows = await db
          .select()
          .from(meldingen)
          .where(where)
          .orderBy(desc(meldingen.createdAt), desc(meldingen.id))
          .limit(limit)
          .offset(offset);

        const [total] = await db
          .select({ value: count() })
          .from(meldingen)
          .where(where);

        return { items: rows.map(meldingFromRow), total: total?.value ?? 0 };
      },

      async insert(melding) {
        await db.insert(meldingen).values(meldingToRow(melding));
      },

      async update(id, patch, updatedAt) {
        const [row] = await db
          .update(meldingen)
          .set({ ...patchToRow(patch), updatedAt })
          .where(eq(meldingen.id, id))
          .returning();

        if (!row) {
          throw new Error(`Melding ${id} vanished during update`);
        }
        return meldingFromRow(row);
      },

      async compareAndSetState(id, expected, patch, updatedAt) {
        const [row] = await db
          .update(meldingen)
          .set({ ...patchToRow(patch), updatedAt })
          .where(and(eq(meldingen.id, id), eq(meldingen.state, expected)))
          .returning();

        return row ? meldingFromRow(row) : null;
      },

      async findByClassificationForUpdate(classificationId) {
        const rows = await db
          .select()
          .from(meldingen)
          .where(eq(meldingen.classificationId, classificationId))
          .orderBy(asc(meldingen.id))
          .for("update");
        return rows.map(meldingFromRow);
      },
    },

    answers: {
      async insert(answer) {
        await db.insert(answers).values({
          id: answer.id,
          meldingId: answer.meldingId,
          questionId: answer.questionId,
          payload: answer.payload,
          createdAt: answer.createdAt,
        });
      },

      async latestForMelding(meldingId) {
        const rows = await db
          .selectDistinctOn([answers.questionId])
          .from(answers)
          .where(eq(answers.meldingId, meldingId))
          .orderBy(answers.questionId, desc(answers.seq));

        return rows
          .sort((a, b) => a.seq - b.seq)
          .map((row) => ({
            id: row.id,
            meldingId: row.meldingId,
            questionId: row.questionId,
            payload: AnswerPayloadSchema.parse(row.payload),
            createdAt: row.createdAt,
          }));
      },

      async deleteForMelding(meldingId) {
        const rows = await db
          .delete(answers)
          .where(eq(answers.meldingId, meldingId))
          .returning({ id: answers.id });
        return rows.length;
      },
    },

    assets: {
      async insert(asset) {
        await db.insert(assets).values(asset);
      },

      async listForMelding(meldingId) {
        return db
          .select()
          .from(assets)
          .where(eq(assets.meldingId, meldingId))
          .orderBy(asc(assets.createdAt), asc(assets.id));
      },

      async countForMelding(meldingId) {
        const [row] = await db
          .select({ value: count() })
          .from(assets)
          .where(eq(assets.meldingId, meldingId));
        return row?.value ?? 0;
      },

      async delete(meldingId, assetId) {
        const rows = await db
          .delete(assets)
          .where(and(eq(assets.meldingId, meldingId), eq(assets.id, assetId)))
          .returning({ id: assets.id });
        return rows.length > 0;
      },

      async deleteForMelding(meldingId) {
        const rows = await db
          .delete(assets)
          .where(eq(assets.meldingId, meldingId))
          .returning({ id: assets.id });
        return rows.length;
      },
    },

    assetTypes: {
      async findById(id) {
        const [row] = await db
          .select()
          .from(assetTypes)
          .where(eq(assetTypes.id, id))
          .limit(1);
        return row ? assetTypeFromRow(row) : null;
      },

      async list() {
        const rows = await db.select().from(assetTypes).orderBy(asc(assetTypes.name));
        return rows.map(assetTypeFromRow);
      },

      async insert(assetType) {
        await db.insert(assetTypes).values(assetType);
      },

      async update(assetType) {
        await db
          .update(assetTypes)
          .set({
            name: assetType.name,
            className: assetType.className,
            arguments: assetType.arguments,
            maxAssets: assetType.maxAssets,
            updatedAt: assetType.updatedAt,
          })
          .where(eq(assetTypes.id, assetType.id));
      },

      async delete(id) {
        const rows = await db
          .delete(assetTypes)
          .where(eq(assetTypes.id, id))
          .returning({ id: assetTypes.id });
        return rows.length > 0;
      },
    },

    classifications: {
      async findById(id) {
        const [row] = await db
          .select()
          .from(classifications)
          .where(eq(classifications.id, id))
          .limit(1);
        return row ?? null;
      },

      async list() {
        return db
          .select()
          .from(classifications)
          .orderBy(asc(classifications.name));
      },

      async insert(classification) {
        await db.insert(classifications).values(classification);
      },

      async update(classification) {
        await db
          .update(classifications)
          .set({
            name: classification.name,
            assetTypeId: classification.assetTypeId,
            updatedAt: classification.updatedAt,
          })
          .where(eq(classifications.id, classification.id));
      },

      async delete(id) {
        const rows = await db
          .delete(classifications)
          .where(eq(classifications.id, id))
          .returning({ id: classifications.id });
        return rows.length > 0;
      },
    },

    forms: {
      async findById(id) {
        const [row] = await db
          .select()
          .from(forms)
          .where(eq(forms.id, id))
          .limit(1);
        return row ? formFromRow(row) : null;
      },

      async findByClassificationId(classificationId) {
        const [row] = await db
          .select()
          .from(forms)
          .where(eq(forms.classificationId, classificationId))
          .limit(1);
        return row ? formFromRow(row) : null;
      },

      async findPrimary() {
        const [row] = await db
          .select()
          .from(forms)
          .where(eq(forms.kind, "primary"))
          .limit(1);
        return row ? formFromRow(row) : null;
      },

      async list() {
        const rows = await db
          .select()
          .from(forms)
          .where(eq(forms.kind, "classification"))
          .orderBy(asc(forms.createdAt));
        return rows.map(formFromRow);
      },

      async save(form) {
        const values = {
          title: form.title,
          display: form.display,
          kind: form.kind,
          classificationId: form.classificationId,
          components: form.components,
          updatedAt: new Date(),
        };

        await db
          .insert(forms)
          .values({ id: form.id, ...values })
          .onConflictDoUpdate({ target: forms.id, set: values });
      },

      async delete(id) {
        const rows = await db
          .delete(forms)
          .where(eq(forms.id, id))
          .returning({ id: forms.id });
        return rows.length > 0;
      },

      async unbindClassification(classificationId, keepFormId) {
        const rows = await db
          .update(forms)
          .set({ classificationId: null })
          .where(
            and(
              eq(forms.classificationId, classificationId),
              keepFormId ? ne(forms.id, keepFormId) : undefined,
            ),
          )
          .returning({ id: forms.id });
        return rows.length;
      },
    },

    questions: {
      async findById(id) {
        const [row] = await db
          .select({ id: questions.id, text: questions.text, formId: questions.formId })
          .from(questions)
          .where(eq(questions.id, id))
          .limit(1);
        return row ?? null;
      },

      async insertMany(rows) {
        if (rows.length === 0) return;
        await db.insert(questions).values(rows);
      },

      async detachForm(formId) {
        const rows = await db
          .update(questions)
          .set({ formId: null })
          .where(eq(questions.formId, formId))
          .returning({ id: questions.id });
        return rows.length;
      },
    },
  };
}

////////////////////////////////////////////////////////////////
// Error classification
////////////////////////////////////////////////////////////////

const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";
const UNIQUE_VIOLATION = "23505";

/**
 * Reads a string field from a driver error or from its `cause` chain.
 */
function pgErrorField(err: unknown, field: "code" | "constraint"): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    const value: unknown = Reflect.get(current, field);
    if (typeof value === "string") return value;
    current = Reflect.get(current, "cause");
  }
  return undefined;
}

function toTransient(err: unknown): TransientStoreError | null {
  const code = pgErrorField(err, "code");

  if (code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED) {
    return new TransientStoreError("Transaction aborted by the database", code);
  }

  // A freshly drawn public id raced another insert; redraw and retry.
  if (
    code === UNIQUE_VIOLATION &&
    pgErrorField(err, "constraint") === "meldingen_public_id_unique"
  ) {
    return new TransientStoreError("Public id already taken", code);
  }

  return null;
}

////////////////////////////////////////////////////////////////
// Store
////////////////////////////////////////////////////////////////

export class DrizzleStore<H extends PgQueryResultHKT> implements Store {
  constructor(private readonly db: PgDatabase<H>) {}

  read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return fn(repositoriesFor(this.db));
  }

  async transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((tx) => fn(repositoriesFor(tx)));
    } catch (err) {
      throw toTransient(err) ?? err;
    }
  }
}
