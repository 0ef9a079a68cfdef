// src/lib/db/schema.ts
// Purpose: PostgreSQL tables. DDL lives in drizzle/0000_init.sql and must be kept in step.

import { sql } from "drizzle-orm";
import {
  bigserial,
  check,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
};

export const assetTypes = pgTable(
  "asset_types",
  {
    id: uuid("id").primaryKey(),
    name: text("name").notNull(),
    className: text("class_name").notNull(),
    arguments: jsonb("arguments").notNull(),
    maxAssets: integer("max_assets").notNull(),
    ...timestamps,
  },
  () => ({
    assetTypesMaxAssetsCheck: check(
      "asset_types_max_assets_check",
      sql`"max_assets" >= 1`,
    ),
  }),
);

export const classifications = pgTable("classifications", {
  id: uuid("id").primaryKey(),
  name: text("name").notNull(),
  assetTypeId: uuid("asset_type_id").references(() => assetTypes.id, {
    onDelete: "set null",
  }),
  ...timestamps,
});

/**
 * One row per form. The component tree is stored whole; it is rebuilt on
 * every save and never patched in place.
 */
export const forms = pgTable(
  "forms",
  {
    id: uuid("id").primaryKey(),
    title: text("title").notNull(),
    display: text("display").notNull(),
    kind: text("kind").notNull(),
    classificationId: uuid("classification_id").references(
      () => classifications.id,
      { onDelete: "set null" },
    ),
    components: jsonb("components").notNull(),
    ...timestamps,
  },
  (table) => ({
    formsClassificationIdx: index("forms_classification_idx").on(
      table.classificationId,
    ),
    formsKindCheck: check(
      "forms_kind_check",
      sql`"kind" IN ('primary', 'classification')`,
    ),
  }),
);

export const questions = pgTable("questions", {
  id: uuid("id").primaryKey(),
  text: text("text").notNull(),
  formId: uuid("form_id").references(() => forms.id, { onDelete: "set null" }),
  ...timestamps,
});

export const meldingen = pgTable(
  "meldingen",
  {
    id: uuid("id").primaryKey(),
    publicId: varchar("public_id", { length: 6 }).notNull(),
    text: text("text").notNull(),
    state: text("state").notNull(),
    classificationId: uuid("classification_id").references(
      () => classifications.id,
      { onDelete: "set null" },
    ),
    tokenHash: text("token_hash"),
    tokenExpiresAt: timestamp("token_expires_at", { withTimezone: true }),
    lat: doublePrecision("lat"),
    lng: doublePrecision("lng"),
    street: text("street"),
    houseNumber: text("house_number"),
    postalCode: text("postal_code"),
    city: text("city"),
    email: text("email"),
    phone: text("phone"),
    ...timestamps,
  },
  (table) => ({
    meldingenPublicIdUnique: uniqueIndex("meldingen_public_id_unique").on(
      table.publicId,
    ),
    meldingenStateCreatedIdx: index("meldingen_state_created_idx").on(
      table.state,
      table.createdAt,
    ),
    /** A token never exists without its expiry. */
    meldingenTokenPairCheck: check(
      "meldingen_token_pair_check",
      sql`("token_hash" IS NULL) = ("token_expires_at" IS NULL)`,
    ),
    meldingenLocationPairCheck: check(
      "meldingen_location_pair_check",
      sql`("lat" IS NULL) = ("lng" IS NULL)`,
    ),
  }),
);

export const answers = pgTable(
  "answers",
  {
    id: uuid("id").primaryKey(),
    /** Insertion order; the highest seq per question is the authoritative answer. */
    seq: bigserial("seq", { mode: "number" }).notNull(),
    meldingId: uuid("melding_id")
      .references(() => meldingen.id, { onDelete: "cascade" })
      .notNull(),
    questionId: uuid("question_id")
      .references(() => questions.id, { onDelete: "cascade" })
      .notNull(),
    payload: jsonb("payload").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    answersMeldingSeqIdx: index("answers_melding_seq_idx").on(
      table.meldingId,
      table.seq,
    ),
  }),
);

export const assets = pgTable(
  "assets",
  {
    id: uuid("id").primaryKey(),
    externalId: text("external_id").notNull(),
    assetTypeId: uuid("asset_type_id")
      .references(() => assetTypes.id, { onDelete: "cascade" })
      .notNull(),
    meldingId: uuid("melding_id")
      .references(() => meldingen.id, { onDelete: "cascade" })
      .notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    assetsMeldingIdx: index("assets_melding_idx").on(table.meldingId),
  }),
);
