// src/modules/meldingen/melding.schemas.ts
// Purpose: Request bodies and query strings of the melding endpoints.

import { z } from "zod";

import { MeldingState } from "./melding.types";
import { MELDING_TRANSITION_NAMES } from "./meldingLifecycle.transitions";

export const MeldingTextSchema = z.object({
  text: z.string().trim().min(1),
});

/** GeoJSON Feature with a Point geometry; coordinates are [lng, lat]. */
export const LocationFeatureSchema = z.object({
  type: z.literal("Feature"),
  geometry: z.object({
    type: z.literal("Point"),
    coordinates: z.tuple([
      z.number().min(-180).max(180),
      z.number().min(-90).max(90),
    ]),
  }),
  properties: z.record(z.unknown()).optional(),
});

export type LocationFeature = z.infer<typeof LocationFeatureSchema>;

export const PHONE_PATTERN = /^\+?[0-9]{6,15}$/;

export const ContactInfoSchema = z.object({
  email: z.string().email().nullable().optional(),
  phone: z
    .string()
    .transform((v) => v.replace(/[\s-]/g, ""))
    .pipe(z.string().regex(PHONE_PATTERN, "Invalid phone number"))
    .nullable()
    .optional(),
});

export type ContactInfo = z.infer<typeof ContactInfoSchema>;

export const TransitionNameSchema = z.enum(MELDING_TRANSITION_NAMES);

export const ReclassifySchema = z.object({
  classification: z.string().uuid().nullable(),
});

export const CompleteSchema = z.object({
  mail_body: z.string().trim().min(1).nullable().optional(),
});

export const ListMeldingenQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  state: z.nativeEnum(MeldingState).optional(),
});
