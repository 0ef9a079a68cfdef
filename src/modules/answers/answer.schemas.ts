// src/modules/answers/answer.schemas.ts

import { z } from "zod";
import type { AnswerPayload } from "@/modules/meldingen/melding.types";

export const TextAnswerSchema = z.object({
  type: z.literal("text"),
  text: z.string().min(1),
});

export const ValueLabelAnswerSchema = z.object({
  type: z.literal("value_label"),
  value: z.string().min(1),
  label: z.string().min(1),
});

export const AnswerPayloadSchema: z.ZodType<AnswerPayload> =
  z.discriminatedUnion("type", [TextAnswerSchema, ValueLabelAnswerSchema]);
