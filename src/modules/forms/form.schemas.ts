// src/modules/forms/form.schemas.ts
// Purpose: Request validation for form definitions (form.io component shape),
// plus the stored tree shape read back from the database and the cache.

import { z } from "zod";
import type { JsonValue } from "@/modules/rules/rule.types";
import type { Form, FormComponent } from "./form.types";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const OptionInputSchema = z.object({
  label: z.string().min(1),
  value: z.string().min(1),
});

const ValidateInputSchema = z.object({
  json: JsonValueSchema.optional(),
  required: z.boolean().default(false),
  requiredErrorMessage: z.string().nullable().optional(),
});

const LeafBase = {
  label: z.string().min(3),
  description: z.string().nullable().optional(),
  key: z.string().min(3),
  input: z.boolean().default(true),
  validate: ValidateInputSchema.optional(),
};

const TextAreaInputSchema = z
  .object({
    ...LeafBase,
    type: z.literal("textarea"),
    autoExpand: z.boolean().default(false),
    maxCharCount: z.number().int().positive().nullable().optional(),
  })
  .strict();

const TextFieldInputSchema = z
  .object({ ...LeafBase, type: z.literal("textfield") })
  .strict();

const RadioInputSchema = z
  .object({
    ...LeafBase,
    type: z.literal("radio"),
    values: z.array(OptionInputSchema),
  })
  .strict();

const CheckboxInputSchema = z
  .object({
    ...LeafBase,
    type: z.literal("selectboxes"),
    values: z.array(OptionInputSchema),
  })
  .strict();

const SelectInputSchema = z
  .object({
    ...LeafBase,
    type: z.literal("select"),
    widget: z.string().default("choicesjs"),
    placeholder: z.string().default(""),
    data: z.object({ values: z.array(OptionInputSchema) }),
  })
  .strict();

export const QuestionComponentInputSchema = z.discriminatedUnion("type", [
  TextAreaInputSchema,
  TextFieldInputSchema,
  RadioInputSchema,
  CheckboxInputSchema,
  SelectInputSchema,
]);

// Panels hold leaves only; a nested panel fails the discriminator.
const PanelInputSchema = z
  .object({
    label: z.string().min(3),
    title: z.string().min(3),
    key: z.string().min(3),
    type: z.literal("panel"),
    input: z.literal(false).default(false),
    components: z.array(QuestionComponentInputSchema),
  })
  .strict();

export const FormComponentInputSchema = z.discriminatedUnion("type", [
  PanelInputSchema,
  TextAreaInputSchema,
  TextFieldInputSchema,
  RadioInputSchema,
  CheckboxInputSchema,
  SelectInputSchema,
]);

const FormBase = {
  title: z.string().min(3),
  display: z.enum(["form", "wizard"]),
  components: z.array(FormComponentInputSchema),
};

export const FormInputSchema = z.object({
  ...FormBase,
  classification: z.string().uuid().nullable().optional(),
});

export const PrimaryFormInputSchema = z.object(FormBase);

export type QuestionComponentInput = z.infer<
  typeof QuestionComponentInputSchema
>;
export type FormComponentInput = z.infer<typeof FormComponentInputSchema>;
export type FormInput = z.infer<typeof FormInputSchema>;
export type PrimaryFormInput = z.infer<typeof PrimaryFormInputSchema>;

////////////////////////////////////////////////////////////////
// Stored tree (jsonb column, form cache)
////////////////////////////////////////////////////////////////

const StoredOptionSchema = z.object({
  value: z.string(),
  label: z.string(),
  position: z.number().int(),
});

const StoredLeafBase = {
  id: z.string(),
  key: z.string(),
  label: z.string(),
  description: z.string().nullable(),
  position: z.number().int(),
  questionId: z.string().nullable(),
  required: z.boolean(),
  requiredErrorMessage: z.string().nullable(),
  jsonLogic: JsonValueSchema.nullable(),
};

const StoredQuestionComponentSchema = z.discriminatedUnion("type", [
  z.object({
    ...StoredLeafBase,
    type: z.literal("textarea"),
    autoExpand: z.boolean(),
    maxCharCount: z.number().int().nullable(),
  }),
  z.object({ ...StoredLeafBase, type: z.literal("textfield") }),
  z.object({
    ...StoredLeafBase,
    type: z.literal("radio"),
    values: z.array(StoredOptionSchema),
  }),
  z.object({
    ...StoredLeafBase,
    type: z.literal("selectboxes"),
    values: z.array(StoredOptionSchema),
  }),
  z.object({
    ...StoredLeafBase,
    type: z.literal("select"),
    widget: z.string(),
    placeholder: z.string(),
    data: z.object({ values: z.array(StoredOptionSchema) }),
  }),
]);

const StoredPanelSchema = z.object({
  id: z.string(),
  type: z.literal("panel"),
  key: z.string(),
  label: z.string(),
  description: z.string().nullable(),
  title: z.string(),
  position: z.number().int(),
  components: z.array(StoredQuestionComponentSchema),
});

export const StoredComponentsSchema: z.ZodType<FormComponent[]> = z.array(
  z.union([StoredPanelSchema, StoredQuestionComponentSchema]),
);

export const StoredFormSchema: z.ZodType<Form> = z.object({
  id: z.string(),
  title: z.string(),
  display: z.enum(["form", "wizard"]),
  kind: z.enum(["primary", "classification"]),
  classificationId: z.string().nullable(),
  components: StoredComponentsSchema,
});
