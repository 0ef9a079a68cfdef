// src/modules/forms/form.types.ts
// Purpose: Schema tree model. Components are a tagged union on `type`.

import type { JsonValue } from "@/modules/rules/rule.types";

export const COMPONENT_TYPES = [
  "panel",
  "textarea",
  "textfield",
  "radio",
  "selectboxes",
  "select",
] as const;

export type ComponentType = (typeof COMPONENT_TYPES)[number];

export type FormDisplay = "form" | "wizard";

/**
 * "primary" is the fixed form a melding is created from.
 * "classification" forms hold the follow-up questions.
 */
export type FormKind = "primary" | "classification";

export interface ComponentOption {
  value: string;
  label: string;
  position: number;
}

interface ComponentBase {
  id: string;
  key: string;
  label: string;
  description: string | null;
  position: number;
}

interface QuestionComponentBase extends ComponentBase {
  /** Null on primary-form leaves; those never get a Question. */
  questionId: string | null;
  required: boolean;
  requiredErrorMessage: string | null;
  /** JSON-logic expression, evaluated with `{ text }`. */
  jsonLogic: JsonValue | null;
}

export interface TextAreaComponent extends QuestionComponentBase {
  type: "textarea";
  autoExpand: boolean;
  maxCharCount: number | null;
}

export interface TextFieldComponent extends QuestionComponentBase {
  type: "textfield";
}

export interface RadioComponent extends QuestionComponentBase {
  type: "radio";
  values: ComponentOption[];
}

export interface CheckboxComponent extends QuestionComponentBase {
  type: "selectboxes";
  values: ComponentOption[];
}

export interface SelectComponent extends QuestionComponentBase {
  type: "select";
  widget: string;
  placeholder: string;
  data: { values: ComponentOption[] };
}

export type QuestionComponent =
  | TextAreaComponent
  | TextFieldComponent
  | RadioComponent
  | CheckboxComponent
  | SelectComponent;

export interface PanelComponent extends ComponentBase {
  type: "panel";
  title: string;
  components: QuestionComponent[];
}

export type FormComponent = PanelComponent | QuestionComponent;

export interface Form {
  id: string;
  title: string;
  display: FormDisplay;
  kind: FormKind;
  classificationId: string | null;
  components: FormComponent[];
}

export interface Question {
  id: string;
  text: string;
  formId: string | null;
}

/**
 * Flattens a schema tree to its answerable leaves in display order.
 */
export function questionComponents(form: Form): QuestionComponent[] {
  const out: QuestionComponent[] = [];
  for (const component of form.components) {
    if (component.type === "panel") {
      out.push(...component.components);
    } else {
      out.push(component);
    }
  }
  return out;
}

export function findComponentByQuestionId(
  form: Form,
  questionId: string,
): QuestionComponent | undefined {
  return questionComponents(form).find((c) => c.questionId === questionId);
}
