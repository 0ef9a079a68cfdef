// src/modules/forms/buildFormTree.ts
// Purpose: Rebuild a schema tree from an ordered component input list.
// Input order defines position; positions are dense and 1-based per parent.

import { randomUUID } from "node:crypto";
import type {
  FormComponentInput,
  QuestionComponentInput,
} from "./form.schemas";
import type {
  ComponentOption,
  FormComponent,
  FormKind,
  PanelComponent,
  Question,
  QuestionComponent,
} from "./form.types";

export interface FormTreeBuild {
  components: FormComponent[];
  /** New questions, one per leaf. Empty for the primary form. */
  questions: Question[];
}

type IdFactory = () => string;

function toOptions(values: { value: string; label: string }[]): ComponentOption[] {
  return values.map((v, index) => ({
    value: v.value,
    label: v.label,
    position: index + 1,
  }));
}

function buildLeaf(
  input: QuestionComponentInput,
  position: number,
  questionId: string | null,
  newId: IdFactory,
): QuestionComponent {
  const base = {
    id: newId(),
    key: input.key,
    label: input.label,
    description: input.description ?? null,
    position,
    questionId,
    required: input.validate?.required ?? false,
    requiredErrorMessage: input.validate?.requiredErrorMessage ?? null,
    jsonLogic: input.validate?.json ?? null,
  };

  switch (input.type) {
    case "textarea":
      return {
        ...base,
        type: "textarea",
        autoExpand: input.autoExpand,
        maxCharCount: input.maxCharCount ?? null,
      };
    case "textfield":
      return { ...base, type: "textfield" };
    case "radio":
      return { ...base, type: "radio", values: toOptions(input.values) };
    case "selectboxes":
      return { ...base, type: "selectboxes", values: toOptions(input.values) };
    case "select":
      return {
        ...base,
        type: "select",
        widget: input.widget,
        placeholder: input.placeholder,
        data: { values: toOptions(input.data.values) },
      };
    default: {
      const _exhaustive: never = input;
      return _exhaustive;
    }
  }
}

/**
 * Builds a fresh component list for `formId`. Nothing of the previous
 * tree is reused: component ids and questions are all new.
 */
export function buildFormTree(
  formId: string,
  kind: FormKind,
  inputs: FormComponentInput[],
  newId: IdFactory = randomUUID,
): FormTreeBuild {
  const questions: Question[] = [];

  const leaf = (input: QuestionComponentInput, position: number) => {
    let questionId: string | null = null;

    if (kind === "classification") {
      questionId = newId();
      questions.push({ id: questionId, text: input.label, formId });
    }

    return buildLeaf(input, position, questionId, newId);
  };

  const components = inputs.map((input, index): FormComponent => {
    const position = index + 1;

    if (input.type === "panel") {
      const panel: PanelComponent = {
        id: newId(),
        type: "panel",
        key: input.key,
        label: input.label,
        description: null,
        title: input.title,
        position,
        components: input.components.map((child, childIndex) =>
          leaf(child, childIndex + 1),
        ),
      };
      return panel;
    }

    return leaf(input, position);
  });

  return { components, questions };
}
