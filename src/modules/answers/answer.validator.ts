// src/modules/answers/answer.validator.ts
// Purpose: Content check of one answer against the schema leaf it answers.
// Dispatch is on the component type; the payload shape is checked first.

import { charCount } from "@/utils/text";
import { PredicateNotSatisfiedError } from "@/modules/rules/rule.errors";
import type { RuleEvaluator } from "@/modules/rules/rule.types";
import type {
  ComponentOption,
  QuestionComponent,
} from "@/modules/forms/form.types";
import type { AnswerPayload } from "@/modules/meldingen/melding.types";
import { InvalidAnswerShapeError } from "./answer.errors";

type ValueLabel = Extract<AnswerPayload, { type: "value_label" }>;

export const NO_MATCHING_OPTION_MESSAGE = "Answer does not match any option";

function expectText(component: QuestionComponent, payload: AnswerPayload): string {
  if (payload.type !== "text") {
    throw new InvalidAnswerShapeError(component.key, component.type, "text");
  }
  return payload.text;
}

function expectValueLabel(
  component: QuestionComponent,
  payload: AnswerPayload,
): ValueLabel {
  if (payload.type !== "value_label") {
    throw new InvalidAnswerShapeError(component.key, component.type, "value_label");
  }
  return payload;
}

/** Value and label must both belong to the same option. */
function requireOption(options: ComponentOption[], answer: ValueLabel) {
  const match = options.some(
    (o) => o.value === answer.value && o.label === answer.label,
  );
  if (!match) {
    throw new PredicateNotSatisfiedError(NO_MATCHING_OPTION_MESSAGE, {
      value: answer.value,
      label: answer.label,
    });
  }
}

export class AnswerValidator {
  constructor(private readonly rules: RuleEvaluator) {}

  validate(component: QuestionComponent, payload: AnswerPayload): void {
    switch (component.type) {
      case "textarea": {
        const text = expectText(component, payload);
        this.checkRule(component, text);
        if (component.maxCharCount !== null && charCount(text) > component.maxCharCount) {
          throw new PredicateNotSatisfiedError(
            `Answer is longer than ${component.maxCharCount} characters`,
            { text },
          );
        }
        return;
      }

      case "textfield":
        this.checkRule(component, expectText(component, payload));
        return;

      case "radio":
      case "selectboxes":
        requireOption(component.values, expectValueLabel(component, payload));
        return;

      case "select":
        requireOption(component.data.values, expectValueLabel(component, payload));
        return;

      default: {
        const _exhaustive: never = component;
        return _exhaustive;
      }
    }
  }

  private checkRule(component: QuestionComponent, text: string) {
    if (component.jsonLogic === null) return;
    this.rules.validate(component.jsonLogic, { text });
  }
}
