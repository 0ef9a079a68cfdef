// src/modules/answers/answer.errors.ts

import { DomainError } from "@/lib/errors/domain-error";
import type { ComponentType } from "@/modules/forms/form.types";

export class InvalidAnswerShapeError extends DomainError {
  constructor(
    public readonly componentKey: string,
    public readonly componentType: ComponentType,
    public readonly expected: "text" | "value_label",
  ) {
    super(
      `Question "${componentKey}" (${componentType}) expects a ${expected} answer`,
      422,
      "INVALID_ANSWER_SHAPE",
    );
    this.name = "InvalidAnswerShapeError";
  }
}
