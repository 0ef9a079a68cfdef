// src/modules/rules/rule.errors.ts

import { DomainError } from "@/lib/errors/domain-error";

/**
 * Malformed rule: unknown operator, bad arity, non-boolean root or a
 * variable path the context does not have. This is a schema
 * configuration bug, never a melder mistake.
 */
export class InvalidExpressionError extends DomainError {
  constructor(public readonly reason: string) {
    super(`Invalid rule expression: ${reason}`, 500, "INVALID_EXPRESSION");
    this.name = "InvalidExpressionError";
  }
}

export class PredicateNotSatisfiedError extends DomainError {
  constructor(
    message: string,
    public readonly input: Record<string, unknown>,
  ) {
    super(message, 422, "PREDICATE_NOT_SATISFIED");
    this.name = "PredicateNotSatisfiedError";
  }
}
