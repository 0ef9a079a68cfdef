// src/modules/rules/rule.types.ts
// Purpose: Typed node tree for the closed JSON-logic operator set.

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Bumped whenever an operator is added, removed or changes meaning.
 * Stored rules are always evaluated against this exact set.
 */
export const RULE_OPERATOR_SET_VERSION = 1;

export const RULE_OPERATORS = [
  "var",
  "==",
  "===",
  "!=",
  "!==",
  "<",
  "<=",
  ">",
  ">=",
  "and",
  "or",
  "!",
  "if",
  "length",
] as const;

export type RuleOperator = (typeof RULE_OPERATORS)[number];

export type EqualityOperator = "==" | "===" | "!=" | "!==";
export type ComparisonOperator = "<" | "<=" | ">" | ">=";
export type LogicalOperator = "and" | "or";

export type RuleNode =
  | { kind: "literal"; value: JsonPrimitive }
  | { kind: "var"; path: string; fallback?: JsonPrimitive }
  | {
      kind: "equality";
      op: EqualityOperator;
      left: RuleNode;
      right: RuleNode;
    }
  | { kind: "comparison"; op: ComparisonOperator; operands: RuleNode[] }
  | { kind: "logical"; op: LogicalOperator; operands: RuleNode[] }
  | { kind: "not"; operand: RuleNode }
  | {
      kind: "if";
      branches: { condition: RuleNode; result: RuleNode }[];
      otherwise: RuleNode;
    }
  | { kind: "length"; operand: RuleNode };

/**
 * Static value types inferred at compile time.
 * "unknown" is whatever a variable lookup yields.
 */
export type ValueType = "boolean" | "number" | "string" | "null" | "unknown";

export interface CompiledRule {
  root: RuleNode;
  /** Possible root types: always contains "boolean", at most "string" besides. */
  resultTypes: ReadonlySet<ValueType>;
}

export type RuleOutcome = { ok: true } | { ok: false; message: string };

export type RuleContext = Record<string, unknown>;

export interface RuleEvaluator {
  evaluate(expression: unknown, context: RuleContext): boolean;
  check(expression: unknown, context: RuleContext): RuleOutcome;
  validate(expression: unknown, context: RuleContext): void;
}
