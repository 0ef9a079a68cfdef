// src/modules/rules/compileRule.ts
// Purpose: Parse a JSON-logic value into a typed RuleNode tree and type-check it.

import { InvalidExpressionError } from "./rule.errors";
import {
  RULE_OPERATORS,
  type CompiledRule,
  type ComparisonOperator,
  type EqualityOperator,
  type JsonPrimitive,
  type RuleNode,
  type RuleOperator,
  type ValueType,
} from "./rule.types";

////////////////////////////////////////////////////////////////
// Public entry
////////////////////////////////////////////////////////////////

export function compileRule(expression: unknown): CompiledRule {
  const source =
    typeof expression === "string" ? parseJson(expression) : expression;

  const root = parseNode(source);
  const resultTypes = inferTypes(root);

  if (!resultTypes.has("boolean")) {
    throw new InvalidExpressionError("Root type is not boolean");
  }

  for (const t of resultTypes) {
    if (t !== "boolean" && t !== "string") {
      throw new InvalidExpressionError("Root type is not boolean");
    }
  }

  return { root, resultTypes };
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidExpressionError("Expression is not valid JSON");
  }
}

////////////////////////////////////////////////////////////////
// Parsing
////////////////////////////////////////////////////////////////

function isOperator(key: string): key is RuleOperator {
  return (RULE_OPERATORS as readonly string[]).includes(key);
}

function isPrimitive(value: unknown): value is JsonPrimitive {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function argumentList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

function expectArity(
  op: RuleOperator,
  args: unknown[],
  min: number,
  max: number,
) {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min}..${max}`;
    throw new InvalidExpressionError(
      `Operator "${op}" expects ${expected} argument(s), got ${args.length}`,
    );
  }
}

function parseNode(value: unknown): RuleNode {
  if (isPrimitive(value)) {
    return { kind: "literal", value };
  }

  if (Array.isArray(value)) {
    throw new InvalidExpressionError("Array literals are not supported");
  }

  if (typeof value !== "object" || value === null) {
    throw new InvalidExpressionError(`Unsupported value: ${String(value)}`);
  }

  const keys = Object.keys(value);
  if (keys.length !== 1) {
    throw new InvalidExpressionError(
      "An operation must have exactly one operator key",
    );
  }

  const op = keys[0];
  if (!isOperator(op)) {
    throw new InvalidExpressionError(`Unknown operator "${op}"`);
  }

  const raw: unknown = Object.values(value)[0];
  const args = argumentList(raw);

  switch (op) {
    case "var":
      return parseVar(args);

    case "==":
    case "===":
    case "!=":
    case "!==":
      expectArity(op, args, 2, 2);
      return parseEquality(op, args);

    case "<":
    case "<=":
    case ">":
    case ">=":
      expectArity(op, args, 2, 3);
      return parseComparison(op, args);

    case "and":
    case "or": {
      expectArity(op, args, 1, Number.POSITIVE_INFINITY);
      const operands = args.map(parseNode);
      operands.forEach((o) => requireTypes(op, o, ["boolean"]));
      return { kind: "logical", op, operands };
    }

    case "!": {
      expectArity(op, args, 1, 1);
      const operand = parseNode(args[0]);
      requireTypes(op, operand, ["boolean"]);
      return { kind: "not", operand };
    }

    case "if":
      expectArity(op, args, 2, Number.POSITIVE_INFINITY);
      return parseIf(args);

    case "length": {
      expectArity(op, args, 1, 1);
      const operand = parseNode(args[0]);
      requireTypes(op, operand, ["string"]);
      return { kind: "length", operand };
    }

    default: {
      const _exhaustive: never = op;
      throw new InvalidExpressionError(`Unknown operator "${_exhaustive}"`);
    }
  }
}

function parseVar(args: unknown[]): RuleNode {
  expectArity("var", args, 1, 2);

  const [path, fallback] = args;

  if (typeof path !== "string" && typeof path !== "number") {
    throw new InvalidExpressionError("var path must be a string");
  }

  if (args.length === 2) {
    if (!isPrimitive(fallback)) {
      throw new InvalidExpressionError("var default must be a primitive");
    }
    return { kind: "var", path: String(path), fallback };
  }

  return { kind: "var", path: String(path) };
}

function parseEquality(op: EqualityOperator, args: unknown[]): RuleNode {
  return {
    kind: "equality",
    op,
    left: parseNode(args[0]),
    right: parseNode(args[1]),
  };
}

function parseComparison(op: ComparisonOperator, args: unknown[]): RuleNode {
  const operands = args.map(parseNode);
  operands.forEach((o) => requireTypes(op, o, ["number", "string"]));
  return { kind: "comparison", op, operands };
}

function parseIf(args: unknown[]): RuleNode {
  const branches: { condition: RuleNode; result: RuleNode }[] = [];

  let i = 0;
  for (; i + 1 < args.length; i += 2) {
    const condition = parseNode(args[i]);
    requireTypes("if", condition, ["boolean"]);
    branches.push({ condition, result: parseNode(args[i + 1]) });
  }

  // Odd count: trailing else. Even count: implicit null.
  const otherwise: RuleNode =
    i < args.length ? parseNode(args[i]) : { kind: "literal", value: null };

  return { kind: "if", branches, otherwise };
}

////////////////////////////////////////////////////////////////
// Type inference
////////////////////////////////////////////////////////////////

function literalType(value: JsonPrimitive): ValueType {
  if (value === null) return "null";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    default:
      return "string";
  }
}

export function inferTypes(node: RuleNode): Set<ValueType> {
  switch (node.kind) {
    case "literal":
      return new Set([literalType(node.value)]);
    case "var":
      return new Set(["unknown"]);
    case "equality":
    case "comparison":
    case "logical":
    case "not":
      return new Set(["boolean"]);
    case "length":
      return new Set(["number"]);
    case "if": {
      const out = new Set<ValueType>();
      for (const b of node.branches) {
        inferTypes(b.result).forEach((t) => out.add(t));
      }
      inferTypes(node.otherwise).forEach((t) => out.add(t));
      return out;
    }
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

/**
 * "unknown" operands are accepted here and checked again at evaluation.
 */
function requireTypes(op: string, node: RuleNode, allowed: ValueType[]) {
  for (const t of inferTypes(node)) {
    if (t !== "unknown" && !allowed.includes(t)) {
      throw new InvalidExpressionError(
        `Operator "${op}" does not accept a ${t} operand`,
      );
    }
  }
}
