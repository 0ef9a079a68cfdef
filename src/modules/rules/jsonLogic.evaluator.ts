// src/modules/rules/jsonLogic.evaluator.ts
// Purpose: Interpreter over compiled RuleNode trees. Pure and synchronous.

import { charCount } from "@/utils/text";
import { compileRule } from "./compileRule";
import {
  InvalidExpressionError,
  PredicateNotSatisfiedError,
} from "./rule.errors";
import type {
  CompiledRule,
  ComparisonOperator,
  EqualityOperator,
  RuleContext,
  RuleEvaluator,
  RuleNode,
  RuleOutcome,
} from "./rule.types";

export const DEFAULT_REJECTION_MESSAGE = "Input is not valid";

////////////////////////////////////////////////////////////////
// Value helpers
////////////////////////////////////////////////////////////////

const MISSING = Symbol("missing");

function accessPath(value: unknown, parts: string[]): unknown {
  if (parts.length === 0) return value;

  if (Array.isArray(value)) {
    const index = Number(parts[0]);
    if (!Number.isInteger(index) || index < 0 || index >= value.length) {
      return MISSING;
    }
    return accessPath(value[index], parts.slice(1));
  }

  if (typeof value === "object" && value !== null) {
    if (!Object.prototype.hasOwnProperty.call(value, parts[0])) {
      return MISSING;
    }
    const next: unknown = Reflect.get(value, parts[0]);
    return accessPath(next, parts.slice(1));
  }

  return MISSING;
}

/**
 * Loose equality: nil only equals nil, numbers compare numerically,
 * everything else compares by string form.
 */
export function compareEqual(a: unknown, b: unknown): boolean {
  if (a === null || a === undefined) {
    return b === null || b === undefined;
  }
  if (b === null || b === undefined) {
    return false;
  }
  if (typeof a === "number" && typeof b === "number") {
    return a === b;
  }
  return String(a) === String(b);
}

function compareOrdered(
  op: ComparisonOperator,
  a: unknown,
  b: unknown,
): boolean {
  const bothNumbers = typeof a === "number" && typeof b === "number";
  const bothStrings = typeof a === "string" && typeof b === "string";

  if (!bothNumbers && !bothStrings) {
    throw new InvalidExpressionError(
      `Operator "${op}" needs two numbers or two strings`,
    );
  }

  const order = bothNumbers
    ? Math.sign(Number(a) - Number(b))
    : codeUnitOrder(String(a), String(b));

  switch (op) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function codeUnitOrder(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function applyEquality(op: EqualityOperator, a: unknown, b: unknown): boolean {
  switch (op) {
    case "==":
      return compareEqual(a, b);
    case "!=":
      return !compareEqual(a, b);
    case "===":
      return a === b;
    case "!==":
      return a !== b;
  }
}

function requireBoolean(op: string, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new InvalidExpressionError(
      `Operator "${op}" received a non-boolean operand`,
    );
  }
  return value;
}

////////////////////////////////////////////////////////////////
// Interpreter
////////////////////////////////////////////////////////////////

export function evaluateNode(node: RuleNode, context: RuleContext): unknown {
  switch (node.kind) {
    case "literal":
      return node.value;

    case "var": {
      const found =
        node.path === "" ? context : accessPath(context, node.path.split("."));
      if (found !== MISSING) return found;
      if (node.fallback !== undefined) return node.fallback;
      throw new InvalidExpressionError(`Unknown variable "${node.path}"`);
    }

    case "equality":
      return applyEquality(
        node.op,
        evaluateNode(node.left, context),
        evaluateNode(node.right, context),
      );

    case "comparison": {
      const values = node.operands.map((o) => evaluateNode(o, context));
      // Between form: {"<": [a, x, b]} means a < x < b
      for (let i = 0; i + 1 < values.length; i++) {
        if (!compareOrdered(node.op, values[i], values[i + 1])) return false;
      }
      return true;
    }

    case "logical": {
      for (const operand of node.operands) {
        const v = requireBoolean(node.op, evaluateNode(operand, context));
        if (node.op === "and" && !v) return false;
        if (node.op === "or" && v) return true;
      }
      return node.op === "and";
    }

    case "not":
      return !requireBoolean("!", evaluateNode(node.operand, context));

    case "if": {
      for (const branch of node.branches) {
        if (requireBoolean("if", evaluateNode(branch.condition, context))) {
          return evaluateNode(branch.result, context);
        }
      }
      return evaluateNode(node.otherwise, context);
    }

    case "length": {
      const v = evaluateNode(node.operand, context);
      if (typeof v === "string") return charCount(v);
      if (Array.isArray(v)) return v.length;
      throw new InvalidExpressionError(
        'Operator "length" needs a string operand',
      );
    }

    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

////////////////////////////////////////////////////////////////
// Evaluator service
////////////////////////////////////////////////////////////////

const DEFAULT_MAX_COMPILED = 500;

export class JsonLogicRuleEvaluator implements RuleEvaluator {
  // Insertion order doubles as recency: a hit is moved to the end.
  private readonly compiled = new Map<string, CompiledRule>();

  constructor(private readonly maxCompiled: number = DEFAULT_MAX_COMPILED) {}

  get compiledCount(): number {
    return this.compiled.size;
  }

  compile(expression: unknown): CompiledRule {
    const key =
      typeof expression === "string" ? expression : JSON.stringify(expression);

    const hit = this.compiled.get(key);
    if (hit) {
      this.compiled.delete(key);
      this.compiled.set(key, hit);
      return hit;
    }

    const rule = compileRule(expression);
    this.compiled.set(key, rule);

    if (this.compiled.size > this.maxCompiled) {
      const oldest = this.compiled.keys().next();
      if (!oldest.done) this.compiled.delete(oldest.value);
    }
    return rule;
  }

  check(expression: unknown, context: RuleContext): RuleOutcome {
    const rule = this.compile(expression);
    const result = evaluateNode(rule.root, context);

    if (result === true) return { ok: true };
    if (typeof result === "string") return { ok: false, message: result };
    if (result === false) {
      return { ok: false, message: DEFAULT_REJECTION_MESSAGE };
    }

    throw new InvalidExpressionError("Root type is not boolean");
  }

  evaluate(expression: unknown, context: RuleContext): boolean {
    return this.check(expression, context).ok;
  }

  validate(expression: unknown, context: RuleContext): void {
    const outcome = this.check(expression, context);
    if (!outcome.ok) {
      throw new PredicateNotSatisfiedError(outcome.message, context);
    }
  }
}
