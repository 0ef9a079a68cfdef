// src/modules/rules/_test_/jsonLogic.evaluator.test.ts

import { describe, it, expect } from "vitest";

import { compileRule } from "../compileRule";
import {
  DEFAULT_REJECTION_MESSAGE,
  JsonLogicRuleEvaluator,
} from "../jsonLogic.evaluator";
import {
  InvalidExpressionError,
  PredicateNotSatisfiedError,
} from "../rule.errors";

const WATER = { "==": [{ var: "text" }, "Water"] };
const WATER_WITH_MESSAGE = {
  if: [{ "==": [{ var: "text" }, "Water"] }, true, "You must type 'Water'!"],
};

function reasonOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidExpressionError) return err.reason;
    throw err;
  }
  throw new Error("expected InvalidExpressionError");
}

describe("JsonLogicRuleEvaluator", () => {
  const rules = new JsonLogicRuleEvaluator();

  it("evaluates equality against the context", () => {
    expect(rules.evaluate(WATER, { text: "Water" })).toBe(true);
    expect(rules.evaluate(WATER, { text: "Fire" })).toBe(false);
  });

  it("surfaces the else-branch message of an if", () => {
    expect(rules.check(WATER_WITH_MESSAGE, { text: "Fire" })).toEqual({
      ok: false,
      message: "You must type 'Water'!",
    });
    expect(rules.check(WATER_WITH_MESSAGE, { text: "Water" })).toEqual({ ok: true });
  });

  it("falls back to the default message for a plain false", () => {
    expect(rules.check({ ">=": [1, 10] }, {})).toEqual({
      ok: false,
      message: DEFAULT_REJECTION_MESSAGE,
    });
    expect(DEFAULT_REJECTION_MESSAGE).toBe("Input is not valid");
  });

  it("validate throws PredicateNotSatisfied with the author's message", () => {
    expect(() => rules.validate(WATER_WITH_MESSAGE, { text: "Fire" })).toThrow(
      PredicateNotSatisfiedError,
    );
    expect(() => rules.validate(WATER_WITH_MESSAGE, { text: "Fire" })).toThrow(
      "You must type 'Water'!",
    );
    expect(() => rules.validate(WATER, { text: "Water" })).not.toThrow();
  });

  it("accepts the expression as a JSON string", () => {
    expect(rules.evaluate(JSON.stringify(WATER), { text: "Water" })).toBe(true);
  });

  it("supports the between form of comparisons", () => {
    const between = { "<": [1, { var: "n" }, 10] };
    expect(rules.evaluate(between, { n: 5 })).toBe(true);
    expect(rules.evaluate(between, { n: 10 })).toBe(false);
  });

  it("measures text with length", () => {
    const maxFive = { "<=": [{ length: { var: "text" } }, 5] };
    expect(rules.evaluate(maxFive, { text: "abc" })).toBe(true);
    expect(rules.evaluate(maxFive, { text: "abcdef" })).toBe(false);
  });

  it("counts characters rather than UTF-16 units", () => {
    const maxThree = { "<=": [{ length: { var: "text" } }, 3] };
    expect(rules.evaluate(maxThree, { text: "😀😀😀" })).toBe(true);
    expect(rules.evaluate(maxThree, { text: "😀😀😀😀" })).toBe(false);
  });

  it("keeps a bounded number of compiled rules, evicting the least recently used", () => {
    const small = new JsonLogicRuleEvaluator(2);
    const a = small.compile({ "==": [{ var: "text" }, "a"] });
    const b = small.compile({ "==": [{ var: "text" }, "b"] });
    small.compile({ "==": [{ var: "text" }, "a"] });
    small.compile({ "==": [{ var: "text" }, "c"] });

    expect(small.compiledCount).toBe(2);
    expect(small.compile({ "==": [{ var: "text" }, "a"] })).toBe(a);
    expect(small.compile({ "==": [{ var: "text" }, "b"] })).not.toBe(b);
  });

  it("compares loosely with == and strictly with ===", () => {
    expect(rules.evaluate({ "==": [{ var: "n" }, "1"] }, { n: 1 })).toBe(true);
    expect(rules.evaluate({ "===": [{ var: "n" }, "1"] }, { n: 1 })).toBe(false);
    expect(rules.evaluate({ "!=": [{ var: "n" }, null] }, { n: 0 })).toBe(true);
  });

  it("uses the var default when the path is missing", () => {
    expect(rules.evaluate({ "==": [{ var: ["missing", "x"] }, "x"] }, {})).toBe(true);
  });

  it("reads nested paths", () => {
    expect(rules.evaluate({ "==": [{ var: "a.b" }, 2] }, { a: { b: 2 } })).toBe(true);
  });

  it("short-circuits and/or", () => {
    const either = { or: [{ "==": [{ var: "text" }, "a"] }, { "==": [{ var: "text" }, "b"] }] };
    expect(rules.evaluate(either, { text: "b" })).toBe(true);
    expect(rules.evaluate({ and: [true, { "!": [true] }] }, {})).toBe(false);
  });

  describe("runtime errors", () => {
    it("rejects an unknown variable", () => {
      expect(reasonOf(() => rules.evaluate({ "==": [{ var: "missing" }, 1] }, {}))).toBe(
        'Unknown variable "missing"',
      );
    });

    it("rejects ordering across types", () => {
      expect(reasonOf(() => rules.evaluate({ "<": [{ var: "n" }, 10] }, { n: "5" }))).toBe(
        'Operator "<" needs two numbers or two strings',
      );
    });

    it("rejects a non-boolean operand of and", () => {
      expect(reasonOf(() => rules.evaluate({ and: [{ var: "flag" }] }, { flag: "yes" }))).toBe(
        'Operator "and" received a non-boolean operand',
      );
    });
  });
});

describe("compileRule", () => {
  it("rejects operators outside the closed set", () => {
    expect(reasonOf(() => compileRule({ "+": [1, 2] }))).toBe('Unknown operator "+"');
  });

  it("rejects a root that cannot be boolean", () => {
    expect(reasonOf(() => compileRule({ length: "abc" }))).toBe("Root type is not boolean");
    expect(reasonOf(() => compileRule(42))).toBe("Root type is not boolean");
  });

  it("rejects an if whose implicit else is null", () => {
    expect(reasonOf(() => compileRule({ if: [{ var: "ok" }, true] }))).toBe(
      "Root type is not boolean",
    );
  });

  it("checks arity", () => {
    expect(reasonOf(() => compileRule({ "==": [1] }))).toBe(
      'Operator "==" expects 2 argument(s), got 1',
    );
  });

  it("rejects a boolean operand of a comparison", () => {
    expect(reasonOf(() => compileRule({ "<": [true, 1] }))).toBe(
      'Operator "<" does not accept a boolean operand',
    );
  });

  it("rejects more than one operator key", () => {
    expect(reasonOf(() => compileRule({ "==": [1, 1], "!=": [1, 2] }))).toBe(
      "An operation must have exactly one operator key",
    );
  });

  it("rejects malformed JSON text", () => {
    expect(reasonOf(() => compileRule("{"))).toBe("Expression is not valid JSON");
  });

  it("infers boolean and string for a message-carrying if", () => {
    const { resultTypes } = compileRule(WATER_WITH_MESSAGE);
    expect([...resultTypes].sort()).toEqual(["boolean", "string"]);
  });
});
