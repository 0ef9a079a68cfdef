// src/modules/forms/_test_/buildFormTree.test.ts

import { describe, it, expect } from "vitest";

import { buildFormTree } from "../buildFormTree";
import { FormInputSchema, type FormComponentInput } from "../form.schemas";
import { questionComponents, type Form } from "../form.types";

function components(raw: unknown[]): FormComponentInput[] {
  return FormInputSchema.parse({ title: "Test form", display: "form", components: raw })
    .components;
}

function sequentialIds() {
  let n = 0;
  return () => `id-${++n}`;
}

const textarea = (key: string) => ({
  type: "textarea",
  key,
  label: `Label ${key}`,
  validate: { required: true },
});

describe("buildFormTree", () => {
  it("numbers top-level components 1..N in input order", () => {
    const built = buildFormTree(
      "form-1",
      "classification",
      components([textarea("aaa"), textarea("bbb"), textarea("ccc"), textarea("ddd")]),
      sequentialIds(),
    );

    expect(built.components.map((c) => [c.key, c.position])).toEqual([
      ["aaa", 1],
      ["bbb", 2],
      ["ccc", 3],
      ["ddd", 4],
    ]);
  });

  it("leaves exactly M dense positions after rebuilding with fewer components", () => {
    const first = buildFormTree(
      "form-1",
      "classification",
      components([textarea("aaa"), textarea("bbb"), textarea("ccc"), textarea("ddd")]),
    );
    const second = buildFormTree(
      "form-1",
      "classification",
      components([textarea("ddd"), textarea("bbb")]),
    );

    expect(first.components).toHaveLength(4);
    expect(second.components.map((c) => [c.key, c.position])).toEqual([
      ["ddd", 1],
      ["bbb", 2],
    ]);

    // No id survives a rebuild
    const firstIds = new Set(first.components.map((c) => c.id));
    expect(second.components.some((c) => firstIds.has(c.id))).toBe(false);
  });

  it("numbers panel children per panel and creates one question per leaf", () => {
    const built = buildFormTree(
      "form-1",
      "classification",
      components([
        {
          type: "panel",
          key: "page1",
          label: "Page one",
          title: "Page one",
          components: [
            textarea("p1a"),
            {
              type: "radio",
              key: "p1b",
              label: "Is it dangerous?",
              values: [
                { value: "yes", label: "Ja" },
                { value: "no", label: "Nee" },
              ],
            },
          ],
        },
        textarea("top"),
      ]),
      sequentialIds(),
    );

    const [panel, top] = built.components;
    expect(panel.type).toBe("panel");
    expect(panel.position).toBe(1);
    expect(top.position).toBe(2);

    if (panel.type !== "panel") throw new Error("expected a panel");
    expect(panel.components.map((c) => [c.key, c.position])).toEqual([
      ["p1a", 1],
      ["p1b", 2],
    ]);

    const radio = panel.components[1];
    if (radio.type !== "radio") throw new Error("expected a radio");
    expect(radio.values).toEqual([
      { value: "yes", label: "Ja", position: 1 },
      { value: "no", label: "Nee", position: 2 },
    ]);

    expect(built.questions.map((q) => [q.text, q.formId])).toEqual([
      ["Label p1a", "form-1"],
      ["Is it dangerous?", "form-1"],
      ["Label top", "form-1"],
    ]);

    const form: Form = {
      id: "form-1",
      title: "Test form",
      display: "form",
      kind: "classification",
      classificationId: null,
      components: built.components,
    };
    expect(questionComponents(form).map((c) => c.questionId)).toEqual(
      built.questions.map((q) => q.id),
    );
  });

  it("gives primary-form leaves no question", () => {
    const built = buildFormTree("primary", "primary", components([textarea("text")]));

    expect(built.questions).toEqual([]);
    const [leaf] = built.components;
    if (leaf.type === "panel") throw new Error("expected a leaf");
    expect(leaf.questionId).toBeNull();
    expect(leaf.required).toBe(true);
  });

  it("refuses a panel inside a panel at the input boundary", () => {
    const parsed = FormInputSchema.safeParse({
      title: "Test form",
      display: "wizard",
      components: [
        {
          type: "panel",
          key: "outer",
          label: "Outer",
          title: "Outer",
          components: [
            { type: "panel", key: "inner", label: "Inner", title: "Inner", components: [] },
          ],
        },
      ],
    });

    expect(parsed.success).toBe(false);
  });
});
