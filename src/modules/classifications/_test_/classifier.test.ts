// src/modules/classifications/_test_/classifier.test.ts

import { describe, it, expect } from "vitest";

import { MemoryStore } from "@/lib/persistence/memory.store";
import { KeywordClassifier, matchClassification } from "../classifier";

const candidates = [
  { id: "c-afval", name: "afval" },
  { id: "c-grof", name: "grof afval" },
  { id: "c-boom", name: "boom" },
];

describe("matchClassification", () => {
  it("matches whole words case-insensitively", () => {
    expect(matchClassification("Er ligt AFVAL op straat", candidates)).toBe("c-afval");
    expect(matchClassification("afvalbak is vol", candidates)).toBeNull();
  });

  it("prefers the longest matching name", () => {
    expect(matchClassification("Grof afval naast de container", candidates)).toBe("c-grof");
  });

  it("breaks equal-length ties alphabetically", () => {
    const tied = [
      { id: "c-zand", name: "zand" },
      { id: "c-boom", name: "boom" },
    ];
    expect(matchClassification("boom in het zand", tied)).toBe("c-boom");
  });

  it("treats regex characters in names literally", () => {
    expect(matchClassification("lamp (kapot)", [{ id: "c-lamp", name: "(kapot)" }])).toBe(
      "c-lamp",
    );
    expect(matchClassification("lamp kapot", [{ id: "c-lamp", name: "(kapot)" }])).toBeNull();
  });

  it("returns null when nothing matches", () => {
    expect(matchClassification("Een kapotte lantaarnpaal", candidates)).toBeNull();
  });
});

describe("KeywordClassifier", () => {
  it("classifies against the stored classifications", async () => {
    const store = new MemoryStore();
    const now = new Date("2026-03-01T12:00:00.000Z");
    await store.transaction((repos) =>
      repos.classifications.insert({
        id: "c-boom",
        name: "boom",
        assetTypeId: null,
        createdAt: now,
        updatedAt: now,
      }),
    );

    const classifier = new KeywordClassifier(store);

    await expect(classifier.classify("De boom is omgevallen")).resolves.toBe("c-boom");
    await expect(classifier.classify("Losliggende stoeptegel")).resolves.toBeNull();
  });
});
