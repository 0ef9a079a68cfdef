// src/modules/forms/_test_/form.lookup.test.ts

import { beforeEach, describe, expect, it } from "vitest";

import {
  requiredTextForm,
  seedClassification,
  silenceLogs,
  testServices,
} from "@/_test_/support";
import { MemoryFormCache, formCacheKeys } from "@/lib/cache/form-cache";
import { FormLookup } from "../form.lookup";

describe("MemoryFormCache", () => {
  it("refuses a fill stamped before the last invalidation", async () => {
    const cache = new MemoryFormCache();
    const stamp = await cache.generation("form:primary");

    await cache.invalidate(["form:primary"]);

    await expect(cache.set("form:primary", null, stamp)).resolves.toBe(false);
    await expect(cache.get("form:primary")).resolves.toBeUndefined();
    await expect(cache.generation("form:primary")).resolves.toBe(1);
  });
});

describe("FormLookup", () => {
  beforeEach(() => {
    silenceLogs();
  });

  async function withForm() {
    const { store, services } = testServices();
    const boom = await seedClassification(store, { name: "boom" });
    const form = await services.forms.create(requiredTextForm(boom.id));
    const cache = new MemoryFormCache();
    return { store, boom, form, cache, lookup: new FormLookup(cache) };
  }

  it("fills the cache on a miss", async () => {
    const { store, boom, form, cache, lookup } = await withForm();

    await store.read((repos) => lookup.forClassification(repos, boom.id));

    const cached = await cache.get(formCacheKeys.byClassification(boom.id));
    expect(cached?.id).toBe(form.id);
  });

  it("does not cache a tree loaded before a concurrent invalidation", async () => {
    const { store, boom, form, cache, lookup } = await withForm();

    const loaded = await store.read((repos) =>
      lookup.forClassification(
        {
          ...repos,
          forms: {
            ...repos.forms,
            findByClassificationId: async (id) => {
              const found = await repos.forms.findByClassificationId(id);
              // A form save commits while this reader is still loading
              await lookup.invalidate([id]);
              return found;
            },
          },
        },
        boom.id,
      ),
    );

    expect(loaded?.id).toBe(form.id);
    await expect(
      cache.get(formCacheKeys.byClassification(boom.id)),
    ).resolves.toBeUndefined();
  });
});
