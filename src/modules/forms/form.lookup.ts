// src/modules/forms/form.lookup.ts
// Purpose: Cached form reads. Writers call `invalidate` after their transaction commits.
// The generation is read before the database so a fill that raced an
// invalidation is discarded by the cache.

import { formCacheKeys, type FormCache } from "@/lib/cache/form-cache";
import type { Repositories } from "@/lib/persistence/store.types";
import type { Form } from "./form.types";

export class FormLookup {
  constructor(private readonly cache: FormCache) {}

  async forClassification(
    repos: Repositories,
    classificationId: string,
  ): Promise<Form | null> {
    const key = formCacheKeys.byClassification(classificationId);

    return this.readThrough(key, () => repos.forms.findByClassificationId(classificationId));
  }

  async primary(repos: Repositories): Promise<Form | null> {
    return this.readThrough(formCacheKeys.primary, () => repos.forms.findPrimary());
  }

  async invalidate(classificationIds: (string | null)[], primary = false) {
    const keys = classificationIds
      .filter((id): id is string => id !== null)
      .map(formCacheKeys.byClassification);

    if (primary) keys.push(formCacheKeys.primary);

    await this.cache.invalidate([...new Set(keys)]);
  }

  private async readThrough(
    key: string,
    load: () => Promise<Form | null>,
  ): Promise<Form | null> {
    const hit = await this.cache.get(key);
    if (hit !== undefined) return hit;

    const generation = await this.cache.generation(key);
    const form = await load();
    if (generation !== null) await this.cache.set(key, form, generation);
    return form;
  }
}
