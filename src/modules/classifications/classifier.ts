// src/modules/classifications/classifier.ts
// Purpose: Text -> classification id. The default matches classification
// names as whole words; a trained model can replace it behind the same interface.

import type { Store } from "@/lib/persistence/store.types";
import type { Classification } from "./classification.types";

export interface Classifier {
  classify(text: string): Promise<string | null>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Longest matching name wins; ties go to the alphabetically first name.
 */
export function matchClassification(
  text: string,
  candidates: Pick<Classification, "id" | "name">[],
): string | null {
  const ordered = [...candidates].sort(
    (a, b) => b.name.length - a.name.length || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
  );

  for (const c of ordered) {
    const name = c.name.trim();
    if (!name) continue;
    const pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(name)}($|[^\\p{L}\\p{N}])`, "iu");
    if (pattern.test(text)) return c.id;
  }

  return null;
}

export class KeywordClassifier implements Classifier {
  constructor(private readonly store: Store) {}

  async classify(text: string): Promise<string | null> {
    const all = await this.store.read((repos) => repos.classifications.list());
    return matchClassification(text, all);
  }
}
