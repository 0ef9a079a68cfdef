// src/modules/classifications/classification.service.ts

import { randomUUID } from "node:crypto";

import { NotFoundError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Repositories, Store } from "@/lib/persistence/store.types";
import type { FormLookup } from "@/modules/forms/form.lookup";
import { runReclassificationCascade } from "@/modules/reclassification/reclassification.cascade";
import type { ClassificationInput } from "./classification.schemas";
import type { Classification } from "./classification.types";

export class ClassificationService {
  constructor(
    private readonly store: Store,
    private readonly forms: FormLookup,
    private readonly now: () => Date,
  ) {}

  list(): Promise<Classification[]> {
    return this.store.read((repos) => repos.classifications.list());
  }

  async get(id: string): Promise<Classification> {
    const found = await this.store.read((repos) => repos.classifications.findById(id));
    if (!found) throw new NotFoundError("Classification", id);
    return found;
  }

  async create(input: ClassificationInput): Promise<Classification> {
    const created = await withTransactionRetry(this.store, async (repos) => {
      const assetTypeId = await this.resolveAssetType(repos, input.asset_type);
      const now = this.now();

      const classification: Classification = {
        id: randomUUID(),
        name: input.name,
        assetTypeId,
        createdAt: now,
        updatedAt: now,
      };
      await repos.classifications.insert(classification);
      return classification;
    });

    log("INFO", "CLASSIFICATION_CREATED", { classificationId: created.id });
    return created;
  }

  /**
   * Changing the asset type does not cascade to meldingen already in flight.
   */
  async update(id: string, input: ClassificationInput): Promise<Classification> {
    return withTransactionRetry(this.store, async (repos) => {
      const current = await repos.classifications.findById(id);
      if (!current) throw new NotFoundError("Classification", id);

      const next: Classification = {
        ...current,
        name: input.name,
        assetTypeId:
          input.asset_type === undefined
            ? current.assetTypeId
            : await this.resolveAssetType(repos, input.asset_type),
        updatedAt: this.now(),
      };
      await repos.classifications.update(next);
      return next;
    });
  }

  /**
   * Meldingen and forms bound to it are unbound, not deleted. Each melding
   * goes through the reclassification cascade towards "no classification".
   */
  async delete(id: string): Promise<void> {
    const unbound = await withTransactionRetry(
      this.store,
      async (repos) => {
        const current = await repos.classifications.findById(id);
        if (!current) throw new NotFoundError("Classification", id);

        // Cascade first: it reads the asset type of the classification being removed
        const bound = await repos.meldingen.findByClassificationForUpdate(id);
        const now = this.now();
        let answersPurged = 0;
        let assetsPurged = 0;
        for (const melding of bound) {
          const { outcome } = await runReclassificationCascade(repos, melding, null, now);
          answersPurged += outcome.answersPurged;
          assetsPurged += outcome.assetsPurged;
        }

        const forms = await repos.forms.unbindClassification(id, null);
        await repos.classifications.delete(id);
        return { meldingen: bound.length, forms, answersPurged, assetsPurged };
      },
      { label: "delete_classification" },
    );

    await this.forms.invalidate([id]);
    log("INFO", "CLASSIFICATION_DELETED", { classificationId: id, ...unbound });
  }

  private async resolveAssetType(
    repos: Repositories,
    assetTypeId: string | null | undefined,
  ): Promise<string | null> {
    if (!assetTypeId) return null;
    const found = await repos.assetTypes.findById(assetTypeId);
    if (!found) throw new NotFoundError("AssetType", assetTypeId);
    return found.id;
  }
}
