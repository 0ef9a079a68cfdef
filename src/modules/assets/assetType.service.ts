// src/modules/assets/assetType.service.ts

import { randomUUID } from "node:crypto";

import { NotFoundError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Store } from "@/lib/persistence/store.types";
import type { AssetTypeInput } from "./assetType.schemas";
import type { AssetType } from "./assetType.types";

export class AssetTypeService {
  constructor(
    private readonly store: Store,
    private readonly now: () => Date,
  ) {}

  list(): Promise<AssetType[]> {
    return this.store.read((repos) => repos.assetTypes.list());
  }

  async get(id: string): Promise<AssetType> {
    const found = await this.store.read((repos) => repos.assetTypes.findById(id));
    if (!found) throw new NotFoundError("AssetType", id);
    return found;
  }

  async create(input: AssetTypeInput): Promise<AssetType> {
    const now = this.now();
    const assetType: AssetType = {
      id: randomUUID(),
      name: input.name,
      className: input.class_name,
      arguments: input.arguments,
      maxAssets: input.max_assets,
      createdAt: now,
      updatedAt: now,
    };

    await withTransactionRetry(this.store, (repos) =>
      repos.assetTypes.insert(assetType),
    );

    log("INFO", "ASSET_TYPE_CREATED", { assetTypeId: assetType.id });
    return assetType;
  }

  async update(id: string, input: AssetTypeInput): Promise<AssetType> {
    return withTransactionRetry(this.store, async (repos) => {
      const current = await repos.assetTypes.findById(id);
      if (!current) throw new NotFoundError("AssetType", id);

      const next: AssetType = {
        ...current,
        name: input.name,
        className: input.class_name,
        arguments: input.arguments,
        maxAssets: input.max_assets,
        updatedAt: this.now(),
      };
      await repos.assetTypes.update(next);
      return next;
    });
  }

  async delete(id: string): Promise<void> {
    const deleted = await withTransactionRetry(this.store, (repos) =>
      repos.assetTypes.delete(id),
    );
    if (!deleted) throw new NotFoundError("AssetType", id);

    log("INFO", "ASSET_TYPE_DELETED", { assetTypeId: id });
  }
}
