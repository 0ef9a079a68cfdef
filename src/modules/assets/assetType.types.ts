// src/modules/assets/assetType.types.ts

import type { JsonValue } from "@/modules/rules/rule.types";

export interface AssetType {
  id: string;
  name: string;
  /** Name of the external lookup adapter that resolves assets of this type. */
  className: string;
  arguments: Record<string, JsonValue>;
  maxAssets: number;
  createdAt: Date;
  updatedAt: Date;
}
