// src/modules/assets/assetType.schemas.ts

import { z } from "zod";
import { JsonValueSchema } from "@/modules/forms/form.schemas";

export const AssetTypeInputSchema = z.object({
  name: z.string().trim().min(1),
  class_name: z.string().trim().min(1),
  arguments: z.record(JsonValueSchema).default({}),
  max_assets: z.number().int().min(1).default(3),
});

export type AssetTypeInput = z.infer<typeof AssetTypeInputSchema>;

export const AssetInputSchema = z.object({
  external_id: z.string().trim().min(1),
  asset_type_id: z.string().uuid(),
});

export type AssetInput = z.infer<typeof AssetInputSchema>;
