// src/modules/classifications/classification.schemas.ts

import { z } from "zod";

export const ClassificationInputSchema = z.object({
  name: z.string().trim().min(1),
  asset_type: z.string().uuid().nullable().optional(),
});

export type ClassificationInput = z.infer<typeof ClassificationInputSchema>;
