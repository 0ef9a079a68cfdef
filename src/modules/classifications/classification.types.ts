// src/modules/classifications/classification.types.ts

export interface Classification {
  id: string;
  name: string;
  /** When set, the melder picks assets of this type instead of a location. */
  assetTypeId: string | null;
  createdAt: Date;
  updatedAt: Date;
}
