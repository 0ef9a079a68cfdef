// src/modules/reclassification/reclassification.cascade.ts
// Purpose: Purge what a classification change invalidates, in a fixed order.
// Must run inside the transaction that writes the new classification.

import type { Repositories } from "@/lib/persistence/store.types";
import type { Melding, MeldingPatch } from "@/modules/meldingen/melding.types";

export interface CascadeOutcome {
  changed: boolean;
  answersPurged: number;
  assetsPurged: number;
  locationPurged: boolean;
}

const UNCHANGED: CascadeOutcome = {
  changed: false,
  answersPurged: 0,
  assetsPurged: 0,
  locationPurged: false,
};

async function assetTypeOf(
  repos: Repositories,
  classificationId: string | null,
): Promise<string | null> {
  if (!classificationId) return null;
  const classification = await repos.classifications.findById(classificationId);
  return classification?.assetTypeId ?? null;
}

/**
 * Returns the updated melding and what was purged. Calling it again with
 * the same classification is a no-op.
 */
export async function runReclassificationCascade(
  repos: Repositories,
  melding: Melding,
  newClassificationId: string | null,
  now: Date,
): Promise<{ melding: Melding; outcome: CascadeOutcome }> {
  // 1. Same classification: nothing to do
  if (melding.classificationId === newClassificationId) {
    return { melding, outcome: UNCHANGED };
  }

  // 2. Old questions no longer apply
  const answersPurged = await repos.answers.deleteForMelding(melding.id);

  // 3. Compare the bound asset types
  const oldAssetType = await assetTypeOf(repos, melding.classificationId);
  const newAssetType = await assetTypeOf(repos, newClassificationId);

  const patch: MeldingPatch = { classificationId: newClassificationId };
  let assetsPurged = 0;
  let locationPurged = false;

  if (oldAssetType !== newAssetType) {
    // 4. Assets of another type are meaningless now
    assetsPurged = await repos.assets.deleteForMelding(melding.id);

    // 5. Asset selection replaces the free location
    if (newAssetType !== null) {
      patch.location = null;
      patch.address = null;
      locationPurged = melding.location !== null;
    }
  }

  const updated = await repos.meldingen.update(melding.id, patch, now);

  return {
    melding: updated,
    outcome: { changed: true, answersPurged, assetsPurged, locationPurged },
  };
}
