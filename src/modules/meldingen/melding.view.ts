// src/modules/meldingen/melding.view.ts
// Purpose: Wire shape of a melding. The token digest never leaves the service.

import type { Asset, Answer, Melding } from "./melding.types";

export function toMeldingView(melding: Melding) {
  return {
    id: melding.id,
    publicId: melding.publicId,
    text: melding.text,
    state: melding.state,
    classificationId: melding.classificationId,
    location: melding.location
      ? {
          type: "Feature" as const,
          geometry: {
            type: "Point" as const,
            coordinates: [melding.location.lng, melding.location.lat],
          },
          properties: {},
        }
      : null,
    address: melding.address,
    email: melding.email,
    phone: melding.phone,
    tokenExpiresAt: melding.token?.expiresAt.toISOString() ?? null,
    createdAt: melding.createdAt.toISOString(),
    updatedAt: melding.updatedAt.toISOString(),
  };
}

export function toAnswerView(answer: Answer) {
  return {
    id: answer.id,
    questionId: answer.questionId,
    ...answer.payload,
    createdAt: answer.createdAt.toISOString(),
  };
}

export function toAssetView(asset: Asset) {
  return {
    id: asset.id,
    externalId: asset.externalId,
    assetTypeId: asset.assetTypeId,
    createdAt: asset.createdAt.toISOString(),
  };
}
