// src/modules/meldingen/melding.types.ts
// Purpose: Melding aggregate and its related records.

////////////////////////////////////////////////////////////////
// States
////////////////////////////////////////////////////////////////

/**
 * Closed state set. A melding's `state` is always one of these.
 */
export const MeldingState = {
  NEW: "NEW",
  CLASSIFIED: "CLASSIFIED",
  QUESTIONS_ANSWERED: "QUESTIONS_ANSWERED",
  ATTACHMENTS_ADDED: "ATTACHMENTS_ADDED",
  LOCATION_SUBMITTED: "LOCATION_SUBMITTED",
  CONTACT_INFO_ADDED: "CONTACT_INFO_ADDED",
  SUBMITTED: "SUBMITTED",
  PROCESSING: "PROCESSING",
  COMPLETED: "COMPLETED",
} as const;

export type MeldingState = (typeof MeldingState)[keyof typeof MeldingState];

export const MELDING_STATES = Object.values(MeldingState);

export function isMeldingState(value: unknown): value is MeldingState {
  return MELDING_STATES.some((s) => s === value);
}

////////////////////////////////////////////////////////////////
// Aggregate
////////////////////////////////////////////////////////////////

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface MeldingAddress {
  street: string | null;
  houseNumber: string | null;
  postalCode: string | null;
  city: string | null;
}

/**
 * Only the digest of the melder token is kept. A token and its expiry
 * exist together or not at all.
 */
export interface MeldingToken {
  hash: string;
  expiresAt: Date;
}

export interface Melding {
  id: string;
  publicId: string;
  text: string;
  state: MeldingState;
  classificationId: string | null;
  token: MeldingToken | null;
  location: GeoPoint | null;
  address: MeldingAddress | null;
  email: string | null;
  phone: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type MeldingPatch = Partial<
  Pick<
    Melding,
    | "text"
    | "state"
    | "classificationId"
    | "token"
    | "location"
    | "address"
    | "email"
    | "phone"
  >
>;

////////////////////////////////////////////////////////////////
// Owned records
////////////////////////////////////////////////////////////////

export type AnswerPayload =
  | { type: "text"; text: string }
  | { type: "value_label"; value: string; label: string };

export interface Answer {
  id: string;
  meldingId: string;
  questionId: string;
  payload: AnswerPayload;
  createdAt: Date;
}

export interface Asset {
  id: string;
  externalId: string;
  assetTypeId: string;
  meldingId: string;
  createdAt: Date;
}
