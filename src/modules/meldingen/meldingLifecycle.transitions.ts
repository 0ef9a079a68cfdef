// src/modules/meldingen/meldingLifecycle.transitions.ts
// Purpose: Closed transition law for meldingen.

import { MeldingState } from "./melding.types";

export const MELDING_TRANSITION_NAMES = [
  "classify",
  "answer_questions",
  "add_attachments",
  "submit_location",
  "add_contact_info",
  "submit",
  "process",
  "complete",
] as const;

export type MeldingTransitionName = (typeof MELDING_TRANSITION_NAMES)[number];

/** Melder transitions authenticate with the melding token, staff ones with a bearer JWT. */
export type TransitionActorKind = "melder" | "staff";

export type GuardName =
  | "classification_resolved"
  | "required_questions_answered"
  | "location_or_assets_provided";

export interface TransitionDefinition {
  from: MeldingState;
  to: MeldingState;
  actor: TransitionActorKind;
  guards: readonly GuardName[];
}

/**
 * A transition name maps to exactly one source state, one destination
 * and one guard list. If it is not declared here, it does not exist.
 */
export const MELDING_TRANSITIONS: Record<
  MeldingTransitionName,
  TransitionDefinition
> = {
  classify: {
    from: MeldingState.NEW,
    to: MeldingState.CLASSIFIED,
    actor: "staff",
    guards: ["classification_resolved"],
  },
  answer_questions: {
    from: MeldingState.CLASSIFIED,
    to: MeldingState.QUESTIONS_ANSWERED,
    actor: "melder",
    guards: ["required_questions_answered"],
  },
  add_attachments: {
    from: MeldingState.QUESTIONS_ANSWERED,
    to: MeldingState.ATTACHMENTS_ADDED,
    actor: "melder",
    guards: [],
  },
  submit_location: {
    from: MeldingState.ATTACHMENTS_ADDED,
    to: MeldingState.LOCATION_SUBMITTED,
    actor: "melder",
    guards: ["location_or_assets_provided"],
  },
  add_contact_info: {
    from: MeldingState.LOCATION_SUBMITTED,
    to: MeldingState.CONTACT_INFO_ADDED,
    actor: "melder",
    guards: [],
  },
  submit: {
    from: MeldingState.CONTACT_INFO_ADDED,
    to: MeldingState.SUBMITTED,
    actor: "melder",
    guards: [],
  },
  process: {
    from: MeldingState.SUBMITTED,
    to: MeldingState.PROCESSING,
    actor: "staff",
    guards: [],
  },
  complete: {
    from: MeldingState.PROCESSING,
    to: MeldingState.COMPLETED,
    actor: "staff",
    guards: [],
  },
};

/**
 * Outgoing transitions per state. Terminal states map to [].
 */
export const MELDING_STATE_TRANSITIONS: Record<
  MeldingState,
  readonly MeldingTransitionName[]
> = {
  [MeldingState.NEW]: ["classify"],
  [MeldingState.CLASSIFIED]: ["answer_questions"],
  [MeldingState.QUESTIONS_ANSWERED]: ["add_attachments"],
  [MeldingState.ATTACHMENTS_ADDED]: ["submit_location"],
  [MeldingState.LOCATION_SUBMITTED]: ["add_contact_info"],
  [MeldingState.CONTACT_INFO_ADDED]: ["submit"],
  [MeldingState.SUBMITTED]: ["process"],
  [MeldingState.PROCESSING]: ["complete"],

  [MeldingState.COMPLETED]: [],
};

/** States in which the melder may still change the text. */
export const TEXT_EDITABLE_STATES: readonly MeldingState[] = [
  MeldingState.NEW,
  MeldingState.CLASSIFIED,
];
