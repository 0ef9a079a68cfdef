// src/modules/meldingen/melding.guards.ts
// Purpose: Transition guards. A guard resolves to null when it holds,
// otherwise to the reason reported in InvalidTransition.

import type { Repositories } from "@/lib/persistence/store.types";
import type { FormLookup } from "@/modules/forms/form.lookup";
import { questionComponents } from "@/modules/forms/form.types";
import { MeldingConfigurationError } from "./melding.errors";
import type { GuardName } from "./meldingLifecycle.transitions";
import type { Melding } from "./melding.types";

export interface GuardContext {
  repos: Repositories;
  forms: FormLookup;
  melding: Melding;
}

export type Guard = (ctx: GuardContext) => Promise<string | null>;

const classificationResolved: Guard = async ({ melding }) =>
  melding.classificationId ? null : "melding has no classification";

/**
 * Only the latest answer per question counts. Answers to questions of an
 * older revision of the form never match the current question ids.
 */
const requiredQuestionsAnswered: Guard = async ({ repos, forms, melding }) => {
  if (!melding.classificationId) return "melding has no classification";

  const form = await forms.forClassification(repos, melding.classificationId);
  if (!form) return null;

  const answered = new Set(
    (await repos.answers.latestForMelding(melding.id)).map((a) => a.questionId),
  );

  const missing = questionComponents(form).filter(
    (c) => c.required && c.questionId !== null && !answered.has(c.questionId),
  );

  if (missing.length === 0) return null;
  return `required question(s) not answered: ${missing.map((c) => c.key).join(", ")}`;
};

const locationOrAssetsProvided: Guard = async ({ repos, melding }) => {
  if (!melding.classificationId) {
    throw new MeldingConfigurationError(melding.id, "no classification to decide between location and assets");
  }

  const classification = await repos.classifications.findById(melding.classificationId);
  if (!classification) {
    throw new MeldingConfigurationError(melding.id, `classification ${melding.classificationId} is missing`);
  }

  if (classification.assetTypeId) {
    const count = await repos.assets.countForMelding(melding.id);
    return count > 0 ? null : "no asset selected";
  }

  return melding.location ? null : "no location set";
};

export const GUARDS: Record<GuardName, Guard> = {
  classification_resolved: classificationResolved,
  required_questions_answered: requiredQuestionsAnswered,
  location_or_assets_provided: locationOrAssetsProvided,
};

/** First failing guard's reason, or null. */
export async function firstFailingGuard(
  guards: readonly GuardName[],
  ctx: GuardContext,
): Promise<string | null> {
  for (const name of guards) {
    const reason = await GUARDS[name](ctx);
    if (reason !== null) return reason;
  }
  return null;
}
