// src/modules/answers/answer.service.ts
// Purpose: SubmitAnswer. Answers are append-only; the newest one per question counts.

import { randomUUID } from "node:crypto";

import { NotFoundError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Store } from "@/lib/persistence/store.types";
import type { FormLookup } from "@/modules/forms/form.lookup";
import { findComponentByQuestionId } from "@/modules/forms/form.types";
import { MeldingNotClassifiedError } from "@/modules/meldingen/melding.errors";
import type { Answer, AnswerPayload } from "@/modules/meldingen/melding.types";
import type { TokenAuthority } from "@/modules/tokens/token.authority";
import type { AnswerValidator } from "./answer.validator";

export interface AnswerServiceDeps {
  store: Store;
  tokens: TokenAuthority;
  forms: FormLookup;
  validator: AnswerValidator;
  now: () => Date;
}

export class AnswerService {
  constructor(private readonly deps: AnswerServiceDeps) {}

  async submit(params: {
    meldingId: string;
    token: string | undefined;
    questionId: string;
    payload: AnswerPayload;
  }): Promise<Answer> {
    const { meldingId, token, questionId, payload } = params;

    const answer = await withTransactionRetry(this.deps.store, async (repos) => {
      // 1. Question must exist
      const question = await repos.questions.findById(questionId);
      if (!question) throw new NotFoundError("Question", questionId);

      // 2. Melding + token (locks the melding row against a concurrent reclassify)
      const melding = await repos.meldingen.findByIdForUpdate(meldingId);
      if (!melding) throw new NotFoundError("Melding", meldingId);
      this.deps.tokens.verify(melding, token);

      // 3. Classified, and the question belongs to its current form
      if (!melding.classificationId) {
        throw new MeldingNotClassifiedError(meldingId);
      }

      const form = await this.deps.forms.forClassification(
        repos,
        melding.classificationId,
      );
      const component = form
        ? findComponentByQuestionId(form, questionId)
        : undefined;
      if (!component) throw new NotFoundError("Question", questionId);

      // 4. Shape, then content
      this.deps.validator.validate(component, payload);

      const created: Answer = {
        id: randomUUID(),
        meldingId,
        questionId,
        payload,
        createdAt: this.deps.now(),
      };
      await repos.answers.insert(created);
      return created;
    }, { label: "submit_answer" });

    log("INFO", "ANSWER_SUBMITTED", { meldingId, questionId, answerId: answer.id });
    return answer;
  }

  async listLatest(meldingId: string, token: string | undefined): Promise<Answer[]> {
    return this.deps.store.read(async (repos) => {
      const melding = await repos.meldingen.findById(meldingId);
      if (!melding) throw new NotFoundError("Melding", meldingId);
      this.deps.tokens.verify(melding, token);

      return repos.answers.latestForMelding(meldingId);
    });
  }
}
