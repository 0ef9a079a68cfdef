// src/modules/reclassification/reclassification.service.ts
// Purpose: Staff-side Reclassify operation plus the in-transaction variant
// used when an edited text resolves to another classification.

import { NotFoundError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Repositories, Store } from "@/lib/persistence/store.types";
import type { MeldingLifecycleService } from "@/modules/meldingen/meldingLifecycle.service";
import { MeldingState, type Melding } from "@/modules/meldingen/melding.types";
import {
  runReclassificationCascade,
  type CascadeOutcome,
} from "./reclassification.cascade";

export interface ReclassificationDeps {
  store: Store;
  lifecycle: MeldingLifecycleService;
  now: () => Date;
}

export class ReclassificationService {
  constructor(private readonly deps: ReclassificationDeps) {}

  async reclassify(
    meldingId: string,
    classificationId: string | null,
  ): Promise<Melding> {
    const { melding, outcome } = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        const current = await repos.meldingen.findByIdForUpdate(meldingId);
        if (!current) throw new NotFoundError("Melding", meldingId);

        return this.reclassifyInTransaction(repos, current, classificationId);
      },
      { label: "reclassify" },
    );

    this.logOutcome(melding, outcome);
    return melding;
  }

  /**
   * `melding` must be locked by the caller's transaction. A NEW melding that
   * gains a classification also moves to CLASSIFIED.
   */
  async reclassifyInTransaction(
    repos: Repositories,
    melding: Melding,
    classificationId: string | null,
  ): Promise<{ melding: Melding; outcome: CascadeOutcome }> {
    if (classificationId !== null) {
      const target = await repos.classifications.findById(classificationId);
      if (!target) throw new NotFoundError("Classification", classificationId);
    }

    const cascaded = await runReclassificationCascade(
      repos,
      melding,
      classificationId,
      this.deps.now(),
    );

    if (
      cascaded.melding.state === MeldingState.NEW &&
      cascaded.melding.classificationId !== null
    ) {
      const classified = await this.deps.lifecycle.applyInTransaction(
        repos,
        cascaded.melding,
        "classify",
      );
      return { melding: classified, outcome: cascaded.outcome };
    }

    return cascaded;
  }

  logOutcome(melding: Melding, outcome: CascadeOutcome) {
    if (!outcome.changed) return;

    log("INFO", "MELDING_RECLASSIFIED", {
      meldingId: melding.id,
      classificationId: melding.classificationId,
      state: melding.state,
      answersPurged: outcome.answersPurged,
      assetsPurged: outcome.assetsPurged,
      locationPurged: outcome.locationPurged,
    });
  }
}
