// src/modules/meldingen/meldingLifecycle.service.ts
// Purpose: Guarded state machine over a melding.
// Commit is a compare-and-set on the current state: of two concurrent
// identical requests exactly one wins, the other gets InvalidTransition.

import { NotFoundError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Repositories, Store } from "@/lib/persistence/store.types";
import type { FormLookup } from "@/modules/forms/form.lookup";
import { dispatchMail, type Mailer } from "@/modules/mail/mailer";
import type { TokenAuthority } from "@/modules/tokens/token.authority";
import { TokenInvalidError } from "@/modules/tokens/token.errors";
import { firstFailingGuard } from "./melding.guards";
import {
  InvalidTransitionError,
  StaffAuthRequiredError,
} from "./melding.errors";
import {
  MELDING_STATE_TRANSITIONS,
  MELDING_TRANSITIONS,
  type MeldingTransitionName,
  type TransitionActorKind,
} from "./meldingLifecycle.transitions";
import type { Melding, MeldingPatch } from "./melding.types";

export type TransitionActor =
  | { kind: "melder"; token: string | undefined }
  | { kind: "staff"; subject: string };

export interface TransitionOptions {
  /** Extra text for the completion mail. */
  mailBody?: string | null;
}

export interface PossibleTransition {
  name: MeldingTransitionName;
  to: Melding["state"];
  actor: TransitionActorKind;
}

export interface MeldingLifecycleDeps {
  store: Store;
  tokens: TokenAuthority;
  forms: FormLookup;
  mailer: Mailer;
  now: () => Date;
}

export class MeldingLifecycleService {
  constructor(private readonly deps: MeldingLifecycleDeps) {}

  ////////////////////////////////////////////////////////////////
  // Public operation
  ////////////////////////////////////////////////////////////////

  async transition(
    meldingId: string,
    actor: TransitionActor,
    name: MeldingTransitionName,
    options: TransitionOptions = {},
  ): Promise<Melding> {
    const definition = MELDING_TRANSITIONS[name];

    const result = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        // 1. Load and lock: guards must see the rows the commit is based on
        const melding = await repos.meldingen.findByIdForUpdate(meldingId);
        if (!melding) throw new NotFoundError("Melding", meldingId);

        // 2. Authenticate the actor kind this transition demands
        this.authorize(melding, actor, definition.actor);

        // 3. State, guards and conditional commit
        return this.applyInTransaction(repos, melding, name);
      },
      { label: `transition:${name}` },
    );

    log("INFO", "MELDING_TRANSITIONED", {
      meldingId,
      transition: name,
      from: definition.from,
      to: result.state,
      actor: actor.kind,
    });

    this.afterCommit(name, result, options);

    return result;
  }

  /**
   * Runs inside a caller's transaction. The melding must have been read in
   * that same transaction.
   */
  async applyInTransaction(
    repos: Repositories,
    melding: Melding,
    name: MeldingTransitionName,
  ): Promise<Melding> {
    const definition = MELDING_TRANSITIONS[name];

    if (melding.state !== definition.from) {
      throw new InvalidTransitionError(
        name,
        melding.state,
        `only allowed from ${definition.from}`,
      );
    }

    const blocked = await firstFailingGuard(definition.guards, {
      repos,
      forms: this.deps.forms,
      melding,
    });
    if (blocked !== null) {
      throw new InvalidTransitionError(name, melding.state, blocked);
    }

    // Token dies in the same write that leaves the draft phase.
    const patch: MeldingPatch =
      name === "submit"
        ? { state: definition.to, ...this.deps.tokens.invalidate() }
        : { state: definition.to };

    const committed = await repos.meldingen.compareAndSetState(
      melding.id,
      definition.from,
      patch,
      this.deps.now(),
    );

    if (!committed) {
      throw new InvalidTransitionError(
        name,
        melding.state,
        "melding was changed by a concurrent request",
      );
    }

    return committed;
  }

  /**
   * Transitions leaving the melding's current state whose guards hold now.
   */
  async possibleTransitions(meldingId: string): Promise<PossibleTransition[]> {
    return this.deps.store.read(async (repos) => {
      const melding = await repos.meldingen.findById(meldingId);
      if (!melding) throw new NotFoundError("Melding", meldingId);

      const out: PossibleTransition[] = [];

      for (const name of MELDING_STATE_TRANSITIONS[melding.state]) {
        const definition = MELDING_TRANSITIONS[name];
        const blocked = await firstFailingGuard(definition.guards, {
          repos,
          forms: this.deps.forms,
          melding,
        });
        if (blocked === null) {
          out.push({ name, to: definition.to, actor: definition.actor });
        }
      }

      return out;
    });
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  private authorize(
    melding: Melding,
    actor: TransitionActor,
    required: TransitionActorKind,
  ) {
    if (required === "staff") {
      if (actor.kind !== "staff") throw new StaffAuthRequiredError();
      return;
    }

    if (actor.kind !== "melder") throw new TokenInvalidError();
    this.deps.tokens.verify(melding, actor.token);
  }

  private afterCommit(
    name: MeldingTransitionName,
    melding: Melding,
    options: TransitionOptions,
  ) {
    const { mailer } = this.deps;

    if (name === "submit") {
      dispatchMail("confirmation", melding.id, () =>
        mailer.sendConfirmation(melding),
      );
    }

    if (name === "complete") {
      dispatchMail("completion", melding.id, () =>
        mailer.sendCompletion(melding, options.mailBody ?? null),
      );
    }
  }
}
