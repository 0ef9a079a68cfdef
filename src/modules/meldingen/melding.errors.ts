// src/modules/meldingen/melding.errors.ts

import { DomainError } from "@/lib/errors/domain-error";
import type { MeldingState } from "./melding.types";

export class InvalidTransitionError extends DomainError {
  constructor(
    public readonly transition: string,
    public readonly from: MeldingState,
    public readonly reason: string,
  ) {
    super(
      `Transition "${transition}" is not possible from ${from}: ${reason}`,
      409,
      "INVALID_TRANSITION",
    );
    this.name = "InvalidTransitionError";
  }
}

export class StaffAuthRequiredError extends DomainError {
  constructor() {
    super("Staff authentication required", 401, "STAFF_AUTH_REQUIRED");
    this.name = "StaffAuthRequiredError";
  }
}

export class PrimaryValidationFailedError extends DomainError {
  constructor(public readonly reason: string) {
    super(reason, 422, "PRIMARY_VALIDATION_FAILED");
    this.name = "PrimaryValidationFailedError";
  }
}

export class MeldingNotEditableError extends DomainError {
  constructor(public readonly state: MeldingState) {
    super(`Melding can no longer be edited in state ${state}`, 409, "MELDING_NOT_EDITABLE");
    this.name = "MeldingNotEditableError";
  }
}

export class MeldingNotClassifiedError extends DomainError {
  constructor(public readonly meldingId: string) {
    super(`Melding ${meldingId} is not classified`, 400, "MELDING_NOT_CLASSIFIED");
    this.name = "MeldingNotClassifiedError";
  }
}

export class MaxAssetsExceededError extends DomainError {
  constructor(public readonly maxAssets: number) {
    super(`A melding can hold at most ${maxAssets} asset(s) of this type`, 422, "MAX_ASSETS_EXCEEDED");
    this.name = "MaxAssetsExceededError";
  }
}

export class AssetTypeMismatchError extends DomainError {
  constructor(public readonly assetTypeId: string) {
    super(
      `Asset type ${assetTypeId} does not belong to the melding's classification`,
      422,
      "ASSET_TYPE_MISMATCH",
    );
    this.name = "AssetTypeMismatchError";
  }
}

/**
 * Stored configuration makes a guard undecidable. Reported like a broken
 * rule expression: a server-side problem, not the caller's.
 */
export class MeldingConfigurationError extends DomainError {
  constructor(public readonly meldingId: string, reason: string) {
    super(`Melding ${meldingId} cannot be evaluated: ${reason}`, 500, "INVALID_EXPRESSION");
    this.name = "MeldingConfigurationError";
  }
}
