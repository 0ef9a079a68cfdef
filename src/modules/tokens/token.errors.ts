// src/modules/tokens/token.errors.ts

import { DomainError } from "@/lib/errors/domain-error";

export class TokenInvalidError extends DomainError {
  constructor() {
    super("Token is invalid", 401, "TOKEN_INVALID");
    this.name = "TokenInvalidError";
  }
}

export class TokenExpiredError extends DomainError {
  constructor(public readonly expiredAt: Date) {
    super("Token has expired", 401, "TOKEN_EXPIRED");
    this.name = "TokenExpiredError";
  }
}
