// src/modules/tokens/token.authority.ts
// Purpose: Anonymous melder credential. The raw token is handed out once;
// only its SHA-256 digest is stored on the melding.

import { randomBytes } from "node:crypto";

import { sha256Hex, digestsMatch } from "@/utils/sha256";
import type { Melding, MeldingToken } from "@/modules/meldingen/melding.types";
import { TokenExpiredError, TokenInvalidError } from "./token.errors";

export const TOKEN_BYTES = 32;

export interface IssuedToken {
  /** Returned to the melder, never persisted. */
  token: string;
  stored: MeldingToken;
}

export interface TokenAuthorityOptions {
  ttlSeconds: number;
  now?: () => Date;
}

export class TokenAuthority {
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: TokenAuthorityOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? (() => new Date());
  }

  generate(): IssuedToken {
    const token = randomBytes(TOKEN_BYTES).toString("base64url");
    const expiresAt = new Date(this.now().getTime() + this.ttlMs);

    return { token, stored: { hash: sha256Hex(token), expiresAt } };
  }

  /**
   * Mismatch is checked before expiry, so an expired token is only
   * reported as such to its holder. The clock is read here, not at
   * request start.
   */
  verify(melding: Pick<Melding, "token">, token: string | undefined): void {
    if (!melding.token || !token) {
      throw new TokenInvalidError();
    }

    if (!digestsMatch(sha256Hex(token), melding.token.hash)) {
      throw new TokenInvalidError();
    }

    if (this.now().getTime() > melding.token.expiresAt.getTime()) {
      throw new TokenExpiredError(melding.token.expiresAt);
    }
  }

  /** Patch that clears the token and its expiry together. */
  invalidate(): { token: null } {
    return { token: null };
  }
}
