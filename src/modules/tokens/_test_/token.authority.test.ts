// src/modules/tokens/_test_/token.authority.test.ts

import { describe, it, expect } from "vitest";

import { MeldingState, type Melding } from "@/modules/meldingen/melding.types";
import { sha256Hex } from "@/utils/sha256";
import { TokenAuthority } from "../token.authority";
import { TokenExpiredError, TokenInvalidError } from "../token.errors";

const T0 = new Date("2026-03-01T12:00:00.000Z");

function clock(start: Date) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function meldingWith(token: Melding["token"]): Pick<Melding, "token" | "state"> {
  return { token, state: MeldingState.NEW };
}

describe("TokenAuthority", () => {
  it("stores only the digest and the expiry", () => {
    const c = clock(T0);
    const authority = new TokenAuthority({ ttlSeconds: 60, now: c.now });

    const issued = authority.generate();

    expect(issued.stored.hash).toBe(sha256Hex(issued.token));
    expect(issued.stored.hash).not.toContain(issued.token);
    expect(issued.stored.expiresAt.toISOString()).toBe("2026-03-01T12:01:00.000Z");
  });

  it("issues a different token every time", () => {
    const authority = new TokenAuthority({ ttlSeconds: 60 });
    expect(authority.generate().token).not.toBe(authority.generate().token);
  });

  it("verifies up to and including the expiry instant", () => {
    const c = clock(T0);
    const authority = new TokenAuthority({ ttlSeconds: 60, now: c.now });
    const { token, stored } = authority.generate();
    const melding = meldingWith(stored);

    expect(() => authority.verify(melding, token)).not.toThrow();

    c.advance(60_000);
    expect(() => authority.verify(melding, token)).not.toThrow();

    c.advance(1);
    expect(() => authority.verify(melding, token)).toThrow(TokenExpiredError);
  });

  it("reports a wrong token as invalid, even after expiry", () => {
    const c = clock(T0);
    const authority = new TokenAuthority({ ttlSeconds: 60, now: c.now });
    const { stored } = authority.generate();
    const melding = meldingWith(stored);

    expect(() => authority.verify(melding, "not-the-token")).toThrow(TokenInvalidError);

    c.advance(120_000);
    expect(() => authority.verify(melding, "not-the-token")).toThrow(TokenInvalidError);
  });

  it("rejects a missing token and a cleared one", () => {
    const authority = new TokenAuthority({ ttlSeconds: 60 });
    const { token, stored } = authority.generate();

    expect(() => authority.verify(meldingWith(stored), undefined)).toThrow(TokenInvalidError);
    expect(() => authority.verify(meldingWith(null), token)).toThrow(TokenInvalidError);
  });

  it("invalidate clears token and expiry together", () => {
    const authority = new TokenAuthority({ ttlSeconds: 60 });
    expect(authority.invalidate()).toEqual({ token: null });
  });
});
