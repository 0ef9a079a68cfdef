// src/modules/meldingen/publicId.ts

import { randomInt } from "node:crypto";

export const PUBLIC_ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const PUBLIC_ID_LENGTH = 6;

/** Short code printed on confirmations. Uniqueness is the caller's check. */
export function generatePublicId(
  pick: (max: number) => number = randomInt,
): string {
  let out = "";
  for (let i = 0; i < PUBLIC_ID_LENGTH; i++) {
    out += PUBLIC_ID_ALPHABET[pick(PUBLIC_ID_ALPHABET.length)];
  }
  return out;
}
