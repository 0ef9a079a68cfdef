// src/lib/http/validate.ts
// Purpose: Boundary parsing for request bodies, query strings and path ids.

import type { Request } from "express";
import type { z } from "zod";

import { RequestValidationError } from "@/lib/errors/domain-error";
import { assertUuid } from "@/utils/uuid";

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.output<S> {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    const { fieldErrors, formErrors } = parsed.error.flatten();
    throw new RequestValidationError(
      formErrors.length > 0 ? { ...fieldErrors, _errors: formErrors } : fieldErrors,
    );
  }

  return parsed.data;
}

export function uuidParam(value: unknown, name: string): string {
  assertUuid(value, name);
  return value;
}

/** Melder token from `?token=`. A repeated parameter counts as absent. */
export function melderToken(req: Request): string | undefined {
  const raw = req.query.token;
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}
