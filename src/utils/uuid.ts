// src/utils/uuid.ts
import { validate as isUuid } from "uuid";
import { RequestValidationError } from "@/lib/errors/domain-error";

export function assertUuid(
  value: unknown,
  name: string,
): asserts value is string {
  if (typeof value !== "string" || !isUuid(value)) {
    throw new RequestValidationError({ [name]: [`${name} must be a UUID`] });
  }
}
