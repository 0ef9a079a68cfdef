import { getRequestId } from "./request-context";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  console.log(JSON.stringify(entry));
}

/**
 * Normalizes an unknown thrown value into loggable fields.
 */
export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      error: err.message,
      errorName: err.name,
      stack: process.env.NODE_ENV === "production" ? undefined : err.stack,
    };
  }
  return { error: String(err) };
}
