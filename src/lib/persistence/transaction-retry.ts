// src/lib/persistence/transaction-retry.ts
// Purpose: Re-run a whole transaction after a serialization failure or deadlock.

import { log } from "@/lib/observability/logger";
import type { Repositories, Store } from "./store.types";

export class TransientStoreError extends Error {
  constructor(
    message: string,
    public readonly reason: string,
  ) {
    super(message);
    this.name = "TransientStoreError";
  }
}

export const DEFAULT_TRANSACTION_ATTEMPTS = 3;

/**
 * Every attempt starts from scratch: `fn` must not keep state between calls.
 */
export async function withTransactionRetry<T>(
  store: Store,
  fn: (repos: Repositories) => Promise<T>,
  options: { attempts?: number; label?: string } = {},
): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_TRANSACTION_ATTEMPTS;

  for (let attempt = 1; ; attempt++) {
    try {
      return await store.transaction(fn);
    } catch (err) {
      if (!(err instanceof TransientStoreError) || attempt >= attempts) {
        throw err;
      }

      log("WARN", "TRANSACTION_RETRY", {
        label: options.label ?? null,
        attempt,
        reason: err.reason,
      });
    }
  }
}
