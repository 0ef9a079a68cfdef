// src/modules/mail/mailer.ts
// Purpose: Outbound mail seam. Delivery is external; the default adapter only logs.

import { log, errorMeta } from "@/lib/observability/logger";
import type { Melding } from "@/modules/meldingen/melding.types";

export interface Mailer {
  sendConfirmation(melding: Melding): Promise<void>;
  sendCompletion(melding: Melding, body: string | null): Promise<void>;
}

export class LogMailer implements Mailer {
  constructor(private readonly from: string) {}

  async sendConfirmation(melding: Melding) {
    this.write("confirmation", melding, null);
  }

  async sendCompletion(melding: Melding, body: string | null) {
    this.write("completion", melding, body);
  }

  private write(kind: string, melding: Melding, body: string | null) {
    if (!melding.email) {
      log("INFO", "MAIL_SKIPPED_NO_RECIPIENT", { kind, meldingId: melding.id });
      return;
    }

    log("INFO", "MAIL_DISPATCHED", {
      kind,
      from: this.from,
      to: melding.email,
      meldingId: melding.id,
      publicId: melding.publicId,
      hasBody: body !== null,
    });
  }
}

/**
 * Runs a mail send without awaiting it. Failures are logged, never rethrown.
 */
export function dispatchMail(
  kind: string,
  meldingId: string,
  send: () => Promise<void>,
): void {
  void send().catch((err: unknown) => {
    log("ERROR", "MAIL_DISPATCH_FAILED", { kind, meldingId, ...errorMeta(err) });
  });
}
