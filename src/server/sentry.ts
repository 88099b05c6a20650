/**
 * Sentry Configuration
 *
 * Error reporting for digest runs. Nothing is sent unless SENTRY_DSN is set.
 * https://docs.sentry.io/platforms/javascript/guides/node/
 */

import * as Sentry from "@sentry/node";
import { GmailApiError } from "@/server/errors";

export function initSentry(env: Record<string, string | undefined> = process.env): boolean {
  if (!env.SENTRY_DSN) {
    return false;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,

    // A run is one short-lived process; tracing adds nothing here
    tracesSampleRate: 0,

    environment: env.NODE_ENV,

    beforeSend(event, hint) {
      const error = hint.originalException;

      // Revoked or expired mailbox authorization needs a human, not an alert per run
      if (error instanceof GmailApiError && error.status === 401) {
        return null;
      }

      return event;
    },
  });

  return true;
}

/**
 * Reports a fatal error and waits for it to be delivered before the process exits.
 */
export async function captureFatalError(error: unknown, context: Record<string, unknown>): Promise<void> {
  Sentry.captureException(error, { extra: context });
  await Sentry.flush(2000);
}
