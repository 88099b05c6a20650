/**
 * Newsletter retrieval from the source mailbox.
 */

import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { errorMessage } from "@/server/errors";
import { normalizeEmail, type NormalizedEmail } from "../email/normalize";
import type { SourceMailbox } from "./client";
import { buildNewsletterQuery, selectNewsletterLabels } from "./query";

export interface FetchNewslettersOptions {
  rootLabel: string;
  after: Date;
  includeRead: boolean;
  maxMessages: number;
  logger?: Logger;
}

/**
 * Lists matching newsletters and normalizes each one.
 *
 * Listing failures propagate. A message that fails to fetch, or has no
 * HTML body, is logged and skipped.
 */
export async function fetchNewsletters(
  mailbox: SourceMailbox,
  options: FetchNewslettersOptions
): Promise<NormalizedEmail[]> {
  const log = options.logger ?? defaultLogger;
  const labels = selectNewsletterLabels(await mailbox.listLabels(), options.rootLabel);
  if (labels.length === 0) {
    log.warn("No newsletter labels found, searching all mail", { rootLabel: options.rootLabel });
  } else {
    log.info("Found newsletter labels", { count: labels.length });
  }

  const query = buildNewsletterQuery({
    labels,
    after: options.after,
    includeRead: options.includeRead,
  });
  log.info("Searching source mailbox", { query });

  const ids = await mailbox.listMessageIds(query, options.maxMessages);
  const emails: NormalizedEmail[] = [];

  for (const id of ids) {
    try {
      const email = normalizeEmail(await mailbox.getMessage(id));
      if (email) {
        emails.push(email);
      } else {
        log.debug("Skipping message without an HTML body", { messageId: id });
      }
    } catch (error) {
      log.error("Error fetching message", { messageId: id, error: errorMessage(error) });
    }
  }

  return emails;
}
