/**
 * Digest run orchestration.
 *
 * One run: fetch newsletters → locate the market image → generate → parse →
 * assemble → send → mark read → save the run timestamp. Steps run strictly in
 * sequence and any fatal error aborts the run.
 */

import fs from "node:fs/promises";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import type { DigestConfig } from "@/server/config/env";
import { errorMessage } from "@/server/errors";
import type { NormalizedEmail } from "../email/normalize";
import type { SendingMailbox, SourceMailbox } from "../gmail/client";
import { buildRawMessage } from "../gmail/compose";
import { fetchNewsletters } from "../gmail/fetch";
import { locateMarketImage } from "./market-image";
import { readLastRun, saveLastRun } from "./run-state";
import { getSection, parseSections } from "./sections";
import { assembleDigest, SUBJECT_SECTION_KEY } from "./template";
import type { DigestWriter } from "./writer";

const DAY_MS = 24 * 60 * 60 * 1000;

export const FAILURE_SUBJECT = "The Drop: Generation Failed";

export interface DigestDependencies {
  config: DigestConfig;
  source: SourceMailbox;
  /** Not used in preview mode */
  sender: SendingMailbox;
  writer: DigestWriter;
  /** Reads the template document; called once per run that has emails */
  loadTemplate: () => Promise<string>;
  now?: () => Date;
  logger?: Logger;
}

export interface DigestRunOptions {
  /** Look back this many days instead of to the last recorded run */
  days?: number;
  includeRead: boolean;
  /** Write the digest to a file instead of sending it */
  preview?: { outputPath: string };
}

export type DigestRunResult =
  | { status: "empty" }
  | { status: "sent"; subject: string; messageId: string; emailCount: number }
  | { status: "preview"; subject: string; outputPath: string; emailCount: number };

/**
 * Subject used when the model did not produce one, e.g. "Today's Drop: October 19".
 */
export function defaultSubject(date: Date, timeZone: string): string {
  const day = new Intl.DateTimeFormat("en-US", { timeZone, month: "long", day: "2-digit" }).format(date);
  return `Today's Drop: ${day}`;
}

async function markAllAsRead(
  source: SourceMailbox,
  emails: readonly NormalizedEmail[],
  log: Logger
): Promise<void> {
  let marked = 0;
  for (const email of emails) {
    try {
      await source.markAsRead(email.id);
      marked++;
    } catch (error) {
      log.error("Error marking email as read", { emailId: email.id, error: errorMessage(error) });
    }
  }
  log.info("Marked emails as read", { marked, total: emails.length });
}

/**
 * Tells the failure recipient the run failed. Never throws.
 */
async function sendFailureNotice(deps: DigestDependencies, error: unknown, log: Logger): Promise<void> {
  const to = deps.config.failureRecipient;
  if (!to) {
    log.error("Cannot send failure notification: no recipient configured");
    return;
  }

  try {
    await deps.sender.send(
      buildRawMessage({
        to,
        subject: FAILURE_SUBJECT,
        text: `The Drop failed to generate.\n\nError: ${errorMessage(error)}`,
      })
    );
    log.info("Failure notification sent", { to });
  } catch (notifyError) {
    log.error("Failed to send failure notification", { error: errorMessage(notifyError) });
  }
}

async function produceDigest(
  deps: DigestDependencies,
  options: DigestRunOptions,
  now: Date,
  log: Logger
): Promise<DigestRunResult> {
  const { config } = deps;

  const after =
    options.days !== undefined
      ? new Date(now.getTime() - options.days * DAY_MS)
      : await readLastRun(config.statePath, now, config.lookbackDays, log);
  log.info("Fetching newsletters", { after: after.toISOString(), includeRead: options.includeRead });

  const emails = await fetchNewsletters(deps.source, {
    rootLabel: config.newsletterLabel,
    after,
    includeRead: options.includeRead,
    maxMessages: config.maxMessages,
    logger: log,
  });
  log.info("Found newsletters", { count: emails.length });

  if (emails.length === 0) {
    log.info("No new emails to process");
    return { status: "empty" };
  }

  const template = await deps.loadTemplate();
  const marketImageUrl = locateMarketImage(emails, log);
  const response = await deps.writer.write(emails, now);

  const sections = parseSections(response);
  log.info("Parsed response sections", { count: sections.size });

  const html = assembleDigest(template, {
    sections,
    marketImageUrl,
    headerImageUrl: config.headerBgImage,
    date: now,
    timeZone: config.timeZone,
  });

  const generatedSubject = getSection(sections, SUBJECT_SECTION_KEY);
  if (!generatedSubject) {
    log.warn("No EMAIL_SUBJECT generated, using default");
  }
  const subject = generatedSubject || defaultSubject(now, config.timeZone);

  if (options.preview) {
    await fs.writeFile(options.preview.outputPath, html);
    log.info("Preview saved", { outputPath: options.preview.outputPath, subject });
    return {
      status: "preview",
      subject,
      outputPath: options.preview.outputPath,
      emailCount: emails.length,
    };
  }

  const messageId = await deps.sender.send(buildRawMessage({ to: config.sendTo, subject, html }));
  log.info("Digest sent", { to: config.sendTo, subject, messageId });

  await markAllAsRead(deps.source, emails, log);
  await saveLastRun(config.statePath, now);

  return { status: "sent", subject, messageId, emailCount: emails.length };
}

/**
 * Runs one digest.
 *
 * In send mode a fatal error triggers a best-effort failure notice before it is
 * rethrown. Preview runs leave the mailbox and the run timestamp untouched and
 * notify no one.
 */
export async function runDigest(
  deps: DigestDependencies,
  options: DigestRunOptions
): Promise<DigestRunResult> {
  const now = deps.now?.() ?? new Date();
  const log = deps.logger ?? defaultLogger;

  try {
    return await produceDigest(deps, options, now, log);
  } catch (error) {
    log.error("Digest run failed", { error: errorMessage(error) });
    if (!options.preview) {
      await sendFailureNotice(deps, error, log);
    }
    throw error;
  }
}
