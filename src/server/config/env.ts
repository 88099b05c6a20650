/**
 * Environment Configuration
 *
 * Reads the process environment once and produces an immutable DigestConfig that
 * is passed explicitly to every component. Nothing else reads process.env directly.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "@/server/errors";

/**
 * Repository root, used to resolve the default asset and state paths.
 */
const PROJECT_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

export const DEFAULT_HEADER_BG_IMAGE =
  "https://raw.githubusercontent.com/r8slab/the-drop/main/assets/hero-background-wide.jpg";

/**
 * Treats empty strings as unset so `FOO=` in a .env file falls back to the default.
 */
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  SEND_TO: optionalString,
  FAILURE_NOTIFY_TO: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  CLAUDE_MODEL: optionalString,
  HEADER_BG_IMAGE: optionalString,
  DIGEST_TIME_ZONE: optionalString,
  DIGEST_TEMPLATE_PATH: optionalString,
  DIGEST_PROMPT_PATH: optionalString,
  DIGEST_STATE_PATH: optionalString,
  GMAIL_SOURCE_TOKEN_PATH: optionalString,
  GMAIL_SENDER_TOKEN_PATH: optionalString,
  NEWSLETTER_LABEL: optionalString,
});

export interface DigestConfig {
  /** Recipient of the digest. Empty only in preview mode. */
  readonly sendTo: string;
  /** Recipient of failure notices (FAILURE_NOTIFY_TO, else SEND_TO). */
  readonly failureRecipient: string;
  readonly anthropicApiKey: string;
  readonly model: string;
  /** Maximum tokens the model may produce for one digest. */
  readonly maxOutputTokens: number;
  readonly headerBgImage: string;
  /** IANA time zone used for the issue date and the default subject. */
  readonly timeZone: string;
  readonly templatePath: string;
  readonly promptPath: string;
  /** File holding the last successful run timestamp. */
  readonly statePath: string;
  readonly sourceTokenPath: string;
  readonly senderTokenPath: string;
  /** Root label; the label itself and all of its sublabels are searched. */
  readonly newsletterLabel: string;
  /** Days to look back when no previous run is recorded. */
  readonly lookbackDays: number;
  /** Upper bound on messages fetched per run. */
  readonly maxMessages: number;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates the environment and builds the run configuration.
 *
 * @param env - Environment variables (usually process.env)
 * @param options.requireRecipient - Whether SEND_TO must be set (false in preview mode)
 * @throws ConfigError if a required value is missing or invalid
 */
export function loadDigestConfig(
  env: Record<string, string | undefined>,
  options: { requireRecipient: boolean }
): DigestConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${parsed.error.message}`);
  }
  const vars = parsed.data;

  if (options.requireRecipient && !vars.SEND_TO) {
    throw new ConfigError("SEND_TO environment variable not set");
  }
  const anthropicApiKey = vars.ANTHROPIC_API_KEY;
  if (!anthropicApiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY environment variable not set");
  }

  const timeZone = vars.DIGEST_TIME_ZONE ?? "America/New_York";
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`DIGEST_TIME_ZONE is not a valid time zone: ${timeZone}`);
  }

  const resolvePath = (value: string | undefined, fallback: string) =>
    path.resolve(PROJECT_ROOT, value ?? fallback);

  const sendTo = vars.SEND_TO ?? "";

  return Object.freeze({
    sendTo,
    failureRecipient: vars.FAILURE_NOTIFY_TO ?? sendTo,
    anthropicApiKey,
    model: vars.CLAUDE_MODEL ?? DEFAULT_MODEL,
    maxOutputTokens: 16000,
    headerBgImage: vars.HEADER_BG_IMAGE ?? DEFAULT_HEADER_BG_IMAGE,
    timeZone,
    templatePath: resolvePath(vars.DIGEST_TEMPLATE_PATH, "assets/digest-template.html"),
    promptPath: resolvePath(vars.DIGEST_PROMPT_PATH, "assets/digest-prompt.md"),
    statePath: resolvePath(vars.DIGEST_STATE_PATH, ".last_run"),
    sourceTokenPath: resolvePath(vars.GMAIL_SOURCE_TOKEN_PATH, "token-source.json"),
    senderTokenPath: resolvePath(vars.GMAIL_SENDER_TOKEN_PATH, "token-sender.json"),
    newsletterLabel: vars.NEWSLETTER_LABEL ?? "Newsletters",
    lookbackDays: 3,
    maxMessages: 35,
  });
}
