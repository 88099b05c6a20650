/**
 * Digest writer: the model call that turns a batch of newsletters into the
 * "## SECTION" formatted text the rest of the pipeline parses.
 */

import fs from "node:fs/promises";
import Anthropic from "@anthropic-ai/sdk";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { DigestGenerationError, errorMessage } from "@/server/errors";
import type { NormalizedEmail } from "../email/normalize";
import { formatLongDate } from "./template";

/**
 * Characters of plain text sent per email.
 */
const MAX_EMAIL_TEXT_LENGTH = 2000;

/**
 * Links sent per email.
 */
const MAX_EMAIL_LINKS = 10;

/**
 * Sections the model is asked for, in output order, with the hint shown under each heading.
 */
export const REQUESTED_SECTIONS: readonly { key: string; hint: string }[] = [
  { key: "EMAIL_SUBJECT", hint: `[punchy subject line, max 60 chars, format: "Today's Drop: [headline]"]` },
  { key: "GOOD_MORNING", hint: "[content]" },
  { key: "BEFORE_THE_BELL_MARKETS", hint: "[bullets]" },
  { key: "BEFORE_THE_BELL_EARNINGS_LAST", hint: "[bullets]" },
  { key: "BEFORE_THE_BELL_EARNINGS_UPCOMING", hint: "[content]" },
  { key: "HEADLINE_ROUNDUP", hint: "[bullets]" },
  { key: "PHARMA_HEALTH_INTEL", hint: "[bullets]" },
  { key: "TECH_AI", hint: "[bullets]" },
  { key: "DEAL_FLOW_MA", hint: "[bullets]" },
  { key: "DEAL_FLOW_VENTURE", hint: "[bullets]" },
  { key: "DEAL_FLOW_IPO", hint: "[bullets]" },
  { key: "DEAL_FLOW_SCOUTING", hint: `[bullets with "Why it matters"]` },
  { key: "NYC_EVENTS", hint: "[bullets]" },
  { key: "NYC_RESTAURANT", hint: "[recommendation]" },
  { key: "NYC_CALLOUT", hint: `[optional: new opening or special callout, or "NONE"]` },
  { key: "CULTURE_SPORTS", hint: "[bullets]" },
  { key: "CULTURE_MEME", hint: "[description and context for meme of the week]" },
  { key: "CULTURE_INTERNET", hint: "[bullets]" },
  { key: "READS_OF_THE_WEEK", hint: "[bullets with source and one-line description]" },
];

/**
 * Produces the raw sectioned text for one issue.
 */
export interface DigestWriter {
  write(emails: readonly NormalizedEmail[], now: Date): Promise<string>;
}

/**
 * Renders one email as a framed block for the prompt.
 */
function renderEmail(email: NormalizedEmail): string {
  const text = email.text.slice(0, MAX_EMAIL_TEXT_LENGTH);
  const links = email.links
    .slice(0, MAX_EMAIL_LINKS)
    .map((link) => `- ${link.label}: ${link.url}`)
    .join("\n");

  return `
---
FROM: ${email.from}
SUBJECT: ${email.subject}
DATE: ${email.date}

CONTENT:
${text}

LINKS:
${links}
---
`;
}

export function renderEmailDigest(emails: readonly NormalizedEmail[]): string {
  return emails.map(renderEmail).join("");
}

function weekdayIn(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("en-US", { timeZone, weekday: "long" }).format(date);
}

/**
 * Builds the user message: issue date, expected density, the source emails and
 * the required response format.
 */
export function buildDigestRequest(
  emails: readonly NormalizedEmail[],
  now: Date,
  timeZone: string
): string {
  const isMonday = weekdayIn(now, timeZone) === "Monday";
  const density = isMonday
    ? "This is a Monday issue, so it should be denser (8-10 min read, 55-65 items)."
    : "This is a mid-week issue, so it should be lighter (5-7 min read, 40-50 items).";

  const format = REQUESTED_SECTIONS.map(({ key, hint }) => `## ${key}\n${hint}`).join("\n\n");

  return `Today is ${formatLongDate(now, timeZone)}.

${density}

Here are the newsletter emails received since the last issue:

${renderEmailDigest(emails)}

Please generate today's issue of The Drop based on these sources. Output the content for each section in a structured format that I can inject into the HTML template.

Format your response as:

${format}
`;
}

/**
 * The slice of a Messages API response the writer reads.
 */
export interface DigestCompletion {
  content: readonly { type: string; text?: string }[];
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client the writer calls; `client.messages` satisfies it.
 */
export interface MessagesClient {
  create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<DigestCompletion>;
}

export interface ClaudeDigestWriterOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  /** Reads the instructions sent as the system prompt; called on every write */
  loadSystemPrompt: () => Promise<string>;
  timeZone: string;
  /** Defaults to the messages resource of a client built from apiKey */
  messages?: MessagesClient;
  logger?: Logger;
}

/**
 * DigestWriter backed by the Anthropic Messages API.
 */
export class ClaudeDigestWriter implements DigestWriter {
  private readonly messages: MessagesClient;
  private readonly log: Logger;

  constructor(private readonly options: ClaudeDigestWriterOptions) {
    this.messages = options.messages ?? new Anthropic({ apiKey: options.apiKey }).messages;
    this.log = options.logger ?? defaultLogger;
  }

  async write(emails: readonly NormalizedEmail[], now: Date): Promise<string> {
    const { model, maxOutputTokens, timeZone } = this.options;
    const systemPrompt = await this.options.loadSystemPrompt();

    this.log.info("Calling Anthropic API for digest generation", {
      model,
      emailCount: emails.length,
    });

    try {
      const response = await this.messages.create({
        model,
        max_tokens: maxOutputTokens,
        system: systemPrompt,
        messages: [{ role: "user", content: buildDigestRequest(emails, now, timeZone) }],
      });

      const textContent = response.content.find((block) => block.type === "text");
      const responseText = textContent?.text ?? "";

      if (!responseText.trim()) {
        throw new DigestGenerationError("Empty response from Anthropic API");
      }

      this.log.info("Digest generated", {
        model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      });

      return responseText;
    } catch (error) {
      this.log.error("Anthropic API call failed", { error: errorMessage(error) });
      throw error;
    }
  }
}

/**
 * Loads the system prompt asset.
 */
export async function loadSystemPrompt(promptPath: string): Promise<string> {
  return fs.readFile(promptPath, "utf8");
}
