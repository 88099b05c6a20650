/**
 * Digest template assembly.
 *
 * The email is a fixed HTML document with `{{NAME}}` placeholders. Each
 * placeholder is filled from a lookup map in a single scan of the template, so
 * generated content is never rescanned: a model response that happens to
 * contain `{{TECH_AI}}` stays literal text instead of being expanded.
 */

import fs from "node:fs/promises";
import { TemplateError } from "@/server/errors";
import { formatParagraph, formatSection, type SectionFormat } from "./format";
import { getSection, type SectionMap } from "./sections";

export interface DigestSection {
  /** Heading the model uses, e.g. "TECH_AI" */
  key: string;
  /** Placeholder name in the template, without braces */
  placeholder: string;
  format: SectionFormat;
  /** Bullet marker color; paragraph-style sections keep it for reference only */
  accentColor: string;
}

export const DIGEST_SECTIONS: readonly DigestSection[] = [
  { key: "GOOD_MORNING", placeholder: "GOOD_MORNING_CONTENT", format: "paragraph", accentColor: "#818CF8" },
  { key: "BEFORE_THE_BELL_MARKETS", placeholder: "BEFORE_THE_BELL_MARKETS", format: "bullets", accentColor: "#34D399" },
  { key: "BEFORE_THE_BELL_EARNINGS_LAST", placeholder: "BEFORE_THE_BELL_EARNINGS_LAST", format: "bullets", accentColor: "#34D399" },
  { key: "BEFORE_THE_BELL_EARNINGS_UPCOMING", placeholder: "BEFORE_THE_BELL_EARNINGS_UPCOMING", format: "paragraph", accentColor: "#34D399" },
  { key: "HEADLINE_ROUNDUP", placeholder: "HEADLINE_ROUNDUP", format: "bullets", accentColor: "#F472B6" },
  { key: "PHARMA_HEALTH_INTEL", placeholder: "PHARMA_HEALTH_INTEL", format: "bullets", accentColor: "#22D3EE" },
  { key: "TECH_AI", placeholder: "TECH_AI", format: "bullets", accentColor: "#FBBF24" },
  { key: "DEAL_FLOW_MA", placeholder: "DEAL_FLOW_MA", format: "bullets", accentColor: "#FB923C" },
  { key: "DEAL_FLOW_VENTURE", placeholder: "DEAL_FLOW_VENTURE", format: "bullets", accentColor: "#FB923C" },
  { key: "DEAL_FLOW_IPO", placeholder: "DEAL_FLOW_IPO", format: "bullets", accentColor: "#FB923C" },
  { key: "DEAL_FLOW_SCOUTING", placeholder: "DEAL_FLOW_SCOUTING", format: "scouting", accentColor: "#A5B4FC" },
  { key: "NYC_EVENTS", placeholder: "NYC_EVENTS", format: "bullets", accentColor: "#4ADE80" },
  { key: "NYC_RESTAURANT", placeholder: "NYC_RESTAURANT", format: "paragraph", accentColor: "#4ADE80" },
  { key: "CULTURE_SPORTS", placeholder: "CULTURE_SPORTS", format: "bullets", accentColor: "#E879F9" },
  { key: "CULTURE_MEME", placeholder: "CULTURE_MEME", format: "paragraph", accentColor: "#E879F9" },
  { key: "CULTURE_INTERNET", placeholder: "CULTURE_INTERNET", format: "bullets", accentColor: "#E879F9" },
  { key: "READS_OF_THE_WEEK", placeholder: "READS_OF_THE_WEEK", format: "reads", accentColor: "#60A5FA" },
];

/** Optional section; the model answers "NONE" when there's nothing to call out. */
export const CALLOUT_SECTION_KEY = "NYC_CALLOUT";
export const CALLOUT_PLACEHOLDER = "NYC_CALLOUT_SECTION";

/** Subject line section; read by the pipeline, not rendered into the body. */
export const SUBJECT_SECTION_KEY = "EMAIL_SUBJECT";

export const DATE_PLACEHOLDER = "DATE";
export const HEADER_IMAGE_PLACEHOLDER = "HEADER_BG_IMAGE";
export const MARKET_IMAGE_PLACEHOLDER = "EXEC_SUM_MARKET_IMAGE_URL";

/**
 * Every placeholder the template must contain.
 */
export const DIGEST_PLACEHOLDERS: readonly string[] = [
  DATE_PLACEHOLDER,
  HEADER_IMAGE_PLACEHOLDER,
  MARKET_IMAGE_PLACEHOLDER,
  ...DIGEST_SECTIONS.map((section) => section.placeholder),
  CALLOUT_PLACEHOLDER,
];

const CALLOUT_TEMPLATE = (content: string) => `<tr>
    <td style="padding: 0 0 20px 0;">
      <table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" class="section-card" style="background: linear-gradient(135deg, #134E4A 0%, #0F766E 100%); border-radius: 12px; border: 1px solid #14B8A6;">
        <tr>
          <td class="content-padding" style="padding: 20px 28px;">
            <p style="margin: 0 0 6px 0; font-size: 11px; font-weight: 600; color: #5EEAD4; text-transform: uppercase; letter-spacing: 0.12em;">New Opening</p>
            <p style="margin: 0; font-size: 15px; color: #F0FDFA; line-height: 1.6;">
              ${content}
            </p>
          </td>
        </tr>
      </table>
    </td>
  </tr>`;

const PLACEHOLDER_PATTERN = /\{\{([A-Z0-9_]+)\}\}/g;

export interface DigestTemplateInput {
  sections: SectionMap;
  /** null when no market image was found; the slot is then left empty */
  marketImageUrl: string | null;
  headerImageUrl: string;
  date: Date;
  timeZone: string;
}

/**
 * Formats a date like "Monday, October 19, 2026".
 */
export function formatLongDate(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "long",
    month: "long",
    day: "2-digit",
    year: "numeric",
  }).format(date);
}

/**
 * Renders the optional callout, or "" when the model answered NONE or left it out.
 */
export function renderCallout(content: string): string {
  const trimmed = content.trim();
  if (!trimmed || trimmed.toUpperCase() === "NONE") {
    return "";
  }
  return CALLOUT_TEMPLATE(formatParagraph(trimmed));
}

/**
 * Computes the value of every placeholder.
 */
export function buildPlaceholderValues(input: DigestTemplateInput): Map<string, string> {
  const values = new Map<string, string>([
    [DATE_PLACEHOLDER, formatLongDate(input.date, input.timeZone)],
    [HEADER_IMAGE_PLACEHOLDER, input.headerImageUrl],
    [MARKET_IMAGE_PLACEHOLDER, input.marketImageUrl ?? ""],
  ]);

  for (const section of DIGEST_SECTIONS) {
    const content = getSection(input.sections, section.key);
    values.set(
      section.placeholder,
      content ? formatSection(section.format, content, section.accentColor) : ""
    );
  }

  values.set(CALLOUT_PLACEHOLDER, renderCallout(getSection(input.sections, CALLOUT_SECTION_KEY)));

  return values;
}

/**
 * Lists the distinct placeholder names in a template, in order of first appearance.
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Replaces every placeholder in one pass.
 *
 * @throws TemplateError if the template uses a placeholder with no value, or
 *   lacks one that has a value (its content would be silently dropped)
 */
export function fillTemplate(template: string, values: ReadonlyMap<string, string>): string {
  const present = findPlaceholders(template);

  const unfilled = present.filter((name) => !values.has(name));
  if (unfilled.length > 0) {
    throw new TemplateError(`Template placeholders without a value: ${unfilled.join(", ")}`, unfilled);
  }

  const presentSet = new Set(present);
  const missing = [...values.keys()].filter((name) => !presentSet.has(name));
  if (missing.length > 0) {
    throw new TemplateError(`Template is missing placeholders: ${missing.join(", ")}`, missing);
  }

  return template.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => values.get(name) ?? token);
}

/**
 * Builds the final digest document.
 */
export function assembleDigest(template: string, input: DigestTemplateInput): string {
  return fillTemplate(template, buildPlaceholderValues(input));
}

export async function loadTemplate(templatePath: string): Promise<string> {
  return fs.readFile(templatePath, "utf8");
}
