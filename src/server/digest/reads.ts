/**
 * "Reads of the week" parsing and rendering.
 *
 * The model is asked for lines shaped like
 *   - **[Article Title](https://example.com/a)** · Source Name · One-line description
 * but drifts between variants (no bold, no link, no description). Each variant
 * is a matcher below; they are tried in order and the first match wins.
 */

import { bulletLines, firstMarkdownLinkUrl, stripMarkdownLinks } from "./markup";

export interface ReadItem {
  title: string;
  /** "#" when the line has no link */
  linkUrl: string;
  source: string;
  description: string;
  paywall: boolean;
}

type ReadFields = Omit<ReadItem, "paywall">;

export interface ReadMatcher {
  name: string;
  pattern: RegExp;
  /** Builds the item from a successful match; `line` is the whole (paywall-free) line. */
  toItem: (match: RegExpExecArray, line: string) => ReadFields;
}

const NO_LINK = "#";

const PAYWALL_TAG = /\[paywall\]/i;
const PAYWALL_TAGS = /\[paywall\]/gi;

/**
 * Ordered from most to least specific.
 */
export const READ_MATCHERS: readonly ReadMatcher[] = [
  {
    name: "bold-link-source-description",
    pattern: /^\*\*\[(.+?)\]\((.+?)\)\*\*\s*·\s*(.+?)\s*·\s*(.+)/,
    toItem: (m) => ({
      title: m[1],
      linkUrl: m[2],
      source: m[3].trim(),
      description: m[4].trim(),
    }),
  },
  {
    name: "bold-link-source",
    pattern: /^\*\*\[(.+?)\]\((.+?)\)\*\*\s*·\s*(.+)/,
    toItem: (m) => {
      const rest = m[3].trim();
      const separator = rest.indexOf("·");
      return {
        title: m[1],
        linkUrl: m[2],
        source: separator === -1 ? rest : rest.slice(0, separator).trim(),
        description: separator === -1 ? "" : rest.slice(separator + 1).trim(),
      };
    },
  },
  {
    name: "bold-title-source-description",
    pattern: /^\*\*(.+?)\*\*\s*·\s*(.+?)\s*·\s*(.+)/,
    toItem: (m, line) => ({
      title: m[1],
      linkUrl: firstMarkdownLinkUrl(line) ?? NO_LINK,
      source: m[2].trim(),
      description: m[3].trim(),
    }),
  },
  {
    name: "link-source-description",
    pattern: /^\[(.+?)\]\((.+?)\)\s*·\s*(.+?)\s*·\s*(.+)/,
    toItem: (m) => ({
      title: m[1],
      linkUrl: m[2],
      source: m[3].trim(),
      description: m[4].trim(),
    }),
  },
];

function matchReadLine(text: string): ReadFields | null {
  for (const matcher of READ_MATCHERS) {
    const match = matcher.pattern.exec(text);
    if (match) {
      return matcher.toItem(match, text);
    }
  }
  return null;
}

/**
 * Recovers a ReadItem from one bullet body (marker already stripped).
 *
 * Lines no matcher recognizes become the title, linked to the first markdown
 * link found anywhere in them.
 */
export function parseReadItem(line: string): ReadItem {
  const paywall = PAYWALL_TAG.test(line);
  const text = paywall ? line.replace(PAYWALL_TAGS, "").trim() : line.trim();

  const fields = matchReadLine(text) ?? {
    title: text,
    linkUrl: firstMarkdownLinkUrl(text) ?? NO_LINK,
    source: "",
    description: "",
  };

  return {
    ...fields,
    description: stripMarkdownLinks(fields.description),
    paywall,
  };
}

const PAYWALL_BADGE =
  '<span style="display: inline-block; background-color: #3F3F46; color: #A1A1AA; font-size: 11px; padding: 2px 6px; border-radius: 4px; margin-left: 6px;">Paywall</span>';

export function renderReadItem(item: ReadItem, accentColor: string): string {
  const source = item.source
    ? `<span style="color: #71717A; font-size: 14px;"> · ${item.source}</span>`
    : "";
  const description = item.description
    ? `<p style="margin: 6px 0 0 0; font-size: 14px; color: #A1A1AA; line-height: 1.5;">${item.description}</p>`
    : "";

  return `<li style="margin-bottom: 16px; padding-left: 16px; position: relative;">
                <span style="position: absolute; left: 0; color: ${accentColor};">›</span>
                <a href="${item.linkUrl}" style="color: #FFFFFF; font-size: 15px; font-weight: 600; text-decoration: none;">${item.title}</a>
                ${source}
                ${item.paywall ? PAYWALL_BADGE : ""}
                ${description}
              </li>`;
}

export function formatReads(content: string, accentColor: string): string {
  return bulletLines(content)
    .map((line) => renderReadItem(parseReadItem(line), accentColor))
    .join("\n");
}
