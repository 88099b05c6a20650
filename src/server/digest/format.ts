/**
 * Section formatters.
 *
 * Convert the model's lightweight markdown (bold, links, bullet lines) into the
 * inline-styled HTML fragments the email template expects. Email clients ignore
 * stylesheets, so every element carries its own style attribute.
 *
 * Formatters never throw: text they can't make sense of is rendered as-is.
 */

import { applyInlineMarkup, bulletLines, SCOUTING_LINK_COLOR } from "./markup";
import { formatReads } from "./reads";

export type SectionFormat = "paragraph" | "bullets" | "scouting" | "reads";

const WHY_IT_MATTERS = "Why it matters:";

export function formatParagraph(content: string): string {
  return applyInlineMarkup(content.trim());
}

export function formatBullets(content: string, accentColor: string): string {
  return bulletLines(content)
    .map(
      (line) => `<li style="margin-bottom: 12px; padding-left: 16px; position: relative; color: #E4E4E7; font-size: 15px; line-height: 1.6;">
                <span style="position: absolute; left: 0; color: ${accentColor};">›</span>
                ${applyInlineMarkup(line)}
              </li>`
    )
    .join("\n");
}

/**
 * Formats the scouting pick, setting the "Why it matters:" tail apart as a second paragraph.
 */
export function formatScouting(content: string): string {
  const html = applyInlineMarkup(content.trim(), SCOUTING_LINK_COLOR);

  const markerIndex = html.indexOf(WHY_IT_MATTERS);
  if (markerIndex === -1) {
    return `<p style="margin: 0; font-size: 15px; color: #E4E4E7; line-height: 1.6;">${html}</p>`;
  }

  const pick = html.slice(0, markerIndex).trim();
  const why = html.slice(markerIndex + WHY_IT_MATTERS.length).trim();
  return `<p style="margin: 0 0 8px 0; font-size: 15px; color: #E4E4E7; line-height: 1.6;">
                ${pick}
              </p>
              <p style="margin: 0; font-size: 14px; color: ${SCOUTING_LINK_COLOR}; line-height: 1.5;">
                ${WHY_IT_MATTERS} ${why}
              </p>`;
}

/**
 * Dispatches to the formatter for a section kind.
 *
 * @param accentColor - Bullet marker color; ignored by paragraph and scouting
 */
export function formatSection(format: SectionFormat, content: string, accentColor: string): string {
  switch (format) {
    case "paragraph":
      return formatParagraph(content);
    case "bullets":
      return formatBullets(content, accentColor);
    case "scouting":
      return formatScouting(content);
    case "reads":
      return formatReads(content, accentColor);
  }
}
