/**
 * Inline markdown handling shared by the section formatters.
 */

export const DEFAULT_LINK_COLOR = "#818CF8";
export const SCOUTING_LINK_COLOR = "#A5B4FC";

const BOLD_PATTERN = /\*\*(.+?)\*\*/g;
const LINK_PATTERN = /\[(.+?)\]\((.+?)\)/g;

/**
 * One leading "-", "*" or "•" followed by whitespace (or nothing else).
 * "**bold**" does not count as a marker.
 */
const BULLET_MARKER = /^[-*•](?:\s+|$)/;

/**
 * Applies the substitutions shared by every formatter: `**bold**` and `[label](url)`.
 */
export function applyInlineMarkup(text: string, linkColor = DEFAULT_LINK_COLOR): string {
  return text
    .replace(BOLD_PATTERN, '<strong style="color: #FFFFFF;">$1</strong>')
    .replace(LINK_PATTERN, `<a href="$2" style="color: ${linkColor};">$1</a>`);
}

/**
 * Reduces every `[label](url)` to its label.
 */
export function stripMarkdownLinks(text: string): string {
  return text.replace(LINK_PATTERN, "$1");
}

/**
 * Returns the URL of the first `[label](url)` in the text, if any.
 */
export function firstMarkdownLinkUrl(text: string): string | undefined {
  return /\[.+?\]\((.+?)\)/.exec(text)?.[1];
}

/**
 * Trims a line and removes one leading bullet marker.
 */
export function stripBulletMarker(line: string): string {
  return line.trim().replace(BULLET_MARKER, "");
}

/**
 * Splits section text into bullet bodies, dropping lines that are empty once the marker is gone.
 */
export function bulletLines(content: string): string[] {
  return content
    .trim()
    .split("\n")
    .map(stripBulletMarker)
    .filter((line) => line.length > 0);
}
