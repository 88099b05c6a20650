/**
 * HTML text extraction utilities using SAX parsing.
 */

import { Parser } from "htmlparser2";

/**
 * Block-level elements that end the current line of text.
 */
const BLOCK_TAGS = new Set([
  "p",
  "div",
  "br",
  "hr",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "li",
  "ul",
  "ol",
  "tr",
  "th",
  "td",
  "blockquote",
  "pre",
  "figure",
  "figcaption",
  "table",
  "section",
  "article",
  "header",
  "footer",
  "main",
  "nav",
  "aside",
  "center",
]);

/**
 * Tags whose content should be skipped entirely.
 */
const SKIP_TAGS = new Set(["script", "style", "title", "head"]);

/**
 * Converts an email body to plain text, one line per block.
 *
 * Whitespace inside a block collapses to single spaces, every block boundary
 * starts a new line, and blank lines are dropped. Newsletter HTML is mostly
 * nested tables, so each cell ends up on its own line.
 */
export function htmlToText(html: string): string {
  if (!html) {
    return "";
  }

  const lines: string[] = [];
  let current = "";
  let skipDepth = 0; // Track depth inside script/style tags

  const breakLine = () => {
    const line = current.trim();
    if (line) {
      lines.push(line);
    }
    current = "";
  };

  const parser = new Parser(
    {
      onopentagname(name) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) {
          skipDepth++;
        }
        if (BLOCK_TAGS.has(tag)) {
          breakLine();
        }
      },
      ontext(text) {
        if (skipDepth > 0) return;

        const normalized = text.replace(/\s+/g, " ");
        current += !current || current.endsWith(" ") ? normalized.trimStart() : normalized;
      },
      onclosetag(name) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) {
          skipDepth = Math.max(0, skipDepth - 1);
        }
        if (BLOCK_TAGS.has(tag)) {
          breakLine();
        }
      },
    },
    { decodeEntities: true }
  );

  parser.write(html);
  parser.end();
  breakLine();

  return lines.join("\n");
}
