/**
 * Link and image extraction from email HTML.
 *
 * Both extractors stream the document with htmlparser2 and keep document order.
 * The caps bound how much of a newsletter reaches the model prompt.
 */

import { Parser } from "htmlparser2";

export interface EmailLink {
  /** Anchor text, whitespace-collapsed */
  label: string;
  url: string;
}

export interface EmailImage {
  src: string;
  alt: string;
}

export const MAX_LINKS = 30;
export const MAX_IMAGES = 10;

/**
 * Collects anchors with a non-empty href, skipping mailto: targets.
 */
export function extractLinks(html: string, limit = MAX_LINKS): EmailLink[] {
  const links: EmailLink[] = [];
  if (!html) {
    return links;
  }

  let openHref: string | null = null;
  let openText = "";

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name !== "a") return;
        openHref = attribs.href?.trim() ?? "";
        openText = "";
      },
      ontext(text) {
        if (openHref !== null) {
          openText += text;
        }
      },
      onclosetag(name) {
        if (name !== "a" || openHref === null) return;
        const url = openHref;
        openHref = null;
        if (!url || url.toLowerCase().startsWith("mailto:") || links.length >= limit) {
          return;
        }
        links.push({ label: openText.replace(/\s+/g, " ").trim(), url });
      },
    },
    { decodeEntities: true }
  );

  parser.write(html);
  parser.end();

  return links;
}

/**
 * Collects images with a src that is not an inline data: URI.
 */
export function extractImages(html: string, limit = MAX_IMAGES): EmailImage[] {
  const images: EmailImage[] = [];
  if (!html) {
    return images;
  }

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name !== "img" || images.length >= limit) return;
        const src = attribs.src ?? "";
        if (!src || src.startsWith("data:")) return;
        images.push({ src, alt: attribs.alt ?? "" });
      },
    },
    { decodeEntities: true }
  );

  parser.write(html);
  parser.end();

  return images;
}
