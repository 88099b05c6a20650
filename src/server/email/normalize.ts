/**
 * Email normalization.
 *
 * Turns a raw Gmail message into the NormalizedEmail record the rest of the
 * pipeline works with.
 */

import { extractHtmlBody, getHeader, type GmailMessage } from "./mime";
import { htmlToText } from "../html/strip-html";
import { extractImages, extractLinks, type EmailImage, type EmailLink } from "../html/extract";

export type { EmailImage, EmailLink };

export interface NormalizedEmail {
  readonly id: string;
  /** Raw From header, e.g. "Exec Sum <newsletter@execsum.co>" */
  readonly from: string;
  readonly subject: string;
  /** Raw Date header */
  readonly date: string;
  /** Plain text, one line per block */
  readonly text: string;
  /** Original HTML body */
  readonly html: string;
  /** At most 30 links, document order */
  readonly links: readonly EmailLink[];
  /** At most 10 images, document order */
  readonly images: readonly EmailImage[];
}

/**
 * Normalizes a fetched message.
 *
 * @returns The normalized email, or null when the message has no body
 */
export function normalizeEmail(message: GmailMessage): NormalizedEmail | null {
  const html = extractHtmlBody(message.payload);
  if (!html) {
    return null;
  }

  const links = extractLinks(html).map((link) => Object.freeze(link));
  const images = extractImages(html).map((image) => Object.freeze(image));

  return Object.freeze({
    id: message.id,
    from: getHeader(message.payload, "From"),
    subject: getHeader(message.payload, "Subject"),
    date: getHeader(message.payload, "Date"),
    text: htmlToText(html),
    html,
    links: Object.freeze(links),
    images: Object.freeze(images),
  });
}
