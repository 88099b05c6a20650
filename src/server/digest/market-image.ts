/**
 * Market snapshot image lookup.
 *
 * The Executive Summary newsletter embeds its pre-market table as an image
 * under a "Before the Bell" heading. There is no stable marker for it, so the
 * lookup tries three progressively weaker heuristics and accepts finding
 * nothing: the digest then renders without a market image.
 */

import { JSDOM } from "jsdom";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import type { NormalizedEmail } from "../email/normalize";

export type MarketImageStrategy = "heading" | "alt-text" | "fallback";

export interface MarketImageMatch {
  src: string;
  strategy: MarketImageStrategy;
}

const EXEC_SUM_SENDER_KEYWORDS = ["exec", "execsum"];
const EXEC_SUM_SUBJECT_KEYWORDS = ["executive summary", "exec sum"];

/**
 * Section headings the market table appears under, tried in order.
 */
const HEADING_PATTERNS = [/before\s*the\s*bell/i, /market\s*snapshot/i, /markets\s*at\s*a\s*glance/i];

/**
 * Nearest ancestors treated as the heading's container.
 */
const CONTAINER_SELECTOR = "td, tr, table, div";

const HEADING_IMAGE_EXCLUDE = ["logo", "icon"];

const MARKET_ALT_KEYWORDS = ["market", "futures", "indices", "stocks", "bell"];

const NOISE_KEYWORDS = [
  "logo",
  "icon",
  "button",
  "social",
  "twitter",
  "facebook",
  "linkedin",
  "spacer",
  "1x1",
];

function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lowered = haystack.toLowerCase();
  return needles.some((needle) => lowered.includes(needle));
}

/**
 * Whether an email is the Executive Summary newsletter, judged by sender or subject.
 */
export function isExecutiveSummaryEmail(email: Pick<NormalizedEmail, "from" | "subject">): boolean {
  return (
    containsAny(email.from, EXEC_SUM_SENDER_KEYWORDS) ||
    containsAny(email.subject, EXEC_SUM_SUBJECT_KEYWORDS)
  );
}

/**
 * Finds the first usable image after a market heading.
 *
 * Each text node matching a heading pattern is widened to its nearest
 * td/tr/table/div, and images are scanned in document order from the start of
 * that container (its own descendants included). Logo and icon images are
 * skipped and the scan moves on to the next image.
 */
function findImageAfterHeading(dom: JSDOM, log: Logger): string | null {
  const { document, NodeFilter, Node } = dom.window;
  const images = Array.from(document.querySelectorAll("img"));
  if (images.length === 0) {
    return null;
  }

  const textNodes: Text[] = [];
  const walker = document.createTreeWalker(document, NodeFilter.SHOW_TEXT);
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    if (node instanceof dom.window.Text) {
      textNodes.push(node);
    }
  }

  for (const pattern of HEADING_PATTERNS) {
    for (const textNode of textNodes) {
      if (!pattern.test(textNode.data)) continue;

      const container = textNode.parentElement?.closest(CONTAINER_SELECTOR);
      if (!container) continue;

      for (const image of images) {
        const position = container.compareDocumentPosition(image);
        if (!(position & Node.DOCUMENT_POSITION_FOLLOWING)) continue;

        const src = image.getAttribute("src") ?? "";
        if (src && !containsAny(src, HEADING_IMAGE_EXCLUDE)) {
          log.debug("Market image found after heading", {
            pattern: pattern.source,
            src: src.slice(0, 80),
          });
          return src;
        }
      }
    }
  }

  return null;
}

/**
 * Finds the first image whose alt text mentions markets.
 */
function findImageByAltText(dom: JSDOM): string | null {
  for (const image of dom.window.document.querySelectorAll("img")) {
    const alt = image.getAttribute("alt") ?? "";
    const src = image.getAttribute("src");
    if (src && containsAny(alt, MARKET_ALT_KEYWORDS)) {
      return src;
    }
  }
  return null;
}

/**
 * Picks the first extracted image that doesn't look like chrome (logos, social buttons, spacers).
 */
function findFirstContentImage(email: NormalizedEmail): string | null {
  for (const image of email.images) {
    if (containsAny(image.src, NOISE_KEYWORDS) || containsAny(image.alt, NOISE_KEYWORDS)) {
      continue;
    }
    return image.src;
  }
  return null;
}

/**
 * Runs the three lookup strategies against one email.
 *
 * @returns The first match, or null when no strategy finds an image
 */
export function findMarketImage(email: NormalizedEmail, log: Logger = defaultLogger): MarketImageMatch | null {
  const dom = new JSDOM(email.html);

  try {
    const headingImage = findImageAfterHeading(dom, log);
    if (headingImage) {
      return { src: headingImage, strategy: "heading" };
    }

    const altImage = findImageByAltText(dom);
    if (altImage) {
      return { src: altImage, strategy: "alt-text" };
    }
  } finally {
    dom.window.close();
  }

  const fallbackImage = findFirstContentImage(email);
  if (fallbackImage) {
    return { src: fallbackImage, strategy: "fallback" };
  }

  return null;
}

/**
 * Locates the market snapshot image across a batch of emails.
 *
 * Only Executive Summary emails are considered, in the given order.
 *
 * @returns The image URL, or null if none was found (not an error)
 */
export function locateMarketImage(
  emails: readonly NormalizedEmail[],
  log: Logger = defaultLogger
): string | null {
  for (const email of emails) {
    if (!isExecutiveSummaryEmail(email)) continue;

    log.info("Found Executive Summary email", { emailId: email.id, subject: email.subject });

    const match = findMarketImage(email, log);
    if (match) {
      log.info("Found market image", {
        emailId: email.id,
        strategy: match.strategy,
        src: match.src.slice(0, 80),
      });
      return match.src;
    }
  }

  log.warn("No Executive Summary market image found");
  return null;
}
