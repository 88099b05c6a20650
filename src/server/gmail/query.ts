/**
 * Gmail search query for newsletters.
 */

import type { GmailLabel } from "./client";

export interface NewsletterQueryOptions {
  /** Label names to search; OR-ed together */
  labels: readonly string[];
  /** Only messages received after this instant */
  after: Date;
  includeRead: boolean;
}

/**
 * Picks the root newsletter label and its sublabels ("Newsletters", "Newsletters/Finance", ...).
 */
export function selectNewsletterLabels(labels: readonly GmailLabel[], rootLabel: string): string[] {
  return labels
    .map((label) => label.name)
    .filter((name) => name === rootLabel || name.startsWith(`${rootLabel}/`));
}

/**
 * Builds the search query, e.g.
 * `{label:"Newsletters" label:"Newsletters/Tech"} is:unread after:1760846400`.
 *
 * Gmail reads `{a b}` as "a OR b". With no labels the label clause is omitted
 * and the whole mailbox is searched.
 */
export function buildNewsletterQuery(options: NewsletterQueryOptions): string {
  const parts: string[] = [];

  if (options.labels.length > 0) {
    parts.push(`{${options.labels.map((label) => `label:"${label}"`).join(" ")}}`);
  }
  if (!options.includeRead) {
    parts.push("is:unread");
  }
  parts.push(`after:${Math.floor(options.after.getTime() / 1000)}`);

  return parts.join(" ");
}
