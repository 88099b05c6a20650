/**
 * Unit tests for newsletter label selection and the search query.
 */

import { describe, it, expect } from "vitest";
import { buildNewsletterQuery, selectNewsletterLabels } from "../../src/server/gmail/query";

const AFTER = new Date("2026-10-16T00:00:00Z");

describe("selectNewsletterLabels", () => {
  it("keeps the root label and its sublabels", () => {
    const labels = [
      { id: "1", name: "INBOX" },
      { id: "2", name: "Newsletters" },
      { id: "3", name: "Newsletters/Finance" },
      { id: "4", name: "NewslettersOld" },
      { id: "5", name: "Work/Newsletters" },
    ];

    expect(selectNewsletterLabels(labels, "Newsletters")).toEqual(["Newsletters", "Newsletters/Finance"]);
  });
});

describe("buildNewsletterQuery", () => {
  it("ORs the labels and limits to unread mail after the cutoff", () => {
    expect(
      buildNewsletterQuery({
        labels: ["Newsletters", "Newsletters/Finance"],
        after: AFTER,
        includeRead: false,
      })
    ).toBe('{label:"Newsletters" label:"Newsletters/Finance"} is:unread after:1792108800');
  });

  it("drops is:unread when read mail is included", () => {
    expect(buildNewsletterQuery({ labels: ["Newsletters"], after: AFTER, includeRead: true })).toBe(
      '{label:"Newsletters"} after:1792108800'
    );
  });

  it("keeps the time filter without labels", () => {
    expect(buildNewsletterQuery({ labels: [], after: AFTER, includeRead: false })).toBe(
      "is:unread after:1792108800"
    );
  });

  it("rounds the cutoff down to whole seconds", () => {
    const after = new Date("2026-10-16T00:00:00.999Z");
    expect(buildNewsletterQuery({ labels: [], after, includeRead: true })).toBe("after:1792108800");
  });
});
