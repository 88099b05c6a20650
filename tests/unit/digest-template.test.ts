/**
 * Unit tests for digest template assembly.
 */

import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { TemplateError } from "../../src/server/errors";
import { parseSections } from "../../src/server/digest/sections";
import {
  assembleDigest,
  buildPlaceholderValues,
  DIGEST_PLACEHOLDERS,
  DIGEST_SECTIONS,
  fillTemplate,
  findPlaceholders,
  formatLongDate,
  renderCallout,
  type DigestTemplateInput,
} from "../../src/server/digest/template";

const MONDAY_NOON = new Date("2026-10-19T16:00:00Z");

/** One line per placeholder: <NAME>{{NAME}}</NAME> */
const TEST_TEMPLATE = DIGEST_PLACEHOLDERS.map((name) => `<${name}>{{${name}}}</${name}>`).join("\n");

function input(response: string, overrides: Partial<DigestTemplateInput> = {}): DigestTemplateInput {
  return {
    sections: parseSections(response),
    marketImageUrl: "https://cdn.example.com/chart.png",
    headerImageUrl: "https://cdn.example.com/header.jpg",
    date: MONDAY_NOON,
    timeZone: "America/New_York",
    ...overrides,
  };
}

describe("formatLongDate", () => {
  it("formats weekday, month, day and year in the given time zone", () => {
    expect(formatLongDate(MONDAY_NOON, "America/New_York")).toBe("Monday, October 19, 2026");
  });

  it("uses the calendar day of the time zone", () => {
    const lateEvening = new Date("2026-10-20T02:00:00Z");
    expect(formatLongDate(lateEvening, "America/New_York")).toBe("Monday, October 19, 2026");
    expect(formatLongDate(lateEvening, "UTC")).toBe("Tuesday, October 20, 2026");
  });
});

describe("renderCallout", () => {
  it("renders nothing for NONE in any case", () => {
    expect(renderCallout("NONE")).toBe("");
    expect(renderCallout("  none \n")).toBe("");
    expect(renderCallout("")).toBe("");
  });

  it("wraps the text in the New Opening card", () => {
    const html = renderCallout("New bar opened");
    expect(html).toContain(">New Opening</p>");
    expect(html).toContain('<p style="margin: 0; font-size: 15px; color: #F0FDFA; line-height: 1.6;">\n              New bar opened\n');
  });

  it("applies inline markup to the callout text", () => {
    expect(renderCallout("**Bar Foo** opened")).toContain('<strong style="color: #FFFFFF;">Bar Foo</strong> opened');
  });
});

describe("buildPlaceholderValues", () => {
  it("has a value for every declared placeholder", () => {
    const values = buildPlaceholderValues(input(""));
    expect([...values.keys()].sort()).toEqual([...DIGEST_PLACEHOLDERS].sort());
  });

  it("fills the fixed values", () => {
    const values = buildPlaceholderValues(input(""));
    expect(values.get("DATE")).toBe("Monday, October 19, 2026");
    expect(values.get("HEADER_BG_IMAGE")).toBe("https://cdn.example.com/header.jpg");
    expect(values.get("EXEC_SUM_MARKET_IMAGE_URL")).toBe("https://cdn.example.com/chart.png");
  });

  it("leaves the market image empty when none was found", () => {
    const values = buildPlaceholderValues(input("", { marketImageUrl: null }));
    expect(values.get("EXEC_SUM_MARKET_IMAGE_URL")).toBe("");
  });

  it("maps GOOD_MORNING to its content placeholder", () => {
    const values = buildPlaceholderValues(input("## GOOD_MORNING\nRise and **shine**"));
    expect(values.get("GOOD_MORNING_CONTENT")).toBe('Rise and <strong style="color: #FFFFFF;">shine</strong>');
  });

  it("renders a missing section as an empty string", () => {
    const values = buildPlaceholderValues(input("## HEADLINE_ROUNDUP\n- Something happened"));
    expect(values.get("TECH_AI")).toBe("");
    expect(values.get("HEADLINE_ROUNDUP")).toContain("Something happened");
  });

  it("uses each section's accent color", () => {
    const values = buildPlaceholderValues(input("## TECH_AI\n- chips"));
    const techAi = DIGEST_SECTIONS.find((section) => section.key === "TECH_AI");
    expect(techAi?.accentColor).toBe("#FBBF24");
    expect(values.get("TECH_AI")).toContain("color: #FBBF24;");
  });

  it("substitutes an empty callout for NONE", () => {
    const values = buildPlaceholderValues(input("## NYC_CALLOUT\nNONE"));
    expect(values.get("NYC_CALLOUT_SECTION")).toBe("");
  });

  it("substitutes the callout fragment for real content", () => {
    const values = buildPlaceholderValues(input("## NYC_CALLOUT\nNew bar opened"));
    expect(values.get("NYC_CALLOUT_SECTION")).toBe(renderCallout("New bar opened"));
    expect(values.get("NYC_CALLOUT_SECTION")).toContain("New bar opened");
  });

  it("renders the IPO section", () => {
    const values = buildPlaceholderValues(input("## DEAL_FLOW_IPO\n- **Acme** prices IPO"));
    expect(values.get("DEAL_FLOW_IPO")).toContain('<strong style="color: #FFFFFF;">Acme</strong> prices IPO');
  });
});

describe("findPlaceholders", () => {
  it("lists distinct placeholders in order", () => {
    expect(findPlaceholders("{{B}} {{A}} {{B}} {{lower}} {A}")).toEqual(["B", "A"]);
  });
});

describe("fillTemplate", () => {
  it("replaces every occurrence", () => {
    expect(fillTemplate("{{A}}-{{A}}", new Map([["A", "x"]]))).toBe("x-x");
  });

  it("rejects a template placeholder with no value", () => {
    const run = () => fillTemplate("{{A}} {{MYSTERY}}", new Map([["A", "x"]]));
    expect(run).toThrow(TemplateError);
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateError);
      if (error instanceof TemplateError) {
        expect(error.placeholders).toEqual(["MYSTERY"]);
      }
    }
  });

  it("rejects a template that lacks a placeholder with a value", () => {
    expect(() =>
      fillTemplate(
        "{{A}}",
        new Map([
          ["A", "x"],
          ["B", "y"],
        ])
      )
    ).toThrow("Template is missing placeholders: B");
  });

  it("does not expand tokens that appear in substituted content", () => {
    const output = fillTemplate(
      "{{A}}|{{B}}",
      new Map([
        ["A", "{{B}}"],
        ["B", "b"],
      ])
    );
    expect(output).toBe("{{B}}|b");
  });
});

describe("assembleDigest", () => {
  it("leaves no placeholder behind", () => {
    const html = assembleDigest(TEST_TEMPLATE, input("## GOOD_MORNING\nHi"));
    expect(findPlaceholders(html)).toEqual([]);
    expect(html).toContain("<TECH_AI></TECH_AI>");
    expect(html).toContain("<GOOD_MORNING_CONTENT>Hi</GOOD_MORNING_CONTENT>");
  });

  it("keeps generated text that looks like a placeholder literal", () => {
    const html = assembleDigest(TEST_TEMPLATE, input("## GOOD_MORNING\nSay {{TECH_AI}}\n## TECH_AI\n- chips"));
    expect(html).toContain("<GOOD_MORNING_CONTENT>Say {{TECH_AI}}</GOOD_MORNING_CONTENT>");
  });

  it("fills the shipped template completely", async () => {
    const templatePath = fileURLToPath(new URL("../../assets/digest-template.html", import.meta.url));
    const template = await fs.readFile(templatePath, "utf8");

    expect([...findPlaceholders(template)].sort()).toEqual([...DIGEST_PLACEHOLDERS].sort());

    const html = assembleDigest(template, input("## TECH_AI\n- chips\n## NYC_CALLOUT\nNONE"));
    expect(findPlaceholders(html)).toEqual([]);
    expect(html).toContain("Monday, October 19, 2026");
  });
});
