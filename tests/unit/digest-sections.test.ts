/**
 * Unit tests for splitting a model response into sections.
 */

import { describe, it, expect } from "vitest";
import { getSection, parseSections } from "../../src/server/digest/sections";

describe("parseSections", () => {
  it("splits on ## headings and trims each body", () => {
    const sections = parseSections(
      "## GOOD_MORNING\n\nHello there.\n\n## TECH_AI\n- one\n- two\n  \n"
    );

    expect([...sections.entries()]).toEqual([
      ["GOOD_MORNING", "Hello there."],
      ["TECH_AI", "- one\n- two"],
    ]);
  });

  it("discards text before the first heading", () => {
    const sections = parseSections("Sure! Here is today's issue.\n\n## GOOD_MORNING\nHi");
    expect([...sections.keys()]).toEqual(["GOOD_MORNING"]);
  });

  it("trims heading names", () => {
    const sections = parseSections("##   TECH_AI   \nbody");
    expect(sections.get("TECH_AI")).toBe("body");
  });

  it("accepts unknown headings as keys", () => {
    const sections = parseSections("## TECH_AII\nTypo'd heading");
    expect(sections.get("TECH_AII")).toBe("Typo'd heading");
  });

  it("requires a space after the marker", () => {
    const sections = parseSections("## A\n##B\nmore");
    expect([...sections.entries()]).toEqual([["A", "##B\nmore"]]);
  });

  it("lets a repeated heading replace the earlier body", () => {
    const sections = parseSections("## A\nfirst\n## A\nsecond");
    expect(sections.get("A")).toBe("second");
  });

  it("keeps an empty section as an empty string", () => {
    const sections = parseSections("## A\n## B\nb");
    expect(sections.get("A")).toBe("");
  });

  it("returns an empty map for text without headings", () => {
    expect(parseSections("no headings here").size).toBe(0);
    expect(parseSections("").size).toBe(0);
  });

  it("round-trips through rendering and re-parsing", () => {
    const original = parseSections(
      "preamble\n## EMAIL_SUBJECT\nToday's Drop: Rates\n## GOOD_MORNING\nLine one\n\nLine two\n## READS_OF_THE_WEEK\n- **[T](http://u)** · S · D"
    );

    const rendered = [...original.entries()]
      .map(([key, value]) => `## ${key}\n${value}`)
      .join("\n");

    expect(parseSections(rendered)).toEqual(original);
  });
});

describe("getSection", () => {
  it("returns the body for a present key", () => {
    expect(getSection(parseSections("## A\nbody"), "A")).toBe("body");
  });

  it("returns an empty string for a missing key", () => {
    expect(getSection(parseSections("## A\nbody"), "TECH_AI")).toBe("");
  });
});
