/**
 * Splits the model's response into named sections.
 *
 * The model is asked to answer in blocks headed by "## NAME". Any heading is
 * accepted as a key, including misspelled ones; consumers look up the keys they
 * know and treat the rest as absent.
 */

export type SectionMap = ReadonlyMap<string, string>;

const SECTION_MARKER = "## ";

/**
 * Parses "## NAME" delimited text into an insertion-ordered map.
 *
 * Lines before the first heading are discarded. Each body is stored trimmed.
 * A repeated heading replaces the earlier body.
 */
export function parseSections(text: string): SectionMap {
  const sections = new Map<string, string>();
  let currentName: string | null = null;
  let currentLines: string[] = [];

  const close = () => {
    if (currentName !== null) {
      sections.set(currentName, currentLines.join("\n").trim());
    }
  };

  for (const line of text.split("\n")) {
    if (line.startsWith(SECTION_MARKER)) {
      close();
      currentName = line.slice(SECTION_MARKER.length).trim();
      currentLines = [];
    } else {
      currentLines.push(line);
    }
  }
  close();

  return sections;
}

/**
 * Returns a section body, or "" when the model did not produce that section.
 */
export function getSection(sections: SectionMap, key: string): string {
  return sections.get(key) ?? "";
}
