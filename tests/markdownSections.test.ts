import { describe, expect, it } from "vitest";
import {
  extractNamedSection,
  formatNoteEntry,
  insertNote,
  parseConceptFields,
  toTitleCase,
} from "../src/pipelines/markdownSections.js";

describe("parseConceptFields", () => {
  it("reads labelled fields with continuation lines", () => {
    const body = [
      "",
      "**High Concept**: A thief steals a crown.",
      "",
      "**Synopsis**: Mira breaks in.",
      "She escapes.",
      "",
      "**Key Elements**:",
      "- Cursed crown",
      "- Fire magic",
      "",
      "**Initial Thoughts**: Strong hook.",
      "Needs a rival.",
      "",
    ].join("\n");

    expect(parseConceptFields(body)).toEqual({
      highConcept: "A thief steals a crown.",
      synopsis: "Mira breaks in. She escapes.",
      keyElements: ["Cursed crown", "Fire magic"],
      initialThoughts: "Strong hook. Needs a rival.",
    });
  });

  it("leaves missing fields empty", () => {
    expect(parseConceptFields("Just a paragraph.\n")).toEqual({
      highConcept: "",
      synopsis: "",
      keyElements: [],
      initialThoughts: "",
    });
  });
});

describe("extractNamedSection", () => {
  const markdown = "# T\n\n## Characters\n\n### Protagonist\nMira\n\n## Plot\nHeist";

  it("returns a level-two section with its subsections", () => {
    expect(extractNamedSection(markdown, "characters")).toBe("## Characters\n\n### Protagonist\nMira\n");
  });

  it("returns a level-three section up to the next level-two heading", () => {
    expect(extractNamedSection(markdown, "Protagonist")).toBe("### Protagonist\nMira\n");
  });

  it("runs to the end of the document for the last section", () => {
    expect(extractNamedSection(markdown, "plot")).toBe("## Plot\nHeist");
  });

  it("returns null for a missing section", () => {
    expect(extractNamedSection(markdown, "themes")).toBeNull();
  });
});

describe("insertNote", () => {
  const content = "# T\n\n## Plot\nHeist\n\n## Development Notes\n\n## Next Steps\n";
  const entry = formatNoteEntry("2025-01-15 09:30", "Add a rival");

  it("formats a timestamped entry", () => {
    expect(entry).toBe("\n### [2025-01-15 09:30]\nAdd a rival\n");
  });

  it("appends to the end of a named section", () => {
    const result = insertNote(content, entry, "plot");

    expect(result.sectionFound).toBe(true);
    expect(result.content).toBe(
      "# T\n\n## Plot\nHeist\n\n### [2025-01-15 09:30]\nAdd a rival\n\n## Development Notes\n\n## Next Steps\n",
    );
  });

  it("appends to the end of the document when the section is last", () => {
    const result = insertNote("## Plot\nHeist", entry, "plot");

    expect(result.content).toBe("## Plot\nHeist\n### [2025-01-15 09:30]\nAdd a rival\n");
  });

  it("writes under the development notes heading by default", () => {
    const result = insertNote(content, entry);

    expect(result.sectionFound).toBe(false);
    expect(result.content).toBe(
      "# T\n\n## Plot\nHeist\n\n## Development Notes\n### [2025-01-15 09:30]\nAdd a rival\n\n\n## Next Steps\n",
    );
  });

  it("falls back to development notes for an unknown section", () => {
    const result = insertNote(content, entry, "world building");

    expect(result.sectionFound).toBe(false);
    expect(result.content).toContain("## Development Notes\n### [2025-01-15 09:30]\nAdd a rival\n");
  });

  it("creates the development notes heading when absent", () => {
    expect(insertNote("# T", entry).content).toBe(
      "# T\n\n## Development Notes\n### [2025-01-15 09:30]\nAdd a rival\n",
    );
  });

  it("does not expand replacement patterns in the note", () => {
    const result = insertNote(content, formatNoteEntry("now", "costs $& and $1"));

    expect(result.content).toContain("### [now]\ncosts $& and $1\n");
  });
});

describe("toTitleCase", () => {
  it("capitalizes each word", () => {
    expect(toTitleCase("world building")).toBe("World Building");
    expect(toTitleCase("NEXT steps")).toBe("Next Steps");
    expect(toTitleCase("sci-fi notes")).toBe("Sci-Fi Notes");
  });
});
