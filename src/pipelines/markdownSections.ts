export const DEVELOPMENT_NOTES_HEADING = "## Development Notes";

export interface ConceptFields {
  highConcept: string;
  synopsis: string;
  keyElements: string[];
  initialThoughts: string;
}

export interface NoteInsertion {
  content: string;
  sectionFound: boolean;
}

type ConceptField = "highConcept" | "synopsis" | "keyElements" | "initialThoughts";

const FIELD_LABELS: ReadonlyArray<[string, ConceptField]> = [
  ["**High Concept**:", "highConcept"],
  ["**Synopsis**:", "synopsis"],
  ["**Key Elements**:", "keyElements"],
  ["**Initial Thoughts**:", "initialThoughts"],
];

/**
 * Reads the labelled fields of a concept body. Synopsis and initial thoughts
 * may continue over several lines; key elements are a `-` bullet list.
 */
export function parseConceptFields(body: string): ConceptFields {
  const fields: ConceptFields = {
    highConcept: "",
    synopsis: "",
    keyElements: [],
    initialThoughts: "",
  };
  let current: ConceptField | null = null;

  for (const rawLine of body.split("\n")) {
    const line = rawLine.trim();
    const labelled = FIELD_LABELS.find(([label]) => line.startsWith(label));

    if (labelled) {
      const [label, field] = labelled;
      current = field;
      const value = line.slice(label.length).trim();
      if (field !== "keyElements") {
        fields[field] = value;
      }
      continue;
    }

    if (current === "keyElements" && line.startsWith("-")) {
      fields.keyElements.push(line.slice(1).trim());
    } else if (
      line &&
      !line.startsWith("**") &&
      (current === "synopsis" || current === "initialThoughts")
    ) {
      fields[current] = fields[current] ? `${fields[current]} ${line}` : line;
    }
  }

  return fields;
}

/**
 * Returns the section whose `##`/`###` heading starts with the given name
 * (case-insensitive), up to the next `#` or `##` heading.
 */
export function extractNamedSection(markdown: string, section: string): string | null {
  const wanted = section.toLowerCase();
  const collected: string[] = [];
  let inSection = false;

  for (const line of markdown.split("\n")) {
    const lower = line.toLowerCase();
    if (lower.startsWith(`## ${wanted}`) || lower.startsWith(`### ${wanted}`)) {
      inSection = true;
      collected.push(line);
    } else if (inSection) {
      if (line.startsWith("## ") || line.startsWith("# ")) {
        break;
      }
      collected.push(line);
    }
  }

  return collected.length > 0 ? collected.join("\n") : null;
}

export function formatNoteEntry(timestamp: string, text: string): string {
  return `\n### [${timestamp}]\n${text}\n`;
}

/**
 * Adds a note at the end of `## <Section>` when that heading exists,
 * otherwise right under the development notes heading, creating it if needed.
 */
export function insertNote(content: string, entry: string, section?: string): NoteInsertion {
  if (section) {
    const heading = `## ${toTitleCase(section)}`;
    const at = content.indexOf(heading);
    if (at >= 0) {
      const afterHeading = at + heading.length;
      const rest = content.slice(afterHeading);
      const next = rest.indexOf("\n## ");
      const insertAt = next >= 0 ? afterHeading + next : content.length;
      return {
        content: `${content.slice(0, insertAt)}${entry}${content.slice(insertAt)}`,
        sectionFound: true,
      };
    }
  }

  return {
    content: insertUnderDevelopmentNotes(content, entry),
    sectionFound: false,
  };
}

export function insertUnderDevelopmentNotes(content: string, block: string): string {
  if (content.includes(DEVELOPMENT_NOTES_HEADING)) {
    return content.replace(DEVELOPMENT_NOTES_HEADING, () => `${DEVELOPMENT_NOTES_HEADING}${block}`);
  }
  return `${content}\n\n${DEVELOPMENT_NOTES_HEADING}${block}`;
}

export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => `${prefix}${letter.toUpperCase()}`);
}
