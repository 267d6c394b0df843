import type { ConceptRecord } from "../domain/types.js";

export const DEFAULT_SECTION_MARKER = "## Concept ";
export const DEFAULT_SECTION_DELIMITER = ":";

export interface SectionExtractorOptions {
  marker?: string;
  delimiter?: string;
}

type ExtractionState =
  | { kind: "outside" }
  | { kind: "inSection"; identifier: string; title: string; bodyLines: string[] };

/**
 * Splits a markdown body into numbered sections such as
 * `## Concept 3: The Lost Kingdom`.
 *
 * Lines before the first heading are dropped. A section's body runs until the
 * next heading or the end of the text, and keeps every line with its `\n`.
 * Identifiers are not deduplicated and output keeps source order.
 */
export class SectionExtractor {
  private readonly marker: string;

  private readonly delimiter: string;

  constructor(options: SectionExtractorOptions = {}) {
    this.marker = options.marker ?? DEFAULT_SECTION_MARKER;
    this.delimiter = options.delimiter ?? DEFAULT_SECTION_DELIMITER;
  }

  extract(text: string): ConceptRecord[] {
    const records: ConceptRecord[] = [];
    let state: ExtractionState = { kind: "outside" };

    for (const line of splitLines(text)) {
      if (this.isSectionStart(line)) {
        if (state.kind === "inSection") {
          records.push(closeSection(state));
        }
        state = { kind: "inSection", ...this.parseHeading(line), bodyLines: [] };
        continue;
      }

      if (state.kind === "inSection") {
        state.bodyLines.push(line);
      }
    }

    if (state.kind === "inSection") {
      records.push(closeSection(state));
    }

    return records;
  }

  findSection(text: string, identifier: string): ConceptRecord | null {
    const wanted = identifier.trim();
    return this.extract(text).find((record) => record.identifier === wanted) ?? null;
  }

  renderHeading(record: ConceptRecord): string {
    const title = record.title ? `${this.delimiter} ${record.title}` : "";
    return `${this.marker}${record.identifier}${title}`;
  }

  private isSectionStart(line: string): boolean {
    return this.marker.length > 0 && line.startsWith(this.marker);
  }

  private parseHeading(line: string): { identifier: string; title: string } {
    const remainder = line.slice(this.marker.length);
    const at = this.delimiter ? remainder.indexOf(this.delimiter) : -1;
    if (at < 0) {
      return { identifier: remainder.trim(), title: "" };
    }
    return {
      identifier: remainder.slice(0, at).trim(),
      title: remainder.slice(at + this.delimiter.length).trim(),
    };
  }
}

function closeSection(state: { identifier: string; title: string; bodyLines: string[] }): ConceptRecord {
  return {
    identifier: state.identifier,
    title: state.title,
    body: state.bodyLines.map((line) => `${line}\n`).join(""),
  };
}

// A final newline terminates the last line rather than opening an empty one.
function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split("\n");
  if (text.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}
