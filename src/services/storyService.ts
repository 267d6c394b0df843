import path from "node:path";
import { ConceptNotFoundError, CreationError } from "../domain/errors.js";
import {
  formatList,
  loadMarkdownFile,
  parseFrontmatterDocument,
  stringifyFrontmatterDocument,
} from "../infra/parsers/documentLoader.js";
import { storiesDir } from "../infra/store/fileSystemIdeaRepository.js";
import {
  formatNoteEntry,
  insertNote,
  insertUnderDevelopmentNotes,
  parseConceptFields,
  type ConceptFields,
} from "../pipelines/markdownSections.js";
import { formatDate, formatTimestamp } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import { validateInteger, validateString } from "../utils/validation.js";
import type { CatalogService } from "./catalogService.js";
import { pathExists, requireSlug, writeMarkdownFile, type CreatorService } from "./creatorService.js";

const logger = createLogger("stories");

const PITCH_PLACEHOLDER = "[One-line pitch that captures the essence]";
const SYNOPSIS_PLACEHOLDER = "[2-3 sentence compelling description]";

export interface DevelopedConcept {
  storyName: string;
  title: string;
  filePath: string;
}

export interface AddedNote {
  storyName: string;
  filePath: string;
  note: string;
  sectionFound: boolean;
}

export class StoryService {
  constructor(
    private readonly root: string,
    private readonly catalog: CatalogService,
    private readonly creator: CreatorService,
  ) {}

  /**
   * Turns one concept of a batch into a story development file seeded with
   * the concept's pitch, synopsis and key elements.
   */
  async developConcept(
    batchId: string,
    conceptNumber: number,
    options: { overwrite?: boolean } = {},
  ): Promise<DevelopedConcept> {
    const number = validateInteger(conceptNumber, "concept number", { min: 1 });
    const batch = await this.catalog.getBatch(batchId);
    const concept = batch.concepts.find((record) => record.identifier === String(number));
    if (!concept) {
      throw new ConceptNotFoundError(batch.batchId, number, batch.concepts.length);
    }

    const title = concept.title || `Concept ${number}`;
    const storyName = requireSlug(title);
    const filePath = path.join(storiesDir(this.root), `${storyName}.md`);
    if (!options.overwrite && (await pathExists(filePath))) {
      throw new CreationError("story", `Story file ${storyName}.md already exists`);
    }

    const fields = parseConceptFields(concept.body);
    let content = await this.creator.renderStoryTemplate({
      storyId: this.creator.storyIdFor(storyName),
      title,
      genre: formatList(batch.genre) || "Unknown",
      origin: batch.batchId,
    });
    if (fields.highConcept) {
      content = content.replace(PITCH_PLACEHOLDER, () => fields.highConcept);
    }
    if (fields.synopsis) {
      content = content.replace(SYNOPSIS_PLACEHOLDER, () => fields.synopsis);
    }
    content = insertUnderDevelopmentNotes(
      content,
      developmentBlock(formatDate(this.creator.clock()), batch.batchId, number, fields),
    );

    await writeMarkdownFile(filePath, content);
    logger.info(`Developed concept #${number} of ${batch.batchId} into ${storyName}`);
    return { storyName, title, filePath };
  }

  /**
   * Adds a timestamped note to a story and bumps its `date_updated`. Returns
   * whether the requested section existed; otherwise the note lands under
   * the development notes.
   */
  async addNote(
    storyName: string,
    text: string,
    options: { section?: string } = {},
  ): Promise<AddedNote> {
    const note = validateString(text, "note", { maxLength: 10000 });
    const section = options.section
      ? validateString(options.section, "section", { maxLength: 100 })
      : undefined;
    const story = await this.catalog.getStory(storyName);

    const now = this.creator.clock();
    const raw = await loadMarkdownFile(story.filePath);
    const document = parseFrontmatterDocument(raw, story.filePath);
    const inserted = insertNote(document.content, formatNoteEntry(formatTimestamp(now), note), section);

    const hasFrontmatter = Object.keys(document.data).length > 0;
    const content = hasFrontmatter
      ? stringifyFrontmatterDocument(inserted.content, {
          ...document.data,
          date_updated: formatDate(now),
        })
      : inserted.content;

    await writeMarkdownFile(story.filePath, content);
    if (section && !inserted.sectionFound) {
      logger.warn(`Section '${section}' not found in ${story.name}; note added to Development Notes`);
    }
    return {
      storyName: story.name,
      filePath: story.filePath,
      note,
      sectionFound: inserted.sectionFound,
    };
  }
}

function developmentBlock(
  date: string,
  batchId: string,
  conceptNumber: number,
  fields: ConceptFields,
): string {
  let block = `\n### [${date}] From Batch ${batchId}, Concept #${conceptNumber}\n\n`;
  if (fields.keyElements.length > 0) {
    block += "**Key Elements from Concept:**\n";
    block += fields.keyElements.map((element) => `- ${element}\n`).join("");
  }
  if (fields.initialThoughts) {
    block += `\n**Initial Thoughts:**\n${fields.initialThoughts}\n`;
  }
  return block;
}
