import {
  BatchNotFoundError,
  ConceptNotFoundError,
  ResourceError,
  StoryNotFoundError,
} from "../domain/errors.js";
import type { IdeaRepository } from "../domain/ideaRepository.js";
import type { BatchDocument, StoryDocument } from "../domain/types.js";
import { formatList } from "../infra/parsers/documentLoader.js";
import { extractNamedSection } from "../pipelines/markdownSections.js";
import { SectionExtractor } from "../pipelines/sectionExtractor.js";
import { validateBatchId, validateInteger, validateString } from "../utils/validation.js";

export type BatchSort = "date" | "count" | "genre";
export type StorySort = "title" | "created" | "updated" | "genre";

export interface BatchFilter {
  status?: string;
  genre?: string;
  sort?: BatchSort;
}

export interface StoryFilter {
  status?: string;
  genre?: string;
  sort?: StorySort;
}

export interface BatchReview {
  batch: BatchDocument;
  markdown: string;
}

export interface StoryReview {
  story: StoryDocument;
  markdown: string;
}

export class CatalogService {
  private readonly extractor = new SectionExtractor();

  constructor(private readonly repository: IdeaRepository) {}

  async listBatches(filter: BatchFilter = {}): Promise<BatchDocument[]> {
    const batches = (await this.repository.listBatches()).filter(
      (batch) =>
        matchesStatus(batch.status, filter.status) && matchesGenre(batch.genre, filter.genre),
    );

    switch (filter.sort ?? "date") {
      case "count":
        return sortBy(batches, (batch) => batch.count, "desc");
      case "genre":
        return sortBy(batches, (batch) => formatList(batch.genre), "asc");
      default:
        return sortBy(batches, (batch) => batch.dateGenerated ?? "", "desc");
    }
  }

  async listStories(filter: StoryFilter = {}): Promise<StoryDocument[]> {
    const stories = (await this.repository.listStories()).filter(
      (story) =>
        matchesStatus(story.status, filter.status) && matchesGenre(story.genre, filter.genre),
    );

    switch (filter.sort ?? "updated") {
      case "title":
        return sortBy(stories, (story) => story.title ?? story.name, "asc");
      case "created":
        return sortBy(stories, (story) => story.dateCreated ?? "", "desc");
      case "genre":
        return sortBy(stories, (story) => formatList(story.genre), "asc");
      default:
        return sortBy(stories, (story) => story.dateUpdated ?? "", "desc");
    }
  }

  async getBatch(batchId: string): Promise<BatchDocument> {
    const id = validateBatchId(batchId);
    const batch = await this.repository.getBatch(id);
    if (!batch) {
      throw new BatchNotFoundError(id);
    }
    return batch;
  }

  async getStory(name: string): Promise<StoryDocument> {
    const storyName = validateString(name, "story name", { maxLength: 200 });
    const story = await this.repository.findStory(storyName);
    if (!story) {
      throw new StoryNotFoundError(storyName);
    }
    return story;
  }

  /** Batch body, or only the numbered concept when one is requested. */
  async reviewBatch(batchId: string, options: { concept?: number } = {}): Promise<BatchReview> {
    const batch = await this.getBatch(batchId);
    if (options.concept === undefined) {
      return { batch, markdown: batch.content.trim() };
    }

    const conceptNumber = validateInteger(options.concept, "concept number", { min: 1 });
    const concept = this.extractor.findSection(batch.content, String(conceptNumber));
    if (!concept) {
      throw new ConceptNotFoundError(batch.batchId, conceptNumber, batch.concepts.length);
    }

    return {
      batch,
      markdown: `${this.extractor.renderHeading(concept)}\n${concept.body}`.trim(),
    };
  }

  async reviewStory(name: string, options: { section?: string } = {}): Promise<StoryReview> {
    const story = await this.getStory(name);
    const markdown = story.content.trim();
    if (!options.section) {
      return { story, markdown };
    }

    const section = extractNamedSection(markdown, options.section);
    if (section === null) {
      throw new ResourceError(`Section '${options.section}' not found in story '${story.name}'.`);
    }
    return { story, markdown: section };
  }
}

function matchesStatus(status: string | null, wanted: string | undefined): boolean {
  return !wanted || status === wanted;
}

function matchesGenre(genre: string | string[] | null, wanted: string | undefined): boolean {
  return !wanted || formatList(genre).toLowerCase().includes(wanted.toLowerCase());
}

function sortBy<T>(
  items: T[],
  key: (item: T) => string | number,
  direction: "asc" | "desc",
): T[] {
  const sign = direction === "asc" ? 1 : -1;
  return [...items].sort((a, b) => {
    const left = key(a);
    const right = key(b);
    if (typeof left === "number" && typeof right === "number") {
      return sign * (left - right);
    }
    return sign * String(left).localeCompare(String(right));
  });
}
