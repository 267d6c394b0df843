import { promises as fs } from "node:fs";
import path from "node:path";
import matter from "gray-matter";
import { CORE_SCHEMA, dump, load } from "js-yaml";
import {
  FileReadError,
  InvalidFrontmatterError,
  MissingMetadataError,
} from "../../domain/errors.js";
import type {
  BatchDocument,
  BatchLocation,
  FrontmatterData,
  StoryDocument,
} from "../../domain/types.js";
import { SectionExtractor } from "../../pipelines/sectionExtractor.js";

export interface FrontmatterDocument {
  data: FrontmatterData;
  content: string;
}

// Core schema keeps `2025-01-01` a plain string instead of a Date.
const yamlEngine = {
  parse: (input: string): object => {
    const parsed = load(input, { schema: CORE_SCHEMA });
    return isRecord(parsed) ? parsed : {};
  },
  stringify: (data: object): string =>
    dump(data, { schema: CORE_SCHEMA, lineWidth: -1, noRefs: true }),
};

const MATTER_OPTIONS = { engines: { yaml: yamlEngine } };

const conceptExtractor = new SectionExtractor();

export async function loadMarkdownFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileReadError(filePath, error instanceof Error ? error.message : String(error));
  }
}

export function parseFrontmatterDocument(raw: string, filePath: string): FrontmatterDocument {
  try {
    const parsed = matter(raw, MATTER_OPTIONS);
    const data: FrontmatterData = isRecord(parsed.data) ? { ...parsed.data } : {};
    return { data, content: parsed.content };
  } catch (error) {
    throw new InvalidFrontmatterError(
      filePath,
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function stringifyFrontmatterDocument(content: string, data: FrontmatterData): string {
  return matter.stringify(content, data, MATTER_OPTIONS);
}

export function toBatchDocument(
  document: FrontmatterDocument,
  filePath: string,
  location: BatchLocation,
): BatchDocument {
  const { data, content } = document;
  const batchId = readString(data, "batch_id");
  if (!batchId) {
    throw new MissingMetadataError(filePath, "batch_id");
  }

  return {
    batchId,
    dateGenerated: readString(data, "date_generated"),
    genre: readStringList(data, "genre"),
    tropes: readStringList(data, "tropes"),
    count: readNumber(data, "count"),
    status: readString(data, "status"),
    llmModel: readString(data, "llm_model"),
    promptUsed: readString(data, "prompt_used"),
    notes: readString(data, "notes"),
    location,
    filePath,
    content,
    concepts: conceptExtractor.extract(content),
    frontmatter: data,
  };
}

export function toStoryDocument(document: FrontmatterDocument, filePath: string): StoryDocument {
  const { data, content } = document;
  return {
    name: path.basename(filePath, path.extname(filePath)),
    storyId: readString(data, "story_id"),
    title: readString(data, "title"),
    genre: readStringList(data, "genre"),
    subgenre: readString(data, "subgenre"),
    tropes: readStringList(data, "tropes"),
    status: readString(data, "status"),
    originBatch: readString(data, "origin_batch"),
    dateCreated: readString(data, "date_created"),
    dateUpdated: readString(data, "date_updated"),
    targetLength: readString(data, "target_length"),
    filePath,
    content,
    frontmatter: data,
  };
}

export async function loadBatchFile(
  filePath: string,
  location: BatchLocation,
): Promise<BatchDocument> {
  const raw = await loadMarkdownFile(filePath);
  return toBatchDocument(parseFrontmatterDocument(raw, filePath), filePath, location);
}

export async function loadStoryFile(filePath: string): Promise<StoryDocument> {
  const raw = await loadMarkdownFile(filePath);
  return toStoryDocument(parseFrontmatterDocument(raw, filePath), filePath);
}

/** Renders a genre or trope field the way listings and CSV show it. */
export function formatList(value: string | string[] | null): string {
  if (value === null) {
    return "";
  }
  return Array.isArray(value) ? value.join(", ") : value;
}

/** Splits a genre or trope field into individual entries. */
export function splitList(value: string | string[] | null): string[] {
  if (value === null) {
    return [];
  }
  const items = Array.isArray(value) ? value : value.split(",");
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

function readString(data: FrontmatterData, key: string): string | null {
  const value = data[key];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

function readStringList(data: FrontmatterData, key: string): string | string[] | null {
  const value = data[key];
  if (Array.isArray(value)) {
    return value.map((item) => String(item));
  }
  return readString(data, key);
}

function readNumber(data: FrontmatterData, key: string): number {
  const value = data[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
