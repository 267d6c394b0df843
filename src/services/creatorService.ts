import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CreationError, FileWriteError, TemplateNotFoundError } from "../domain/errors.js";
import { loadMarkdownFile } from "../infra/parsers/documentLoader.js";
import { conceptsDir, isFileMissing, storiesDir } from "../infra/store/fileSystemIdeaRepository.js";
import {
  formatCompactDate,
  formatDate,
  systemClock,
  unixSeconds,
  type Clock,
} from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import { validateBatchId, validateInteger, validateString } from "../utils/validation.js";

const logger = createLogger("creator");

export const BATCH_TEMPLATE = "concept-batch.md";
export const STORY_TEMPLATE = "story-development.md";

// Resolves to <repo>/templates from both src/services and dist/services.
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

export interface CreateBatchInput {
  genre: string;
  tropes: string;
  model: string;
  count?: number;
}

export interface CreateStoryInput {
  title: string;
  genre: string;
  origin?: string;
}

export interface CreatedBatch {
  batchId: string;
  filePath: string;
}

export interface CreatedStory {
  storyName: string;
  storyId: string;
  title: string;
  filePath: string;
}

export interface StoryTemplateValues {
  storyId: string;
  title: string;
  genre: string;
  origin: string;
}

export interface CreatorServiceOptions {
  clock?: Clock;
  bundledTemplatesDir?: string;
}

export class CreatorService {
  readonly clock: Clock;

  private readonly bundledTemplatesDir: string;

  constructor(
    private readonly root: string,
    options: CreatorServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.bundledTemplatesDir = options.bundledTemplatesDir ?? BUNDLED_TEMPLATES_DIR;
  }

  /** Writes `concepts/generated/<YYYYMMDD-NNN>.md` using the first free number for today. */
  async createBatch(input: CreateBatchInput): Promise<CreatedBatch> {
    const genre = validateString(input.genre, "genre", { maxLength: 100 });
    const tropes = validateString(input.tropes, "tropes", { maxLength: 500 });
    const model = validateString(input.model, "model", { maxLength: 100 });
    const count = validateInteger(input.count ?? 10, "count", { min: 1, max: 100 });

    const now = this.clock();
    const dir = conceptsDir(this.root, "generated");
    const batchId = await nextBatchId(dir, formatCompactDate(now));
    const filePath = path.join(dir, `${batchId}.md`);

    const content = replaceAll(await this.readTemplate(BATCH_TEMPLATE), [
      ["YYYYMMDD-001", batchId],
      ["YYYY-MM-DD", formatDate(now)],
      ["[genre]", genre],
      ["[trope1, trope2, trope3]", tropes],
      ["count: 10", `count: ${count}`],
      ['"model used"', `"${model}"`],
    ]);

    await writeMarkdownFile(filePath, content);
    logger.info(`Created batch ${batchId} at ${filePath}`);
    return { batchId, filePath };
  }

  /** Writes `stories/<slug>.md`, adding a `-YYYYMMDD` suffix when the slug is taken. */
  async createStory(input: CreateStoryInput): Promise<CreatedStory> {
    const title = validateString(input.title, "title", { maxLength: 200 });
    const genre = validateString(input.genre, "genre", { maxLength: 100 });
    const origin = input.origin ? validateBatchId(input.origin) : "none";

    const slug = requireSlug(title);
    const now = this.clock();
    const dir = storiesDir(this.root);

    let storyName = slug;
    if (await pathExists(path.join(dir, `${storyName}.md`))) {
      storyName = `${slug}-${formatCompactDate(now)}`;
    }
    const filePath = path.join(dir, `${storyName}.md`);
    const storyId = this.storyIdFor(slug);

    const content = await this.renderStoryTemplate({ storyId, title, genre, origin });
    await writeMarkdownFile(filePath, content);
    logger.info(`Created story ${storyName} at ${filePath}`);
    return { storyName, storyId, title, filePath };
  }

  storyIdFor(slug: string): string {
    return `${slug}-${unixSeconds(this.clock())}`;
  }

  async renderStoryTemplate(values: StoryTemplateValues): Promise<string> {
    return replaceAll(await this.readTemplate(STORY_TEMPLATE), [
      ["[unique-id]", values.storyId],
      ["[Working Title]", values.title],
      ["[Story Title]", values.title],
      ["[genre]", values.genre],
      ["[batch_id if from generated concepts]", values.origin],
      ["YYYY-MM-DD", formatDate(this.clock())],
    ]);
  }

  /** Workspace templates win over the bundled copies. */
  async readTemplate(name: string): Promise<string> {
    const workspaceDir = path.join(this.root, "templates");
    for (const dir of [workspaceDir, this.bundledTemplatesDir]) {
      const candidate = path.join(dir, name);
      if (await pathExists(candidate)) {
        return loadMarkdownFile(candidate);
      }
    }
    throw new TemplateNotFoundError(name, workspaceDir);
  }
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replaceAll(" ", "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function requireSlug(title: string): string {
  const slug = slugify(title);
  if (!slug) {
    throw new CreationError("story", `title '${title}' has no letters or digits to build a file name from`);
  }
  return slug;
}

export async function writeMarkdownFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new FileWriteError(filePath, error instanceof Error ? error.message : String(error));
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isFileMissing(error)) {
      return false;
    }
    throw error;
  }
}

async function nextBatchId(dir: string, day: string): Promise<string> {
  for (let number = 1; number <= 999; number += 1) {
    const batchId = `${day}-${String(number).padStart(3, "0")}`;
    if (!(await pathExists(path.join(dir, `${batchId}.md`)))) {
      return batchId;
    }
  }
  throw new CreationError("batch", `all 999 batch numbers for ${day} are taken`);
}

function replaceAll(template: string, pairs: Array<[string, string]>): string {
  return pairs.reduce(
    (text, [placeholder, value]) => text.replaceAll(placeholder, () => value),
    template,
  );
}
