import { promises as fs } from "node:fs";
import path from "node:path";
import { describeError } from "../../domain/errors.js";
import type { IdeaRepository } from "../../domain/ideaRepository.js";
import {
  BATCH_LOCATIONS,
  type BatchDocument,
  type BatchLocation,
  type StoryDocument,
} from "../../domain/types.js";
import { createLogger } from "../../utils/logger.js";
import { loadBatchFile, loadStoryFile } from "../parsers/documentLoader.js";

const logger = createLogger("repository");

export function conceptsDir(root: string, location: BatchLocation): string {
  return path.join(root, "concepts", location);
}

export function storiesDir(root: string): string {
  return path.join(root, "stories");
}

/**
 * Reads batches and stories straight from the workspace on every call, so
 * edits made outside the tool are picked up immediately.
 */
export class FileSystemIdeaRepository implements IdeaRepository {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async listBatches(): Promise<BatchDocument[]> {
    const batches: BatchDocument[] = [];

    for (const location of BATCH_LOCATIONS) {
      for (const filePath of await listMarkdownFiles(conceptsDir(this.root, location))) {
        try {
          batches.push(await loadBatchFile(filePath, location));
        } catch (error) {
          logger.warn(`Error parsing ${filePath}: ${describeError(error)}`);
        }
      }
    }

    return batches;
  }

  async getBatch(batchId: string): Promise<BatchDocument | null> {
    const batches = await this.listBatches();
    return batches.find((batch) => batch.batchId === batchId) ?? null;
  }

  async listStories(): Promise<StoryDocument[]> {
    const stories: StoryDocument[] = [];

    for (const filePath of await listMarkdownFiles(storiesDir(this.root))) {
      try {
        stories.push(await loadStoryFile(filePath));
      } catch (error) {
        logger.warn(`Error parsing ${filePath}: ${describeError(error)}`);
      }
    }

    return stories;
  }

  async findStory(name: string): Promise<StoryDocument | null> {
    const dir = storiesDir(this.root);
    const candidates = [path.join(dir, `${name}.md`), path.join(dir, name)];

    for (const candidate of candidates) {
      if (!isInside(dir, candidate) || !(await isFile(candidate))) {
        continue;
      }
      return loadStoryFile(candidate);
    }
    return null;
  }
}

async function listMarkdownFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isFileMissing(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.toLowerCase().endsWith(".md"))
    .sort((a, b) => a.localeCompare(b))
    .map((entry) => path.join(dir, entry));
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (isFileMissing(error)) {
      return false;
    }
    throw error;
  }
}

function isInside(dir: string, candidate: string): boolean {
  const relative = path.relative(dir, candidate);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

export function isFileMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
