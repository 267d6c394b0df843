import path from "node:path";
import type { IdeaRepository } from "../domain/ideaRepository.js";
import { BATCH_LOCATIONS, type BatchDocument, type StoryDocument } from "../domain/types.js";
import { formatList } from "../infra/parsers/documentLoader.js";
import { formatTimestamp, systemClock, type Clock } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import { writeMarkdownFile } from "./creatorService.js";

const logger = createLogger("index");

export const INDEX_FILE = "INDEX.md";

export interface IndexUpdate {
  filePath: string;
  batchCount: number;
  storyCount: number;
}

export class IndexService {
  constructor(
    private readonly root: string,
    private readonly repository: IdeaRepository,
    private readonly clock: Clock = systemClock,
  ) {}

  async updateIndex(): Promise<IndexUpdate> {
    const batches = await this.repository.listBatches();
    const stories = await this.repository.listStories();
    const filePath = path.join(this.root, INDEX_FILE);

    await writeMarkdownFile(filePath, this.render(batches, stories));
    logger.info(`Index rebuilt with ${batches.length} batches and ${stories.length} stories`);
    return { filePath, batchCount: batches.length, storyCount: stories.length };
  }

  render(batches: BatchDocument[], stories: StoryDocument[]): string {
    const totalConcepts = batches.reduce((sum, batch) => sum + batch.count, 0);
    const developing = stories.filter((story) => story.status === "developing").length;

    const lines = [
      "# Story Concepts Index",
      "",
      `This file tracks all story concepts in the database. Last updated: ${formatTimestamp(this.clock())}`,
      "",
      "## Statistics",
      `- Total Batches: ${batches.length}`,
      `- Total Concepts: ${totalConcepts}`,
      `- Stories in Development: ${developing}`,
      `- Total Stories: ${stories.length}`,
      "",
      "---",
      "",
      "## Concept Batches",
      "",
    ];

    for (const location of BATCH_LOCATIONS) {
      const inLocation = batches
        .filter((batch) => batch.location === location)
        .sort((a, b) => (b.dateGenerated ?? "").localeCompare(a.dateGenerated ?? ""));
      if (inLocation.length === 0) {
        continue;
      }

      lines.push(`### ${location.toUpperCase()}`, "");
      for (const batch of inLocation) {
        lines.push(
          `- **[${batch.batchId}]** ${formatList(batch.genre) || "N/A"} (${batch.count} concepts) - ${batch.dateGenerated ?? "N/A"} - \`${this.relative(batch.filePath)}\``,
        );
      }
      lines.push("");
    }

    lines.push("---", "", "## Stories in Development", "");

    const byCreated = [...stories].sort((a, b) =>
      (b.dateCreated ?? "").localeCompare(a.dateCreated ?? ""),
    );
    for (const story of byCreated) {
      lines.push(
        `- **${story.title ?? "Untitled"}** [${story.status ?? "N/A"}]`,
        `  - Genre: ${formatList(story.genre) || "N/A"}`,
        `  - Tropes: ${formatList(story.tropes)}`,
        `  - File: \`${this.relative(story.filePath)}\``,
        "",
      );
    }

    lines.push(
      "---",
      "",
      "## Manual Updates",
      "You can manually add notes and cross-references below this line.",
      "",
    );

    return `${lines.join("\n")}\n`;
  }

  private relative(filePath: string): string {
    const relative = path.relative(this.root, filePath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      return filePath;
    }
    return relative.split(path.sep).join("/");
  }
}
