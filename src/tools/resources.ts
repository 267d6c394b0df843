import { promises as fs } from "node:fs";
import path from "node:path";
import { type McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { ResourceError, ValidationError } from "../domain/errors.js";
import { isFileMissing } from "../infra/store/fileSystemIdeaRepository.js";
import type { IdeaServices } from "../services/createServices.js";
import { INDEX_FILE } from "../services/indexService.js";
import { jsonText } from "./toolResult.js";

export const RESOURCE_SCHEME = "idea-factory";

export function registerResources(server: McpServer, services: IdeaServices) {
  server.registerResource(
    "batches",
    `${RESOURCE_SCHEME}://batches/list`,
    {
      title: "Concept Batches",
      description: "All concept batches with their metadata.",
      mimeType: "application/json",
    },
    async (uri) => {
      const batches = await services.catalog.listBatches();
      return jsonContents(uri, {
        total: batches.length,
        batches: batches.map((batch) => ({
          batch_id: batch.batchId,
          date: batch.dateGenerated,
          genre: batch.genre,
          tropes: batch.tropes,
          count: batch.count,
          status: batch.status,
          location: batch.location,
        })),
      });
    },
  );

  server.registerResource(
    "batch",
    new ResourceTemplate(`${RESOURCE_SCHEME}://batch/{batch_id}`, { list: undefined }),
    {
      title: "Concept Batch",
      description: "One batch with all of its concepts.",
      mimeType: "application/json",
    },
    async (uri, variables) =>
      readOrReport(uri, async () => {
        const batch = await services.catalog.getBatch(firstValue(variables.batch_id));
        return jsonContents(uri, {
          batch_id: batch.batchId,
          date_generated: batch.dateGenerated,
          genre: batch.genre,
          tropes: batch.tropes,
          count: batch.count,
          status: batch.status,
          llm_model: batch.llmModel,
          prompt_used: batch.promptUsed,
          concepts: batch.concepts.map((concept) => ({
            number: concept.identifier,
            title: concept.title,
            content: concept.body,
          })),
        });
      }),
  );

  server.registerResource(
    "stories",
    `${RESOURCE_SCHEME}://stories/list`,
    {
      title: "Stories",
      description: "All story development files with their metadata.",
      mimeType: "application/json",
    },
    async (uri) => {
      const stories = await services.catalog.listStories();
      return jsonContents(uri, {
        total: stories.length,
        stories: stories.map((story) => ({
          name: story.name,
          story_id: story.storyId,
          title: story.title,
          genre: story.genre,
          status: story.status,
          origin_batch: story.originBatch,
          date_created: story.dateCreated,
          date_updated: story.dateUpdated,
          file_path: story.filePath,
        })),
      });
    },
  );

  server.registerResource(
    "story",
    new ResourceTemplate(`${RESOURCE_SCHEME}://story/{story_name}`, { list: undefined }),
    {
      title: "Story",
      description: "The raw markdown of one story development file.",
      mimeType: "text/markdown",
    },
    async (uri, variables) =>
      readOrReport(uri, async () => {
        const story = await services.catalog.getStory(firstValue(variables.story_name));
        const raw = await fs.readFile(story.filePath, "utf-8");
        return { contents: [{ uri: uri.href, mimeType: "text/markdown", text: raw }] };
      }),
  );

  server.registerResource(
    "stats",
    `${RESOURCE_SCHEME}://stats`,
    {
      title: "Statistics",
      description: "Totals and the most common genres and tropes.",
      mimeType: "application/json",
    },
    async (uri) => {
      const stats = await services.stats.generate();
      return jsonContents(uri, {
        total_batches: stats.totalBatches,
        total_concepts: stats.totalConcepts,
        total_stories: stats.totalStories,
        stories_in_development: stats.storiesInDevelopment,
        batches_by_status: Object.fromEntries(
          stats.batchesByStatus.map((entry) => [entry.name, entry.count]),
        ),
        top_genres: stats.topGenres.map((entry) => [entry.name, entry.count]),
        top_tropes: stats.topTropes.map((entry) => [entry.name, entry.count]),
      });
    },
  );

  server.registerResource(
    "index",
    `${RESOURCE_SCHEME}://index`,
    {
      title: "Index",
      description: "The generated INDEX.md overview.",
      mimeType: "text/markdown",
    },
    async (uri) => {
      let text: string;
      try {
        text = await fs.readFile(path.join(services.root, INDEX_FILE), "utf-8");
      } catch (error) {
        if (!isFileMissing(error)) {
          throw error;
        }
        text = "Index file not found. Run update_index tool to create it.";
      }
      return { contents: [{ uri: uri.href, mimeType: "text/markdown", text }] };
    },
  );
}

function jsonContents(uri: URL, payload: unknown): ReadResourceResult {
  return { contents: [{ uri: uri.href, mimeType: "application/json", text: jsonText(payload) }] };
}

// Lookup failures are reported in the resource body; anything else propagates.
async function readOrReport(
  uri: URL,
  read: () => Promise<ReadResourceResult>,
): Promise<ReadResourceResult> {
  try {
    return await read();
  } catch (error) {
    if (error instanceof ResourceError || error instanceof ValidationError) {
      return jsonContents(uri, { error: error.message });
    }
    throw error;
  }
}

function firstValue(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? (value[0] ?? "") : (value ?? "");
  return decodeURIComponent(raw);
}
