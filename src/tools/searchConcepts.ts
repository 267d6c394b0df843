import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { SearchService } from "../services/searchService.js";
import { runTool } from "./toolResult.js";

export function registerSearchConceptsTool(server: McpServer, search: SearchService) {
  server.registerTool(
    "search_concepts",
    {
      title: "Search Concepts",
      description: "Searches concepts and stories by substring or fuzzy similarity.",
      inputSchema: {
        query: z.string().describe("Search query"),
        genre: z.string().optional().describe("Genre filter (substring)"),
        trope: z.string().optional().describe("Trope filter (substring)"),
        status: z.string().optional().describe("Status filter (exact)"),
        fuzzy: z.boolean().optional().describe("Rank by similarity instead of substring"),
        limit: z.number().int().optional().describe("Max results (default 20)"),
      },
    },
    async ({ query, genre, trope, status, fuzzy, limit }) =>
      runTool("search_concepts", async () => {
        const hits = await search.search({ query, genre, trope, status, fuzzy, limit });
        return {
          query,
          count: hits.length,
          results: hits.map((hit) => ({
            type: hit.type,
            title: hit.title,
            batch_id: hit.batchId,
            genre: hit.genre,
            file: hit.file,
            score: hit.score === undefined ? undefined : Number(hit.score.toFixed(4)),
            preview: hit.preview,
          })),
        };
      }),
  );
}
