import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SimilarityService } from "../services/similarityService.js";
import { runTool } from "./toolResult.js";

export interface FindSimilarArgs {
  text?: string;
  threshold?: number;
  limit?: number;
}

export function registerFindSimilarTool(server: McpServer, similarity: SimilarityService) {
  server.registerTool(
    "find_similar",
    {
      title: "Find Similar",
      description:
        "Finds near-duplicate concepts across batches, or concepts similar to a given text.",
      inputSchema: {
        text: z.string().optional().describe("Compare concepts against this text instead"),
        threshold: z.number().min(0).max(1).optional().describe("Similarity cut-off (0-1)"),
        limit: z.number().int().optional().describe("Max matches when text is given (default 10)"),
      },
    },
    findSimilarHandler(similarity),
  );
}

/** Near-duplicate scans stop once the request's signal is aborted. */
export function findSimilarHandler(similarity: SimilarityService) {
  return async (
    { text, threshold, limit }: FindSimilarArgs,
    extra: { signal: AbortSignal },
  ): Promise<CallToolResult> =>
    runTool("find_similar", async () => {
      if (text) {
        const matches = await similarity.findSimilarToText(text, { threshold, limit });
        return {
          count: matches.length,
          matches: matches.map(({ subject, score }) => ({
            batch_id: subject.group,
            concept_number: subject.identifier,
            title: subject.title,
            score: Number(score.toFixed(4)),
          })),
        };
      }

      const pairs = await similarity.findSimilarConcepts({ threshold, signal: extra.signal });
      return {
        count: pairs.length,
        pairs: pairs.map(({ first, second, score }) => ({
          first: { batch_id: first.group, concept_number: first.identifier, title: first.title },
          second: {
            batch_id: second.group,
            concept_number: second.identifier,
            title: second.title,
          },
          score: Number(score.toFixed(4)),
        })),
      };
    });
}
