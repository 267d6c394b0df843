import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CreatorService } from "../services/creatorService.js";
import { runTool } from "./toolResult.js";

export function registerCreateBatchTool(server: McpServer, creator: CreatorService) {
  server.registerTool(
    "create_batch",
    {
      title: "Create Batch",
      description: "Creates a new concept batch file from the batch template.",
      inputSchema: {
        genre: z.string().describe("Story genre, e.g. Romantasy"),
        tropes: z.string().describe("Comma-separated tropes"),
        model: z.string().describe("Model used to generate the concepts"),
        count: z.number().int().optional().describe("Number of concepts (default 10)"),
      },
    },
    async ({ genre, tropes, model, count }) =>
      runTool("create_batch", async () => {
        const created = await creator.createBatch({ genre, tropes, model, count });
        return {
          batch_id: created.batchId,
          file: created.filePath,
          message: `Created batch file: ${created.batchId}.md`,
        };
      }),
  );
}
