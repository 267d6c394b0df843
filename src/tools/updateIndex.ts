import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { IndexService } from "../services/indexService.js";
import { runTool } from "./toolResult.js";

export function registerUpdateIndexTool(server: McpServer, index: IndexService) {
  server.registerTool(
    "update_index",
    {
      title: "Update Index",
      description: "Rebuilds INDEX.md from the current batches and stories.",
      inputSchema: {},
    },
    async () =>
      runTool("update_index", async () => {
        const updated = await index.updateIndex();
        return {
          file: updated.filePath,
          message: `INDEX.md updated (${updated.batchCount} batches, ${updated.storyCount} stories)`,
        };
      }),
  );
}
