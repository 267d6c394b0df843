import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CreatorService } from "../services/creatorService.js";
import { runTool } from "./toolResult.js";

export function registerCreateStoryTool(server: McpServer, creator: CreatorService) {
  server.registerTool(
    "create_story",
    {
      title: "Create Story",
      description: "Creates a new story development file from the story template.",
      inputSchema: {
        title: z.string().describe("Story title"),
        genre: z.string().describe("Story genre"),
        origin: z.string().optional().describe("Batch ID the story came from"),
      },
    },
    async ({ title, genre, origin }) =>
      runTool("create_story", async () => {
        const created = await creator.createStory({ title, genre, origin });
        return {
          story_name: created.storyName,
          story_id: created.storyId,
          story_file: created.filePath,
          message: `Created story development file: ${created.storyName}.md`,
        };
      }),
  );
}
