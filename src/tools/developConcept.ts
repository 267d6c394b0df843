import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { StoryService } from "../services/storyService.js";
import { runTool } from "./toolResult.js";

export function registerDevelopConceptTool(server: McpServer, stories: StoryService) {
  server.registerTool(
    "develop_concept",
    {
      title: "Develop Concept",
      description:
        "Turns one concept of a batch into a story development file seeded with its pitch, synopsis and key elements.",
      inputSchema: {
        batch_id: z.string().describe("Batch ID, e.g. 20250101-001"),
        concept_number: z.number().int().min(1).describe("Concept number within the batch"),
        overwrite: z.boolean().optional().describe("Replace an existing story file"),
      },
    },
    async ({ batch_id, concept_number, overwrite }) =>
      runTool("develop_concept", async () => {
        const developed = await stories.developConcept(batch_id, concept_number, { overwrite });
        return {
          story_file: developed.filePath,
          story_name: developed.storyName,
          title: developed.title,
          message: `Created story development file: ${developed.storyName}.md`,
        };
      }),
  );
}
