import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { StoryService } from "../services/storyService.js";
import { runTool } from "./toolResult.js";

export function registerAddNoteTool(server: McpServer, stories: StoryService) {
  server.registerTool(
    "add_note",
    {
      title: "Add Note",
      description: "Adds a timestamped note to a story development file.",
      inputSchema: {
        story_name: z.string().describe("Story file name without .md"),
        note_text: z.string().describe("Note content"),
        section: z
          .string()
          .optional()
          .describe("Section heading to append to (default: Development Notes)"),
      },
    },
    async ({ story_name, note_text, section }) =>
      runTool("add_note", async () => {
        const added = await stories.addNote(story_name, note_text, { section });
        return {
          message: `Note added to ${added.storyName}`,
          note: added.note,
          section_found: added.sectionFound,
        };
      }),
  );
}
