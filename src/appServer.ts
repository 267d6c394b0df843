import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { IdeaServices } from "./services/createServices.js";
import { registerAddNoteTool } from "./tools/addNote.js";
import { registerCreateBatchTool } from "./tools/createBatch.js";
import { registerCreateStoryTool } from "./tools/createStory.js";
import { registerDevelopConceptTool } from "./tools/developConcept.js";
import { registerExportDataTool } from "./tools/exportData.js";
import { registerFindSimilarTool } from "./tools/findSimilar.js";
import { registerPrompts } from "./tools/prompts.js";
import { registerResources } from "./tools/resources.js";
import { registerSearchConceptsTool } from "./tools/searchConcepts.js";
import { registerUpdateIndexTool } from "./tools/updateIndex.js";
import { APP_NAME, APP_VERSION } from "./version.js";

export function createAppServer(services: IdeaServices): McpServer {
  const server = new McpServer({
    name: APP_NAME,
    version: APP_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${APP_NAME} is running at ${services.root}. hello ${who}`,
          },
        ],
      };
    },
  );

  registerCreateBatchTool(server, services.creator);
  registerCreateStoryTool(server, services.creator);
  registerDevelopConceptTool(server, services.stories);
  registerAddNoteTool(server, services.stories);
  registerSearchConceptsTool(server, services.search);
  registerFindSimilarTool(server, services.similarity);
  registerUpdateIndexTool(server, services.index);
  registerExportDataTool(server, services.exporter);
  registerResources(server, services);
  registerPrompts(server);

  return server;
}
