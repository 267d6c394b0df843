import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { EXPORT_FORMATS, EXPORT_TYPES, type ExportService } from "../services/exportService.js";
import { runTool } from "./toolResult.js";

export function registerExportDataTool(server: McpServer, exporter: ExportService) {
  server.registerTool(
    "export_data",
    {
      title: "Export Data",
      description: "Exports batch and story metadata to JSON, CSV or YAML.",
      inputSchema: {
        output_path: z.string().describe("File to write"),
        type: z.enum(EXPORT_TYPES).optional().describe("batches, stories or all (default)"),
        format: z.enum(EXPORT_FORMATS).optional().describe("json (default), csv or yaml"),
      },
    },
    async ({ output_path, type, format }) =>
      runTool("export_data", async () => {
        const exported = await exporter.export({ outputPath: output_path, type, format });
        return {
          file: exported.outputPath,
          batch_count: exported.batchCount,
          story_count: exported.storyCount,
        };
      }),
  );
}
