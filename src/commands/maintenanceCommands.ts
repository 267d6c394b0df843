import { EXPORT_FORMATS, EXPORT_TYPES } from "../services/exportService.js";
import { choiceOption } from "./args.js";
import type { Command } from "./context.js";
import { display, heading } from "./format.js";

const TOP_SHOWN = 5;

const stats: Command = {
  name: "stats",
  usage: "stats [--detailed]",
  summary: "Display statistics",
  options: [{ name: "detailed", short: "d", type: "boolean", description: "Show recent activity too" }],
  async run({ services, io }, args) {
    const data = await services.stats.generate();
    const statusCount = (status: string) =>
      data.batchesByStatus.find((entry) => entry.name === status)?.count ?? 0;

    heading("Idea Factory").forEach((line) => io.out(line));
    io.out(`Batches: ${data.totalBatches}`);
    io.out(`    Generated: ${statusCount("generated")}`);
    io.out(`    Developing: ${statusCount("developing")}`);
    io.out(`    Favorites: ${statusCount("favorites")}`);
    io.out(`Concepts: ${data.totalConcepts}`);
    io.out(`Stories: ${data.totalStories}`);
    io.out(`    In Development: ${data.storiesInDevelopment}`);

    if (data.topGenres.length > 0) {
      io.out("");
      io.out("Top Genres");
      data.topGenres.slice(0, TOP_SHOWN).forEach((entry) => io.out(`  ${entry.name}: ${entry.count}`));
    }
    if (data.topTropes.length > 0) {
      io.out("");
      io.out("Top Tropes");
      data.topTropes.slice(0, TOP_SHOWN).forEach((entry) => io.out(`  ${entry.name}: ${entry.count}`));
    }
    if (args.flags.has("detailed") && data.recentBatches.length > 0) {
      io.out("");
      io.out("Recent Activity");
      for (const batch of data.recentBatches.slice(0, TOP_SHOWN)) {
        io.out(`  ${display(batch.dateGenerated)}: ${batch.batchId} (${display(batch.genre)})`);
      }
    }
  },
};

const updateIndex: Command = {
  name: "update-index",
  usage: "update-index",
  summary: "Rebuild INDEX.md",
  options: [],
  async run({ services, io }) {
    await services.index.updateIndex();
    io.out("INDEX.md updated successfully!");
  },
};

const exportData: Command = {
  name: "export",
  usage: "export [--format json|csv|yaml] [--output <file>] [--type batches|stories|all]",
  summary: "Export metadata to JSON, CSV or YAML",
  options: [
    { name: "format", short: "f", type: "string", description: "json (default), csv or yaml" },
    { name: "output", short: "o", type: "string", description: "Output file (default export-<type>.<format>)" },
    { name: "type", short: "t", type: "string", description: "all (default), batches or stories" },
  ],
  async run({ services, io }, args) {
    const format = choiceOption(args, "format", EXPORT_FORMATS) ?? "json";
    const type = choiceOption(args, "type", EXPORT_TYPES) ?? "all";
    const output = args.strings.get("output") ?? `export-${type}.${format}`;

    const result = await services.exporter.export({ type, format, outputPath: output });
    io.out(`Exported to: ${result.outputPath}`);
  },
};

export const maintenanceCommands: Command[] = [stats, updateIndex, exportData];
