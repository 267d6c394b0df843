import { ValidationError } from "../domain/errors.js";
import { integerOption, numberOption } from "./args.js";
import type { Command } from "./context.js";
import { display, heading, percent } from "./format.js";

const PREVIEW_CHARS = 150;

const search: Command = {
  name: "search",
  usage: "search <query> [--genre <g>] [--trope <t>] [--status <s>] [--fuzzy] [--limit <n>]",
  summary: "Search through concepts and stories",
  options: [
    { name: "genre", short: "g", type: "string", description: "Filter by genre" },
    { name: "trope", short: "t", type: "string", description: "Filter by trope" },
    { name: "status", short: "s", type: "string", description: "Filter by status" },
    { name: "fuzzy", short: "f", type: "boolean", description: "Use fuzzy matching" },
    { name: "limit", short: "l", type: "string", description: "Max results to show (default 20)" },
  ],
  async run({ services, io }, args) {
    const query = args.positionals.join(" ");
    if (!query.trim()) {
      throw new ValidationError("Missing argument <query>");
    }

    const results = await services.search.search({
      query,
      genre: args.strings.get("genre"),
      trope: args.strings.get("trope"),
      status: args.strings.get("status"),
      fuzzy: args.flags.has("fuzzy"),
      limit: integerOption(args, "limit"),
    });
    if (results.length === 0) {
      io.out(`No results found for '${query}'`);
      return;
    }

    heading(`Search Results for: ${query}`).forEach((line) => io.out(line));
    results.forEach((result, index) => {
      io.out("");
      io.out(`${index + 1}. ${result.title}`);
      io.out(`   Type: ${result.type}`);
      io.out(`   Genre: ${display(result.genre)}`);
      io.out(`   File: ${result.file}`);
      if (result.score !== undefined) {
        io.out(`   Match: ${percent(result.score)}`);
      }
      const preview = result.preview.replace(/\s+/g, " ").trim();
      io.out(
        `   Preview: ${preview.length > PREVIEW_CHARS ? `${preview.slice(0, PREVIEW_CHARS)}...` : preview}`,
      );
    });
    io.out("");
    io.out(`Showing ${results.length} results`);
  },
};

const findSimilar: Command = {
  name: "find-similar",
  usage: "find-similar [--threshold <0-1>] [--titles]",
  summary: "Find near-duplicate concepts across batches",
  options: [
    { name: "threshold", short: "t", type: "string", description: "Similarity cut-off (default 0.8)" },
    { name: "titles", type: "boolean", description: "List concept titles used in more than one batch instead" },
  ],
  async run({ services, io }, args) {
    if (args.flags.has("titles")) {
      if (args.strings.has("threshold")) {
        throw new ValidationError("--threshold does not apply to --titles");
      }
      const duplicates = await services.similarity.findDuplicateTitles();
      if (duplicates.length === 0) {
        io.out("No duplicate titles found");
        return;
      }
      heading("Duplicate Titles").forEach((line) => io.out(line));
      for (const duplicate of duplicates) {
        io.out(`- ${duplicate.title}: ${duplicate.groups.join(", ")}`);
      }
      return;
    }

    const pairs = await services.similarity.findSimilarConcepts({
      threshold: numberOption(args, "threshold"),
    });
    if (pairs.length === 0) {
      io.out("No similar concepts found");
      return;
    }

    heading("Similar Concepts Found").forEach((line) => io.out(line));
    pairs.forEach(({ first, second, score }, index) => {
      io.out("");
      io.out(`${index + 1}. Similarity: ${percent(score)}`);
      io.out(`   A: ${first.title} (${first.group}, concept #${first.identifier})`);
      io.out(`   B: ${second.title} (${second.group}, concept #${second.identifier})`);
    });
  },
};

export const searchCommands: Command[] = [search, findSimilar];
