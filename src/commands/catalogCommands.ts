import path from "node:path";
import { ValidationError } from "../domain/errors.js";
import type { BatchSort, StorySort } from "../services/catalogService.js";
import { choiceOption, integerOption } from "./args.js";
import type { Command } from "./context.js";
import { display, heading, renderTable } from "./format.js";

const BATCH_SORTS: readonly BatchSort[] = ["date", "count", "genre"];
const STORY_SORTS: readonly StorySort[] = ["title", "created", "updated", "genre"];

const listBatches: Command = {
  name: "list-batches",
  usage: "list-batches [--status <s>] [--genre <g>] [--sort date|count|genre]",
  summary: "List all concept batches",
  options: [
    { name: "status", short: "s", type: "string", description: "Filter by status" },
    { name: "genre", short: "g", type: "string", description: "Filter by genre" },
    { name: "sort", short: "S", type: "string", description: "date (default), count or genre" },
  ],
  async run({ services, io }, args) {
    const batches = await services.catalog.listBatches({
      status: args.strings.get("status"),
      genre: args.strings.get("genre"),
      sort: choiceOption(args, "sort", BATCH_SORTS),
    });
    if (batches.length === 0) {
      io.out("No batches found.");
      return;
    }

    const rows = batches.map((batch) => [
      batch.batchId,
      display(batch.dateGenerated),
      display(batch.genre),
      String(batch.count),
      display(batch.status),
      batch.location,
    ]);
    for (const line of renderTable(["Batch ID", "Date", "Genre", "Count", "Status", "Location"], rows)) {
      io.out(line);
    }
    io.out("");
    io.out(`Total: ${batches.length} batches`);
  },
};

const listStories: Command = {
  name: "list-stories",
  usage: "list-stories [--status <s>] [--genre <g>] [--sort title|created|updated|genre]",
  summary: "List all stories in development",
  options: [
    { name: "status", short: "s", type: "string", description: "Filter by status" },
    { name: "genre", short: "g", type: "string", description: "Filter by genre" },
    { name: "sort", short: "S", type: "string", description: "updated (default), title, created or genre" },
  ],
  async run({ services, io }, args) {
    const stories = await services.catalog.listStories({
      status: args.strings.get("status"),
      genre: args.strings.get("genre"),
      sort: choiceOption(args, "sort", STORY_SORTS),
    });
    if (stories.length === 0) {
      io.out("No stories found.");
      return;
    }

    const rows = stories.map((story) => [
      story.name,
      display(story.title),
      display(story.genre),
      display(story.status),
      display(story.dateCreated),
      display(story.dateUpdated),
    ]);
    for (const line of renderTable(["Story Name", "Title", "Genre", "Status", "Created", "Updated"], rows)) {
      io.out(line);
    }
    io.out("");
    io.out(`Total: ${stories.length} stories`);
    io.out("Use: idea-factory review-story <story-name>");
  },
};

const show: Command = {
  name: "show",
  usage: "show <batch_id>",
  summary: "Show the metadata of one batch",
  options: [],
  async run({ services, io }, args) {
    const batch = await services.catalog.getBatch(requirePositional(args.positionals, 0, "batch_id"));

    for (const line of heading(batch.batchId)) {
      io.out(line);
    }
    io.out(`Genre:  ${display(batch.genre)}`);
    io.out(`Date:   ${display(batch.dateGenerated)}`);
    io.out(`Status: ${display(batch.status)}`);
    io.out(`Count:  ${batch.count}`);
    io.out(`Tropes: ${display(batch.tropes)}`);
    io.out(`Model:  ${display(batch.llmModel)}`);
    if (batch.promptUsed) {
      io.out("");
      io.out("Prompt Used:");
      io.out(batch.promptUsed);
    }
    io.out("");
    io.out(`File: ${batch.filePath}`);
  },
};

const reviewBatch: Command = {
  name: "review-batch",
  usage: "review-batch <batch_id> [--concept <n>] [--no-metadata]",
  summary: "Print a batch, or one of its concepts, as markdown",
  options: [
    { name: "concept", short: "c", type: "string", description: "Show only this concept number" },
    { name: "no-metadata", type: "boolean", description: "Hide the batch info" },
  ],
  async run({ services, io }, args) {
    const review = await services.catalog.reviewBatch(
      requirePositional(args.positionals, 0, "batch_id"),
      { concept: integerOption(args, "concept") },
    );
    const { batch } = review;

    if (!args.flags.has("no-metadata")) {
      io.out(`Batch:    ${batch.batchId}`);
      io.out(`Genre:    ${display(batch.genre)}`);
      io.out(`Date:     ${display(batch.dateGenerated)}`);
      io.out(`Concepts: ${batch.count}`);
      io.out(`Tropes:   ${display(batch.tropes)}`);
      io.out("");
    }
    io.out(review.markdown);
    io.out("");
    io.out(`File: ${batch.filePath}`);
  },
};

const STORY_INFO_FIELDS = [
  ["title", "Title"],
  ["genre", "Genre"],
  ["status", "Status"],
  ["origin_batch", "Origin Batch"],
  ["date_created", "Date Created"],
  ["date_updated", "Date Updated"],
] as const;

const reviewStory: Command = {
  name: "review-story",
  usage: "review-story <name> [--section <name>] [--no-metadata]",
  summary: "Print a story, or one of its sections, as markdown",
  options: [
    { name: "section", short: "s", type: "string", description: "Show only this section, e.g. characters" },
    { name: "no-metadata", type: "boolean", description: "Hide the story info" },
  ],
  async run({ services, io }, args) {
    const review = await services.catalog.reviewStory(
      requirePositional(args.positionals, 0, "story name"),
      { section: args.strings.get("section") },
    );
    const { story } = review;

    if (!args.flags.has("no-metadata")) {
      const info = STORY_INFO_FIELDS.filter(([key]) => key in story.frontmatter).map(
        ([key, label]) => `${label}: ${displayUnknown(story.frontmatter[key])}`,
      );
      if (info.length > 0) {
        info.forEach((line) => io.out(line));
        io.out("");
      }
    }
    io.out(review.markdown);
    io.out("");
    io.out(`File: ${path.relative(services.root, story.filePath) || story.filePath}`);
  },
};

export const catalogCommands: Command[] = [listBatches, listStories, show, reviewBatch, reviewStory];

export function requirePositional(positionals: readonly string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || !value.trim()) {
    throw new ValidationError(`Missing argument <${name}>`);
  }
  return value;
}

function displayUnknown(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(", ");
  }
  return value === null || value === undefined ? "N/A" : String(value);
}
