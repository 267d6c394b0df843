import path from "node:path";
import { ValidationError } from "../domain/errors.js";
import type { ParsedArgs } from "./args.js";
import { integerOption } from "./args.js";
import { requirePositional } from "./catalogCommands.js";
import type { CommandContext, Command } from "./context.js";

const newBatch: Command = {
  name: "new-batch",
  usage: "new-batch [--genre <g>] [--tropes <list>] [--model <m>] [--count <n>]",
  summary: "Create a new concept batch",
  options: [
    { name: "genre", short: "g", type: "string", description: "Story genre" },
    { name: "tropes", short: "t", type: "string", description: "Comma-separated tropes" },
    { name: "model", short: "m", type: "string", description: "Which model generated the concepts" },
    { name: "count", short: "c", type: "string", description: "Number of concepts (default 10)" },
  ],
  async run(context, args) {
    const genre = await requireValue(context, args, "genre", "Genre");
    const tropes = await requireValue(context, args, "tropes", "Tropes (comma-separated)");
    const model = await requireValue(context, args, "model", "LLM model used");
    const created = await context.services.creator.createBatch({
      genre,
      tropes,
      model,
      count: integerOption(args, "count"),
    });

    const { io } = context;
    io.out(`Created new batch: ${path.basename(created.filePath)}`);
    io.out("");
    io.out("Next steps:");
    io.out("1. Open the file and paste your generated concepts");
    io.out("2. Fill in the 'Initial Thoughts' for each concept");
    io.out("3. Mark your favorites");
    io.out("4. Run: idea-factory update-index");
    io.out("");
    io.out(`File: ${created.filePath}`);
  },
};

const newStory: Command = {
  name: "new-story",
  usage: "new-story [--title <t>] [--genre <g>] [--origin <batch_id>]",
  summary: "Create a new story development file",
  options: [
    { name: "title", short: "t", type: "string", description: "Working title" },
    { name: "genre", short: "g", type: "string", description: "Story genre" },
    { name: "origin", short: "o", type: "string", description: "Origin batch ID, if any" },
  ],
  async run(context, args) {
    const title = await requireValue(context, args, "title", "Story title");
    const genre = await requireValue(context, args, "genre", "Genre");
    const created = await context.services.creator.createStory({
      title,
      genre,
      origin: args.strings.get("origin"),
    });

    context.io.out(`Created new story: ${created.title}`);
    context.io.out("The development template is ready for you to fill in.");
    context.io.out("");
    context.io.out(`File: ${created.filePath}`);
  },
};

const developConcept: Command = {
  name: "develop-concept",
  usage: "develop-concept <batch_id> <concept_number> [--force]",
  summary: "Turn a concept into a story development file",
  options: [{ name: "force", type: "boolean", description: "Overwrite an existing story file" }],
  async run({ services, io }, args) {
    const batchId = requirePositional(args.positionals, 0, "batch_id");
    const rawNumber = requirePositional(args.positionals, 1, "concept_number");
    if (!/^\d+$/.test(rawNumber)) {
      throw new ValidationError(`concept_number must be a positive integer, got '${rawNumber}'`);
    }

    const developed = await services.stories.developConcept(batchId, Number(rawNumber), {
      overwrite: args.flags.has("force"),
    });
    io.out(`Created story development file: ${developed.storyName}.md`);
    io.out(`Title: ${developed.title}`);
    io.out("");
    io.out(`Next: idea-factory review-story ${developed.storyName}`);
    io.out(`File: ${developed.filePath}`);
  },
};

const note: Command = {
  name: "note",
  usage: "note <story_name> [text] [--section <name>]",
  summary: "Add a quick note to a story development file",
  options: [{ name: "section", short: "s", type: "string", description: "Add the note to this section" }],
  async run(context, args) {
    const storyName = requirePositional(args.positionals, 0, "story_name");
    let text = args.positionals.slice(1).join(" ");
    if (!text.trim()) {
      text = (await context.io.prompt("Note")) ?? "";
    }
    if (!text.trim()) {
      throw new ValidationError("note cannot be empty");
    }

    const section = args.strings.get("section");
    const added = await context.services.stories.addNote(storyName, text, { section });
    if (section && !added.sectionFound) {
      context.io.out(`Section '${section}' not found, added to Development Notes`);
    }
    context.io.out(`Note added to ${added.storyName}`);
  },
};

export const authoringCommands: Command[] = [newBatch, newStory, developConcept, note];

async function requireValue(
  { io }: CommandContext,
  args: ParsedArgs,
  name: string,
  question: string,
): Promise<string> {
  const given = args.strings.get(name);
  if (given !== undefined) {
    return given;
  }
  const answer = await io.prompt(question);
  if (answer === null) {
    throw new ValidationError(`--${name} is required`);
  }
  return answer;
}
