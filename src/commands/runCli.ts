import { IdeaFactoryError } from "../domain/errors.js";
import { createLogger } from "../utils/logger.js";
import { APP_NAME, APP_VERSION } from "../version.js";
import { parseCommandArgs } from "./args.js";
import { authoringCommands } from "./authoringCommands.js";
import { catalogCommands } from "./catalogCommands.js";
import type { Command, CommandContext } from "./context.js";
import { maintenanceCommands } from "./maintenanceCommands.js";
import { searchCommands } from "./searchCommands.js";

const logger = createLogger("cli");

export const COMMANDS: Command[] = [
  ...catalogCommands,
  ...searchCommands,
  ...authoringCommands,
  ...maintenanceCommands,
];

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], context: CommandContext): Promise<number> {
  const [name, ...rest] = argv;
  const { io } = context;

  if (name === undefined || name === "help" || name === "--help" || name === "-h") {
    helpText().forEach((line) => io.out(line));
    return 0;
  }
  if (name === "--version" || name === "-V") {
    io.out(`${APP_NAME} ${APP_VERSION}`);
    return 0;
  }

  const command = COMMANDS.find((candidate) => candidate.name === name);
  if (!command) {
    io.err(`Unknown command '${name}'. Run '${APP_NAME} --help' for the list of commands.`);
    return 2;
  }
  if (rest.includes("--help") || rest.includes("-h")) {
    commandHelp(command).forEach((line) => io.out(line));
    return 0;
  }

  try {
    logger.debug(`Running ${command.name} ${rest.join(" ")}`);
    await command.run(context, parseCommandArgs(rest, command.options));
    return 0;
  } catch (error) {
    if (error instanceof IdeaFactoryError) {
      logger.warn(`${command.name} failed: ${error.message}`);
      io.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

export function helpText(): string[] {
  const width = Math.max(...COMMANDS.map((command) => command.name.length));
  return [
    `${APP_NAME} ${APP_VERSION} - manage story concept batches and story development files`,
    "",
    "USAGE:",
    `  ${APP_NAME} <command> [options]`,
    "",
    "COMMANDS:",
    ...COMMANDS.map((command) => `  ${command.name.padEnd(width)}  ${command.summary}`),
    "",
    `Run '${APP_NAME} <command> --help' for the options of a command.`,
  ];
}

function commandHelp(command: Command): string[] {
  const lines = [`USAGE: ${APP_NAME} ${command.usage}`, "", command.summary];
  if (command.options.length > 0) {
    lines.push("", "OPTIONS:");
    for (const option of command.options) {
      const flag = option.short ? `-${option.short}, --${option.name}` : `    --${option.name}`;
      lines.push(`  ${flag.padEnd(20)}  ${option.description}`);
    }
  }
  return lines;
}
