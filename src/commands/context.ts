import type { IdeaServices } from "../services/createServices.js";
import type { OptionSpec, ParsedArgs } from "./args.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  /** Asks for a missing value; null when no terminal is attached. */
  prompt(question: string): Promise<string | null>;
}

export interface CommandContext {
  services: IdeaServices;
  io: CliIo;
}

export interface Command {
  name: string;
  usage: string;
  summary: string;
  options: OptionSpec[];
  run(context: CommandContext, args: ParsedArgs): Promise<void>;
}
