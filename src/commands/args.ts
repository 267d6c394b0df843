import { ValidationError } from "../domain/errors.js";

export interface OptionSpec {
  name: string;
  short?: string;
  type: "string" | "boolean";
  description: string;
}

export interface ParsedArgs {
  positionals: string[];
  strings: Map<string, string>;
  flags: Set<string>;
}

/**
 * Accepts `--name value`, `--name=value`, `-n value` and boolean `--flag`.
 * `--` ends option parsing.
 */
export function parseCommandArgs(args: readonly string[], options: readonly OptionSpec[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], strings: new Map(), flags: new Set() };
  let optionsDone = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (optionsDone || arg === "-" || !arg.startsWith("-")) {
      parsed.positionals.push(arg);
      continue;
    }
    if (arg === "--") {
      optionsDone = true;
      continue;
    }

    const [key, inlineValue] = splitOption(arg);
    const matched = options.find((option) =>
      key.startsWith("--") ? option.name === key.slice(2) : option.short === key.slice(1),
    );
    if (!matched) {
      throw new ValidationError(`Unknown option ${key}`);
    }

    if (matched.type === "boolean") {
      if (inlineValue !== undefined) {
        throw new ValidationError(`Option --${matched.name} does not take a value`);
      }
      parsed.flags.add(matched.name);
      continue;
    }

    const value = inlineValue ?? args[i + 1];
    if (value === undefined) {
      throw new ValidationError(`Option --${matched.name} requires a value`);
    }
    if (inlineValue === undefined) {
      i += 1;
    }
    parsed.strings.set(matched.name, value);
  }

  return parsed;
}

export function integerOption(parsed: ParsedArgs, name: string): number | undefined {
  const raw = parsed.strings.get(name);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ValidationError(`--${name} must be an integer, got '${raw}'`);
  }
  return Number(raw);
}

export function numberOption(parsed: ParsedArgs, name: string): number | undefined {
  const raw = parsed.strings.get(name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!raw.trim() || !Number.isFinite(value)) {
    throw new ValidationError(`--${name} must be a number, got '${raw}'`);
  }
  return value;
}

export function choiceOption<T extends string>(
  parsed: ParsedArgs,
  name: string,
  choices: readonly T[],
): T | undefined {
  const raw = parsed.strings.get(name);
  if (raw === undefined) {
    return undefined;
  }
  const choice = choices.find((item) => item === raw);
  if (!choice) {
    throw new ValidationError(`--${name} must be one of ${choices.join(", ")}, got '${raw}'`);
  }
  return choice;
}

function splitOption(arg: string): [string, string | undefined] {
  const at = arg.indexOf("=");
  return at < 0 ? [arg, undefined] : [arg.slice(0, at), arg.slice(at + 1)];
}
