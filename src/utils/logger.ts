import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggingOptions {
  level?: LogLevel;
  file?: string | null;
  console?: boolean;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const ROOT_NAME = "idea-factory";

interface LoggingState {
  level: LogLevel;
  file: string | null;
  console: boolean;
}

const state: LoggingState = {
  level: "info",
  file: null,
  console: true,
};

/**
 * Applies process-wide logging settings. Console output goes to stderr so it
 * never mixes with command output or the MCP stdio stream.
 */
export function configureLogging(options: LoggingOptions): void {
  state.level = options.level ?? state.level;
  state.console = options.console ?? state.console;
  state.file = options.file === undefined ? state.file : options.file;

  if (state.file) {
    try {
      mkdirSync(path.dirname(path.resolve(state.file)), { recursive: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const failedFile = state.file;
      state.file = null;
      createLogger("logging").warn(`Could not create log file ${failedFile}: ${reason}`);
    }
  }
}

export function getLogLevel(): LogLevel {
  return state.level;
}

export function createLogger(scope: string): Logger {
  const name = `${ROOT_NAME}.${scope}`;
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[state.level]) {
      return;
    }
    const line = formatLogLine(new Date(), name, level, message);
    if (state.console) {
      console.error(line);
    }
    if (state.file) {
      appendFileSync(state.file, `${line}\n`, "utf-8");
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export function formatLogLine(
  time: Date,
  name: string,
  level: LogLevel,
  message: string,
): string {
  return `${time.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
}
