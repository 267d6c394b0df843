import path from "node:path";
import { z } from "zod";
import type { LogLevel } from "../utils/logger.js";
import {
  DEFAULT_DUPLICATE_THRESHOLD,
  DEFAULT_FUZZY_THRESHOLD,
} from "../pipelines/matchEngine.js";

const envSchema = z.object({
  IDEA_FACTORY_ROOT: z.string().optional(),
  IDEA_FACTORY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  IDEA_FACTORY_LOG_FILE: z.string().optional(),
  FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_FUZZY_THRESHOLD),
  DUPLICATE_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_DUPLICATE_THRESHOLD),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("127.0.0.1"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig {
  workspaceRoot: string;
  logLevel: LogLevel;
  logFile: string | null;
  fuzzyThreshold: number;
  duplicateThreshold: number;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const root = parsed.IDEA_FACTORY_ROOT?.trim();

  return {
    workspaceRoot: path.resolve(root || process.cwd()),
    logLevel: parsed.IDEA_FACTORY_LOG_LEVEL,
    logFile: parsed.IDEA_FACTORY_LOG_FILE?.trim() || null,
    fuzzyThreshold: parsed.FUZZY_THRESHOLD,
    duplicateThreshold: parsed.DUPLICATE_THRESHOLD,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
