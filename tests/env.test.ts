import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      workspaceRoot: path.resolve(process.cwd()),
      logLevel: "info",
      logFile: null,
      fuzzyThreshold: 0.6,
      duplicateThreshold: 0.8,
      transport: "stdio",
      host: "127.0.0.1",
      port: 3000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      IDEA_FACTORY_ROOT: "/tmp/ideas",
      IDEA_FACTORY_LOG_LEVEL: "debug",
      IDEA_FACTORY_LOG_FILE: " logs/idea-factory.log ",
      FUZZY_THRESHOLD: "0.5",
      DUPLICATE_THRESHOLD: "0.9",
      MCP_TRANSPORT: "http",
      MCP_PORT: "8080",
    });

    expect(config.workspaceRoot).toBe(path.resolve("/tmp/ideas"));
    expect(config.logLevel).toBe("debug");
    expect(config.logFile).toBe("logs/idea-factory.log");
    expect(config.fuzzyThreshold).toBe(0.5);
    expect(config.duplicateThreshold).toBe(0.9);
    expect(config.transport).toBe("http");
    expect(config.port).toBe(8080);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ FUZZY_THRESHOLD: "1.5" })).toThrow();
    expect(() => loadConfig({ MCP_TRANSPORT: "ws" })).toThrow();
    expect(() => loadConfig({ MCP_PORT: "-1" })).toThrow();
  });
});
