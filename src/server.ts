import "dotenv/config";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { MCP_PATH, runHttpServer } from "./httpServer.js";
import { createServices } from "./services/createServices.js";
import { configureLogging, createLogger } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, file: config.logFile, console: true });

  const services = createServices(config);
  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config.host, config.port, () =>
      createAppServer(services),
    );
    shutdownTasks.push(stopHttpServer);
    logger.info(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    const server = createAppServer(services);
    await runStdioServer(server);
    shutdownTasks.push(() => server.close());
    logger.info(`MCP stdio server ready for workspace ${config.workspaceRoot}`);
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch(exitWithError);
  });
  process.on("SIGTERM", () => {
    shutdown().catch(exitWithError);
  });
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

function exitWithError(error: unknown) {
  logger.error(`MCP server failed: ${describeError(error)}`);
  process.exit(1);
}

main().catch(exitWithError);
