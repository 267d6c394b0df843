#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { runCli } from "./commands/runCli.js";
import type { CliIo } from "./commands/context.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createServices } from "./services/createServices.js";
import { configureLogging } from "./utils/logger.js";

const terminalIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  async prompt(question) {
    if (!process.stdin.isTTY) {
      return null;
    }
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(`${question}: `);
    } finally {
      rl.close();
    }
  },
};

async function main() {
  const config = loadConfig();
  // Log to the console only when debugging; stdout carries command output.
  configureLogging({
    level: config.logLevel,
    file: config.logFile,
    console: config.logLevel === "debug",
  });

  const services = createServices(config);
  process.exitCode = await runCli(process.argv.slice(2), { services, io: terminalIo });
}

main().catch((error) => {
  console.error(`Unexpected error: ${describeError(error)}`);
  process.exit(1);
});
