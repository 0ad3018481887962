#!/usr/bin/env node
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  type Logger,
  prefixedLogger,
} from "@relayline/engine";
import { type CliCommand, HELP, parseArgs, type Verbosity } from "./args.js";

const VERSION = "0.1.0";

function createLogger(verbosity: Verbosity): Logger {
  const level =
    verbosity === "verbose" ? "debug" : verbosity === "quiet" ? "warn" : "info";
  return prefixedLogger("relayline", filteredLogger(level, basicLogger()));
}

function readCommand(): CliCommand {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    console.error(err.message);
    console.log(HELP);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const command = readCommand();

  if (command.kind === "help") {
    console.log(HELP);
    return;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return;
  }

  const { config } = command;
  const logger = createLogger(command.verbosity);
  const server = createNodeServer({ config, logger });
  const port = await server.start();

  console.log(`\n  relayline listening on http://${config.host}:${port}\n`);
  for (const route of config.routes) {
    const target =
      route.kind === "proxy"
        ? `${route.tls ? "https" : "http"}://${route.targetHost}:${route.targetPort}`
        : route.root;
    console.log(`  ${route.prefix.padEnd(16)} -> ${target}`);
  }
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
