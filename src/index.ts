#!/usr/bin/env node

// Load .env before configuration is read (quiet mode to suppress verbose output)
import { config as loadEnv } from "dotenv";
loadEnv({ quiet: true });

import { readFileSync } from "node:fs";
import chalk from "chalk";
import { ConfigError, loadConfig } from "./config.js";
import { getLogFilePath, initializeDebugConfig, initLogger, log } from "./logger.js";
import { createProxyServer } from "./proxy-server.js";

const args = process.argv.slice(2);

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

function printHelp(): void {
  console.log(`
${chalk.bold("eventstream-proxy")} - serve Amazon Q event streams as Claude SSE

Usage: eventstream-proxy [options]

Options:
  --port <n>     Listen port (default: 8787, env EVENTSTREAM_PORT)
  --debug        Write debug logs to ./logs (env EVENTSTREAM_DEBUG)
  --version      Print version
  --help         Show this help

Environment:
  AMAZONQ_ACCESS_TOKEN        Bearer token for the Amazon Q API
  AMAZONQ_ENDPOINT            Streaming endpoint URL
  AMAZONQ_MODEL               Model name reported to clients
  EVENTSTREAM_HOST            Listen address (default: 127.0.0.1)
  EVENTSTREAM_MAX_FRAME_SIZE  Largest accepted frame in bytes
  EVENTSTREAM_LOG_LEVEL       debug | info | minimal
`);
}

async function main(): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    return;
  }
  if (args.includes("--version") || args.includes("-v")) {
    console.log(readVersion());
    return;
  }

  const config = loadConfig(process.env, args);
  initializeDebugConfig(config.debug);
  initLogger(config.debug, config.logLevel);

  if (!config.accessToken) {
    console.warn(chalk.yellow("[eventstream-proxy] AMAZONQ_ACCESS_TOKEN is not set; /v1/messages will return 401"));
  }

  const proxy = await createProxyServer(config);

  console.log(chalk.green(`[eventstream-proxy] Listening on ${proxy.url}`));
  console.log(chalk.gray(`  model:    ${config.model}`));
  console.log(chalk.gray(`  upstream: ${config.endpoint}`));
  const logFile = getLogFilePath();
  if (logFile) {
    console.log(chalk.gray(`  log file: ${logFile}`));
  }

  const shutdown = (signal: string) => {
    log(`[eventstream-proxy] ${signal} received, shutting down`);
    console.log(`\n[eventstream-proxy] Shutting down proxy server...`);
    proxy.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[eventstream-proxy] Shutdown failed:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`[eventstream-proxy] ${error.message}`));
  } else {
    console.error("[eventstream-proxy] Fatal error:", error);
  }
  process.exit(1);
});
