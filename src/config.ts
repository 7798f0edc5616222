/**
 * Proxy configuration
 *
 * Read once from the environment (after dotenv has loaded .env) and the
 * command line. Command-line flags win over environment variables.
 */

import type { LogLevel } from "./logger.js";
import { DEFAULT_MAX_FRAME_SIZE } from "./protocol/eventstream/index.js";

export const DEFAULT_PORT = 8787;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_ENDPOINT = "https://codewhisperer.us-east-1.amazonaws.com/generateAssistantResponse";
export const DEFAULT_MODEL = "claude-sonnet-4.5";

export interface ProxyConfig {
  port: number;
  host: string;
  /** Vendor streaming endpoint */
  endpoint: string;
  /** Bearer token for the vendor API; requests fail with 401 without it */
  accessToken?: string;
  /** Model name reported to clients */
  model: string;
  maxFrameSize: number;
  debug: boolean;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: readonly string[] = []): ProxyConfig {
  const portFlag = flagValue(argv, "--port");

  return {
    port: parsePort(portFlag ?? env.EVENTSTREAM_PORT, DEFAULT_PORT),
    host: env.EVENTSTREAM_HOST || DEFAULT_HOST,
    endpoint: env.AMAZONQ_ENDPOINT || DEFAULT_ENDPOINT,
    accessToken: env.AMAZONQ_ACCESS_TOKEN || undefined,
    model: env.AMAZONQ_MODEL || DEFAULT_MODEL,
    maxFrameSize: parsePositiveInt("EVENTSTREAM_MAX_FRAME_SIZE", env.EVENTSTREAM_MAX_FRAME_SIZE, DEFAULT_MAX_FRAME_SIZE),
    debug: argv.includes("--debug") || env.EVENTSTREAM_DEBUG === "true" || env.EVENTSTREAM_DEBUG === "1",
    logLevel: parseLogLevel(env.EVENTSTREAM_LOG_LEVEL),
  };
}

function flagValue(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

function parsePort(raw: string | undefined, fallback: number): number {
  const port = parsePositiveInt("port", raw, fallback);
  if (port > 65535) {
    throw new ConfigError(`Invalid port: ${raw}`);
  }
  return port;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid ${name}: ${raw}`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === "") return "info";
  if (raw === "debug" || raw === "info" || raw === "minimal") return raw;
  throw new ConfigError(`Invalid EVENTSTREAM_LOG_LEVEL: ${raw} (expected debug, info or minimal)`);
}
