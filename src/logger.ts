import { appendFile, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "minimal";

let logFilePath: string | null = null;
let logLevel: LogLevel = "info"; // Default to structured logging
let logBuffer: string[] = []; // Buffer for async writes
let flushTimer: NodeJS.Timeout | null = null;
let exitHookInstalled = false;
const FLUSH_INTERVAL_MS = 100; // Flush every 100ms
const MAX_BUFFER_SIZE = 50; // Flush if buffer exceeds 50 messages

/**
 * Debug configuration for component-specific debugging
 */
export interface DebugConfig {
  enabled: boolean;
  components: {
    frames: boolean;
    events: boolean;
    sse: boolean;
    transport: boolean;
  };
}

let debugConfig: DebugConfig | null = null;

/**
 * Initialize debug configuration from environment variables
 */
export function initializeDebugConfig(
  enabled: boolean,
  env: NodeJS.ProcessEnv = process.env
): DebugConfig {
  const config: DebugConfig = {
    enabled,
    components: {
      frames: env.EVENTSTREAM_DEBUG_FRAMES === "true",
      events: env.EVENTSTREAM_DEBUG_EVENTS === "true",
      sse: env.EVENTSTREAM_DEBUG_SSE === "true",
      transport: env.EVENTSTREAM_DEBUG_TRANSPORT === "true",
    },
  };

  // Enable all components if main debug flag is set and no specific components are enabled
  if (config.enabled && !Object.values(config.components).some(Boolean)) {
    config.components = { frames: true, events: true, sse: true, transport: true };
  }

  debugConfig = config;
  return config;
}

/**
 * Check if a specific debug component is enabled
 */
export function shouldDebug(component: keyof DebugConfig["components"]): boolean {
  if (!debugConfig || !debugConfig.enabled) return false;
  return debugConfig.components[component];
}

/**
 * Check if logging is enabled (useful for skipping expensive log formatting)
 */
export function isLoggingEnabled(): boolean {
  return logFilePath !== null;
}

/**
 * Flush log buffer to file (async)
 */
function flushLogBuffer(): void {
  if (!logFilePath || logBuffer.length === 0) return;

  const toWrite = logBuffer.join("");
  logBuffer = [];

  appendFile(logFilePath, toWrite, (err) => {
    if (err) {
      console.error(`[eventstream-proxy] Warning: Failed to write to log file: ${err.message}`);
    }
  });
}

/**
 * Schedule periodic buffer flush
 */
function scheduleFlush(): void {
  if (flushTimer) return;

  flushTimer = setInterval(() => {
    flushLogBuffer();
  }, FLUSH_INTERVAL_MS);
  flushTimer.unref();

  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.on("exit", () => {
    if (flushTimer) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
    // Final flush (must be sync on exit)
    if (logFilePath && logBuffer.length > 0) {
      writeFileSync(logFilePath, logBuffer.join(""), { flag: "a" });
      logBuffer = [];
    }
  });
}

/**
 * Initialize file logging for this session
 */
export function initLogger(debugMode: boolean, level: LogLevel = "info"): void {
  if (!debugMode) {
    logFilePath = null;
    if (flushTimer) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
    return;
  }

  logLevel = level;

  const logsDir = join(process.cwd(), "logs");
  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }

  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .split("T")
    .join("_")
    .slice(0, -5);
  logFilePath = join(logsDir, `eventstream-proxy_${timestamp}.log`);

  // Write header (sync on init is fine)
  writeFileSync(
    logFilePath,
    `eventstream-proxy Debug Log - ${new Date().toISOString()}\nLog Level: ${level}\n${"=".repeat(80)}\n\n`
  );

  scheduleFlush();
}

/**
 * Log a message (to file only in debug mode, silent otherwise)
 * Uses async buffered writes to avoid blocking the event loop
 */
export function log(message: string, forceConsole = false): void {
  const timestamp = new Date().toISOString();
  const logLine = `[${timestamp}] ${message}\n`;

  if (logFilePath) {
    logBuffer.push(logLine);

    if (logBuffer.length >= MAX_BUFFER_SIZE) {
      flushLogBuffer();
    }
  }

  // Critical messages go to the console even when not in debug mode
  if (forceConsole) {
    console.log(message);
  }
}

/**
 * Get the current log file path
 */
export function getLogFilePath(): string | null {
  return logFilePath;
}

/**
 * Mask sensitive credentials for logging
 * Shows only first 4 and last 4 characters
 */
export function maskCredential(credential: string): string {
  if (!credential || credential.length <= 8) {
    return "***";
  }
  return `${credential.substring(0, 4)}...${credential.substring(credential.length - 4)}`;
}

/**
 * Get current log level
 */
export function getLogLevel(): LogLevel {
  return logLevel;
}

/**
 * Truncate content for logging (keeps first N chars + "...")
 */
export function truncateContent(content: unknown, maxLength = 200): string {
  const str = typeof content === "string" ? content : (JSON.stringify(content) ?? String(content));
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.substring(0, maxLength)}... [truncated ${str.length - maxLength} chars]`;
}

/**
 * Log structured data (only in info/debug mode)
 * Truncates long content based on log level
 */
export function logStructured(label: string, data: Record<string, unknown>): void {
  if (!logFilePath) return;

  if (logLevel === "minimal") {
    log(`[${label}]`);
    return;
  }

  if (logLevel === "info") {
    const structured: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === "string" || typeof value === "object") {
        structured[key] = truncateContent(value, 150);
      } else {
        structured[key] = value;
      }
    }
    log(`[${label}] ${JSON.stringify(structured, null, 2)}`);
    return;
  }

  log(`[${label}] ${JSON.stringify(data, null, 2)}`);
}

/**
 * Component-specific logging. Only logs if that component's debugging is
 * enabled; the data producer is skipped otherwise.
 */
export function debugLog(
  component: keyof DebugConfig["components"],
  message: string,
  dataProducer?: () => Record<string, unknown>
): void {
  if (!shouldDebug(component) || !isLoggingEnabled()) return;

  if (dataProducer) {
    logStructured(`${component.toUpperCase()}_${message}`, dataProducer());
  } else {
    log(`[${component.toUpperCase()}] ${message}`);
  }
}
