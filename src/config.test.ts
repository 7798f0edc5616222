import { describe, test, expect } from "vitest";
import { ConfigError, DEFAULT_ENDPOINT, DEFAULT_HOST, DEFAULT_MODEL, DEFAULT_PORT, loadConfig } from "./config.js";
import { DEFAULT_MAX_FRAME_SIZE } from "./protocol/eventstream/index.js";

describe("loadConfig", () => {
  test("uses defaults for an empty environment", () => {
    expect(loadConfig({}, [])).toEqual({
      port: DEFAULT_PORT,
      host: DEFAULT_HOST,
      endpoint: DEFAULT_ENDPOINT,
      accessToken: undefined,
      model: DEFAULT_MODEL,
      maxFrameSize: DEFAULT_MAX_FRAME_SIZE,
      debug: false,
      logLevel: "info",
    });
  });

  test("reads the environment", () => {
    const config = loadConfig(
      {
        EVENTSTREAM_PORT: "9000",
        EVENTSTREAM_HOST: "0.0.0.0",
        AMAZONQ_ENDPOINT: "http://localhost:4000/stream",
        AMAZONQ_ACCESS_TOKEN: "test-secret",
        AMAZONQ_MODEL: "test-model",
        EVENTSTREAM_MAX_FRAME_SIZE: "1024",
        EVENTSTREAM_DEBUG: "1",
        EVENTSTREAM_LOG_LEVEL: "debug",
      },
      []
    );

    expect(config).toEqual({
      port: 9000,
      host: "0.0.0.0",
      endpoint: "http://localhost:4000/stream",
      accessToken: "test-secret",
      model: "test-model",
      maxFrameSize: 1024,
      debug: true,
      logLevel: "debug",
    });
  });

  test("command-line flags win over the environment", () => {
    const config = loadConfig({ EVENTSTREAM_PORT: "9000" }, ["--port", "9100", "--debug"]);
    expect(config.port).toBe(9100);
    expect(config.debug).toBe(true);
  });

  test("rejects invalid values", () => {
    expect(() => loadConfig({ EVENTSTREAM_PORT: "abc" })).toThrow(new ConfigError("Invalid port: abc"));
    expect(() => loadConfig({ EVENTSTREAM_PORT: "70000" })).toThrow("Invalid port: 70000");
    expect(() => loadConfig({ EVENTSTREAM_MAX_FRAME_SIZE: "-1" })).toThrow("Invalid EVENTSTREAM_MAX_FRAME_SIZE: -1");
    expect(() => loadConfig({ EVENTSTREAM_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadConfig({}, ["--port"])).toThrow("--port requires a value");
  });
});
