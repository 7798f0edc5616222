import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ProxyConfig } from "./config.js";
import { EventStreamHandler } from "./handlers/eventstream-handler.js";
import type { ModelHandler } from "./handlers/types.js";
import { log } from "./logger.js";
import { AmazonQProvider } from "./providers/transport/amazonq.js";
import { claudeMessagesRequestSchema, errorBody, type ProxyServer } from "./types.js";
import { estimateRequestTokens } from "./utils/tokens.js";

export function createDefaultHandler(config: ProxyConfig): ModelHandler {
  const provider = new AmazonQProvider(config.endpoint, config.model, config.accessToken);
  return new EventStreamHandler(provider, config.model, { maxFrameSize: config.maxFrameSize });
}

/**
 * Build the Hono app. Separate from createProxyServer so it can be driven
 * in-process with app.request().
 */
export function createApp(config: ProxyConfig, handler: ModelHandler = createDefaultHandler(config)): Hono {
  const app = new Hono();
  app.use("*", cors());

  app.get("/", (c) =>
    c.json({
      status: "ok",
      message: "eventstream-proxy",
      config: { model: config.model, endpoint: config.endpoint, authenticated: Boolean(config.accessToken) },
    })
  );
  app.get("/health", (c) => c.json({ status: "ok" }));

  // Token counting (estimate only; the vendor has no count endpoint)
  app.post("/v1/messages/count_tokens", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (e) {
      return c.json(errorBody("invalid_request_error", `Invalid JSON body: ${e}`), 400);
    }
    return c.json({ input_tokens: estimateRequestTokens(body) });
  });

  app.post("/v1/messages", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (e) {
      return c.json(errorBody("invalid_request_error", `Invalid JSON body: ${e}`), 400);
    }

    const parsed = claudeMessagesRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
      return c.json(errorBody("invalid_request_error", `${where}: ${issue ? issue.message : "invalid request"}`), 400);
    }
    // A missing stream flag means a non-streaming request
    if (parsed.data.stream !== true) {
      return c.json(errorBody("invalid_request_error", "Only streaming requests are supported"), 400);
    }

    try {
      return await handler.handle(c, parsed.data);
    } catch (e) {
      log(`[Proxy] Error: ${e}`);
      return c.json(errorBody("server_error", String(e)), 500);
    }
  });

  return app;
}

export async function createProxyServer(
  config: ProxyConfig,
  handler: ModelHandler = createDefaultHandler(config)
): Promise<ProxyServer> {
  const app = createApp(config, handler);

  return new Promise<ProxyServer>((resolve) => {
    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
      const url = `http://${config.host}:${info.port}`;
      log(`[Proxy] Server started on ${url}`);

      resolve({
        port: info.port,
        url,
        shutdown: async () => {
          await handler.shutdown();
          await new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done())));
        },
      });
    });
  });
}
