/**
 * EventStreamHandler — proxies a Claude Messages request to a provider that
 * answers with a binary event stream, and streams Claude SSE back.
 *
 * Flow:
 *   1. provider.getHeaders()         — auth
 *   2. provider.transformPayload()   — request envelope
 *   3. fetch                         — HTTP request
 *   4. stream parser by provider.streamFormat — event stream → Claude SSE
 */

import type { Context } from "hono";
import type { ModelHandler } from "./types.js";
import type { ProviderTransport } from "../providers/transport/types.js";
import { createAmazonQEventStream } from "./shared/stream-parsers/index.js";
import { errorBody, type ClaudeMessagesRequest } from "../types.js";
import { debugLog, getLogLevel, log, logStructured, maskCredential, truncateContent } from "../logger.js";
import { estimateRequestTokens } from "../utils/tokens.js";

export interface EventStreamHandlerOptions {
  maxFrameSize?: number;
  pingIntervalMs?: number;
  onTokenUpdate?: (input: number, output: number) => void;
}

export class EventStreamHandler implements ModelHandler {
  private provider: ProviderTransport;
  private modelName: string;
  private options: EventStreamHandlerOptions;

  constructor(provider: ProviderTransport, modelName: string, options: EventStreamHandlerOptions = {}) {
    this.provider = provider;
    this.modelName = modelName;
    this.options = options;
  }

  async handle(c: Context, payload: ClaudeMessagesRequest): Promise<Response> {
    const inputTokens = estimateRequestTokens(payload);
    logStructured(`${this.provider.displayName} Request`, {
      requestedModel: payload.model ?? "(none)",
      targetModel: this.modelName,
      messageCount: payload.messages.length,
      inputTokens,
      ...(getLogLevel() === "debug" ? { messages: payload.messages } : {}),
    });

    let headers: Record<string, string>;
    try {
      headers = await this.provider.getHeaders();
    } catch (error) {
      log(`[${this.provider.name}] Auth error: ${error}`);
      return c.json(errorBody("authentication_error", errorMessage(error)), 401);
    }
    debugLog("transport", "headers", () => ({
      endpoint: this.provider.getEndpoint(),
      authorization: headers["Authorization"] ? maskCredential(headers["Authorization"]) : "(not set)",
    }));

    const body = this.provider.transformPayload ? this.provider.transformPayload(payload) : payload;

    let upstream: Response;
    try {
      upstream = await fetch(this.provider.getEndpoint(), {
        method: "POST",
        headers,
        body: JSON.stringify(body),
      });
    } catch (error) {
      log(`[${this.provider.name}] Fetch error: ${error}`);
      return c.json(errorBody("api_error", errorMessage(error)), 500);
    }

    if (!upstream.ok) {
      const text = await upstream.text();
      log(`[${this.provider.name}] Upstream ${upstream.status}: ${truncateContent(text, 500)}`);
      return new Response(
        JSON.stringify(
          errorBody("api_error", `${this.provider.displayName} returned ${upstream.status}: ${truncateContent(text, 500)}`)
        ),
        { status: upstream.status, headers: { "Content-Type": "application/json" } }
      );
    }

    switch (this.provider.streamFormat) {
      case "aws-eventstream":
        return createAmazonQEventStream(c, upstream, {
          modelName: this.modelName,
          inputTokens,
          maxFrameSize: this.options.maxFrameSize,
          pingIntervalMs: this.options.pingIntervalMs,
          onTokenUpdate: this.options.onTokenUpdate,
        });
    }
  }

  async shutdown(): Promise<void> {
    // No state to clean up
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
