/**
 * Amazon Q event-stream → Claude SSE stream parser.
 *
 * The upstream body is the binary event-stream format, not text:
 *   initial-response        {"conversationId": "..."}
 *   assistantResponseEvent  {"content": "..."}     (repeated)
 *   toolUseEvent            {"toolUseId", "name", "input", "stop"}
 *   assistantResponseEnd
 *
 * Frames are decoded and translated by the bridge pipeline; this module only
 * writes the resulting canonical events as Claude SSE and manages keepalive
 * pings and cancellation.
 */

import type { Context } from "hono";
import { debugLog, log } from "../../../logger.js";
import { bridgeEventStream, type CanonicalEvent } from "../../../protocol/eventstream/index.js";
import { formatSse, toSseRecords } from "../sse-writer.js";

export interface AmazonQEventStreamOptions {
  modelName: string;
  /** Estimated prompt size, reported on message_start */
  inputTokens?: number;
  maxFrameSize?: number;
  /** Idle keepalive ping interval; 0 disables */
  pingIntervalMs?: number;
  onTokenUpdate?: (input: number, output: number) => void;
}

export function createAmazonQEventStream(
  c: Context,
  response: Response,
  opts: AmazonQEventStreamOptions
): Response {
  const encoder = new TextEncoder();
  const inputTokens = opts.inputTokens ?? 0;
  const pingIntervalMs = opts.pingIntervalMs ?? 1000;
  let isClosed = false;
  let pingInterval: ReturnType<typeof setInterval> | null = null;
  let upstreamReader: ReadableStreamDefaultReader<Uint8Array> | null = null;

  const stopPing = () => {
    if (pingInterval) {
      clearInterval(pingInterval);
      pingInterval = null;
    }
  };

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      let lastActivity = Date.now();

      const send = (event: CanonicalEvent) => {
        if (isClosed) return;
        for (const record of toSseRecords(event, { inputTokens })) {
          debugLog("sse", record.event, () => record.data);
          controller.enqueue(encoder.encode(formatSse(record)));
        }
        lastActivity = Date.now();
      };

      const close = () => {
        stopPing();
        if (!isClosed) {
          isClosed = true;
          controller.close();
        }
      };

      if (pingIntervalMs > 0) {
        pingInterval = setInterval(() => {
          if (!isClosed && Date.now() - lastActivity > pingIntervalMs) {
            controller.enqueue(encoder.encode(formatSse({ event: "ping", data: { type: "ping" } })));
          }
        }, pingIntervalMs);
      }

      if (!response.body) {
        log("[AmazonQEventStream] Upstream response has no body");
        send({ type: "error", errorType: "api_error", message: "Upstream response has no body" });
        close();
        return;
      }

      let outputTokens = 0;
      upstreamReader = response.body.getReader();
      const events = bridgeEventStream(readChunks(upstreamReader), {
        model: opts.modelName,
        maxFrameSize: opts.maxFrameSize,
      });

      // Leaving the loop early cancels the upstream body via readChunks
      for await (const event of events) {
        if (isClosed) break;
        if (event.type === "stream-stop") outputTokens = event.outputTokens;
        send(event);
      }

      if (opts.onTokenUpdate) {
        opts.onTokenUpdate(inputTokens, outputTokens);
      }
      close();
    },
    async cancel(reason) {
      isClosed = true;
      stopPing();
      log("[AmazonQEventStream] Client cancelled the stream");
      // Unblocks a pending upstream read so the bridge loop can exit
      await upstreamReader
        ?.cancel(reason)
        .catch((err: unknown) => log(`[AmazonQEventStream] Upstream cancel failed: ${err}`));
    },
  });

  return c.body(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
}

/**
 * Iterate a stream reader; cancels the upstream body if iteration stops early
 */
async function* readChunks(
  reader: ReadableStreamDefaultReader<Uint8Array>
): AsyncGenerator<Uint8Array, void, undefined> {
  let done = false;
  try {
    while (true) {
      const result = await reader.read();
      if (result.done) {
        done = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!done) {
      await reader.cancel().catch((err: unknown) => log(`[AmazonQEventStream] Upstream cancel failed: ${err}`));
    }
    reader.releaseLock();
  }
}
