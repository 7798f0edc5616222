/**
 * Canonical events → Claude SSE records.
 *
 *   stream-start   → message_start, ping
 *   block-start    → content_block_start
 *   content-delta  → content_block_delta (text_delta | input_json_delta)
 *   block-stop     → content_block_stop
 *   stream-stop    → message_delta, message_stop
 *   error          → error
 */

import type { CanonicalEvent } from "../../protocol/eventstream/index.js";

export interface SseRecord {
  event: string;
  data: Record<string, unknown>;
}

export interface SseContext {
  /** Reported as usage.input_tokens on message_start */
  inputTokens: number;
}

export function toSseRecords(event: CanonicalEvent, ctx: SseContext): SseRecord[] {
  switch (event.type) {
    case "stream-start":
      return [
        {
          event: "message_start",
          data: {
            type: "message_start",
            message: {
              id: `msg_${event.conversationId}`,
              type: "message",
              role: "assistant",
              content: [],
              model: event.model,
              stop_reason: null,
              stop_sequence: null,
              usage: { input_tokens: ctx.inputTokens, output_tokens: 0 },
            },
          },
        },
        { event: "ping", data: { type: "ping" } },
      ];

    case "block-start":
      return [
        {
          event: "content_block_start",
          data: {
            type: "content_block_start",
            index: event.index,
            content_block:
              event.block.kind === "text"
                ? { type: "text", text: "" }
                : { type: "tool_use", id: event.block.id, name: event.block.name, input: {} },
          },
        },
      ];

    case "content-delta":
      return [
        {
          event: "content_block_delta",
          data: {
            type: "content_block_delta",
            index: event.index,
            delta:
              event.delta.kind === "text"
                ? { type: "text_delta", text: event.delta.text }
                : { type: "input_json_delta", partial_json: event.delta.partialJson },
          },
        },
      ];

    case "block-stop":
      return [{ event: "content_block_stop", data: { type: "content_block_stop", index: event.index } }];

    case "stream-stop":
      return [
        {
          event: "message_delta",
          data: {
            type: "message_delta",
            delta: { stop_reason: event.stopReason, stop_sequence: null },
            usage: { output_tokens: event.outputTokens },
          },
        },
        { event: "message_stop", data: { type: "message_stop" } },
      ];

    case "error":
      return [
        {
          event: "error",
          data: { type: "error", error: { type: event.errorType, message: event.message } },
        },
      ];
  }
}

/**
 * Serialize one record: `event: <name>\ndata: <json>\n\n`
 */
export function formatSse(record: SseRecord): string {
  return `event: ${record.event}\ndata: ${JSON.stringify(record.data)}\n\n`;
}
