import { describe, test, expect } from "vitest";
import { formatSse, toSseRecords } from "./sse-writer.js";

const ctx = { inputTokens: 12 };

describe("toSseRecords", () => {
  test("stream-start becomes message_start followed by ping", () => {
    const records = toSseRecords({ type: "stream-start", conversationId: "abc", model: "test-model" }, ctx);

    expect(records).toEqual([
      {
        event: "message_start",
        data: {
          type: "message_start",
          message: {
            id: "msg_abc",
            type: "message",
            role: "assistant",
            content: [],
            model: "test-model",
            stop_reason: null,
            stop_sequence: null,
            usage: { input_tokens: 12, output_tokens: 0 },
          },
        },
      },
      { event: "ping", data: { type: "ping" } },
    ]);
  });

  test("block-start for text and tool_use", () => {
    expect(toSseRecords({ type: "block-start", index: 0, block: { kind: "text" } }, ctx)).toEqual([
      {
        event: "content_block_start",
        data: { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
      },
    ]);

    expect(
      toSseRecords({ type: "block-start", index: 1, block: { kind: "tool_use", id: "t1", name: "read" } }, ctx)
    ).toEqual([
      {
        event: "content_block_start",
        data: {
          type: "content_block_start",
          index: 1,
          content_block: { type: "tool_use", id: "t1", name: "read", input: {} },
        },
      },
    ]);
  });

  test("content deltas", () => {
    expect(toSseRecords({ type: "content-delta", index: 0, delta: { kind: "text", text: "Hi" } }, ctx)).toEqual([
      {
        event: "content_block_delta",
        data: { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hi" } },
      },
    ]);

    expect(
      toSseRecords({ type: "content-delta", index: 1, delta: { kind: "input_json", partialJson: '{"a"' } }, ctx)
    ).toEqual([
      {
        event: "content_block_delta",
        data: { type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '{"a"' } },
      },
    ]);
  });

  test("stream-stop becomes message_delta and message_stop", () => {
    expect(toSseRecords({ type: "stream-stop", stopReason: "end_turn", outputTokens: 7 }, ctx)).toEqual([
      {
        event: "message_delta",
        data: {
          type: "message_delta",
          delta: { stop_reason: "end_turn", stop_sequence: null },
          usage: { output_tokens: 7 },
        },
      },
      { event: "message_stop", data: { type: "message_stop" } },
    ]);
  });

  test("errors", () => {
    expect(toSseRecords({ type: "error", errorType: "api_error", message: "boom" }, ctx)).toEqual([
      { event: "error", data: { type: "error", error: { type: "api_error", message: "boom" } } },
    ]);
  });
});

describe("formatSse", () => {
  test("writes the event line, the data line and a blank line", () => {
    const [record] = toSseRecords({ type: "block-stop", index: 2 }, ctx);
    expect(formatSse(record)).toBe(
      'event: content_block_stop\ndata: {"type":"content_block_stop","index":2}\n\n'
    );
  });
});
