import { describe, test, expect } from "vitest";
import { bridgeEventStream } from "./bridge.js";
import { encodeEventFrame, encodeExceptionFrame } from "./frame-encoder.js";
import { concatBytes } from "./headers.js";
import type { CanonicalEvent } from "./canonical-events.js";

const options = { model: "test-model" };

async function* chunked(bytes: Uint8Array, size: number): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < bytes.byteLength; offset += size) {
    yield bytes.slice(offset, offset + size);
  }
}

async function collect(source: AsyncIterable<Uint8Array>): Promise<CanonicalEvent[]> {
  const events: CanonicalEvent[] = [];
  for await (const event of bridgeEventStream(source, options)) {
    events.push(event);
  }
  return events;
}

const helloStream = concatBytes([
  encodeEventFrame("initial-response", { conversationId: "abc" }),
  encodeEventFrame("assistantResponseEvent", { content: "Hello" }),
  encodeEventFrame("assistantResponseEvent", { content: " there" }),
  encodeEventFrame("assistantResponseEnd", {}),
]);

const helloEvents: CanonicalEvent[] = [
  { type: "stream-start", conversationId: "abc", model: "test-model" },
  { type: "block-start", index: 0, block: { kind: "text" } },
  { type: "content-delta", index: 0, delta: { kind: "text", text: "Hello" } },
  { type: "content-delta", index: 0, delta: { kind: "text", text: " there" } },
  { type: "block-stop", index: 0 },
  { type: "stream-stop", stopReason: "end_turn", outputTokens: 2 },
];

describe("bridgeEventStream", () => {
  test("produces the same events for any chunking", async () => {
    for (const size of [1, 5, 16, 1024]) {
      expect(await collect(chunked(helloStream, size))).toEqual(helloEvents);
    }
  });

  test("a corrupted frame ends the stream with an error", async () => {
    const corrupted = concatBytes([
      encodeEventFrame("initial-response", { conversationId: "abc" }),
      encodeEventFrame("assistantResponseEvent", { content: "Hi" }),
    ]);
    // Flip a payload byte of the second frame
    corrupted[corrupted.byteLength - 6] ^= 0x01;

    const events = await collect(chunked(corrupted, 7));
    expect(events).toHaveLength(2);
    expect(events[0]).toEqual({ type: "stream-start", conversationId: "abc", model: "test-model" });
    expect(events[1]).toMatchObject({
      type: "error",
      errorType: "api_error",
      message: expect.stringMatching(/^Message checksum mismatch/),
    });
  });

  test("a vendor exception ends the stream and stops reading", async () => {
    let pulledAfterError = false;
    async function* source(): AsyncGenerator<Uint8Array> {
      yield encodeEventFrame("initial-response", { conversationId: "abc" });
      yield encodeExceptionFrame("ThrottlingException", { message: "Rate exceeded" });
      pulledAfterError = true;
      yield encodeEventFrame("assistantResponseEvent", { content: "late" });
    }

    expect(await collect(source())).toEqual([
      { type: "stream-start", conversationId: "abc", model: "test-model" },
      { type: "error", errorType: "ThrottlingException", message: "Rate exceeded" },
    ]);
    expect(pulledAfterError).toBe(false);
  });

  test("a failing source becomes an error event", async () => {
    async function* source(): AsyncGenerator<Uint8Array> {
      yield encodeEventFrame("initial-response", { conversationId: "abc" });
      throw new Error("socket hang up");
    }

    expect(await collect(source())).toEqual([
      { type: "stream-start", conversationId: "abc", model: "test-model" },
      { type: "error", errorType: "api_error", message: "socket hang up" },
    ]);
  });

  test("an incomplete trailing frame is dropped and the stream stops normally", async () => {
    const tail = encodeEventFrame("assistantResponseEvent", { content: "cut" }).subarray(0, 10);
    const bytes = concatBytes([
      encodeEventFrame("initial-response", { conversationId: "abc" }),
      encodeEventFrame("assistantResponseEvent", { content: "Hi" }),
      tail,
    ]);

    const events = await collect(chunked(bytes, 64));
    expect(events[events.length - 1]).toEqual({ type: "stream-stop", stopReason: "end_turn", outputTokens: 1 });
    expect(events).toHaveLength(5);
  });

  test("a tool call with array input keeps streaming", async () => {
    const bytes = concatBytes([
      encodeEventFrame("initial-response", { conversationId: "abc" }),
      encodeEventFrame("assistantResponseEvent", { content: "Let me run it" }),
      encodeEventFrame("toolUseEvent", { toolUseId: "t1", name: "run", input: ["a", 1] }),
      encodeEventFrame("toolUseEvent", { toolUseId: "t1", name: "run", stop: true }),
    ]);

    expect(await collect(chunked(bytes, 16))).toEqual([
      { type: "stream-start", conversationId: "abc", model: "test-model" },
      { type: "block-start", index: 0, block: { kind: "text" } },
      { type: "content-delta", index: 0, delta: { kind: "text", text: "Let me run it" } },
      { type: "block-stop", index: 0 },
      { type: "block-start", index: 1, block: { kind: "tool_use", id: "t1", name: "run" } },
      { type: "content-delta", index: 1, delta: { kind: "input_json", partialJson: '["a",1]' } },
      { type: "block-stop", index: 1 },
      { type: "stream-stop", stopReason: "tool_use", outputTokens: 3 },
    ]);
  });

  test("a start without a conversation id still streams", async () => {
    const bytes = concatBytes([
      encodeEventFrame("initial-response", {}),
      encodeEventFrame("assistantResponseEvent", { content: "Hi" }),
    ]);

    const events = await collect(chunked(bytes, 1024));
    expect(events[0]).toEqual({ type: "stream-start", conversationId: "unknown", model: "test-model" });
    expect(events.map((e) => e.type)).toEqual([
      "stream-start",
      "block-start",
      "content-delta",
      "block-stop",
      "stream-stop",
    ]);
  });

  test("an empty upstream is an error", async () => {
    expect(await collect(chunked(new Uint8Array(0), 1))).toEqual([
      {
        type: "error",
        errorType: "api_error",
        message: "Upstream stream ended before the conversation started",
      },
    ]);
  });
});
