import { describe, test, expect } from "vitest";
import { classifyFrame } from "./vendor-events.js";
import { encodeEventFrame, encodeExceptionFrame, encodeFrame } from "./frame-encoder.js";
import { FrameDecoder } from "./frame-decoder.js";
import { ProtocolViolationError } from "./errors.js";
import type { Frame } from "./types.js";

function decodeOne(bytes: Uint8Array): Frame {
  const decoder = new FrameDecoder();
  decoder.feed(bytes);
  const result = decoder.tryExtractFrame();
  if (result.status !== "frame") throw new Error("expected a complete frame");
  return result.frame;
}

describe("classifyFrame", () => {
  test("initial-response is a conversation start", () => {
    const frame = decodeOne(encodeEventFrame("initial-response", { conversationId: "abc" }));
    expect(classifyFrame(frame)).toEqual({ kind: "conversation-start", conversationId: "abc" });
  });

  test("assistantResponseEvent is a text fragment", () => {
    const frame = decodeOne(encodeEventFrame("assistantResponseEvent", { content: "Hi", modelId: "x" }));
    expect(classifyFrame(frame)).toEqual({ kind: "text-fragment", text: "Hi" });
  });

  test("toolUseEvent keeps string input as-is", () => {
    const frame = decodeOne(
      encodeEventFrame("toolUseEvent", { toolUseId: "t1", name: "read", input: '{"pa' })
    );
    expect(classifyFrame(frame)).toEqual({
      kind: "tool-use",
      toolUseId: "t1",
      name: "read",
      input: '{"pa',
      stop: false,
    });
  });

  test("toolUseEvent serializes object input and drops empty input", () => {
    const withObject = decodeOne(encodeEventFrame("toolUseEvent", { toolUseId: "t1", input: { path: "a" } }));
    expect(classifyFrame(withObject)).toMatchObject({ kind: "tool-use", input: '{"path":"a"}' });

    const empty = decodeOne(encodeEventFrame("toolUseEvent", { toolUseId: "t1", input: {}, stop: true }));
    expect(classifyFrame(empty)).toEqual({ kind: "tool-use", toolUseId: "t1", stop: true });
  });

  test("initial-response without an id starts an unknown conversation", () => {
    const frame = decodeOne(encodeEventFrame("initial-response", {}));
    expect(classifyFrame(frame)).toEqual({ kind: "conversation-start", conversationId: "unknown" });
  });

  test("toolUseEvent serializes input of other JSON types", () => {
    const withArray = decodeOne(
      encodeEventFrame("toolUseEvent", { toolUseId: "t1", name: "run", input: ["a", 1] })
    );
    expect(classifyFrame(withArray)).toEqual({
      kind: "tool-use",
      toolUseId: "t1",
      name: "run",
      input: '["a",1]',
      stop: false,
    });

    const withNumber = decodeOne(encodeEventFrame("toolUseEvent", { toolUseId: "t1", input: 5 }));
    expect(classifyFrame(withNumber)).toMatchObject({ kind: "tool-use", input: "5" });

    const withNull = decodeOne(encodeEventFrame("toolUseEvent", { toolUseId: "t1", input: null, stop: true }));
    expect(classifyFrame(withNull)).toEqual({ kind: "tool-use", toolUseId: "t1", stop: true });
  });

  test("assistantResponseEnd is a response end", () => {
    const frame = decodeOne(encodeEventFrame("assistantResponseEnd", { toolUses: [] }));
    expect(classifyFrame(frame)).toEqual({ kind: "response-end" });
  });

  test("exception frames carry the exception type and message", () => {
    const frame = decodeOne(encodeExceptionFrame("ThrottlingException", { message: "Rate exceeded" }));
    expect(classifyFrame(frame)).toEqual({
      kind: "vendor-error",
      errorType: "ThrottlingException",
      message: "Rate exceeded",
    });
  });

  test("exception frames with a non-JSON payload use the raw text", () => {
    const frame = decodeOne(encodeExceptionFrame("InternalServerException", "boom"));
    expect(classifyFrame(frame)).toEqual({
      kind: "vendor-error",
      errorType: "InternalServerException",
      message: "boom",
    });
  });

  test("error frames fall back to the error headers", () => {
    const frame = decodeOne(
      encodeFrame({ ":message-type": "error", ":error-code": "InternalError", ":error-message": "bad" })
    );
    expect(classifyFrame(frame)).toEqual({ kind: "vendor-error", errorType: "InternalError", message: "bad" });
  });

  test("unknown event types are unrecognized", () => {
    const frame = decodeOne(encodeEventFrame("messageMetadataEvent", { conversationId: "abc" }));
    expect(classifyFrame(frame)).toEqual({
      kind: "unrecognized",
      eventType: "messageMetadataEvent",
      messageType: "event",
    });
  });

  test("a recognized event with the wrong payload is a protocol violation", () => {
    const missing = decodeOne(encodeEventFrame("assistantResponseEvent", { text: "Hi" }));
    expect(() => classifyFrame(missing)).toThrow(ProtocolViolationError);
    expect(() => classifyFrame(missing)).toThrow(/^Unexpected assistantResponseEvent payload at content/);

    const notJson = decodeOne(encodeEventFrame("initial-response", "{not json"));
    expect(() => classifyFrame(notJson)).toThrow(/^Invalid JSON payload in initial-response/);
  });
});
