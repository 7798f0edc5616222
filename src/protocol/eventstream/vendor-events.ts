/**
 * Vendor event classification.
 *
 * Resolves a validated frame into a closed union of the vendor event kinds
 * the translator understands. Routing is by the `:message-type` and
 * `:event-type` headers; payloads are JSON and checked against zod schemas.
 *
 *   initial-response        {"conversationId": "..."}   (missing id → "unknown")
 *   assistantResponseEvent  {"content": "..."}
 *   toolUseEvent            {"toolUseId": "...", "name": "...", "input": "...", "stop": true}
 *   assistantResponseEnd    {...}
 *
 * Exception frames (`:message-type` exception/error) become vendor-error.
 * Anything else is `unrecognized` and left to the caller to skip.
 */

import { z } from "zod";
import {
  HEADER_ERROR_CODE,
  HEADER_ERROR_MESSAGE,
  HEADER_EVENT_TYPE,
  HEADER_EXCEPTION_TYPE,
  HEADER_MESSAGE_TYPE,
} from "./constants.js";
import { log } from "../../logger.js";
import { ProtocolViolationError } from "./errors.js";
import { getStringHeader, type Frame } from "./types.js";

export const VendorEventType = {
  INITIAL_RESPONSE: "initial-response",
  ASSISTANT_RESPONSE: "assistantResponseEvent",
  TOOL_USE: "toolUseEvent",
  ASSISTANT_RESPONSE_END: "assistantResponseEnd",
} as const;

export type VendorEvent =
  | { kind: "conversation-start"; conversationId: string }
  | { kind: "text-fragment"; text: string }
  | { kind: "tool-use"; toolUseId?: string; name?: string; input?: string; stop: boolean }
  | { kind: "response-end" }
  | { kind: "vendor-error"; errorType: string; message: string }
  | { kind: "unrecognized"; eventType?: string; messageType?: string };

const UNKNOWN_CONVERSATION_ID = "unknown";

const conversationStartSchema = z.object({
  conversationId: z.string().optional(),
});

const textFragmentSchema = z.object({
  content: z.string(),
});

const toolUseSchema = z.object({
  toolUseId: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
  stop: z.boolean().optional(),
});

const vendorErrorSchema = z
  .object({
    message: z.string().optional(),
    Message: z.string().optional(),
  })
  .passthrough();

const utf8Decoder = new TextDecoder();

/**
 * Classify a frame into a vendor event.
 *
 * @throws ProtocolViolationError when a recognized event carries a payload
 *   that is not JSON or does not match its schema
 */
export function classifyFrame(frame: Frame): VendorEvent {
  const messageType = getStringHeader(frame.headers, HEADER_MESSAGE_TYPE);
  const eventType = getStringHeader(frame.headers, HEADER_EVENT_TYPE);

  if (messageType === "exception" || messageType === "error") {
    return toVendorError(frame);
  }

  if (messageType !== undefined && messageType !== "event") {
    return { kind: "unrecognized", eventType, messageType };
  }

  switch (eventType) {
    case VendorEventType.INITIAL_RESPONSE: {
      const { conversationId } = parsePayload(frame, eventType, conversationStartSchema);
      if (!conversationId) {
        log(`[VendorEvents] initial-response without conversationId, using "${UNKNOWN_CONVERSATION_ID}"`);
      }
      return { kind: "conversation-start", conversationId: conversationId || UNKNOWN_CONVERSATION_ID };
    }
    case VendorEventType.ASSISTANT_RESPONSE: {
      const { content } = parsePayload(frame, eventType, textFragmentSchema);
      return { kind: "text-fragment", text: content };
    }
    case VendorEventType.TOOL_USE: {
      const payload = parsePayload(frame, eventType, toolUseSchema);
      return {
        kind: "tool-use",
        toolUseId: payload.toolUseId,
        name: payload.name,
        input: normalizeToolInput(payload.input),
        stop: payload.stop ?? false,
      };
    }
    case VendorEventType.ASSISTANT_RESPONSE_END:
      // toolUses listed here were already streamed as toolUseEvent frames
      return { kind: "response-end" };
    default:
      return { kind: "unrecognized", eventType, messageType };
  }
}

function parsePayload<T>(frame: Frame, eventType: string, schema: z.ZodType<T>): T {
  let json: unknown;
  try {
    json = JSON.parse(utf8Decoder.decode(frame.payload));
  } catch (err) {
    throw new ProtocolViolationError(`Invalid JSON payload in ${eventType}: ${err}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "payload";
    throw new ProtocolViolationError(
      `Unexpected ${eventType} payload at ${where}: ${issue ? issue.message : "invalid"}`
    );
  }
  return result.data;
}

/**
 * Tool input arrives as partial JSON text, or occasionally as a parsed value.
 * Empty input is dropped; anything else becomes a JSON string.
 */
function normalizeToolInput(input: unknown): string | undefined {
  if (input === undefined || input === null) return undefined;
  if (typeof input === "string") return input.length > 0 ? input : undefined;
  if (isPlainObject(input)) {
    return Object.keys(input).length > 0 ? JSON.stringify(input) : undefined;
  }

  log(`[VendorEvents] Unexpected tool input type (${Array.isArray(input) ? "array" : typeof input}), serializing`);
  return JSON.stringify(input);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toVendorError(frame: Frame): VendorEvent {
  const errorType =
    getStringHeader(frame.headers, HEADER_EXCEPTION_TYPE) ??
    getStringHeader(frame.headers, HEADER_ERROR_CODE) ??
    "api_error";

  const text = utf8Decoder.decode(frame.payload);
  let message: string | undefined;
  if (text.length > 0) {
    try {
      const parsed = vendorErrorSchema.safeParse(JSON.parse(text));
      message = parsed.success ? (parsed.data.message ?? parsed.data.Message) : text;
    } catch {
      // Not JSON: the raw payload is the message
      message = text;
    }
  }

  return {
    kind: "vendor-error",
    errorType,
    message: message ?? getStringHeader(frame.headers, HEADER_ERROR_MESSAGE) ?? errorType,
  };
}
