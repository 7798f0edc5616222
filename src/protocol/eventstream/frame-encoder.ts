/**
 * Event-stream frame encoder.
 *
 * The inverse of FrameDecoder. The proxy only ever decodes; encoding is
 * used to build upstream fixtures and by the in-process upstream stand-ins.
 */

import { crc32 } from "@aws-crypto/crc32";
import {
  HEADER_CONTENT_TYPE,
  HEADER_EVENT_TYPE,
  HEADER_EXCEPTION_TYPE,
  HEADER_MESSAGE_TYPE,
  HeaderType,
  MESSAGE_CRC_LENGTH,
  PRELUDE_FIELDS_LENGTH,
  PRELUDE_LENGTH,
} from "./constants.js";
import { encodeHeaders } from "./headers.js";
import type { HeaderValue } from "./types.js";

const utf8Encoder = new TextEncoder();

export type HeaderInput = Record<string, HeaderValue | string>;

/**
 * Encode one frame.
 *
 * @param headers - Header map; plain strings are encoded as string headers
 * @param payload - Raw bytes, a string (UTF-8) or any JSON-serializable value
 */
export function encodeFrame(headers: HeaderInput, payload?: unknown): Uint8Array {
  const headerBlock = encodeHeaders(
    Object.entries(headers).map(([name, value]): [string, HeaderValue] => [
      name,
      typeof value === "string" ? { type: HeaderType.STRING, value } : value,
    ])
  );
  const payloadBytes = toPayloadBytes(payload);

  const totalLength = PRELUDE_LENGTH + headerBlock.byteLength + payloadBytes.byteLength + MESSAGE_CRC_LENGTH;
  const out = new Uint8Array(totalLength);
  const view = new DataView(out.buffer);

  view.setUint32(0, totalLength);
  view.setUint32(4, headerBlock.byteLength);
  view.setUint32(8, crc32(out.subarray(0, PRELUDE_FIELDS_LENGTH)) >>> 0);

  out.set(headerBlock, PRELUDE_LENGTH);
  out.set(payloadBytes, PRELUDE_LENGTH + headerBlock.byteLength);

  const messageEnd = totalLength - MESSAGE_CRC_LENGTH;
  view.setUint32(messageEnd, crc32(out.subarray(0, messageEnd)) >>> 0);

  return out;
}

/**
 * Encode a vendor event frame (`:message-type = event`, JSON content type)
 */
export function encodeEventFrame(eventType: string, payload: unknown): Uint8Array {
  return encodeFrame(
    {
      [HEADER_EVENT_TYPE]: eventType,
      [HEADER_CONTENT_TYPE]: "application/json",
      [HEADER_MESSAGE_TYPE]: "event",
    },
    payload
  );
}

/**
 * Encode a vendor exception frame
 */
export function encodeExceptionFrame(exceptionType: string, payload: unknown): Uint8Array {
  return encodeFrame(
    {
      [HEADER_EXCEPTION_TYPE]: exceptionType,
      [HEADER_CONTENT_TYPE]: "application/json",
      [HEADER_MESSAGE_TYPE]: "exception",
    },
    payload
  );
}

function toPayloadBytes(payload: unknown): Uint8Array {
  if (payload === undefined || payload === null) return new Uint8Array(0);
  if (payload instanceof Uint8Array) return payload;
  if (typeof payload === "string") return utf8Encoder.encode(payload);
  return utf8Encoder.encode(JSON.stringify(payload));
}
