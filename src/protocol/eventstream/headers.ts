/**
 * Header block codec.
 *
 * Each header is: name-len (1B) | name (UTF-8) | type (1B) | value
 * Variable-length values (byte array, string) carry a 2-byte length prefix.
 * UUIDs are accepted in either case and always decode as lower-case hex.
 */

import { HeaderType } from "./constants.js";
import { FrameCorruptionError } from "./errors.js";
import type { HeaderValue } from "./types.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

const UUID_LENGTH = 16;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Decode a header block into a name → value map.
 *
 * @param block - Exactly the header bytes (headers_length bytes)
 */
export function decodeHeaders(block: Uint8Array): Map<string, HeaderValue> {
  const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
  const headers = new Map<string, HeaderValue>();
  let offset = 0;

  const need = (count: number, what: string): void => {
    if (offset + count > block.byteLength) {
      throw new FrameCorruptionError(
        `Header block truncated reading ${what}: need ${count} bytes at offset ${offset}, block is ${block.byteLength} bytes`
      );
    }
  };

  const readUtf8 = (length: number, what: string): string => {
    need(length, what);
    try {
      const text = utf8Decoder.decode(block.subarray(offset, offset + length));
      offset += length;
      return text;
    } catch (err) {
      throw new FrameCorruptionError(`Invalid UTF-8 in ${what}: ${err}`);
    }
  };

  while (offset < block.byteLength) {
    const nameLength = view.getUint8(offset);
    offset += 1;
    const name = readUtf8(nameLength, "header name");

    need(1, `type of header ${name}`);
    const type: number = view.getUint8(offset);
    offset += 1;

    let header: HeaderValue;
    switch (type) {
      case HeaderType.BOOL_TRUE:
        header = { type: HeaderType.BOOL_TRUE, value: true };
        break;
      case HeaderType.BOOL_FALSE:
        header = { type: HeaderType.BOOL_FALSE, value: false };
        break;
      case HeaderType.BYTE:
        need(1, `value of header ${name}`);
        header = { type: HeaderType.BYTE, value: view.getInt8(offset) };
        offset += 1;
        break;
      case HeaderType.SHORT:
        need(2, `value of header ${name}`);
        header = { type: HeaderType.SHORT, value: view.getInt16(offset) };
        offset += 2;
        break;
      case HeaderType.INTEGER:
        need(4, `value of header ${name}`);
        header = { type: HeaderType.INTEGER, value: view.getInt32(offset) };
        offset += 4;
        break;
      case HeaderType.LONG:
        need(8, `value of header ${name}`);
        header = { type: HeaderType.LONG, value: view.getBigInt64(offset) };
        offset += 8;
        break;
      case HeaderType.BYTE_ARRAY: {
        need(2, `length of header ${name}`);
        const length = view.getUint16(offset);
        offset += 2;
        need(length, `value of header ${name}`);
        header = { type: HeaderType.BYTE_ARRAY, value: block.slice(offset, offset + length) };
        offset += length;
        break;
      }
      case HeaderType.STRING: {
        need(2, `length of header ${name}`);
        const length = view.getUint16(offset);
        offset += 2;
        header = { type: HeaderType.STRING, value: readUtf8(length, `value of header ${name}`) };
        break;
      }
      case HeaderType.TIMESTAMP:
        need(8, `value of header ${name}`);
        header = { type: HeaderType.TIMESTAMP, value: new Date(Number(view.getBigInt64(offset))) };
        offset += 8;
        break;
      case HeaderType.UUID:
        need(UUID_LENGTH, `value of header ${name}`);
        header = { type: HeaderType.UUID, value: formatUuid(block.subarray(offset, offset + UUID_LENGTH)) };
        offset += UUID_LENGTH;
        break;
      default:
        throw new FrameCorruptionError(`Unknown header type ${type} for header ${name}`);
    }

    headers.set(name, header);
  }

  return headers;
}

/**
 * Encode headers into a header block
 */
export function encodeHeaders(headers: Iterable<readonly [string, HeaderValue]>): Uint8Array {
  const parts: Uint8Array[] = [];

  for (const [name, header] of headers) {
    const nameBytes = utf8Encoder.encode(name);
    if (nameBytes.byteLength > 0xff) {
      throw new RangeError(`Header name too long: ${name}`);
    }
    parts.push(Uint8Array.of(nameBytes.byteLength), nameBytes, Uint8Array.of(header.type));
    parts.push(encodeValue(name, header));
  }

  return concatBytes(parts);
}

function encodeValue(name: string, header: HeaderValue): Uint8Array {
  switch (header.type) {
    case HeaderType.BOOL_TRUE:
    case HeaderType.BOOL_FALSE:
      return new Uint8Array(0);
    case HeaderType.BYTE: {
      const out = new Uint8Array(1);
      new DataView(out.buffer).setInt8(0, header.value);
      return out;
    }
    case HeaderType.SHORT: {
      const out = new Uint8Array(2);
      new DataView(out.buffer).setInt16(0, header.value);
      return out;
    }
    case HeaderType.INTEGER: {
      const out = new Uint8Array(4);
      new DataView(out.buffer).setInt32(0, header.value);
      return out;
    }
    case HeaderType.LONG: {
      const out = new Uint8Array(8);
      new DataView(out.buffer).setBigInt64(0, header.value);
      return out;
    }
    case HeaderType.TIMESTAMP: {
      const out = new Uint8Array(8);
      new DataView(out.buffer).setBigInt64(0, BigInt(header.value.getTime()));
      return out;
    }
    case HeaderType.BYTE_ARRAY:
      return withLengthPrefix(name, header.value);
    case HeaderType.STRING:
      return withLengthPrefix(name, utf8Encoder.encode(header.value));
    case HeaderType.UUID:
      return parseUuid(name, header.value);
  }
}

function withLengthPrefix(name: string, value: Uint8Array): Uint8Array {
  if (value.byteLength > 0xffff) {
    throw new RangeError(`Header value too long: ${name} (${value.byteLength} bytes)`);
  }
  const out = new Uint8Array(2 + value.byteLength);
  new DataView(out.buffer).setUint16(0, value.byteLength);
  out.set(value, 2);
  return out;
}

function formatUuid(bytes: Uint8Array): string {
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function parseUuid(name: string, uuid: string): Uint8Array {
  if (!UUID_PATTERN.test(uuid)) {
    throw new RangeError(`Invalid UUID for header ${name}: ${uuid}`);
  }
  const hex = uuid.replace(/-/g, "").toLowerCase();
  const out = new Uint8Array(UUID_LENGTH);
  for (let i = 0; i < UUID_LENGTH; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
}
