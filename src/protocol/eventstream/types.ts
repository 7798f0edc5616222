/**
 * Event-stream type definitions
 */

import { HeaderType } from "./constants.js";

/**
 * A typed header value as it appears on the wire
 */
export type HeaderValue =
  | { type: HeaderType.BOOL_TRUE; value: true }
  | { type: HeaderType.BOOL_FALSE; value: false }
  | { type: HeaderType.BYTE; value: number }
  | { type: HeaderType.SHORT; value: number }
  | { type: HeaderType.INTEGER; value: number }
  | { type: HeaderType.LONG; value: bigint }
  | { type: HeaderType.BYTE_ARRAY; value: Uint8Array }
  | { type: HeaderType.STRING; value: string }
  | { type: HeaderType.TIMESTAMP; value: Date }
  | { type: HeaderType.UUID; value: string };

export type FrameHeaders = ReadonlyMap<string, HeaderValue>;

/**
 * One validated frame. Only produced after both checksums pass.
 */
export type Frame = {
  readonly totalLength: number;
  readonly headersLength: number;
  readonly preludeChecksum: number;
  readonly headers: FrameHeaders;
  readonly payload: Uint8Array;
  readonly messageChecksum: number;
};

/**
 * Result of a single extraction attempt
 */
export type ExtractResult =
  | { status: "frame"; frame: Frame }
  | { status: "need-more-data" };

/**
 * Read a header as a string, or undefined when absent or not a string
 */
export function getStringHeader(headers: FrameHeaders, name: string): string | undefined {
  const header = headers.get(name);
  return header?.type === HeaderType.STRING ? header.value : undefined;
}
