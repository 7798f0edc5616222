/**
 * ProviderTransport — how to talk to a model API.
 *
 * Owns: auth, endpoint URL, HTTP headers, stream format, request envelope.
 * Does NOT own: decoding or translating the response stream (stream parsers).
 */

import type { ClaudeMessagesRequest } from "../../types.js";

/** The wire format used for streaming responses */
export type StreamFormat = "aws-eventstream";

export interface ProviderTransport {
  /** Internal provider identifier (e.g., "amazonq") */
  readonly name: string;

  /** Human-readable name for display */
  readonly displayName: string;

  /** Which stream parser to use for this provider's responses */
  readonly streamFormat: StreamFormat;

  /** Get the full API endpoint URL for a request */
  getEndpoint(): string;

  /** Get HTTP headers (may be async for token refresh) */
  getHeaders(): Promise<Record<string, string>>;

  /**
   * Optional payload transformation before sending.
   * Used by providers that wrap the request in an envelope.
   */
  transformPayload?(payload: ClaudeMessagesRequest): unknown;
}
