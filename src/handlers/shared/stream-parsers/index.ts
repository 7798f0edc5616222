/**
 * Stream parsers — convert provider-specific streaming formats to Claude SSE.
 *
 * Each parser takes a Response from a provider API and returns a Response
 * with Claude-compatible SSE events (message_start, content_block_delta, etc.).
 */

export { createAmazonQEventStream, type AmazonQEventStreamOptions } from "./amazonq-eventstream.js";
