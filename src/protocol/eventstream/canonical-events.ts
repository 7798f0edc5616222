/**
 * Canonical streaming events — the vendor-agnostic output of the translator.
 *
 * A well-formed sequence is:
 *   stream-start (block-start content-delta* block-stop)* (stream-stop | error)
 * or a lone error when the stream fails before it starts.
 */

export type ContentBlock =
  | { kind: "text" }
  | { kind: "tool_use"; id: string; name: string };

export type ContentDelta =
  | { kind: "text"; text: string }
  | { kind: "input_json"; partialJson: string };

export type StopReason = "end_turn" | "tool_use";

export type CanonicalEvent =
  | { type: "stream-start"; conversationId: string; model: string }
  | { type: "block-start"; index: number; block: ContentBlock }
  | { type: "content-delta"; index: number; delta: ContentDelta }
  | { type: "block-stop"; index: number }
  | { type: "stream-stop"; stopReason: StopReason; outputTokens: number }
  | { type: "error"; errorType: string; message: string };

export function isTerminalEvent(event: CanonicalEvent): boolean {
  return event.type === "stream-stop" || event.type === "error";
}
