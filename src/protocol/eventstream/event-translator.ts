/**
 * EventTranslator — vendor events → canonical streaming events.
 *
 * State machine (one instance per upstream response):
 *
 *   NOT_STARTED ──initial-response──▶ STREAMING ──EOF / error──▶ TERMINATED
 *
 * The vendor never sends block boundaries, so they are synthesized: the first
 * text fragment opens a text block, a tool use closes whatever is open and
 * opens a tool_use block, and EOF closes the last one before stream-stop.
 * Indices are sequential from 0; blocks never overlap.
 *
 * Exactly one terminal event (stream-stop or error) is ever produced. Once
 * terminated, every call returns an empty list.
 */

import { log, debugLog } from "../../logger.js";
import { estimateTokens } from "../../utils/tokens.js";
import type { CanonicalEvent, ContentBlock } from "./canonical-events.js";
import { EventStreamError, ProtocolViolationError } from "./errors.js";
import type { Frame } from "./types.js";
import { classifyFrame, type VendorEvent } from "./vendor-events.js";

export enum TranslatorState {
  NOT_STARTED = "NOT_STARTED",
  STREAMING = "STREAMING",
  TERMINATED = "TERMINATED",
}

export interface EventTranslatorOptions {
  /** Model name reported on stream-start */
  model: string;
  /** Output token estimator for stream-stop (defaults to ~4 chars/token) */
  estimateTokens?: (text: string) => number;
}

type OpenBlock = { index: number; block: ContentBlock };

export class EventTranslator {
  private state: TranslatorState = TranslatorState.NOT_STARTED;
  private _conversationId: string | null = null;
  private openBlock: OpenBlock | null = null;
  private nextBlockIndex = 0;
  private sawToolUse = false;
  private outputText = "";
  private readonly model: string;
  private readonly estimate: (text: string) => number;

  constructor(options: EventTranslatorOptions) {
    this.model = options.model;
    this.estimate = options.estimateTokens ?? estimateTokens;
  }

  get conversationId(): string | null {
    return this._conversationId;
  }

  get contentBlockOpen(): boolean {
    return this.openBlock !== null;
  }

  get streamTerminated(): boolean {
    return this.state === TranslatorState.TERMINATED;
  }

  getState(): TranslatorState {
    return this.state;
  }

  /**
   * Translate one validated frame. Payload problems terminate the session
   * with an error event rather than throwing.
   */
  translate(frame: Frame): CanonicalEvent[] {
    if (this.streamTerminated) return [];

    let event: VendorEvent;
    try {
      event = classifyFrame(frame);
    } catch (err) {
      return this.fail(err);
    }
    return this.translateEvent(event);
  }

  /**
   * Translate one already-classified vendor event
   */
  translateEvent(event: VendorEvent): CanonicalEvent[] {
    if (this.streamTerminated) return [];

    debugLog("events", `vendor ${event.kind}`, () => ({ event, state: this.state }));

    switch (event.kind) {
      case "conversation-start":
        return this.onConversationStart(event.conversationId);
      case "text-fragment": {
        const { text } = event;
        return this.whenStarted(event.kind, () => this.onTextFragment(text));
      }
      case "tool-use": {
        const toolUse = event;
        return this.whenStarted(event.kind, () => this.onToolUse(toolUse));
      }
      case "response-end":
        return this.whenStarted(event.kind, () => this.closeBlock());
      case "vendor-error":
        log(`[EventTranslator] Vendor error (${event.errorType}): ${event.message}`);
        return this.terminate({ type: "error", errorType: event.errorType, message: event.message });
      case "unrecognized":
        log(
          `[EventTranslator] Skipping unrecognized event: ${event.eventType ?? "(no event-type)"}` +
            (event.messageType ? ` (message-type ${event.messageType})` : "")
        );
        return [];
      default:
        return assertNever(event);
    }
  }

  /**
   * End of the upstream byte stream. Closes the open block and emits
   * stream-stop, or an error if the conversation never started.
   */
  finish(): CanonicalEvent[] {
    if (this.streamTerminated) return [];

    if (this.state === TranslatorState.NOT_STARTED) {
      return this.fail(new ProtocolViolationError("Upstream stream ended before the conversation started"));
    }

    const events = this.closeBlock();
    const outputTokens = this.estimate(this.outputText);
    log(`[EventTranslator] Stream complete: conversation=${this._conversationId}, output≈${outputTokens} tokens`);

    return [
      ...events,
      ...this.terminate({
        type: "stream-stop",
        stopReason: this.sawToolUse ? "tool_use" : "end_turn",
        outputTokens,
      }),
    ];
  }

  /**
   * Terminate with an error event: decoder corruption, transport failure,
   * or a protocol violation. No block-stop / stream-stop is emitted.
   */
  fail(error: unknown): CanonicalEvent[] {
    if (this.streamTerminated) return [];

    const message = error instanceof Error ? error.message : String(error);
    const name = error instanceof EventStreamError ? error.name : "UpstreamError";
    log(`[EventTranslator] ${name}: ${message}`);

    return this.terminate({ type: "error", errorType: "api_error", message });
  }

  private onConversationStart(conversationId: string): CanonicalEvent[] {
    if (this.state !== TranslatorState.NOT_STARTED) {
      log(`[EventTranslator] Ignoring repeated initial-response (conversation ${conversationId})`);
      return [];
    }

    this._conversationId = conversationId;
    this.transition(TranslatorState.STREAMING);
    return [{ type: "stream-start", conversationId, model: this.model }];
  }

  private onTextFragment(text: string): CanonicalEvent[] {
    const events: CanonicalEvent[] = [];
    let block = this.openBlock;

    if (!block || block.block.kind !== "text") {
      events.push(...this.closeBlock());
      block = this.open({ kind: "text" });
      events.push({ type: "block-start", index: block.index, block: block.block });
    }

    if (text) {
      this.outputText += text;
      events.push({ type: "content-delta", index: block.index, delta: { kind: "text", text } });
    }

    return events;
  }

  private onToolUse(event: Extract<VendorEvent, { kind: "tool-use" }>): CanonicalEvent[] {
    const events: CanonicalEvent[] = [];
    let block = this.openBlock;

    const current = block?.block;
    const isCurrentTool = current?.kind === "tool_use" && current.id === event.toolUseId;
    if (event.toolUseId && event.name && !isCurrentTool) {
      events.push(...this.closeBlock());
      block = this.open({ kind: "tool_use", id: event.toolUseId, name: event.name });
      this.sawToolUse = true;
      log(`[EventTranslator] Tool use started: ${event.name} (${event.toolUseId})`);
      events.push({ type: "block-start", index: block.index, block: block.block });
    }

    if (!block || block.block.kind !== "tool_use") {
      log(`[EventTranslator] Tool use fragment without an open tool block, skipped`);
      return events;
    }

    if (event.input !== undefined) {
      events.push({
        type: "content-delta",
        index: block.index,
        delta: { kind: "input_json", partialJson: event.input },
      });
    }

    if (event.stop) {
      events.push(...this.closeBlock());
    }

    return events;
  }

  private whenStarted(kind: VendorEvent["kind"], handler: () => CanonicalEvent[]): CanonicalEvent[] {
    if (this.state === TranslatorState.NOT_STARTED) {
      return this.fail(new ProtocolViolationError(`Received ${kind} before the conversation started`));
    }
    return handler();
  }

  private open(block: ContentBlock): OpenBlock {
    const opened = { index: this.nextBlockIndex++, block };
    this.openBlock = opened;
    return opened;
  }

  private closeBlock(): CanonicalEvent[] {
    if (!this.openBlock) return [];
    const { index } = this.openBlock;
    this.openBlock = null;
    return [{ type: "block-stop", index }];
  }

  private terminate(event: CanonicalEvent): CanonicalEvent[] {
    this.openBlock = null;
    this.transition(TranslatorState.TERMINATED);
    return [event];
  }

  private transition(next: TranslatorState): void {
    if (this.state === next) return;
    debugLog("events", `state ${this.state} → ${next}`);
    this.state = next;
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled vendor event: ${JSON.stringify(value)}`);
}
