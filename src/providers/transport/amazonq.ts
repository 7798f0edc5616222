/**
 * AmazonQProvider — Amazon Q / CodeWhisperer streaming transport.
 *
 * Transport concerns:
 * - Bearer token auth (token comes from configuration)
 * - AWS JSON 1.0 target header
 * - conversationState request envelope
 * - aws-eventstream response format
 */

import { randomUUID } from "node:crypto";
import type { ClaudeMessagesRequest } from "../../types.js";
import type { ProviderTransport, StreamFormat } from "./types.js";

const TARGET = "AmazonCodeWhispererStreamingService.GenerateAssistantResponse";

export class AmazonQProvider implements ProviderTransport {
  readonly name = "amazonq";
  readonly displayName = "Amazon Q";
  readonly streamFormat: StreamFormat = "aws-eventstream";

  private endpoint: string;
  private accessToken?: string;
  private model: string;

  constructor(endpoint: string, model: string, accessToken?: string) {
    this.endpoint = endpoint;
    this.model = model;
    this.accessToken = accessToken;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  hasCredentials(): boolean {
    return Boolean(this.accessToken);
  }

  async getHeaders(): Promise<Record<string, string>> {
    if (!this.accessToken) {
      throw new Error("AMAZONQ_ACCESS_TOKEN is required to call Amazon Q");
    }
    return {
      Authorization: `Bearer ${this.accessToken}`,
      "Content-Type": "application/x-amz-json-1.0",
      "X-Amz-Target": TARGET,
      Accept: "application/vnd.amazon.eventstream",
    };
  }

  /**
   * Wrap the latest user turn in the conversationState envelope.
   * Earlier turns are not replayed.
   */
  transformPayload(payload: ClaudeMessagesRequest): unknown {
    return {
      conversationState: {
        conversationId: randomUUID(),
        chatTriggerType: "MANUAL",
        currentMessage: {
          userInputMessage: {
            content: lastUserText(payload),
            modelId: this.model,
            origin: "AI_EDITOR",
          },
        },
        history: [],
      },
    };
  }
}

/**
 * Text of the last user message, with a string system prompt prepended
 */
export function lastUserText(payload: ClaudeMessagesRequest): string {
  const lastUser = [...payload.messages].reverse().find((m) => m.role === "user");
  let text = "";
  if (lastUser) {
    text =
      typeof lastUser.content === "string"
        ? lastUser.content
        : lastUser.content
            .flatMap((block) => (block.type === "text" && typeof block.text === "string" ? [block.text] : []))
            .join("\n");
  }

  const system =
    typeof payload.system === "string"
      ? payload.system
      : (payload.system ?? []).map((block) => block.text).join("\n");
  return system ? `${system}\n\n${text}` : text;
}
