import type { Context } from "hono";
import type { ClaudeMessagesRequest } from "../types.js";

export interface ModelHandler {
  handle(c: Context, payload: ClaudeMessagesRequest): Promise<Response>;
  shutdown(): Promise<void>;
}
