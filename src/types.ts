import { z } from "zod";

export interface ProxyServer {
  port: number;
  url: string;
  shutdown: () => Promise<void>;
}

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const systemBlockSchema = z
  .object({
    type: z.string(),
    text: z.string(),
  })
  .passthrough();

/**
 * The subset of a Claude Messages request the proxy reads. Unknown fields
 * are kept so they can be logged or forwarded.
 */
export const claudeMessagesRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(
      z
        .object({
          role: z.string(),
          content: z.union([z.string(), z.array(contentBlockSchema)]),
        })
        .passthrough()
    ),
    system: z.union([z.string(), z.array(systemBlockSchema)]).optional(),
    max_tokens: z.number().int().positive().optional(),
    stream: z.boolean().optional(),
  })
  .passthrough();

export type ClaudeMessagesRequest = z.infer<typeof claudeMessagesRequestSchema>;

export interface ClaudeErrorBody {
  error: { type: string; message: string };
}

export function errorBody(type: string, message: string): ClaudeErrorBody {
  return { error: { type, message } };
}
