/**
 * Rough token estimate: about four characters per token.
 * Used for output usage on streamed responses.
 */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor(text.length / 4));
}

/**
 * Estimate for a whole request body (count_tokens and message_start usage)
 */
export function estimateRequestTokens(body: unknown): number {
  const text = typeof body === "string" ? body : JSON.stringify(body) ?? "";
  return Math.ceil(text.length / 4);
}
