// services/claudeRetry.ts
// Retry wrapper for Claude API calls with rate limit (429) handling

import type { Message, MessageCreateParamsNonStreaming } from "@anthropic-ai/sdk/resources/messages";

const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 10_000;

/** The part of the Anthropic client the recipe service calls. */
export interface MessagesClient<R = Message> {
  messages: {
    create(params: MessageCreateParamsNonStreaming): Promise<R>;
  };
}

export class RateLimitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RateLimitError";
  }
}

function isRateLimit(error: unknown): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === 429;
}

/**
 * Wraps client.messages.create() with automatic retry on 429 rate limit errors.
 * Retries up to 2 times with a 10-second delay between attempts.
 * On final failure, throws a user-friendly error.
 */
export async function createWithRetry<R>(
  client: MessagesClient<R>,
  params: MessageCreateParamsNonStreaming,
  delayMs = RETRY_DELAY_MS,
): Promise<R> {
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await client.messages.create(params);
    } catch (error: unknown) {
      if (!isRateLimit(error)) throw error;
      if (attempt === MAX_RETRIES) {
        console.error(`[claudeRetry] Rate limited after ${MAX_RETRIES + 1} attempts`);
        throw new RateLimitError("High demand right now. Please wait 60 seconds and try again.");
      }
      console.warn(`[claudeRetry] Rate limited (attempt ${attempt + 1}/${MAX_RETRIES + 1}), retrying in ${delayMs / 1000}s...`);
      await new Promise((r) => setTimeout(r, delayMs));
    }
  }
  // Unreachable, but satisfies TypeScript
  throw new Error("Unexpected retry loop exit");
}
