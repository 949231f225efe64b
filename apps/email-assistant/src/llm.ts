import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import type { CoreMessage, LanguageModel } from "ai";
import { silentLogger, toErrorMessage } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import { AssistantConfig } from "./config";

export type ChatRequest = {
  system: string;
  messages: CoreMessage[];
};

/** Text completion boundary; tests swap in scripted answers. */
export type ChatCompletion = (request: ChatRequest) => Promise<string>;

export type RateLimitRetryOptions = {
  maxRetryMs: number;
  logger?: StructuredLogger;
  sleep?: (ms: number) => Promise<void>;
};

export function createLanguageModel(config: Pick<AssistantConfig, "llmApiKey" | "llmApiBaseUrl" | "llmModel">): LanguageModel {
  const provider = createOpenAI({
    apiKey: config.llmApiKey,
    baseURL: config.llmApiBaseUrl.replace(/\/$/, "")
  });
  return provider(config.llmModel);
}

export function isRetryableRateLimitError(error: unknown): boolean {
  const normalized = toErrorMessage(error).toLowerCase();
  return (
    normalized.includes("rate limit") ||
    normalized.includes("too many requests") ||
    normalized.includes("429")
  );
}

export function extractRetryAfterMs(message: string): number | null {
  const retryAfterMatch = message.match(/retry-after[^0-9]*([0-9]+(?:\.[0-9]+)?)/i);
  if (retryAfterMatch) {
    const seconds = Number.parseFloat(retryAfterMatch[1] ?? "");
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.round(seconds * 1000);
    }
  }

  const minSecMatch = message.match(/try again in\s*([0-9]+)m([0-9]+(?:\.[0-9]+)?)s/i);
  if (minSecMatch) {
    const minutes = Number.parseInt(minSecMatch[1] ?? "", 10);
    const seconds = Number.parseFloat(minSecMatch[2] ?? "");
    if (Number.isFinite(minutes) && Number.isFinite(seconds)) {
      return Math.round((minutes * 60 + seconds) * 1000);
    }
  }

  const secMatch = message.match(/try again in\s*([0-9]+(?:\.[0-9]+)?)s/i);
  if (secMatch) {
    const seconds = Number.parseFloat(secMatch[1] ?? "");
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.round(seconds * 1000);
    }
  }

  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retries once when the provider asks for a short back-off; longer waits and
 * every other error go straight to the caller.
 */
export async function withRateLimitRetry<T>(call: () => Promise<T>, options: RateLimitRetryOptions): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (!isRetryableRateLimitError(error)) {
      throw error;
    }
    const retryAfterMs = extractRetryAfterMs(toErrorMessage(error));
    if (retryAfterMs === null || retryAfterMs > options.maxRetryMs) {
      throw error;
    }
    (options.logger ?? silentLogger)({ level: "warn", event: "llm_rate_limited", retryAfterMs });
    await (options.sleep ?? sleep)(retryAfterMs);
    return call();
  }
}

export function createChatCompletion(
  model: LanguageModel,
  options: RateLimitRetryOptions & { temperature: number }
): ChatCompletion {
  return async (request) =>
    withRateLimitRetry(async () => {
      const { text } = await generateText({
        model,
        temperature: options.temperature,
        system: request.system,
        messages: request.messages
      });
      return text;
    }, options);
}
