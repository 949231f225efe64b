import { z } from "zod";
import { ValidationRuntimeError } from "@mailgate/core";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  LLM_API_KEY: z.string().trim().min(1, "LLM_API_KEY is required"),
  LLM_API_BASE_URL: z.string().trim().url().default("https://api.openai.com/v1"),
  LLM_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_RATE_LIMIT_RETRY_MS: z.coerce.number().int().min(0).default(3000),
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(32),
  MEMORY_CONTEXT_WINDOW: z.coerce.number().int().positive().optional(),
  DATABASE_URL: optionalText,
  ASSISTANT_BACKGROUND: optionalText
});

export type AssistantConfig = {
  llmApiKey: string;
  llmApiBaseUrl: string;
  llmModel: string;
  llmTemperature: number;
  rateLimitRetryMs: number;
  maxSteps: number;
  memoryContextWindow?: number;
  databaseUrl?: string;
  background?: string;
};

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim().length === 0 ? undefined : value;
  }
  return cleaned;
}

export function loadAssistantConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ValidationRuntimeError(`Invalid assistant configuration: ${detail}`);
  }

  const values = parsed.data;
  return {
    llmApiKey: values.LLM_API_KEY,
    llmApiBaseUrl: values.LLM_API_BASE_URL,
    llmModel: values.LLM_MODEL,
    llmTemperature: values.LLM_TEMPERATURE,
    rateLimitRetryMs: values.LLM_RATE_LIMIT_RETRY_MS,
    maxSteps: values.AGENT_MAX_STEPS,
    ...(values.MEMORY_CONTEXT_WINDOW !== undefined ? { memoryContextWindow: values.MEMORY_CONTEXT_WINDOW } : {}),
    ...(values.DATABASE_URL ? { databaseUrl: values.DATABASE_URL } : {}),
    ...(values.ASSISTANT_BACKGROUND ? { background: values.ASSISTANT_BACKGROUND } : {})
  };
}
