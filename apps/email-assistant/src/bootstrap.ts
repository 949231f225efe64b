import {
  EMAIL_TOOLS,
  EmailAssistant,
  EmailInput,
  InMemoryPreferencePersistence,
  PostgresPreferencePersistence,
  PreferencePersistencePort,
  SuspensionChannel,
  createEmailAssistant,
  formatEmailMarkdown
} from "@mailgate/core";
import { withLogContext } from "@mailgate/observability";
import type { RunEventSink, StructuredLogger } from "@mailgate/observability";
import { AssistantConfig } from "./config";
import { ChatCompletion, createChatCompletion, createLanguageModel } from "./llm";
import { ModelActionPlanner } from "./planner";
import {
  GeneratePreferenceUpdate,
  ModelDecisionSynthesizer,
  createPreferenceUpdateGenerator
} from "./synthesizer";

export type AssistantAppDeps = {
  config: AssistantConfig;
  logger: StructuredLogger;
  channel?: SuspensionChannel;
  eventSink?: RunEventSink;
  /** Overrides for the model calls; the configured provider is used otherwise. */
  complete?: ChatCompletion;
  generatePreferenceUpdate?: GeneratePreferenceUpdate;
  preferencePersistence?: PreferencePersistencePort;
};

export type AssistantApp = EmailAssistant & {
  close(): Promise<void>;
};

export async function createAssistantApp(deps: AssistantAppDeps): Promise<AssistantApp> {
  const { config, logger } = deps;

  let complete = deps.complete;
  let generatePreferenceUpdate = deps.generatePreferenceUpdate;
  if (!complete || !generatePreferenceUpdate) {
    const model = createLanguageModel(config);
    complete ??= createChatCompletion(model, {
      temperature: config.llmTemperature,
      maxRetryMs: config.rateLimitRetryMs,
      logger: withLogContext(logger, { component: "llm" })
    });
    generatePreferenceUpdate ??= createPreferenceUpdateGenerator(model, config.llmTemperature);
  }

  let postgres: PostgresPreferencePersistence | undefined;
  let preferencePersistence = deps.preferencePersistence;
  if (!preferencePersistence) {
    if (config.databaseUrl) {
      postgres = await openSchemaStore(new PostgresPreferencePersistence(config.databaseUrl));
      preferencePersistence = postgres;
    } else {
      preferencePersistence = new InMemoryPreferencePersistence();
    }
  }
  logger({ event: "preference_store_ready", backend: postgres ? "postgres" : "memory" });

  const assistant = createEmailAssistant({
    planner: new ModelActionPlanner({
      complete,
      tools: EMAIL_TOOLS,
      background: config.background,
      logger: withLogContext(logger, { component: "planner" })
    }),
    synthesizer: new ModelDecisionSynthesizer(generatePreferenceUpdate),
    channel: deps.channel,
    preferencePersistence,
    eventSink: deps.eventSink,
    maxSteps: config.maxSteps,
    memoryContextWindow: config.memoryContextWindow,
    logger
  });

  return {
    ...assistant,
    close: async () => {
      await postgres?.close();
    }
  };
}

/** Prepares the schema, ending the store's pool when that fails. */
export async function openSchemaStore<T extends { ensureSchema(): Promise<void>; close(): Promise<void> }>(
  store: T
): Promise<T> {
  try {
    await store.ensureSchema();
  } catch (error) {
    await store.close();
    throw error;
  }
  return store;
}

export function buildEmailRequest(email: EmailInput): string {
  return `Respond to the email:${formatEmailMarkdown(email.subject, email.author, email.to, email.emailThread)}`;
}
