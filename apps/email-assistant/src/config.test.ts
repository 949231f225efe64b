import test from "node:test";
import assert from "node:assert/strict";
import { ValidationRuntimeError } from "@mailgate/core";
import { loadAssistantConfig } from "./config";

test("defaults fill everything but the api key", () => {
  assert.deepEqual(loadAssistantConfig({ LLM_API_KEY: "test-secret" }), {
    llmApiKey: "test-secret",
    llmApiBaseUrl: "https://api.openai.com/v1",
    llmModel: "gpt-4o-mini",
    llmTemperature: 0,
    rateLimitRetryMs: 3000,
    maxSteps: 32
  });
});

test("numeric and optional settings are parsed", () => {
  const config = loadAssistantConfig({
    LLM_API_KEY: "test-secret",
    LLM_API_BASE_URL: "http://localhost:8080/v1",
    LLM_TEMPERATURE: "0.3",
    AGENT_MAX_STEPS: "8",
    MEMORY_CONTEXT_WINDOW: "6",
    DATABASE_URL: "postgres://localhost/mailgate",
    ASSISTANT_BACKGROUND: "  I lead the platform team. "
  });

  assert.equal(config.llmApiBaseUrl, "http://localhost:8080/v1");
  assert.equal(config.llmTemperature, 0.3);
  assert.equal(config.maxSteps, 8);
  assert.equal(config.memoryContextWindow, 6);
  assert.equal(config.databaseUrl, "postgres://localhost/mailgate");
  assert.equal(config.background, "I lead the platform team.");
});

test("blank values count as missing", () => {
  const config = loadAssistantConfig({ LLM_API_KEY: "test-secret", DATABASE_URL: "  ", MEMORY_CONTEXT_WINDOW: "" });
  assert.equal(config.databaseUrl, undefined);
  assert.equal(config.memoryContextWindow, undefined);
});

test("invalid settings name the field", () => {
  assert.throws(
    () => loadAssistantConfig({}),
    (error: unknown) =>
      error instanceof ValidationRuntimeError &&
      error.message === "Invalid assistant configuration: LLM_API_KEY: Required"
  );
  assert.throws(
    () => loadAssistantConfig({ LLM_API_KEY: "test-secret", AGENT_MAX_STEPS: "0" }),
    /Invalid assistant configuration: AGENT_MAX_STEPS: /
  );
});
