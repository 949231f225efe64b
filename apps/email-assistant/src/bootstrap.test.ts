import test from "node:test";
import assert from "node:assert/strict";
import { RESPONSE_NAMESPACE, createInteractiveSuspensionChannel } from "@mailgate/core";
import type { LogEntry } from "@mailgate/observability";
import { buildEmailRequest, createAssistantApp, openSchemaStore } from "./bootstrap";
import { AssistantConfig } from "./config";
import { ChatRequest } from "./llm";

const config: AssistantConfig = {
  llmApiKey: "test-secret",
  llmApiBaseUrl: "http://localhost:9/v1",
  llmModel: "test-model",
  llmTemperature: 0,
  rateLimitRetryMs: 0,
  maxSteps: 6
};

const email = {
  author: "alex@example.com",
  to: "me@example.com",
  subject: "Launch notes",
  emailThread: "Could you send the launch notes?"
};

test("the request message carries the email", () => {
  assert.equal(
    buildEmailRequest(email),
    "Respond to the email:\n\n**Subject**: Launch notes\n**From**: alex@example.com\n**To**: me@example.com\n\n" +
      "Could you send the launch notes?\n\n---\n"
  );
});

test("an edited draft is sent and the model's profile is stored", async () => {
  const answers = [
    JSON.stringify({
      content: "Replying",
      tool_calls: [
        { name: "triage_email", args: { classification: "respond", reasoning: "Direct request" } },
        { name: "write_email", args: { to: "alex@example.com", subject: "Re: Launch notes", content: "Attached." } }
      ]
    }),
    JSON.stringify({ content: "All set", tool_calls: [{ name: "Done", args: { done: true } }] })
  ];
  const requests: ChatRequest[] = [];
  const logs: LogEntry[] = [];

  const app = await createAssistantApp({
    config,
    logger: (entry) => logs.push(entry),
    complete: async (request) => {
      requests.push(request);
      const answer = answers[requests.length - 1];
      if (!answer) {
        throw new Error("unexpected planner call");
      }
      return answer;
    },
    generatePreferenceUpdate: async () => ({
      chain_of_thought: "The user prefers shorter replies.",
      user_preferences: "Keep replies to one sentence."
    }),
    channel: createInteractiveSuspensionChannel(async (request) => ({
      type: "edit",
      args: { ...request.toolCall.args, content: "Notes attached, thanks!" }
    }))
  });

  const result = await app.runtime.start({ email, messages: [{ role: "user", content: buildEmailRequest(email) }] });
  await app.close();

  assert.equal(result.status, "completed");
  assert.deepEqual(result.output, { toolName: "Done", args: { done: true }, result: "Email handled." });
  assert.equal(await app.preferences.get(RESPONSE_NAMESPACE, ""), "Keep replies to one sentence.");
  assert.equal(requests.length, 2);
  assert.ok(requests[1].system.includes("Keep replies to one sentence."));
  assert.deepEqual(logs[0], { event: "preference_store_ready", backend: "memory" });
});

test("a store whose schema cannot be created is closed before the error surfaces", async () => {
  const calls: string[] = [];
  const store = {
    async ensureSchema() {
      calls.push("ensureSchema");
      throw new Error("connection refused");
    },
    async close() {
      calls.push("close");
    }
  };

  await assert.rejects(openSchemaStore(store), { message: "connection refused" });
  assert.deepEqual(calls, ["ensureSchema", "close"]);
});

test("a store with a ready schema stays open", async () => {
  const calls: string[] = [];
  const store = {
    async ensureSchema() {
      calls.push("ensureSchema");
    },
    async close() {
      calls.push("close");
    }
  };

  assert.equal(await openSchemaStore(store), store);
  assert.deepEqual(calls, ["ensureSchema"]);
});
