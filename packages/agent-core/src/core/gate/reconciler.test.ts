import test from "node:test";
import assert from "node:assert/strict";
import { ConversationMessage, FeedbackMessage, MemoryNamespace } from "../contracts";
import { PreferenceStoreUnavailableError } from "../errors";
import { namespaceKey } from "../preferences/namespace";
import { EMAIL_REJECTION_FEEDBACK, TRIAGE_NAMESPACE } from "../../email/policies";
import { MEMORY_MERGE_REMINDER, PreferenceUpdater } from "./memoryUpdates";
import { PostSuspensionReconciler, buildRejectionInstruction, findProposedArgs } from "./reconciler";

class RecordingPreferences implements PreferenceUpdater {
  readonly updates: Array<{ namespace: string; messages: FeedbackMessage[] }> = [];
  failuresLeft = 0;

  async update(namespace: MemoryNamespace, feedbackMessages: FeedbackMessage[]): Promise<string> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new PreferenceStoreUnavailableError(namespaceKey(namespace), "store offline");
    }
    this.updates.push({ namespace: namespaceKey(namespace), messages: feedbackMessages });
    return "";
  }
}

const rejectedDraft: ConversationMessage[] = [
  { role: "user", content: "Respond to the email: vendor pitch" },
  {
    role: "assistant",
    content: "",
    toolCalls: [{ id: "call-1", name: "write_email", args: { to: "sales@example.com", subject: "Re: pitch" } }]
  },
  { role: "tool", toolCallId: "call-1", name: "write_email", content: "Not interested", status: "error" }
];

function createReconciler(preferences: PreferenceUpdater) {
  return new PostSuspensionReconciler({
    rejectionFeedback: EMAIL_REJECTION_FEEDBACK,
    triageNamespace: TRIAGE_NAMESPACE,
    preferences
  });
}

test("a rejected draft updates triage with the proposed args and the reason", async () => {
  const preferences = new RecordingPreferences();
  const reconciler = createReconciler(preferences);

  const processed = await reconciler.scan(rejectedDraft, {
    runId: "run-1",
    checkpoint: "before_model",
    processedIds: new Set()
  });

  assert.deepEqual(processed, ["call-1"]);
  assert.equal(preferences.updates.length, 1);
  const [update] = preferences.updates;
  assert.equal(update.namespace, "email_assistant:triage_preferences");
  assert.equal(update.messages.length, 4);
  assert.equal(
    update.messages[3].content,
    `${EMAIL_REJECTION_FEEDBACK.write_email}\n\nRejected tool call: write_email\nArguments: {\n` +
      `  "to": "sales@example.com",\n  "subject": "Re: pitch"\n}\n\nUser's rejection reason: Not interested` +
      `\n\n${MEMORY_MERGE_REMINDER}`
  );
});

test("ids already processed are skipped", async () => {
  const preferences = new RecordingPreferences();
  const reconciler = createReconciler(preferences);

  const processed = await reconciler.scan(rejectedDraft, {
    runId: "run-1",
    checkpoint: "after_tool",
    processedIds: new Set(["call-1"])
  });

  assert.deepEqual(processed, []);
  assert.deepEqual(preferences.updates, []);
});

test("unwatched tools and successful results are ignored", async () => {
  const preferences = new RecordingPreferences();
  const reconciler = createReconciler(preferences);
  const messages: ConversationMessage[] = [
    { role: "assistant", content: "", toolCalls: [{ id: "q-1", name: "Question", args: { content: "?" } }] },
    { role: "tool", toolCallId: "q-1", name: "Question", content: "nope", status: "error" },
    { role: "tool", toolCallId: "call-5", name: "write_email", content: "Email sent", status: "success" }
  ];

  assert.deepEqual(
    await reconciler.scan(messages, { runId: "run-1", checkpoint: "before_model", processedIds: new Set() }),
    []
  );
  assert.deepEqual(preferences.updates, []);
});

test("memory failures still mark the id as processed", async () => {
  const preferences = new RecordingPreferences();
  preferences.failuresLeft = 1;
  const reconciler = createReconciler(preferences);

  const processed = await reconciler.scan(rejectedDraft, {
    runId: "run-1",
    checkpoint: "before_model",
    processedIds: new Set()
  });

  assert.deepEqual(processed, ["call-1"]);
  assert.deepEqual(preferences.updates, []);
});

test("proposed args fall back to an empty object and the reason is optional", () => {
  assert.deepEqual(findProposedArgs(rejectedDraft, "missing"), {});
  assert.equal(
    buildRejectionInstruction("Rejected.", "schedule_meeting", {}, ""),
    "Rejected.\n\nRejected tool call: schedule_meeting\nArguments: {}"
  );
});
