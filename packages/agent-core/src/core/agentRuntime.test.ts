import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryRunEventSink } from "@mailgate/observability";
import {
  ActionPlanner,
  AssistantMessage,
  DecisionSynthesizer,
  EmailInput,
  ProposeInput,
  SynthesizeInput,
  ToolCall
} from "./contracts";
import {
  InternalRuntimeError,
  ResumeValidationError,
  ToolExecutionError,
  ValidationRuntimeError
} from "./errors";
import { createInteractiveSuspensionChannel } from "./gate/suspension";
import { InMemoryPreferencePersistence } from "./persistence/preferences";
import { InMemoryAgentPersistence } from "./persistence/repositories";
import { namespaceKey } from "./preferences/namespace";
import { createEmailAssistant } from "../email/assistant";
import {
  CALENDAR_NAMESPACE,
  EMAIL_PREFERENCE_NAMESPACES,
  RESPONSE_NAMESPACE
} from "../email/policies";

class ScriptedPlanner implements ActionPlanner {
  readonly inputs: ProposeInput[] = [];

  constructor(private readonly script: AssistantMessage[]) {}

  async propose(input: ProposeInput): Promise<AssistantMessage> {
    this.inputs.push(structuredClone(input));
    const next = this.script[this.inputs.length - 1];
    if (!next) {
      throw new Error(`planner script exhausted at step ${input.stepIndex}`);
    }
    return structuredClone(next);
  }
}

class RecordingSynthesizer implements DecisionSynthesizer {
  readonly calls: SynthesizeInput[] = [];

  async synthesize(input: SynthesizeInput): Promise<string> {
    this.calls.push(input);
    return `${input.currentProfile}\n- learned`;
  }

  namespaces(): string[] {
    return this.calls.map((call) => namespaceKey(call.namespace));
  }
}

function propose(...toolCalls: ToolCall[]): AssistantMessage {
  return { role: "assistant", content: "", toolCalls };
}

const email: EmailInput = {
  author: "alex@example.com",
  to: "me@example.com",
  subject: "Launch review",
  emailThread: "Can you send me the launch notes by Friday?"
};

const triage: ToolCall = {
  id: "call-1",
  name: "triage_email",
  args: { classification: "respond", reasoning: "Direct request" }
};
const draft: ToolCall = {
  id: "call-2",
  name: "write_email",
  args: { to: "alex@example.com", subject: "Re: Launch review", content: "Will do." }
};
const done: ToolCall = { id: "call-3", name: "Done", args: { done: true } };

const FIXED_NOW = () => new Date("2026-03-01T10:00:00.000Z");

test("send-message: an edited draft is sent with the edit and teaches response preferences", async () => {
  const planner = new ScriptedPlanner([propose(triage, draft), propose(done)]);
  const synthesizer = new RecordingSynthesizer();
  const { runtime, preferences } = createEmailAssistant({ planner, synthesizer, now: FIXED_NOW });

  const first = await runtime.start({
    runId: "run-1",
    threadId: "thread-1",
    email,
    messages: [{ role: "user", content: "Respond to the email from alex@example.com" }]
  });

  assert.equal(first.status, "waiting_decision");
  assert.deepEqual(first.pending?.token, { runId: "run-1", suspensionId: "run-1:call-2" });
  assert.equal(first.pending?.request.policy.allowEdit, true);
  assert.deepEqual(
    first.messages.map((message) => message.role),
    ["user", "assistant", "tool"]
  );
  assert.equal(runtime.getRun("run-1")?.status, "waiting_decision");

  const edited = { ...draft.args, content: "Sending them Thursday." };
  const token = { runId: "run-1", suspensionId: "run-1:call-2" };
  const result = await runtime.resume(token, { type: "edit", args: { action: "write_email", args: edited } });

  assert.equal(result.status, "completed");
  assert.equal(planner.inputs.length, 2);
  const proposal = result.messages[1];
  assert.ok(proposal.role === "assistant");
  assert.deepEqual(proposal.toolCalls[1].args, edited);
  const sent = result.messages[3];
  assert.ok(sent.role === "tool");
  assert.equal(
    sent.content,
    "Email sent to alex@example.com with subject 'Re: Launch review' and content: Sending them Thursday."
  );

  assert.deepEqual(synthesizer.namespaces(), ["email_assistant:response_preferences"]);
  assert.equal(
    await preferences.get(RESPONSE_NAMESPACE, ""),
    `${EMAIL_PREFERENCE_NAMESPACES.response.defaultProfile}\n- learned`
  );
  assert.equal(planner.inputs[1].preferences.response, `${EMAIL_PREFERENCE_NAMESPACES.response.defaultProfile}\n- learned`);
  assert.deepEqual(
    runtime.listAuditRecords("run-1").map((record) => record.eventType),
    ["run_started", "suspended", "decision_applied", "run_terminal_completed"]
  );
});

test("ask-question: ignoring a question terminates the run and teaches triage", async () => {
  const question: ToolCall = { id: "call-1", name: "Question", args: { content: "Do you want to attend?" } };
  const planner = new ScriptedPlanner([propose(question, done)]);
  const synthesizer = new RecordingSynthesizer();
  const { runtime } = createEmailAssistant({ planner, synthesizer, now: FIXED_NOW });

  const first = await runtime.start({ runId: "run-2", email, messages: [{ role: "user", content: "Handle it" }] });
  assert.equal(first.status, "waiting_decision");

  const token = { runId: "run-2", suspensionId: "run-2:call-1" };
  const result = await runtime.resume(token, [{ type: "ignore" }]);

  assert.equal(result.status, "terminated");
  assert.deepEqual(result.output, {
    toolName: "Question",
    reason: "User ignored this question. Ignore this email and end the workflow."
  });
  assert.equal(result.messages.length, 3);
  assert.deepEqual(synthesizer.namespaces(), ["email_assistant:triage_preferences"]);

  await assert.rejects(runtime.resume(token, { type: "accept" }), ResumeValidationError);
});

test("a rejected draft is reconciled once into triage and the run carries on", async () => {
  const planner = new ScriptedPlanner([propose(draft), propose(done)]);
  const synthesizer = new RecordingSynthesizer();
  const { runtime } = createEmailAssistant({ planner, synthesizer, now: FIXED_NOW });

  await runtime.start({ runId: "run-3", email, messages: [{ role: "user", content: "Reply" }] });
  const result = await runtime.resumeWithRejection({ runId: "run-3", suspensionId: "run-3:call-2" }, "Do not reply to this");

  assert.equal(result.status, "completed");
  const rejection = result.messages[2];
  assert.deepEqual(rejection, {
    role: "tool",
    toolCallId: "call-2",
    name: "write_email",
    content: "Do not reply to this",
    status: "error"
  });
  assert.deepEqual(synthesizer.namespaces(), ["email_assistant:triage_preferences"]);
  assert.match(
    synthesizer.calls[0].feedbackMessages[synthesizer.calls[0].feedbackMessages.length - 1].content,
    /User's rejection reason: Do not reply to this/
  );
  assert.deepEqual(runtime.getRun("run-3")?.processedIds, ["call-2"]);
});

test("a proposal without tool calls completes the run", async () => {
  const planner = new ScriptedPlanner([{ role: "assistant", content: "Nothing to do.", toolCalls: [] }]);
  const { runtime } = createEmailAssistant({ planner, synthesizer: new RecordingSynthesizer() });

  const result = await runtime.start({ runId: "run-4", messages: [{ role: "user", content: "FYI" }] });

  assert.equal(result.status, "completed");
  assert.deepEqual(result.output, { content: "Nothing to do." });
  assert.deepEqual(Object.keys(planner.inputs[0].preferences).sort(), ["calendar", "response", "triage"]);
  assert.equal(planner.inputs[0].preferences.calendar, EMAIL_PREFERENCE_NAMESPACES.calendar.defaultProfile);
});

test("the step guard fails the run", async () => {
  const lookup: ToolCall = { id: "call-1", name: "check_calendar_availability", args: { day: "Monday" } };
  const planner = new ScriptedPlanner([propose(lookup), propose({ ...lookup, id: "call-2" }), propose(done)]);
  const { runtime } = createEmailAssistant({ planner, synthesizer: new RecordingSynthesizer(), maxSteps: 2 });

  await assert.rejects(
    runtime.start({ runId: "run-5", messages: [{ role: "user", content: "Check" }] }),
    ValidationRuntimeError
  );
  assert.equal(runtime.getRun("run-5")?.status, "failed");
  assert.equal(planner.inputs.length, 2);
  assert.deepEqual(
    runtime.listAuditRecords("run-5").map((record) => record.eventType),
    ["run_started", "run_terminal_failed"]
  );
});

test("executor failures are fatal for the run", async () => {
  const sink = new InMemoryRunEventSink();
  const planner = new ScriptedPlanner([propose(triage)]);
  const { runtime } = createEmailAssistant({
    planner,
    synthesizer: new RecordingSynthesizer(),
    executor: {
      async execute(name) {
        throw new ToolExecutionError(name, `Tool ${name} failed: mailbox offline`, true);
      }
    },
    eventSink: sink
  });

  await assert.rejects(runtime.start({ runId: "run-6", messages: [] }), ToolExecutionError);
  assert.equal(runtime.getRun("run-6")?.errorSummary, "Tool triage_email failed: mailbox offline");
  const failed = await sink.listRunEvents({ runId: "run-6", message: "run.failed" });
  assert.equal(failed.length, 1);
});

test("untyped planner errors are wrapped as internal errors", async () => {
  const { runtime } = createEmailAssistant({
    planner: new ScriptedPlanner([]),
    synthesizer: new RecordingSynthesizer()
  });

  await assert.rejects(runtime.start({ runId: "run-7", messages: [] }), (error: unknown) => {
    assert.ok(error instanceof InternalRuntimeError);
    assert.equal(error.message, "Unhandled runtime error: planner script exhausted at step 0");
    return true;
  });
});

test("a suspended run resumes from a serialized checkpoint in a fresh process", async () => {
  const runPersistence = new InMemoryAgentPersistence();
  const preferencePersistence = new InMemoryPreferencePersistence();
  const first = createEmailAssistant({
    planner: new ScriptedPlanner([propose(draft)]),
    synthesizer: new RecordingSynthesizer(),
    runPersistence,
    preferencePersistence
  });
  await first.runtime.start({ runId: "run-8", email, messages: [{ role: "user", content: "Reply" }] });

  const restoredRuns = InMemoryAgentPersistence.fromSnapshot(JSON.parse(JSON.stringify(runPersistence.toSnapshot())));
  assert.deepEqual(
    restoredRuns.listWaitingCheckpoints("run-8").map((checkpoint) => checkpoint.suspensionId),
    ["run-8:call-2"]
  );

  const planner = new ScriptedPlanner([propose(done)]);
  const second = createEmailAssistant({
    planner,
    synthesizer: new RecordingSynthesizer(),
    runPersistence: restoredRuns,
    preferencePersistence: InMemoryPreferencePersistence.fromSnapshot(preferencePersistence.toSnapshot())
  });
  const result = await second.runtime.resume({ runId: "run-8", suspensionId: "run-8:call-2" }, { type: "accept" });

  assert.equal(result.status, "completed");
  assert.equal(planner.inputs.length, 1);
  assert.equal(planner.inputs[0].stepIndex, 1);
  const sent = result.messages[2];
  assert.ok(sent.role === "tool");
  assert.equal(sent.content, "Email sent to alex@example.com with subject 'Re: Launch review' and content: Will do.");
});

test("resume rejects a token that does not match the pending suspension", async () => {
  const { runtime } = createEmailAssistant({
    planner: new ScriptedPlanner([propose(draft)]),
    synthesizer: new RecordingSynthesizer()
  });
  await runtime.start({ runId: "run-9", messages: [] });

  await assert.rejects(
    runtime.resume({ runId: "run-9", suspensionId: "run-9:call-7" }, { type: "accept" }),
    ResumeValidationError
  );
  await assert.rejects(
    runtime.resume({ runId: "missing", suspensionId: "missing:call-2" }, { type: "accept" }),
    ResumeValidationError
  );
  assert.equal(runtime.getRun("run-9")?.status, "waiting_decision");
});

test("an interactive reviewer completes a run without suspending", async () => {
  const meeting: ToolCall = {
    id: "call-4",
    name: "schedule_meeting",
    args: { attendees: ["alex@example.com"], subject: "Launch", duration_minutes: 45, preferred_day: "2026-03-03" }
  };
  const synthesizer = new RecordingSynthesizer();
  const reviewed: string[] = [];
  const { runtime, durableChannel } = createEmailAssistant({
    planner: new ScriptedPlanner([propose(meeting), propose(done)]),
    synthesizer,
    channel: createInteractiveSuspensionChannel(async (request) => {
      reviewed.push(request.suspensionId);
      return { type: "edit", args: { ...request.toolCall.args, duration_minutes: 30 } };
    })
  });

  const result = await runtime.start({ runId: "run-10", messages: [] });

  assert.equal(durableChannel, undefined);
  assert.equal(result.status, "completed");
  assert.deepEqual(reviewed, ["run-10:call-4"]);
  assert.deepEqual(synthesizer.namespaces(), [namespaceKey(CALENDAR_NAMESPACE)]);
  const scheduled = result.messages[2];
  assert.ok(scheduled.role === "tool");
  assert.equal(scheduled.content, "Meeting 'Launch' scheduled on 2026-03-03 for 30 minutes with 1 attendees");
  assert.deepEqual(runtime.getRun("run-10")?.processedIds, []);
});

test("a rejected draft followed by Done is reconciled before the run completes", async () => {
  const synthesizer = new RecordingSynthesizer();
  const { runtime } = createEmailAssistant({
    planner: new ScriptedPlanner([propose(draft, done)]),
    synthesizer,
    now: FIXED_NOW
  });

  await runtime.start({ runId: "run-11", email, messages: [{ role: "user", content: "Reply" }] });
  const result = await runtime.resumeWithRejection(
    { runId: "run-11", suspensionId: "run-11:call-2" },
    "not this one"
  );

  assert.equal(result.status, "completed");
  assert.deepEqual(
    result.messages.flatMap((message) => (message.role === "tool" ? [[message.name, message.status]] : [])),
    [
      ["write_email", "error"],
      ["Done", "success"]
    ]
  );
  assert.deepEqual(synthesizer.namespaces(), ["email_assistant:triage_preferences"]);
  assert.deepEqual(runtime.getRun("run-11")?.processedIds, ["call-2"]);
});

test("a rejected draft followed by an ignored question still teaches triage from both", async () => {
  const question: ToolCall = { id: "call-5", name: "Question", args: { content: "Should I loop in Sam?" } };
  const synthesizer = new RecordingSynthesizer();
  const { runtime } = createEmailAssistant({
    planner: new ScriptedPlanner([propose(draft, question)]),
    synthesizer,
    now: FIXED_NOW
  });

  await runtime.start({ runId: "run-12", email, messages: [{ role: "user", content: "Reply" }] });
  const waiting = await runtime.resumeWithRejection(
    { runId: "run-12", suspensionId: "run-12:call-2" },
    "not this one"
  );
  assert.equal(waiting.status, "waiting_decision");
  assert.deepEqual(waiting.pending?.token, { runId: "run-12", suspensionId: "run-12:call-5" });

  const result = await runtime.resume({ runId: "run-12", suspensionId: "run-12:call-5" }, { type: "ignore" });

  assert.equal(result.status, "terminated");
  assert.equal(synthesizer.calls.length, 2);
  assert.deepEqual(synthesizer.namespaces(), [
    "email_assistant:triage_preferences",
    "email_assistant:triage_preferences"
  ]);
  const lastFeedback = synthesizer.calls[1].feedbackMessages;
  assert.match(lastFeedback[lastFeedback.length - 1].content, /User's rejection reason: not this one/);
  assert.deepEqual(runtime.getRun("run-12")?.processedIds, ["call-2"]);
});

test("starting a run id twice is rejected without touching the first run", async () => {
  const { runtime } = createEmailAssistant({
    planner: new ScriptedPlanner([propose(draft), propose(draft)]),
    synthesizer: new RecordingSynthesizer()
  });

  const [first, second] = await Promise.allSettled([
    runtime.start({ runId: "run-13", messages: [] }),
    runtime.start({ runId: "run-13", messages: [] })
  ]);

  assert.equal(first.status, "fulfilled");
  assert.equal(second.status, "rejected");
  assert.ok(second.status === "rejected" && second.reason instanceof ValidationRuntimeError);
  assert.equal(runtime.getRun("run-13")?.status, "waiting_decision");
  assert.deepEqual(
    runtime.listAuditRecords("run-13").map((record) => record.eventType),
    ["run_started", "suspended"]
  );
});
