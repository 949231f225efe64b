import { silentLogger, withLogContext } from "@mailgate/observability";
import type { RunEventSink, StructuredLogger } from "@mailgate/observability";
import { AgentRuntime } from "../core/agentRuntime";
import { ActionPlanner, DecisionSynthesizer, SuspensionChannel, ToolExecutor } from "../core/contracts";
import { ApprovalGate } from "../core/gate/approvalGate";
import { PostSuspensionReconciler } from "../core/gate/reconciler";
import { DurableSuspensionChannel } from "../core/gate/suspension";
import { RuntimeTelemetry } from "../core/observability";
import { InMemoryPreferencePersistence, PreferencePersistencePort } from "../core/persistence/preferences";
import { AgentPersistencePort } from "../core/persistence/repositories";
import { PreferenceStore } from "../core/preferences/preferenceStore";
import { renderApprovalContext } from "./formatting";
import {
  EMAIL_GATE_TOOLS,
  EMAIL_INTERRUPT_ON,
  EMAIL_PREFERENCE_NAMESPACES,
  EMAIL_REJECTION_FEEDBACK,
  EMAIL_TERMINAL_TOOLS,
  TRIAGE_NAMESPACE
} from "./policies";
import { createEmailToolRegistry } from "./tools";

export interface EmailAssistantDeps {
  planner: ActionPlanner;
  synthesizer: DecisionSynthesizer;
  /** Interactive channel; a durable one is created when omitted so runs can suspend and resume. */
  channel?: SuspensionChannel;
  executor?: ToolExecutor;
  preferencePersistence?: PreferencePersistencePort;
  runPersistence?: AgentPersistencePort;
  eventSink?: RunEventSink;
  maxSteps?: number;
  memoryContextWindow?: number;
  logger?: StructuredLogger;
  now?: () => Date;
}

export interface EmailAssistant {
  runtime: AgentRuntime;
  preferences: PreferenceStore;
  gate: ApprovalGate;
  reconciler: PostSuspensionReconciler;
  durableChannel?: DurableSuspensionChannel;
}

export function createEmailAssistant(deps: EmailAssistantDeps): EmailAssistant {
  const logger = deps.logger ?? silentLogger;
  const telemetry = new RuntimeTelemetry({
    enabled: deps.eventSink !== undefined,
    sink: deps.eventSink,
    logger: withLogContext(logger, { component: "telemetry" }),
    now: deps.now
  });

  const preferences = new PreferenceStore({
    persistence: deps.preferencePersistence ?? new InMemoryPreferencePersistence(),
    synthesizer: deps.synthesizer,
    defaults: Object.values(EMAIL_PREFERENCE_NAMESPACES),
    logger: withLogContext(logger, { component: "preference-store" }),
    now: deps.now
  });

  let durableChannel: DurableSuspensionChannel | undefined;
  let channel: SuspensionChannel;
  if (deps.channel) {
    channel = deps.channel;
  } else {
    durableChannel = new DurableSuspensionChannel();
    channel = durableChannel;
  }

  const gate = new ApprovalGate({
    interruptOn: EMAIL_INTERRUPT_ON,
    tools: EMAIL_GATE_TOOLS,
    triageNamespace: TRIAGE_NAMESPACE,
    executor: deps.executor ?? createEmailToolRegistry(),
    preferences,
    channel,
    memoryContextWindow: deps.memoryContextWindow,
    renderDisplayContext: renderApprovalContext,
    telemetry,
    logger: withLogContext(logger, { component: "approval-gate" })
  });

  const reconciler = new PostSuspensionReconciler({
    rejectionFeedback: EMAIL_REJECTION_FEEDBACK,
    triageNamespace: TRIAGE_NAMESPACE,
    preferences,
    memoryContextWindow: deps.memoryContextWindow,
    telemetry,
    logger: withLogContext(logger, { component: "reconciler" })
  });

  const runtime = new AgentRuntime({
    planner: deps.planner,
    gate,
    reconciler,
    preferences,
    preferenceNamespaces: EMAIL_PREFERENCE_NAMESPACES,
    resumeChannel: durableChannel,
    persistence: deps.runPersistence,
    terminalTools: EMAIL_TERMINAL_TOOLS,
    maxSteps: deps.maxSteps,
    telemetry,
    logger: withLogContext(logger, { component: "agent-runtime" }),
    now: deps.now
  });

  return { runtime, preferences, gate, reconciler, ...(durableChannel ? { durableChannel } : {}) };
}
