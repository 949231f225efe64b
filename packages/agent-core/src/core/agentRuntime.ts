import { uuidv7 } from "uuidv7";
import { silentLogger, toErrorMessage } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import {
  ActionPlanner,
  ApprovalRequest,
  AssistantMessage,
  ContinuationToken,
  ConversationMessage,
  EmailInput,
  GateOutcome,
  MemoryNamespace,
  PreferenceNamespaceConfig,
  PreferenceSnapshot,
  ToolCall
} from "./contracts";
import { InternalRuntimeError, ResumeValidationError, RuntimeError, ValidationRuntimeError } from "./errors";
import { ApprovalGate } from "./gate/approvalGate";
import { PostSuspensionReconciler, ReconcileCheckpoint } from "./gate/reconciler";
import { DurableSuspensionChannel, isRunSuspension } from "./gate/suspension";
import { RuntimeTelemetry } from "./observability";
import {
  AgentPersistencePort,
  AuditEventType,
  AuditRecord,
  InMemoryAgentPersistence,
  PendingToolCall,
  PersistedRun
} from "./persistence/repositories";

const DEFAULT_MAX_STEPS = 32;

export interface PreferenceReader {
  get(namespace: MemoryNamespace, defaultProfile: string): Promise<string>;
}

export interface AgentRuntimeOptions {
  planner: ActionPlanner;
  gate: ApprovalGate;
  reconciler: PostSuspensionReconciler;
  preferences: PreferenceReader;
  /** Profiles loaded before every planner call, keyed by the label the planner sees. */
  preferenceNamespaces: Readonly<Record<string, PreferenceNamespaceConfig>>;
  /** Must be the channel the gate suspends on; `resume` feeds decisions through it. */
  resumeChannel?: DurableSuspensionChannel;
  persistence?: AgentPersistencePort;
  terminalTools?: readonly string[];
  maxSteps?: number;
  telemetry?: RuntimeTelemetry;
  logger?: StructuredLogger;
  now?: () => Date;
}

export interface StartRunInput {
  messages: ConversationMessage[];
  email?: EmailInput;
  threadId?: string;
  runId?: string;
}

export type RunResultStatus = "completed" | "waiting_decision" | "terminated";

export interface RunResult {
  runId: string;
  threadId: string;
  status: RunResultStatus;
  messages: ConversationMessage[];
  pending?: {
    token: ContinuationToken;
    request: ApprovalRequest;
  };
  output?: Record<string, unknown>;
}

type LoopExit =
  | { status: "completed"; output: Record<string, unknown> }
  | { status: "terminated"; output: Record<string, unknown> }
  | { status: "waiting_decision"; pending: PendingToolCall; request: ApprovalRequest };

/**
 * Drives one run: reconcile, load preferences, ask the planner for the next
 * proposal, pass each proposed tool call through the gate. A run stopped at a
 * suspension is checkpointed and continues from the same tool call on resume.
 */
export class AgentRuntime {
  private readonly planner: ActionPlanner;
  private readonly gate: ApprovalGate;
  private readonly reconciler: PostSuspensionReconciler;
  private readonly preferences: PreferenceReader;
  private readonly preferenceNamespaces: Readonly<Record<string, PreferenceNamespaceConfig>>;
  private readonly resumeChannel?: DurableSuspensionChannel;
  private readonly persistence: AgentPersistencePort;
  private readonly terminalTools: ReadonlySet<string>;
  private readonly maxSteps: number;
  private readonly telemetry: RuntimeTelemetry;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;

  constructor(options: AgentRuntimeOptions) {
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new ValidationRuntimeError("Invalid max step guard: maxSteps must be a positive integer");
    }

    this.planner = options.planner;
    this.gate = options.gate;
    this.reconciler = options.reconciler;
    this.preferences = options.preferences;
    this.preferenceNamespaces = options.preferenceNamespaces;
    this.resumeChannel = options.resumeChannel;
    this.persistence = options.persistence ?? new InMemoryAgentPersistence();
    this.terminalTools = new Set(options.terminalTools ?? ["Done"]);
    this.maxSteps = maxSteps;
    this.telemetry = options.telemetry ?? new RuntimeTelemetry({ enabled: false });
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  getRun(runId: string): PersistedRun | undefined {
    return this.persistence.getRun(runId);
  }

  listAuditRecords(runId: string): AuditRecord[] {
    return this.persistence.listAuditRecords({ runId });
  }

  async start(input: StartRunInput): Promise<RunResult> {
    const runId = input.runId ?? `run_${uuidv7()}`;
    const occurredAt = this.now().toISOString();
    const run: PersistedRun = {
      runId,
      threadId: input.threadId ?? uuidv7(),
      status: "running",
      messages: structuredClone(input.messages),
      ...(input.email ? { email: structuredClone(input.email) } : {}),
      stepCount: 0,
      processedIds: [],
      createdAt: occurredAt,
      updatedAt: occurredAt
    };

    await this.persistence.withTransaction((tx) => {
      if (tx.getRun(runId)) {
        throw new ValidationRuntimeError(`Run already exists: ${runId}`);
      }
      tx.saveRun(run);
      tx.appendAuditRecord(this.auditRecord(run, "run_started"));
    });
    this.logger({ event: "run_started", runId, threadId: run.threadId });
    await this.telemetry.onRunStarted({ runId, threadId: run.threadId, resumed: false });

    return this.drive(run);
  }

  /** Continues a suspended run with the reviewer's decision payload. */
  async resume(token: ContinuationToken, payload: unknown): Promise<RunResult> {
    const channel = this.requireResumeChannel();
    const run = await this.claimSuspension(token, "decision_applied");
    channel.provideDecision(token.suspensionId, payload);
    return this.drive(run);
  }

  /** Continues a suspended run whose reviewer rejected the call instead of deciding. */
  async resumeWithRejection(token: ContinuationToken, reason: string): Promise<RunResult> {
    const channel = this.requireResumeChannel();
    const run = await this.claimSuspension(token, "rejection_applied");
    channel.provideRejection(token.suspensionId, reason);
    return this.drive(run);
  }

  private requireResumeChannel(): DurableSuspensionChannel {
    if (!this.resumeChannel) {
      throw new InternalRuntimeError("Resuming a run requires a durable suspension channel");
    }
    return this.resumeChannel;
  }

  private async claimSuspension(
    token: ContinuationToken,
    eventType: Extract<AuditEventType, "decision_applied" | "rejection_applied">
  ): Promise<PersistedRun> {
    const run = await this.persistence.withTransaction((tx) => {
      const existing = tx.getRun(token.runId);
      if (!existing) {
        throw new ResumeValidationError(`Unknown run: ${token.runId}`);
      }
      if (existing.status !== "waiting_decision" || existing.pending?.suspensionId !== token.suspensionId) {
        throw new ResumeValidationError(
          `Run ${token.runId} is not waiting on decision ${token.suspensionId}`
        );
      }
      const checkpoint = tx.consumeWaitingCheckpoint(token);
      if (!checkpoint) {
        throw new ResumeValidationError(`Decision ${token.suspensionId} was already consumed`);
      }

      existing.status = "running";
      existing.updatedAt = this.now().toISOString();
      tx.saveRun(existing);
      tx.appendAuditRecord(
        this.auditRecord(existing, eventType, { suspensionId: token.suspensionId, toolName: checkpoint.toolName })
      );
      return existing;
    });

    this.logger({ event: "run_resumed", runId: run.runId, suspensionId: token.suspensionId });
    await this.telemetry.onRunStarted({ runId: run.runId, threadId: run.threadId, resumed: true });
    return run;
  }

  private async drive(run: PersistedRun): Promise<RunResult> {
    try {
      const exit = await this.loop(run);
      return await this.finish(run, exit);
    } catch (error) {
      await this.fail(run, error);
      this.rethrowTypedError(error);
    }
  }

  private async loop(run: PersistedRun): Promise<LoopExit> {
    const processed = new Set(run.processedIds);
    let resumeAt = run.pending;
    run.pending = undefined;

    while (true) {
      let proposalIndex: number;
      let startIndex: number;

      if (resumeAt) {
        proposalIndex = resumeAt.proposalIndex;
        startIndex = resumeAt.toolCallIndex;
        resumeAt = undefined;
      } else {
        if (run.stepCount >= this.maxSteps) {
          throw new ValidationRuntimeError(
            `Max step guard exceeded: run ${run.runId} reached ${this.maxSteps} planner steps`
          );
        }

        await this.reconcile(run, processed, "before_model");
        const proposal = await this.planner.propose({
          runId: run.runId,
          stepIndex: run.stepCount,
          messages: structuredClone(run.messages),
          preferences: await this.loadPreferences(),
          ...(run.email ? { email: run.email } : {})
        });
        run.stepCount += 1;
        run.messages.push(structuredClone(proposal));
        proposalIndex = run.messages.length - 1;
        startIndex = 0;

        if (proposal.toolCalls.length === 0) {
          return { status: "completed", output: { content: proposal.content } };
        }
      }

      const callCount = this.proposalAt(run, proposalIndex).toolCalls.length;
      for (let toolCallIndex = startIndex; toolCallIndex < callCount; toolCallIndex += 1) {
        const toolCall = this.proposalAt(run, proposalIndex).toolCalls[toolCallIndex];

        let outcome: GateOutcome;
        try {
          outcome = await this.gate.intercept(toolCall, {
            runId: run.runId,
            threadId: run.threadId,
            messages: run.messages,
            ...(run.email ? { email: run.email } : {})
          });
        } catch (error) {
          if (isRunSuspension(error)) {
            run.processedIds = Array.from(processed);
            return {
              status: "waiting_decision",
              pending: { suspensionId: error.request.suspensionId, proposalIndex, toolCallIndex },
              request: error.request
            };
          }
          throw error;
        }

        this.applyOutcome(run, outcome);
        if (outcome.type === "terminate") {
          await this.reconcile(run, processed, "after_tool");
          run.processedIds = Array.from(processed);
          return { status: "terminated", output: { toolName: toolCall.name, reason: outcome.message.content } };
        }
        if (this.terminalTools.has(toolCall.name)) {
          await this.reconcile(run, processed, "after_tool");
          run.processedIds = Array.from(processed);
          return { status: "completed", output: terminalOutput(toolCall, outcome) };
        }
      }

      await this.reconcile(run, processed, "after_tool");
      run.processedIds = Array.from(processed);
    }
  }

  private applyOutcome(run: PersistedRun, outcome: GateOutcome): void {
    if (
      outcome.type === "edited" &&
      outcome.rewrittenProposal &&
      outcome.proposalIndex !== undefined &&
      run.messages[outcome.proposalIndex]?.role === "assistant"
    ) {
      run.messages[outcome.proposalIndex] = structuredClone(outcome.rewrittenProposal);
    }
    run.messages.push(structuredClone(outcome.message));
  }

  private proposalAt(run: PersistedRun, index: number): AssistantMessage {
    const message = run.messages[index];
    if (!message || message.role !== "assistant") {
      throw new InternalRuntimeError(`Run ${run.runId} has no proposal at message ${index}`);
    }
    return message;
  }

  private async reconcile(
    run: PersistedRun,
    processed: Set<string>,
    checkpoint: ReconcileCheckpoint
  ): Promise<void> {
    const reconciled = await this.reconciler.scan(run.messages, {
      runId: run.runId,
      threadId: run.threadId,
      checkpoint,
      processedIds: processed
    });
    for (const toolCallId of reconciled) {
      processed.add(toolCallId);
    }
  }

  private async loadPreferences(): Promise<PreferenceSnapshot> {
    const snapshot: PreferenceSnapshot = {};
    for (const [label, config] of Object.entries(this.preferenceNamespaces)) {
      snapshot[label] = await this.preferences.get(config.namespace, config.defaultProfile);
    }
    return snapshot;
  }

  private async finish(run: PersistedRun, exit: LoopExit): Promise<RunResult> {
    run.updatedAt = this.now().toISOString();

    if (exit.status === "waiting_decision") {
      run.status = "waiting_decision";
      run.pending = exit.pending;
      const token: ContinuationToken = { runId: run.runId, suspensionId: exit.pending.suspensionId };
      const toolName = exit.request.toolCall.name;
      await this.persistence.withTransaction((tx) => {
        tx.saveRun(run);
        tx.putWaitingCheckpoint({ ...token, toolName, createdAt: run.updatedAt });
        tx.appendAuditRecord(this.auditRecord(run, "suspended", { suspensionId: token.suspensionId, toolName }));
      });
      return {
        runId: run.runId,
        threadId: run.threadId,
        status: "waiting_decision",
        messages: structuredClone(run.messages),
        pending: { token, request: exit.request }
      };
    }

    run.status = exit.status;
    run.output = exit.output;
    await this.persistence.withTransaction((tx) => {
      tx.saveRun(run);
      tx.appendAuditRecord(
        this.auditRecord(
          run,
          exit.status === "completed" ? "run_terminal_completed" : "run_terminal_terminated",
          exit.output
        )
      );
    });
    this.logger({ event: "run_finished", runId: run.runId, status: exit.status, steps: run.stepCount });
    await this.telemetry.onRunTerminal({ runId: run.runId, threadId: run.threadId, status: exit.status });

    return {
      runId: run.runId,
      threadId: run.threadId,
      status: exit.status,
      messages: structuredClone(run.messages),
      output: structuredClone(exit.output)
    };
  }

  private async fail(run: PersistedRun, error: unknown): Promise<void> {
    const errorSummary = toErrorMessage(error);
    run.status = "failed";
    run.pending = undefined;
    run.errorSummary = errorSummary;
    run.updatedAt = this.now().toISOString();

    this.logger({
      level: "error",
      event: "run_failed",
      runId: run.runId,
      code: error instanceof RuntimeError ? error.code : "INTERNAL_ERROR",
      error: errorSummary
    });
    try {
      await this.persistence.withTransaction((tx) => {
        tx.saveRun(run);
        tx.appendAuditRecord(this.auditRecord(run, "run_terminal_failed", { errorSummary }));
      });
    } catch (persistError) {
      this.logger({
        level: "error",
        event: "run_failure_not_persisted",
        runId: run.runId,
        error: toErrorMessage(persistError)
      });
    }
    await this.telemetry.onRunTerminal({
      runId: run.runId,
      threadId: run.threadId,
      status: "failed",
      errorSummary
    });
  }

  private auditRecord(
    run: PersistedRun,
    eventType: AuditEventType,
    detail?: Record<string, unknown>
  ): AuditRecord {
    const suffix = typeof detail?.suspensionId === "string" ? `:${detail.suspensionId}` : "";
    return {
      auditId: `${run.runId}:${run.stepCount}:${eventType}${suffix}`,
      runId: run.runId,
      stepNumber: run.stepCount,
      eventType,
      occurredAt: this.now().toISOString(),
      ...(detail ? { detail: structuredClone(detail) } : {})
    };
  }

  private rethrowTypedError(err: unknown): never {
    if (err instanceof RuntimeError) {
      throw err;
    }

    const message = err instanceof Error ? err.message : String(err);
    throw new InternalRuntimeError(`Unhandled runtime error: ${message}`);
  }
}

function terminalOutput(toolCall: ToolCall, outcome: GateOutcome): Record<string, unknown> {
  return {
    toolName: toolCall.name,
    args: structuredClone(toolCall.args),
    result: outcome.message.content
  };
}
