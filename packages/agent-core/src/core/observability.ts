import { uuidv7 } from "uuidv7";
import { silentLogger, toErrorMessage, toJsonValue } from "@mailgate/observability";
import type {
  JsonValue,
  RunEventLevel,
  RunEventSink,
  RunEventType,
  StructuredLogger
} from "@mailgate/observability";
import { DecisionType, RunStatus } from "./contracts";

export interface RuntimeTelemetryConfig {
  enabled?: boolean;
  sink?: RunEventSink;
  logger?: StructuredLogger;
  now?: () => Date;
}

interface RunEventBase {
  runId: string;
  threadId?: string;
}

export class RuntimeTelemetry {
  private readonly sink?: RunEventSink;
  private readonly enabled: boolean;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;

  constructor(config: RuntimeTelemetryConfig = {}) {
    this.sink = config.sink;
    this.enabled = config.enabled ?? true;
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? (() => new Date());
  }

  async onRunStarted(input: RunEventBase & { resumed: boolean }): Promise<void> {
    await this.appendEvent(input, "state", "info", input.resumed ? "run.resumed" : "run.started", {
      resumed: input.resumed
    });
  }

  async onSuspended(input: RunEventBase & { suspensionId: string; toolName: string }): Promise<void> {
    await this.appendEvent(input, "decision", "info", "decision.requested", {
      suspensionId: input.suspensionId,
      toolName: input.toolName
    });
  }

  async onDecisionApplied(
    input: RunEventBase & {
      suspensionId: string;
      toolName: string;
      decision: DecisionType | "failed_open" | "rejected";
    }
  ): Promise<void> {
    await this.appendEvent(
      input,
      "decision",
      input.decision === "failed_open" ? "warn" : "info",
      "decision.applied",
      {
        suspensionId: input.suspensionId,
        toolName: input.toolName,
        decision: input.decision
      }
    );
  }

  async onToolExecuted(input: RunEventBase & { toolCallId: string; toolName: string }): Promise<void> {
    await this.appendEvent(input, "tool_call", "info", "tool.executed", {
      toolCallId: input.toolCallId,
      toolName: input.toolName
    });
  }

  async onMemoryUpdated(input: RunEventBase & { namespace: string; reason: string }): Promise<void> {
    await this.appendEvent(input, "memory", "info", "memory.updated", {
      namespace: input.namespace,
      reason: input.reason
    });
  }

  async onMemoryUpdateFailed(
    input: RunEventBase & { namespace: string; reason: string; code: string; errorMessage: string }
  ): Promise<void> {
    await this.appendEvent(input, "memory", "error", "memory.update_failed", {
      namespace: input.namespace,
      reason: input.reason,
      code: input.code,
      errorMessage: input.errorMessage
    });
  }

  async onRejectionReconciled(input: RunEventBase & { toolCallId: string; toolName: string }): Promise<void> {
    await this.appendEvent(input, "memory", "info", "rejection.reconciled", {
      toolCallId: input.toolCallId,
      toolName: input.toolName
    });
  }

  async onRunTerminal(
    input: RunEventBase & { status: Exclude<RunStatus, "running">; errorSummary?: string }
  ): Promise<void> {
    await this.appendEvent(input, "state", input.status === "failed" ? "error" : "info", `run.${input.status}`, {
      status: input.status,
      ...(input.errorSummary ? { errorSummary: input.errorSummary } : {})
    });
  }

  private async appendEvent(
    base: RunEventBase,
    type: RunEventType,
    level: RunEventLevel,
    message: string,
    payload: Record<string, unknown>
  ): Promise<void> {
    if (!this.enabled || !this.sink) {
      return;
    }

    const safePayload: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (value !== undefined) {
        safePayload[key] = toJsonValue(value);
      }
    }

    try {
      await this.sink.appendRunEvent({
        id: `evt_${uuidv7()}`,
        runId: base.runId,
        ts: this.now().toISOString(),
        type,
        level,
        message,
        payload: safePayload,
        ...(base.threadId ? { threadId: base.threadId } : {})
      });
    } catch (error) {
      this.logger({
        event: "telemetry_append_failed",
        runId: base.runId,
        message,
        error: toErrorMessage(error)
      });
    }
  }
}
