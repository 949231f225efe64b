import { silentLogger, toErrorMessage } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import {
  ApprovalRequest,
  AssistantMessage,
  ConversationMessage,
  Decision,
  EmailInput,
  GateOutcome,
  InterceptContext,
  MemoryNamespace,
  SuspensionChannel,
  ToolActionPolicy,
  ToolArgs,
  ToolCall,
  ToolExecutor,
  ToolMessage
} from "../contracts";
import { MalformedDecisionError, PolicyNotFoundError } from "../errors";
import { RuntimeTelemetry } from "../observability";
import { normalizeDecisionPayload, parseDecision } from "./decisions";
import { MemoryUpdater, PreferenceUpdater } from "./memoryUpdates";
import { isRunSuspension } from "./suspension";

/** Per-tool behaviour once a call is under approval. */
export interface GateToolConfig {
  policy: ToolActionPolicy;
  /** Namespace that learns from edits and feedback; omitted tools skip those updates. */
  namespace?: MemoryNamespace;
  /** Tool result recorded when the reviewer ignores the call. */
  ignoredMessage: string;
  /** Tool result recorded when the reviewer answers with feedback instead of a decision. */
  respondMessage: (feedback: string) => string;
  /** Triage correction sent to the synthesizer on ignore. */
  ignoreFeedback: string;
  editFeedback?: (initialArgs: ToolArgs, editedArgs: ToolArgs) => string;
}

export interface ApprovalGateOptions {
  interruptOn: Readonly<Record<string, boolean>>;
  tools: Readonly<Record<string, GateToolConfig>>;
  triageNamespace: MemoryNamespace;
  executor: ToolExecutor;
  preferences: PreferenceUpdater;
  channel: SuspensionChannel;
  memoryContextWindow?: number;
  renderDisplayContext?: (toolCall: ToolCall, email?: EmailInput) => string;
  telemetry?: RuntimeTelemetry;
  logger?: StructuredLogger;
}

export function formatToolResult(result: unknown): string {
  if (typeof result === "string") {
    return result;
  }
  if (result === undefined) {
    return "";
  }
  return JSON.stringify(result);
}

export function suspensionIdFor(runId: string, toolCallId: string): string {
  return `${runId}:${toolCallId}`;
}

function defaultDisplayContext(toolCall: ToolCall): string {
  return `# Tool Call: ${toolCall.name}\n\n${JSON.stringify(toolCall.args, null, 2)}`;
}

function defaultEditFeedback(toolName: string, initialArgs: ToolArgs, editedArgs: ToolArgs): string {
  return (
    `The reviewer edited the ${toolName} call. ` +
    `Arguments proposed by the assistant: ${JSON.stringify(initialArgs)}. ` +
    `Arguments after the edit: ${JSON.stringify(editedArgs)}.`
  );
}

/**
 * Intercepts proposed tool calls, suspends the run for the ones under approval and
 * turns the reviewer's decision into a tool result plus a preference update.
 */
export class ApprovalGate {
  private readonly interruptOn: Readonly<Record<string, boolean>>;
  private readonly tools: Readonly<Record<string, GateToolConfig>>;
  private readonly triageNamespace: MemoryNamespace;
  private readonly executor: ToolExecutor;
  private readonly channel: SuspensionChannel;
  private readonly memory: MemoryUpdater;
  private readonly renderDisplayContext: (toolCall: ToolCall, email?: EmailInput) => string;
  private readonly telemetry: RuntimeTelemetry;
  private readonly logger: StructuredLogger;

  constructor(options: ApprovalGateOptions) {
    this.interruptOn = options.interruptOn;
    this.tools = options.tools;
    this.triageNamespace = options.triageNamespace;
    this.executor = options.executor;
    this.channel = options.channel;
    this.telemetry = options.telemetry ?? new RuntimeTelemetry({ enabled: false });
    this.logger = options.logger ?? silentLogger;
    this.renderDisplayContext = options.renderDisplayContext ?? defaultDisplayContext;
    this.memory = new MemoryUpdater({
      preferences: options.preferences,
      memoryContextWindow: options.memoryContextWindow,
      telemetry: this.telemetry,
      logger: this.logger
    });
  }

  requiresApproval(toolName: string): boolean {
    return this.interruptOn[toolName] === true;
  }

  async intercept(toolCall: ToolCall, context: InterceptContext): Promise<GateOutcome> {
    if (!this.requiresApproval(toolCall.name)) {
      return { type: "tool_result", message: await this.execute(toolCall, toolCall.args, context) };
    }

    const config = this.tools[toolCall.name];
    if (!config) {
      throw new PolicyNotFoundError(toolCall.name);
    }

    const request: ApprovalRequest = {
      suspensionId: suspensionIdFor(context.runId, toolCall.id),
      toolCall: structuredClone(toolCall),
      policy: { requiresApproval: true, ...config.policy },
      displayContext: this.renderDisplayContext(toolCall, context.email)
    };

    let payload: unknown;
    try {
      payload = await this.channel.suspend(request);
    } catch (error) {
      if (isRunSuspension(error)) {
        this.logger({
          event: "run_suspended",
          runId: context.runId,
          suspensionId: request.suspensionId,
          toolName: toolCall.name
        });
        await this.telemetry.onSuspended({
          runId: context.runId,
          threadId: context.threadId,
          suspensionId: request.suspensionId,
          toolName: toolCall.name
        });
        throw error;
      }
      return { type: "tool_result", message: await this.reject(toolCall, request, context, error) };
    }

    const raw = normalizeDecisionPayload(payload, request.suspensionId);
    if (!raw) {
      return this.failOpen(toolCall, request, context, "no decision found in resume payload");
    }

    let decision: Decision;
    try {
      decision = parseDecision(raw);
    } catch (error) {
      if (error instanceof MalformedDecisionError) {
        return this.failOpen(toolCall, request, context, error.message);
      }
      throw error;
    }

    this.logger({
      event: "decision_received",
      runId: context.runId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      decision: decision.type
    });
    const outcome = await this.applyDecision(decision, toolCall, config, context);
    await this.telemetry.onDecisionApplied({
      runId: context.runId,
      threadId: context.threadId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      decision: decision.type
    });
    return outcome;
  }

  private async applyDecision(
    decision: Decision,
    toolCall: ToolCall,
    config: GateToolConfig,
    context: InterceptContext
  ): Promise<GateOutcome> {
    switch (decision.type) {
      case "accept":
        return { type: "tool_result", message: await this.execute(toolCall, toolCall.args, context) };

      case "edit": {
        const message = await this.execute(toolCall, decision.args, context);
        const rewrite = rewriteProposal(context.messages, toolCall.id, decision.args);
        if (config.namespace) {
          const instruction = config.editFeedback
            ? config.editFeedback(toolCall.args, decision.args)
            : defaultEditFeedback(toolCall.name, toolCall.args, decision.args);
          await this.memory.apply({
            runId: context.runId,
            threadId: context.threadId,
            namespace: config.namespace,
            history: context.messages,
            instruction,
            reason: "edit"
          });
        }
        return {
          type: "edited",
          message,
          ...(rewrite ? { rewrittenProposal: rewrite.message, proposalIndex: rewrite.index } : {})
        };
      }

      case "ignore":
        await this.memory.apply({
          runId: context.runId,
          threadId: context.threadId,
          namespace: this.triageNamespace,
          history: context.messages,
          instruction: config.ignoreFeedback,
          reason: "ignore"
        });
        return { type: "terminate", message: toolMessage(toolCall, config.ignoredMessage, "success") };

      case "respond":
        if (config.namespace) {
          await this.memory.apply({
            runId: context.runId,
            threadId: context.threadId,
            namespace: config.namespace,
            history: context.messages,
            instruction: `The reviewer gave feedback: ${decision.feedback}. Use this to update the preferences.`,
            reason: "respond"
          });
        }
        return {
          type: "tool_result",
          message: toolMessage(toolCall, config.respondMessage(decision.feedback), "success")
        };

      default: {
        const exhaustive: never = decision;
        return exhaustive;
      }
    }
  }

  private async execute(toolCall: ToolCall, args: ToolArgs, context: InterceptContext): Promise<ToolMessage> {
    const result = await this.executor.execute(toolCall.name, args);
    await this.telemetry.onToolExecuted({
      runId: context.runId,
      threadId: context.threadId,
      toolCallId: toolCall.id,
      toolName: toolCall.name
    });
    return toolMessage(toolCall, formatToolResult(result), "success");
  }

  private async failOpen(
    toolCall: ToolCall,
    request: ApprovalRequest,
    context: InterceptContext,
    detail: string
  ): Promise<GateOutcome> {
    this.logger({
      level: "warn",
      event: "decision_malformed",
      code: "MALFORMED_DECISION",
      runId: context.runId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      detail
    });
    await this.telemetry.onDecisionApplied({
      runId: context.runId,
      threadId: context.threadId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      decision: "failed_open"
    });
    return { type: "tool_result", message: await this.execute(toolCall, toolCall.args, context) };
  }

  private async reject(
    toolCall: ToolCall,
    request: ApprovalRequest,
    context: InterceptContext,
    error: unknown
  ): Promise<ToolMessage> {
    const reason = toErrorMessage(error);
    this.logger({
      level: "warn",
      event: "decision_rejected",
      runId: context.runId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      reason
    });
    await this.telemetry.onDecisionApplied({
      runId: context.runId,
      threadId: context.threadId,
      suspensionId: request.suspensionId,
      toolName: toolCall.name,
      decision: "rejected"
    });
    return toolMessage(toolCall, reason, "error");
  }
}

function toolMessage(toolCall: ToolCall, content: string, status: ToolMessage["status"]): ToolMessage {
  return { role: "tool", toolCallId: toolCall.id, name: toolCall.name, content, status };
}

/** Copy of the latest assistant message proposing `toolCallId`, with that call's args replaced. */
export function rewriteProposal(
  messages: readonly ConversationMessage[],
  toolCallId: string,
  args: ToolArgs
): { message: AssistantMessage; index: number } | undefined {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message.role !== "assistant") {
      continue;
    }
    if (!message.toolCalls.some((call) => call.id === toolCallId)) {
      continue;
    }
    return {
      index,
      message: {
        role: "assistant",
        content: message.content,
        toolCalls: message.toolCalls.map((call) =>
          call.id === toolCallId ? { ...call, args: structuredClone(args) } : structuredClone(call)
        )
      }
    };
  }
  return undefined;
}
