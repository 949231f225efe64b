import { silentLogger } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import { ConversationMessage, MemoryNamespace, ToolArgs, ToolMessage } from "../contracts";
import { RuntimeTelemetry } from "../observability";
import { MemoryUpdater, PreferenceUpdater } from "./memoryUpdates";

export type ReconcileCheckpoint = "before_model" | "after_tool";

export interface ReconcileContext {
  runId: string;
  threadId?: string;
  checkpoint: ReconcileCheckpoint;
  /** Tool call ids already reconciled earlier in this run. */
  processedIds: ReadonlySet<string>;
}

export interface PostSuspensionReconcilerOptions {
  /** Watched tool name to the triage correction its rejection produces. */
  rejectionFeedback: Readonly<Record<string, string>>;
  triageNamespace: MemoryNamespace;
  preferences: PreferenceUpdater;
  memoryContextWindow?: number;
  telemetry?: RuntimeTelemetry;
  logger?: StructuredLogger;
}

export function findProposedArgs(messages: readonly ConversationMessage[], toolCallId: string): ToolArgs {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message.role !== "assistant") {
      continue;
    }
    const call = message.toolCalls.find((candidate) => candidate.id === toolCallId);
    if (call) {
      return structuredClone(call.args);
    }
  }
  return {};
}

export function buildRejectionInstruction(
  feedback: string,
  toolName: string,
  args: ToolArgs,
  reason: string
): string {
  const reasonSection = reason ? `\n\nUser's rejection reason: ${reason}` : "";
  return `${feedback}\n\nRejected tool call: ${toolName}\nArguments: ${JSON.stringify(args, null, 2)}${reasonSection}`;
}

/**
 * Learns from rejections that reached the history as error tool messages rather than
 * as gate decisions. Each tool call id is reconciled at most once per run.
 */
export class PostSuspensionReconciler {
  private readonly rejectionFeedback: Readonly<Record<string, string>>;
  private readonly triageNamespace: MemoryNamespace;
  private readonly memory: MemoryUpdater;
  private readonly telemetry: RuntimeTelemetry;
  private readonly logger: StructuredLogger;

  constructor(options: PostSuspensionReconcilerOptions) {
    this.rejectionFeedback = options.rejectionFeedback;
    this.triageNamespace = options.triageNamespace;
    this.telemetry = options.telemetry ?? new RuntimeTelemetry({ enabled: false });
    this.logger = options.logger ?? silentLogger;
    this.memory = new MemoryUpdater({
      preferences: options.preferences,
      memoryContextWindow: options.memoryContextWindow,
      telemetry: this.telemetry,
      logger: this.logger
    });
  }

  watches(toolName: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.rejectionFeedback, toolName);
  }

  /** Returns the tool call ids reconciled by this scan, newest first. */
  async scan(messages: readonly ConversationMessage[], context: ReconcileContext): Promise<string[]> {
    const processed: string[] = [];
    const seen = new Set(context.processedIds);

    for (let index = messages.length - 1; index >= 0; index -= 1) {
      const message = messages[index];
      if (!isRejection(message) || !this.watches(message.name) || seen.has(message.toolCallId)) {
        continue;
      }

      const args = findProposedArgs(messages, message.toolCallId);
      await this.memory.apply({
        runId: context.runId,
        threadId: context.threadId,
        namespace: this.triageNamespace,
        history: messages,
        instruction: buildRejectionInstruction(
          this.rejectionFeedback[message.name],
          message.name,
          args,
          message.content
        ),
        reason: "rejection"
      });

      seen.add(message.toolCallId);
      processed.push(message.toolCallId);
      this.logger({
        event: "rejection_reconciled",
        runId: context.runId,
        checkpoint: context.checkpoint,
        toolCallId: message.toolCallId,
        toolName: message.name
      });
      await this.telemetry.onRejectionReconciled({
        runId: context.runId,
        threadId: context.threadId,
        toolCallId: message.toolCallId,
        toolName: message.name
      });
    }

    return processed;
  }
}

function isRejection(message: ConversationMessage): message is ToolMessage {
  return message.role === "tool" && message.status === "error";
}
