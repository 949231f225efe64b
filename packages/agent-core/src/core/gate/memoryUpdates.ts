import { silentLogger, toErrorMessage } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import { ConversationMessage, FeedbackMessage, MemoryNamespace } from "../contracts";
import { RuntimeError } from "../errors";
import { RuntimeTelemetry } from "../observability";
import { namespaceKey } from "../preferences/namespace";

export const MEMORY_MERGE_REMINDER = [
  "When you rewrite the profile:",
  "- keep every existing line unless feedback directly contradicts it",
  "- add only the new information the feedback carries",
  "- change only facts the feedback contradicts",
  "- keep the profile's existing layout and tone",
  "- answer with the full profile as plain text"
].join("\n");

export interface PreferenceUpdater {
  update(namespace: MemoryNamespace, feedbackMessages: FeedbackMessage[]): Promise<string>;
}

export interface MemoryUpdateRequest {
  runId: string;
  threadId?: string;
  namespace: MemoryNamespace;
  history: readonly ConversationMessage[];
  instruction: string;
  /** Short label for logs and run events, e.g. `edit` or `rejection`. */
  reason: string;
}

export interface MemoryUpdaterOptions {
  preferences: PreferenceUpdater;
  /** Trailing history messages handed to the synthesizer; the whole history when unset. */
  memoryContextWindow?: number;
  telemetry?: RuntimeTelemetry;
  logger?: StructuredLogger;
}

export function buildFeedbackMessages(
  history: readonly ConversationMessage[],
  instruction: string,
  memoryContextWindow?: number
): FeedbackMessage[] {
  const context =
    memoryContextWindow === undefined
      ? history
      : memoryContextWindow <= 0
        ? []
        : history.slice(-memoryContextWindow);

  return [
    ...structuredClone([...context]),
    { role: "user", content: `${instruction}\n\n${MEMORY_MERGE_REMINDER}` }
  ];
}

/**
 * Runs preference updates on behalf of the gate and the reconciler. Failures are
 * absorbed: the run continues with the profile it had.
 */
export class MemoryUpdater {
  private readonly preferences: PreferenceUpdater;
  private readonly memoryContextWindow?: number;
  private readonly telemetry: RuntimeTelemetry;
  private readonly logger: StructuredLogger;

  constructor(options: MemoryUpdaterOptions) {
    this.preferences = options.preferences;
    this.memoryContextWindow = options.memoryContextWindow;
    this.telemetry = options.telemetry ?? new RuntimeTelemetry({ enabled: false });
    this.logger = options.logger ?? silentLogger;
  }

  async apply(request: MemoryUpdateRequest): Promise<boolean> {
    const key = namespaceKey(request.namespace);
    const feedbackMessages = buildFeedbackMessages(
      request.history,
      request.instruction,
      this.memoryContextWindow
    );

    try {
      await this.preferences.update(request.namespace, feedbackMessages);
    } catch (error) {
      const code = error instanceof RuntimeError ? error.code : "INTERNAL_ERROR";
      const errorMessage = toErrorMessage(error);
      if (code === "SYNTHESIZER_FAILURE") {
        this.logger({
          level: "warn",
          event: "memory_update_skipped",
          runId: request.runId,
          namespace: key,
          reason: request.reason,
          code,
          error: errorMessage
        });
        return false;
      }

      this.logger({
        level: "error",
        event: "memory_update_failed",
        runId: request.runId,
        namespace: key,
        reason: request.reason,
        code,
        error: errorMessage
      });
      await this.telemetry.onMemoryUpdateFailed({
        runId: request.runId,
        threadId: request.threadId,
        namespace: key,
        reason: request.reason,
        code,
        errorMessage
      });
      return false;
    }

    this.logger({
      level: "info",
      event: "memory_updated",
      runId: request.runId,
      namespace: key,
      reason: request.reason
    });
    await this.telemetry.onMemoryUpdated({
      runId: request.runId,
      threadId: request.threadId,
      namespace: key,
      reason: request.reason
    });
    return true;
  }
}
