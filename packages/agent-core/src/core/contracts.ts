export type ToolArgs = Record<string, unknown>;

export interface ToolCall {
  id: string;
  name: string;
  args: ToolArgs;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  toolCalls: ToolCall[];
}

export type ToolMessageStatus = "success" | "error";

export interface ToolMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  content: string;
  status: ToolMessageStatus;
}

export type ConversationMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** Feedback handed to the Decision Synthesizer: prior history plus one synthesized instruction. */
export type FeedbackMessage = ConversationMessage;

export type MemoryNamespace = readonly [string, ...string[]];

export interface EmailInput {
  author: string;
  to: string;
  subject: string;
  emailThread: string;
}

export interface ToolPolicy {
  requiresApproval: boolean;
  allowAccept: boolean;
  allowEdit: boolean;
  allowIgnore: boolean;
  allowRespond: boolean;
}

export type ToolActionPolicy = Omit<ToolPolicy, "requiresApproval">;

export interface ApprovalRequest {
  suspensionId: string;
  toolCall: ToolCall;
  policy: ToolPolicy;
  displayContext: string;
}

export type Decision =
  | { type: "accept" }
  | { type: "edit"; args: ToolArgs }
  | { type: "ignore" }
  | { type: "respond"; feedback: string };

export type DecisionType = Decision["type"];

export interface ToolExecutor {
  execute(name: string, args: ToolArgs): Promise<unknown>;
}

export interface SuspensionChannel {
  /**
   * Resolves with the raw decision payload, or throws `RunSuspension` when the
   * decision is not available yet.
   */
  suspend(request: ApprovalRequest): Promise<unknown>;
}

export interface SynthesizeInput {
  namespace: MemoryNamespace;
  currentProfile: string;
  feedbackMessages: FeedbackMessage[];
}

export interface DecisionSynthesizer {
  synthesize(input: SynthesizeInput): Promise<string>;
}

export interface InterceptContext {
  runId: string;
  threadId?: string;
  messages: readonly ConversationMessage[];
  email?: EmailInput;
}

export type GateOutcome =
  | { type: "tool_result"; message: ToolMessage }
  | {
      type: "edited";
      message: ToolMessage;
      rewrittenProposal?: AssistantMessage;
      proposalIndex?: number;
    }
  | { type: "terminate"; message: ToolMessage };

export interface ContinuationToken {
  runId: string;
  suspensionId: string;
}

export type RunStatus = "running" | "waiting_decision" | "completed" | "terminated" | "failed";

export interface PreferenceNamespaceConfig {
  namespace: MemoryNamespace;
  defaultProfile: string;
}

/** Profiles keyed by the label the domain gives each namespace. */
export type PreferenceSnapshot = Record<string, string>;

export interface ProposeInput {
  runId: string;
  stepIndex: number;
  messages: readonly ConversationMessage[];
  preferences: PreferenceSnapshot;
  email?: EmailInput;
}

/** The model-facing "propose next action" boundary. */
export interface ActionPlanner {
  propose(input: ProposeInput): Promise<AssistantMessage>;
}
