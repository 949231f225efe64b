export * from "./core/contracts";
export * from "./core/errors";
export { ToolRegistry } from "./core/toolRegistry";
export type { ToolMetadata, ToolRegistration, ToolValidationIssue } from "./core/toolRegistry";
export { RuntimeTelemetry } from "./core/observability";
export type { RuntimeTelemetryConfig } from "./core/observability";

export { assertNamespace, namespaceKey, parseNamespaceKey } from "./core/preferences/namespace";
export { KeyedMutex } from "./core/preferences/keyedMutex";
export { PreferenceStore } from "./core/preferences/preferenceStore";
export type { PreferenceStoreOptions } from "./core/preferences/preferenceStore";
export { InMemoryPreferencePersistence } from "./core/persistence/preferences";
export type {
  InMemoryPreferenceSnapshot,
  PreferencePersistencePort,
  PreferenceRecord,
  PreferenceWrite
} from "./core/persistence/preferences";
export {
  PostgresPreferencePersistence,
  PREFERENCE_PROFILES_DDL
} from "./core/persistence/postgresPreferences";
export type { PgQueryable } from "./core/persistence/postgresPreferences";
export { InMemoryAgentPersistence } from "./core/persistence/repositories";
export type {
  AgentPersistencePort,
  AgentPersistenceTransaction,
  AuditEventType,
  AuditQuery,
  AuditRecord,
  InMemoryPersistenceSnapshot,
  PendingToolCall,
  PersistedRun,
  WaitingCheckpoint
} from "./core/persistence/repositories";

export { DECISION_WIRE_TYPES, normalizeDecisionPayload, parseDecision } from "./core/gate/decisions";
export {
  DurableSuspensionChannel,
  RunSuspension,
  SuspensionRejectedError,
  createInteractiveSuspensionChannel,
  isRunSuspension,
  toWireDecision
} from "./core/gate/suspension";
export type { Reviewer, WireDecision } from "./core/gate/suspension";
export {
  MEMORY_MERGE_REMINDER,
  MemoryUpdater,
  buildFeedbackMessages
} from "./core/gate/memoryUpdates";
export type { MemoryUpdateRequest, PreferenceUpdater } from "./core/gate/memoryUpdates";
export {
  ApprovalGate,
  formatToolResult,
  rewriteProposal,
  suspensionIdFor
} from "./core/gate/approvalGate";
export type { ApprovalGateOptions, GateToolConfig } from "./core/gate/approvalGate";
export {
  PostSuspensionReconciler,
  buildRejectionInstruction,
  findProposedArgs
} from "./core/gate/reconciler";
export type {
  PostSuspensionReconcilerOptions,
  ReconcileCheckpoint,
  ReconcileContext
} from "./core/gate/reconciler";
export { AgentRuntime } from "./core/agentRuntime";
export type {
  AgentRuntimeOptions,
  PreferenceReader,
  RunResult,
  RunResultStatus,
  StartRunInput
} from "./core/agentRuntime";

export * from "./email/formatting";
export * from "./email/policies";
export * from "./email/tools";
export { createEmailAssistant } from "./email/assistant";
export type { EmailAssistant, EmailAssistantDeps } from "./email/assistant";
