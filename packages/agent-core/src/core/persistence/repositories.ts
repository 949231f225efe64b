import { ContinuationToken, ConversationMessage, EmailInput, RunStatus } from "../contracts";

/** Position of the tool call the run stopped at. */
export interface PendingToolCall {
  suspensionId: string;
  /** Index of the proposing assistant message in `messages`. */
  proposalIndex: number;
  /** Index of the tool call inside that message. */
  toolCallIndex: number;
}

export interface PersistedRun {
  runId: string;
  threadId: string;
  status: RunStatus;
  messages: ConversationMessage[];
  email?: EmailInput;
  stepCount: number;
  /** Tool call ids the reconciler already learned from. */
  processedIds: string[];
  pending?: PendingToolCall;
  output?: Record<string, unknown>;
  errorSummary?: string;
  createdAt: string;
  updatedAt: string;
}

export interface WaitingCheckpoint extends ContinuationToken {
  toolName: string;
  createdAt: string;
}

export type AuditEventType =
  | "run_started"
  | "suspended"
  | "decision_applied"
  | "rejection_applied"
  | "run_terminal_completed"
  | "run_terminal_terminated"
  | "run_terminal_failed";

export interface AuditRecord {
  auditId: string;
  runId: string;
  stepNumber: number;
  eventType: AuditEventType;
  occurredAt: string;
  detail?: Record<string, unknown>;
}

export interface AuditQuery {
  runId?: string;
  eventType?: AuditEventType;
}

interface PersistenceState {
  runs: Map<string, PersistedRun>;
  waitingCheckpoints: Map<string, WaitingCheckpoint>;
  auditRecords: Map<string, AuditRecord[]>;
}

export interface InMemoryPersistenceSnapshot {
  runs: PersistedRun[];
  waitingCheckpoints: WaitingCheckpoint[];
  auditRecords: Array<{ runId: string; records: AuditRecord[] }>;
}

export interface AgentPersistenceTransaction {
  getRun(runId: string): PersistedRun | undefined;
  saveRun(run: PersistedRun): void;
  putWaitingCheckpoint(checkpoint: WaitingCheckpoint): void;
  consumeWaitingCheckpoint(token: ContinuationToken): WaitingCheckpoint | undefined;
  appendAuditRecord(record: AuditRecord): void;
}

export interface AgentPersistencePort {
  withTransaction<T>(work: (tx: AgentPersistenceTransaction) => Promise<T> | T): Promise<T>;
  getRun(runId: string): PersistedRun | undefined;
  listWaitingCheckpoints(runId?: string): WaitingCheckpoint[];
  listAuditRecords(query?: AuditQuery): AuditRecord[];
}

class InMemoryAgentPersistenceTransaction implements AgentPersistenceTransaction {
  constructor(private readonly state: PersistenceState) {}

  getRun(runId: string): PersistedRun | undefined {
    const run = this.state.runs.get(runId);
    return run ? clone(run) : undefined;
  }

  saveRun(run: PersistedRun): void {
    this.state.runs.set(run.runId, clone(run));
  }

  putWaitingCheckpoint(checkpoint: WaitingCheckpoint): void {
    this.state.waitingCheckpoints.set(checkpointKey(checkpoint), clone(checkpoint));
  }

  consumeWaitingCheckpoint(token: ContinuationToken): WaitingCheckpoint | undefined {
    const key = checkpointKey(token);
    const checkpoint = this.state.waitingCheckpoints.get(key);
    if (!checkpoint) {
      return undefined;
    }
    this.state.waitingCheckpoints.delete(key);
    return clone(checkpoint);
  }

  appendAuditRecord(record: AuditRecord): void {
    const existing = this.state.auditRecords.get(record.runId) ?? [];
    existing.push(clone(record));
    this.state.auditRecords.set(record.runId, existing);
  }
}

export class InMemoryAgentPersistence implements AgentPersistencePort {
  private state: PersistenceState = {
    runs: new Map(),
    waitingCheckpoints: new Map(),
    auditRecords: new Map()
  };
  private transactionQueue: Promise<void> = Promise.resolve();
  private activeTransactionState: PersistenceState | null = null;

  async withTransaction<T>(work: (tx: AgentPersistenceTransaction) => Promise<T> | T): Promise<T> {
    if (this.activeTransactionState) {
      const nestedTx = new InMemoryAgentPersistenceTransaction(this.activeTransactionState);
      return await work(nestedTx);
    }

    const execute = async (): Promise<T> => {
      const nextState = cloneState(this.state);
      const tx = new InMemoryAgentPersistenceTransaction(nextState);
      this.activeTransactionState = nextState;
      try {
        const result = await work(tx);
        this.state = nextState;
        return result;
      } finally {
        this.activeTransactionState = null;
      }
    };

    const pending = this.transactionQueue.then(execute, execute);
    this.transactionQueue = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  getRun(runId: string): PersistedRun | undefined {
    const run = this.state.runs.get(runId);
    return run ? clone(run) : undefined;
  }

  listWaitingCheckpoints(runId?: string): WaitingCheckpoint[] {
    const checkpoints: WaitingCheckpoint[] = [];
    for (const checkpoint of this.state.waitingCheckpoints.values()) {
      if (runId && checkpoint.runId !== runId) {
        continue;
      }
      checkpoints.push(clone(checkpoint));
    }
    checkpoints.sort((left, right) => left.createdAt.localeCompare(right.createdAt));
    return checkpoints;
  }

  listAuditRecords(query: AuditQuery = {}): AuditRecord[] {
    const records: AuditRecord[] = [];
    for (const runRecords of this.state.auditRecords.values()) {
      for (const record of runRecords) {
        if (query.runId && record.runId !== query.runId) {
          continue;
        }
        if (query.eventType && record.eventType !== query.eventType) {
          continue;
        }
        records.push(clone(record));
      }
    }

    records.sort((left, right) => {
      const byTime = left.occurredAt.localeCompare(right.occurredAt);
      if (byTime !== 0) {
        return byTime;
      }
      return left.stepNumber - right.stepNumber;
    });
    return records;
  }

  toSnapshot(): InMemoryPersistenceSnapshot {
    return {
      runs: Array.from(this.state.runs.values()).map(clone),
      waitingCheckpoints: Array.from(this.state.waitingCheckpoints.values()).map(clone),
      auditRecords: Array.from(this.state.auditRecords.entries()).map(([runId, records]) => ({
        runId,
        records: clone(records)
      }))
    };
  }

  static fromSnapshot(snapshot: InMemoryPersistenceSnapshot): InMemoryAgentPersistence {
    const persistence = new InMemoryAgentPersistence();
    persistence.state = {
      runs: new Map(snapshot.runs.map((run) => [run.runId, clone(run)])),
      waitingCheckpoints: new Map(
        snapshot.waitingCheckpoints.map((checkpoint) => [checkpointKey(checkpoint), clone(checkpoint)])
      ),
      auditRecords: new Map(snapshot.auditRecords.map((entry) => [entry.runId, clone(entry.records)]))
    };
    return persistence;
  }
}

function cloneState(input: PersistenceState): PersistenceState {
  return {
    runs: cloneMap(input.runs),
    waitingCheckpoints: cloneMap(input.waitingCheckpoints),
    auditRecords: cloneMap(input.auditRecords)
  };
}

function cloneMap<K, V>(input: Map<K, V>): Map<K, V> {
  const out = new Map<K, V>();
  for (const [key, value] of input.entries()) {
    out.set(key, clone(value));
  }
  return out;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function checkpointKey(token: ContinuationToken): string {
  return `${token.runId}|${token.suspensionId}`;
}
