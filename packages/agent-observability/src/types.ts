export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { [key: string]: JsonValue }
  | JsonValue[];

export type RunEventType = "state" | "tool_call" | "decision" | "memory" | "log";

export type RunEventLevel = "info" | "warn" | "error";

export type RunEvent = {
  id: string;
  runId: string;
  ts: string;
  type: RunEventType;
  level: RunEventLevel;
  message: string;
  payload: Record<string, JsonValue>;
  threadId?: string;
  correlationId?: string;
  causationId?: string;
  metadata?: Record<string, JsonValue>;
};

export type RunEventsFilter = {
  runId?: string;
  type?: RunEventType;
  level?: RunEventLevel;
  message?: string;
};

export interface RunEventSink {
  appendRunEvent(event: RunEvent): Promise<void>;
}

export interface RunEventStore extends RunEventSink {
  listRunEvents(filter?: RunEventsFilter): Promise<RunEvent[]>;
}

export type LogEntry = Record<string, JsonValue>;

export type StructuredLogger = (entry: LogEntry) => void;
