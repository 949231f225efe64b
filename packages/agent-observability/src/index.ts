export { InMemoryRunEventSink } from "./memorySink";
export {
  createJsonLogger,
  silentLogger,
  toErrorMessage,
  toJsonValue,
  withLogContext
} from "./logger";
export type { JsonLoggerOptions } from "./logger";

export type {
  JsonValue,
  LogEntry,
  RunEvent,
  RunEventLevel,
  RunEventSink,
  RunEventStore,
  RunEventsFilter,
  RunEventType,
  StructuredLogger
} from "./types";
