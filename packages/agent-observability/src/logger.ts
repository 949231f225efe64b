import type { JsonValue, LogEntry, StructuredLogger } from "./types";

export type JsonLoggerOptions = {
  component?: string;
  write?: (line: string) => void;
  clock?: () => Date;
};

export function createJsonLogger(options: JsonLoggerOptions = {}): StructuredLogger {
  const write = options.write ?? ((line: string) => console.log(line));
  const clock = options.clock ?? (() => new Date());

  return (entry: LogEntry) => {
    const line: LogEntry = {
      ts: clock().toISOString(),
      ...(options.component ? { component: options.component } : {}),
      ...entry
    };
    write(JSON.stringify(line));
  };
}

export function withLogContext(logger: StructuredLogger, context: LogEntry): StructuredLogger {
  return (entry) => logger({ ...context, ...entry });
}

export const silentLogger: StructuredLogger = () => undefined;

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Coerces arbitrary values into JSON-safe log payloads. */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (typeof value === "object") {
    const out: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      out[key] = toJsonValue(item);
    }
    return out;
  }
  return String(value);
}
