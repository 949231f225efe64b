import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryRunEventSink, createJsonLogger, toJsonValue, withLogContext } from "./index";

test("json logger writes one line per entry with timestamp and component", () => {
  const lines: string[] = [];
  const log = createJsonLogger({
    component: "approval-gate",
    write: (line) => lines.push(line),
    clock: () => new Date("2026-01-02T03:04:05.000Z")
  });

  log({ event: "suspended", toolName: "write_email" });

  assert.equal(lines.length, 1);
  assert.deepEqual(JSON.parse(lines[0]), {
    ts: "2026-01-02T03:04:05.000Z",
    component: "approval-gate",
    event: "suspended",
    toolName: "write_email"
  });
});

test("withLogContext merges context under entry fields", () => {
  const entries: Array<Record<string, unknown>> = [];
  const log = withLogContext((entry) => entries.push(entry), { runId: "run-1", event: "default" });

  log({ event: "decision_applied" });

  assert.deepEqual(entries, [{ runId: "run-1", event: "decision_applied" }]);
});

test("toJsonValue drops undefined fields and flattens errors", () => {
  assert.deepEqual(toJsonValue({ a: 1, b: undefined, c: new Error("boom") }), {
    a: 1,
    c: { name: "Error", message: "boom" }
  });
  assert.equal(toJsonValue(Number.NaN), "NaN");
  assert.equal(toJsonValue(undefined), null);
});

test("in-memory sink filters by run and message", async () => {
  const sink = new InMemoryRunEventSink();
  await sink.appendRunEvent({
    id: "e1",
    runId: "run-1",
    ts: "2026-01-01T00:00:01.000Z",
    type: "memory",
    level: "info",
    message: "memory.updated",
    payload: {}
  });
  await sink.appendRunEvent({
    id: "e2",
    runId: "run-2",
    ts: "2026-01-01T00:00:00.000Z",
    type: "memory",
    level: "error",
    message: "memory.update_failed",
    payload: {}
  });

  const forRun = await sink.listRunEvents({ runId: "run-1" });
  assert.deepEqual(
    forRun.map((event) => event.id),
    ["e1"]
  );
  const all = await sink.listRunEvents();
  assert.deepEqual(
    all.map((event) => event.id),
    ["e2", "e1"]
  );
  const failures = await sink.listRunEvents({ message: "memory.update_failed" });
  assert.equal(failures[0].level, "error");
});
