import type { RunEvent, RunEventStore, RunEventsFilter } from "./types";

export class InMemoryRunEventSink implements RunEventStore {
  private readonly events: RunEvent[] = [];

  async appendRunEvent(event: RunEvent): Promise<void> {
    this.events.push(structuredClone(event));
  }

  async listRunEvents(filter: RunEventsFilter = {}): Promise<RunEvent[]> {
    return this.events
      .filter((event) => {
        if (filter.runId && event.runId !== filter.runId) return false;
        if (filter.type && event.type !== filter.type) return false;
        if (filter.level && event.level !== filter.level) return false;
        if (filter.message && event.message !== filter.message) return false;
        return true;
      })
      .sort((a, b) => a.ts.localeCompare(b.ts))
      .map((event) => structuredClone(event));
  }
}
