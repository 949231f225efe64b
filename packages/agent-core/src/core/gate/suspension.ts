import { ApprovalRequest, Decision, SuspensionChannel } from "../contracts";

/**
 * Thrown by a channel that has no decision yet. The runtime catches it, checkpoints
 * the run and reports `waiting_decision`; it is control flow, not a failure.
 */
export class RunSuspension extends Error {
  constructor(readonly request: ApprovalRequest) {
    super(`Run suspended awaiting decision ${request.suspensionId}`);
    this.name = "RunSuspension";
  }
}

export function isRunSuspension(error: unknown): error is RunSuspension {
  return error instanceof RunSuspension;
}

/** Wire form of a decision, as a reviewer UI or API client sends it. */
export type WireDecision =
  | { type: "accept" }
  | { type: "edit"; args: { action: string; args: Record<string, unknown> } }
  | { type: "ignore" }
  | { type: "response"; args: string };

export function toWireDecision(decision: Decision, toolName: string): WireDecision {
  switch (decision.type) {
    case "accept":
      return { type: "accept" };
    case "edit":
      return { type: "edit", args: { action: toolName, args: decision.args } };
    case "ignore":
      return { type: "ignore" };
    case "respond":
      return { type: "response", args: decision.feedback };
    default: {
      const exhaustive: never = decision;
      return exhaustive;
    }
  }
}

export type Reviewer = (request: ApprovalRequest) => Promise<Decision>;

/** In-process reviewer: the decision is available as soon as the reviewer answers. */
export function createInteractiveSuspensionChannel(reviewer: Reviewer): SuspensionChannel {
  return {
    async suspend(request) {
      const decision = await reviewer(request);
      return [toWireDecision(decision, request.toolCall.name)];
    }
  };
}

type ResumeValue = { kind: "decision"; payload: unknown } | { kind: "rejection"; reason: string };

/** Raised into the gate when a suspension is resumed with a rejection instead of a decision. */
export class SuspensionRejectedError extends Error {
  constructor(
    readonly suspensionId: string,
    readonly reason: string
  ) {
    super(reason);
    this.name = "SuspensionRejectedError";
  }
}

/**
 * Answers suspensions from values supplied on resume; any suspension without one
 * raises `RunSuspension`. Each value is consumed by the first suspension that reads it.
 */
export class DurableSuspensionChannel implements SuspensionChannel {
  private readonly values = new Map<string, ResumeValue>();

  provideDecision(suspensionId: string, payload: unknown): void {
    this.values.set(suspensionId, { kind: "decision", payload });
  }

  provideRejection(suspensionId: string, reason: string): void {
    this.values.set(suspensionId, { kind: "rejection", reason });
  }

  has(suspensionId: string): boolean {
    return this.values.has(suspensionId);
  }

  async suspend(request: ApprovalRequest): Promise<unknown> {
    const value = this.values.get(request.suspensionId);
    if (!value) {
      throw new RunSuspension(request);
    }
    this.values.delete(request.suspensionId);

    if (value.kind === "rejection") {
      throw new SuspensionRejectedError(request.suspensionId, value.reason);
    }
    return wrapResumeValue(request.suspensionId, value.payload);
  }
}

function wrapResumeValue(suspensionId: string, payload: unknown): unknown {
  const isMapping =
    typeof payload === "object" && payload !== null && !Array.isArray(payload) && !("type" in payload);
  return isMapping ? payload : { [suspensionId]: payload };
}
