import { z } from "zod";
import { Decision, ToolArgs } from "../contracts";
import { MalformedDecisionError, UnknownDecisionTypeError } from "../errors";

/** Wire names as reviewers send them; `response` is the wire spelling of `respond`. */
export const DECISION_WIRE_TYPES = ["accept", "edit", "ignore", "response"] as const;

const argsRecord = z.record(z.string(), z.unknown());

const editArgs = z.union([
  z
    .object({ action: z.string().optional(), args: argsRecord })
    .strict()
    .transform((envelope) => envelope.args),
  argsRecord
]);

const wireDecisionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("accept") }),
  z.object({ type: z.literal("edit"), args: editArgs }),
  z.object({ type: z.literal("ignore") }),
  z.object({ type: z.literal("response"), args: z.string() })
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reduces whatever the channel resumed with to a single raw decision object.
 * Returns `undefined` when no decision can be extracted.
 */
export function normalizeDecisionPayload(
  payload: unknown,
  suspensionId?: string
): Record<string, unknown> | undefined {
  if (Array.isArray(payload) || (isRecord(payload) && "type" in payload)) {
    return decisionEntry(payload);
  }
  if (!isRecord(payload)) {
    return undefined;
  }

  if (suspensionId !== undefined && suspensionId in payload) {
    return decisionEntry(payload[suspensionId]);
  }
  const [first] = Object.values(payload);
  return decisionEntry(first);
}

/** A single entry is either the decision itself or a list led by it. */
function decisionEntry(value: unknown): Record<string, unknown> | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  return isRecord(candidate) ? candidate : undefined;
}

/**
 * Parses a normalized decision. An unrecognised `type` is fatal; a recognised type
 * with an unusable payload raises `MalformedDecisionError` so the caller can fail open.
 */
export function parseDecision(raw: Record<string, unknown>): Decision {
  const type = raw.type;
  if (typeof type !== "string" || !isWireType(type)) {
    throw new UnknownDecisionTypeError(String(type));
  }

  const parsed = wireDecisionSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "decision"}: ${issue.message}`)
      .join("; ");
    throw new MalformedDecisionError(`Malformed ${type} decision: ${detail}`);
  }

  const decision = parsed.data;
  switch (decision.type) {
    case "accept":
      return { type: "accept" };
    case "edit":
      return { type: "edit", args: toToolArgs(decision.args) };
    case "ignore":
      return { type: "ignore" };
    case "response":
      return { type: "respond", feedback: decision.args };
    default: {
      const exhaustive: never = decision;
      throw new UnknownDecisionTypeError(String(exhaustive));
    }
  }
}

function isWireType(type: string): type is (typeof DECISION_WIRE_TYPES)[number] {
  return DECISION_WIRE_TYPES.some((candidate) => candidate === type);
}

function toToolArgs(args: Record<string, unknown>): ToolArgs {
  return { ...args };
}
