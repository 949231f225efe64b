import { uuidv7 } from "uuidv7";
import { z } from "zod";
import {
  ActionPlanner,
  AssistantMessage,
  ProposeInput,
  ToolMetadata,
  ValidationRuntimeError
} from "@mailgate/core";
import { silentLogger } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import { ChatCompletion } from "./llm";
import { buildPlannerSystemPrompt, toModelMessages } from "./prompts";

const plannerOutputSchema = z.object({
  content: z.string().default(""),
  tool_calls: z
    .array(
      z.object({
        name: z.string().min(1),
        args: z.record(z.unknown()).default({})
      })
    )
    .default([])
});

export type PlannerParseResult =
  | { ok: true; message: AssistantMessage }
  | { ok: false; reason: string };

export function stripCodeFences(input: string): string {
  return input.replace(/^\s*```(?:json)?\s*/i, "").replace(/\s*```\s*$/i, "").trim();
}

export function parsePlannerOutput(
  raw: string,
  allowedTools: ReadonlySet<string>,
  newId: () => string = () => `call_${uuidv7()}`
): PlannerParseResult {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch {
    return { ok: false, reason: `invalid_planner_json: ${stripCodeFences(raw).slice(0, 240)}` };
  }

  const parsed = plannerOutputSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: `invalid_planner_shape: ${parsed.error.issues[0]?.message ?? "unknown"}` };
  }

  const unknownTool = parsed.data.tool_calls.find((call) => !allowedTools.has(call.name));
  if (unknownTool) {
    return { ok: false, reason: `unknown_tool: ${unknownTool.name}` };
  }

  return {
    ok: true,
    message: {
      role: "assistant",
      content: parsed.data.content,
      toolCalls: parsed.data.tool_calls.map((call) => ({ id: newId(), name: call.name, args: call.args }))
    }
  };
}

export type ModelActionPlannerOptions = {
  complete: ChatCompletion;
  tools: readonly ToolMetadata[];
  background?: string;
  logger?: StructuredLogger;
  newId?: () => string;
};

/** Asks the model for the next step as JSON; one repair round on unusable output. */
export class ModelActionPlanner implements ActionPlanner {
  private readonly allowedTools: ReadonlySet<string>;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: ModelActionPlannerOptions) {
    this.allowedTools = new Set(options.tools.map((tool) => tool.name));
    this.logger = options.logger ?? silentLogger;
  }

  async propose(input: ProposeInput): Promise<AssistantMessage> {
    const system = buildPlannerSystemPrompt({
      preferences: input.preferences,
      tools: this.options.tools,
      email: input.email,
      background: this.options.background
    });
    const messages = toModelMessages(input.messages);

    const content = await this.options.complete({ system, messages });
    const first = parsePlannerOutput(content, this.allowedTools, this.options.newId);
    if (first.ok) {
      return first.message;
    }

    this.logger({ level: "warn", event: "planner_output_rejected", runId: input.runId, reason: first.reason });
    const repairContent = await this.options.complete({
      system,
      messages: [
        ...messages,
        { role: "assistant", content: stripCodeFences(content) },
        {
          role: "user",
          content: [
            `Your previous output was invalid (${first.reason}).`,
            `Return only JSON and use only these tools: ${Array.from(this.allowedTools).join(", ") || "(none)"}.`
          ].join("\n")
        }
      ]
    });
    const repaired = parsePlannerOutput(repairContent, this.allowedTools, this.options.newId);
    if (repaired.ok) {
      return repaired.message;
    }

    throw new ValidationRuntimeError(
      `Planner output invalid after repair: ${first.reason} | ${repaired.reason}`
    );
  }
}
