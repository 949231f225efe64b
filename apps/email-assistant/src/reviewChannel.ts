import { createInterface } from "node:readline/promises";
import type { ApprovalRequest, Decision, Reviewer, ToolActionPolicy } from "@mailgate/core";

export type ReviewerIO = {
  ask(question: string): Promise<string>;
  write(text: string): void;
  close(): void;
};

type ActionKey = "a" | "e" | "i" | "r";

const ACTIONS: ReadonlyArray<{ key: ActionKey; label: string; allowed: keyof ToolActionPolicy }> = [
  { key: "a", label: "[a]ccept", allowed: "allowAccept" },
  { key: "e", label: "[e]dit", allowed: "allowEdit" },
  { key: "i", label: "[i]gnore", allowed: "allowIgnore" },
  { key: "r", label: "[r]espond", allowed: "allowRespond" }
];

export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ReviewerIO {
  const rl = createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    write: (text) => {
      output.write(`${text}\n`);
    },
    close: () => rl.close()
  };
}

function parseArgsObject(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return undefined;
    }
    return { ...parsed };
  } catch {
    return undefined;
  }
}

async function askForEdit(io: ReviewerIO, request: ApprovalRequest): Promise<Decision> {
  io.write(`Current arguments:\n${JSON.stringify(request.toolCall.args, null, 2)}`);
  while (true) {
    const raw = (await io.ask("New arguments as a JSON object (blank keeps them): ")).trim();
    if (raw.length === 0) {
      return { type: "edit", args: request.toolCall.args };
    }
    const args = parseArgsObject(raw);
    if (args) {
      return { type: "edit", args };
    }
    io.write("That is not a JSON object.");
  }
}

/** Terminal reviewer: shows the proposal and asks until a permitted action is chosen. */
export function createTerminalReviewer(io: ReviewerIO): Reviewer {
  return async (request) => {
    const allowed = ACTIONS.filter((action) => request.policy[action.allowed]);
    io.write(request.displayContext);

    while (true) {
      const answer = (await io.ask(`${allowed.map((action) => action.label).join(" ")}: `)).trim().toLowerCase();
      const action = allowed.find((candidate) => candidate.key === answer.charAt(0));
      if (!action) {
        io.write(`Choose one of: ${allowed.map((candidate) => candidate.key).join(", ")}`);
        continue;
      }

      switch (action.key) {
        case "a":
          return { type: "accept" };
        case "i":
          return { type: "ignore" };
        case "e":
          return askForEdit(io, request);
        case "r": {
          const feedback = (await io.ask("Feedback: ")).trim();
          return { type: "respond", feedback };
        }
      }
    }
  };
}
