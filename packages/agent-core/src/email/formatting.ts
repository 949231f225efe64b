import { EmailInput, PreferenceSnapshot, ToolArgs, ToolCall } from "../core/contracts";
import { ValidationRuntimeError } from "../core/errors";

/** Pretty JSON used wherever tool arguments are shown to a reviewer or the synthesizer. */
export function formatArgs(args: ToolArgs): string {
  return JSON.stringify(args, null, 2);
}

function readString(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

/**
 * Accepts both the assistant's own field names and the mailbox export shape
 * (`from_email`, `to_email`, `page_content`).
 */
export function parseEmail(input: unknown): EmailInput {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ValidationRuntimeError("Invalid email input: expected an object");
  }
  const record: Record<string, unknown> = { ...input };

  const author = readString(record, ["author", "from_email", "from"]);
  const to = readString(record, ["to", "to_email"]);
  const subject = readString(record, ["subject"]);
  const emailThread = readString(record, ["emailThread", "email_thread", "page_content", "body"]);

  const missing = [
    author === undefined ? "author" : undefined,
    to === undefined ? "to" : undefined,
    subject === undefined ? "subject" : undefined,
    emailThread === undefined ? "emailThread" : undefined
  ].filter((field): field is string => field !== undefined);
  if (missing.length > 0 || author === undefined || to === undefined || subject === undefined || emailThread === undefined) {
    throw new ValidationRuntimeError(`Invalid email input: missing ${missing.join(", ")}`);
  }

  return { author, to, subject, emailThread };
}

export function formatEmailMarkdown(subject: string, author: string, to: string, emailThread: string): string {
  return `\n\n**Subject**: ${subject}\n**From**: ${author}\n**To**: ${to}\n\n${emailThread}\n\n---\n`;
}

function argText(args: ToolArgs, key: string): string {
  const value = args[key];
  if (value === undefined || value === null) {
    return "";
  }
  return Array.isArray(value) ? value.map(String).join(", ") : String(value);
}

export function formatToolCallForDisplay(toolCall: ToolCall): string {
  const { args } = toolCall;
  switch (toolCall.name) {
    case "write_email":
      return [
        "# Email Draft",
        "",
        `**To**: ${argText(args, "to")}`,
        `**Subject**: ${argText(args, "subject")}`,
        "",
        argText(args, "content")
      ].join("\n");
    case "schedule_meeting":
      return [
        "# Calendar Invite",
        "",
        `**Meeting**: ${argText(args, "subject")}`,
        `**Attendees**: ${argText(args, "attendees")}`,
        `**Duration**: ${argText(args, "duration_minutes")} minutes`,
        `**Day**: ${argText(args, "preferred_day")}`
      ].join("\n");
    case "Question":
      return `# Question for User\n\n${argText(args, "content")}`;
    default:
      return `# Tool Call: ${toolCall.name}\n\nArguments:\n${formatArgs(args)}`;
  }
}

export function renderApprovalContext(toolCall: ToolCall, email?: EmailInput): string {
  const emailMarkdown = email
    ? formatEmailMarkdown(email.subject, email.author, email.to, email.emailThread)
    : "";
  return emailMarkdown + formatToolCallForDisplay(toolCall);
}

/** System prompt section carrying the learned profiles into the planner call. */
export function buildPreferencePrompt(preferences: PreferenceSnapshot): string {
  const section = (title: string, label: string) =>
    `<${label}_preferences>\n${title}\n${(preferences[label] ?? "").trim()}\n</${label}_preferences>`;

  return [
    section("How to triage incoming email:", "triage"),
    section("How to write replies:", "response"),
    section("How to schedule meetings:", "calendar")
  ].join("\n\n");
}
