import { ToolArgs } from "../core/contracts";
import { ToolRegistration, ToolRegistry, ToolValidationIssue } from "../core/toolRegistry";

export const TRIAGE_CLASSIFICATIONS = ["ignore", "notify", "respond"] as const;
export type TriageClassification = (typeof TRIAGE_CLASSIFICATIONS)[number];

function requireString(args: ToolArgs, field: string, issues: ToolValidationIssue[]): void {
  const value = args[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    issues.push({ field, message: `${field} is required and must be a non-empty string` });
  }
}

function text(args: ToolArgs, field: string): string {
  const value = args[field];
  return typeof value === "string" ? value : String(value ?? "");
}

export const TriageEmailTool: ToolRegistration = {
  name: "triage_email",
  description: "Classify the email as ignore, notify or respond before doing anything else.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    requireString(args, "reasoning", issues);
    const classification = args.classification;
    if (!TRIAGE_CLASSIFICATIONS.some((candidate) => candidate === classification)) {
      issues.push({
        field: "classification",
        message: `classification must be one of ${TRIAGE_CLASSIFICATIONS.join(", ")}`
      });
    }
    return issues;
  },

  execute: (args) =>
    `Classification Decision: ${text(args, "classification")}. Reasoning: ${text(args, "reasoning")}`
};

export const WriteEmailTool: ToolRegistration = {
  name: "write_email",
  description: "Write and send an email.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    requireString(args, "to", issues);
    requireString(args, "subject", issues);
    requireString(args, "content", issues);
    return issues;
  },

  execute: (args) =>
    `Email sent to ${text(args, "to")} with subject '${text(args, "subject")}' and content: ${text(args, "content")}`
};

export const ScheduleMeetingTool: ToolRegistration = {
  name: "schedule_meeting",
  description: "Schedule a calendar meeting.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    const attendees = args.attendees;
    if (
      !Array.isArray(attendees) ||
      attendees.length === 0 ||
      !attendees.every((attendee) => typeof attendee === "string")
    ) {
      issues.push({ field: "attendees", message: "attendees must be a non-empty list of email addresses" });
    }
    requireString(args, "subject", issues);
    requireString(args, "preferred_day", issues);
    const duration = args.duration_minutes;
    if (typeof duration !== "number" || !Number.isInteger(duration) || duration <= 0) {
      issues.push({ field: "duration_minutes", message: "duration_minutes must be a positive integer" });
    }
    if (args.start_time !== undefined && typeof args.start_time !== "number") {
      issues.push({ field: "start_time", message: "start_time must be a number like 1430" });
    }
    return issues;
  },

  execute: (args) => {
    const attendees = Array.isArray(args.attendees) ? args.attendees.map(String) : [];
    const startTime = typeof args.start_time === "number" ? ` at ${args.start_time}` : "";
    return (
      `Meeting '${text(args, "subject")}' scheduled on ${text(args, "preferred_day")}${startTime} ` +
      `for ${text(args, "duration_minutes")} minutes with ${attendees.length} attendees`
    );
  }
};

export const CheckCalendarAvailabilityTool: ToolRegistration = {
  name: "check_calendar_availability",
  description: "Check calendar availability for a given day.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    requireString(args, "day", issues);
    return issues;
  },

  execute: (args) => `Available times on ${text(args, "day")}: 9:00 AM, 2:00 PM, 4:00 PM`
};

export const QuestionTool: ToolRegistration = {
  name: "Question",
  description: "Ask the user a question.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    requireString(args, "content", issues);
    return issues;
  },

  execute: (args) => `Question asked: ${text(args, "content")}`
};

export const DoneTool: ToolRegistration = {
  name: "Done",
  description: "Mark the email as handled.",

  validateArgs: (args) => {
    const issues: ToolValidationIssue[] = [];
    if (args.done !== undefined && typeof args.done !== "boolean") {
      issues.push({ field: "done", message: "done must be a boolean" });
    }
    return issues;
  },

  execute: () => "Email handled."
};

export const EMAIL_TOOLS: readonly ToolRegistration[] = [
  TriageEmailTool,
  WriteEmailTool,
  ScheduleMeetingTool,
  CheckCalendarAvailabilityTool,
  QuestionTool,
  DoneTool
];

export function createEmailToolRegistry(extraTools: readonly ToolRegistration[] = []): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of [...EMAIL_TOOLS, ...extraTools]) {
    registry.registerTool(tool);
  }
  return registry;
}
