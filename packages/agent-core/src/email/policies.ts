import { MemoryNamespace, PreferenceNamespaceConfig } from "../core/contracts";
import { GateToolConfig } from "../core/gate/approvalGate";
import defaultProfiles from "./defaultProfiles.json";
import { formatArgs } from "./formatting";

export const TRIAGE_NAMESPACE: MemoryNamespace = ["email_assistant", "triage_preferences"];
export const RESPONSE_NAMESPACE: MemoryNamespace = ["email_assistant", "response_preferences"];
export const CALENDAR_NAMESPACE: MemoryNamespace = ["email_assistant", "cal_preferences"];

export const EMAIL_PREFERENCE_NAMESPACES: Readonly<Record<string, PreferenceNamespaceConfig>> = {
  triage: { namespace: TRIAGE_NAMESPACE, defaultProfile: defaultProfiles.triage },
  response: { namespace: RESPONSE_NAMESPACE, defaultProfile: defaultProfiles.response },
  calendar: { namespace: CALENDAR_NAMESPACE, defaultProfile: defaultProfiles.calendar }
};

export const EMAIL_INTERRUPT_ON: Readonly<Record<string, boolean>> = {
  write_email: true,
  schedule_meeting: true,
  Question: true
};

export const EMAIL_TERMINAL_TOOLS: readonly string[] = ["Done"];

const NOT_RESPOND = "Update the triage preferences so emails like this one are not classified as respond.";

export const EMAIL_GATE_TOOLS: Readonly<Record<string, GateToolConfig>> = {
  write_email: {
    policy: { allowAccept: true, allowEdit: true, allowIgnore: true, allowRespond: true },
    namespace: RESPONSE_NAMESPACE,
    ignoredMessage: "User ignored this email draft. Ignore this email and end the workflow.",
    respondMessage: (feedback) =>
      `User gave feedback, which can we incorporate into the email. Feedback: ${feedback}`,
    ignoreFeedback: `The user ignored the email draft, so they did not want to reply to this email. ${NOT_RESPOND}`,
    editFeedback: (initialArgs, editedArgs) =>
      `The user edited the email reply. Draft written by the assistant:\n${formatArgs(initialArgs)}\n` +
      `Email after the user's edit:\n${formatArgs(editedArgs)}`
  },
  schedule_meeting: {
    policy: { allowAccept: true, allowEdit: true, allowIgnore: true, allowRespond: true },
    namespace: CALENDAR_NAMESPACE,
    ignoredMessage: "User ignored this calendar meeting draft. Ignore this email and end the workflow.",
    respondMessage: (feedback) =>
      `User gave feedback, which can we incorporate into the meeting request. Feedback: ${feedback}`,
    ignoreFeedback: `The user ignored the meeting invitation, so they did not want a meeting for this email. ${NOT_RESPOND}`,
    editFeedback: (initialArgs, editedArgs) =>
      `The user edited the calendar invitation. Invitation proposed by the assistant:\n${formatArgs(initialArgs)}\n` +
      `Invitation after the user's edit:\n${formatArgs(editedArgs)}`
  },
  Question: {
    policy: { allowAccept: false, allowEdit: false, allowIgnore: true, allowRespond: true },
    ignoredMessage: "User ignored this question. Ignore this email and end the workflow.",
    respondMessage: (feedback) =>
      `User answered the question, which can we can use for any follow up actions. Feedback: ${feedback}`,
    ignoreFeedback: `The user ignored the question, so they did not want to deal with this email. ${NOT_RESPOND}`
  }
};

/** Triage corrections for drafts rejected outside the decision protocol. */
export const EMAIL_REJECTION_FEEDBACK: Readonly<Record<string, string>> = {
  write_email: `The user rejected the email draft, so they did not want to reply to this email. ${NOT_RESPOND}`,
  schedule_meeting: `The user rejected the meeting invitation, so they did not want a meeting for this email. ${NOT_RESPOND}`
};
