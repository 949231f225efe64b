export abstract class RuntimeError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationRuntimeError extends RuntimeError {
  readonly code = "VALIDATION_ERROR";
}

export class ResumeValidationError extends ValidationRuntimeError {}

export class PolicyNotFoundError extends RuntimeError {
  readonly code = "POLICY_NOT_FOUND";

  constructor(readonly toolName: string) {
    super(`No approval policy configured for tool: ${toolName}`);
  }
}

export class UnknownDecisionTypeError extends RuntimeError {
  readonly code = "UNKNOWN_DECISION_TYPE";

  constructor(readonly decisionType: string) {
    super(`Invalid decision type: ${decisionType}`);
  }
}

export class MalformedDecisionError extends RuntimeError {
  readonly code = "MALFORMED_DECISION";
}

export class PreferenceSynthesisError extends RuntimeError {
  readonly code = "SYNTHESIZER_FAILURE";

  constructor(
    readonly namespaceKey: string,
    message: string
  ) {
    super(message);
  }
}

export class PreferenceStoreUnavailableError extends RuntimeError {
  readonly code = "STORE_UNAVAILABLE";

  constructor(
    readonly namespaceKey: string,
    message: string
  ) {
    super(message);
  }
}

export class PreferenceConflictError extends RuntimeError {
  readonly code = "PREFERENCE_CONFLICT";

  constructor(
    readonly namespaceKey: string,
    readonly attempts: number
  ) {
    super(`Preference update for ${namespaceKey} lost ${attempts} compare-and-swap attempts`);
  }
}

export class ToolExecutionError extends RuntimeError {
  readonly code = "TOOL_FAILURE";

  constructor(
    readonly toolName: string,
    message: string,
    readonly retryable: boolean
  ) {
    super(message);
  }
}

export class InternalRuntimeError extends RuntimeError {
  readonly code = "INTERNAL_ERROR";
}
