export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Malformed candidate profile input. Raised before the session leaves `collecting`.
 */
export class ValidationError extends Error {
  readonly issues: ReadonlyArray<ValidationIssue>;

  constructor(issues: ReadonlyArray<ValidationIssue>) {
    super(`Invalid candidate profile: ${issues.map((issue) => `${issue.field} ${issue.message}`).join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export type GenerationErrorCode =
  | "not_configured"
  | "http_error"
  | "empty_content"
  | "network"
  | "timeout";

/**
 * Text-generation collaborator failure.
 */
export class GenerationError extends Error {
  readonly code: GenerationErrorCode;
  readonly status?: number;

  constructor(message: string, code: GenerationErrorCode, status?: number) {
    super(message);
    this.name = "GenerationError";
    this.code = code;
    this.status = status;
  }
}

/**
 * Neither the collaborator nor the static question bank produced a usable question.
 */
export class GenerationUnavailable extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationUnavailable";
  }
}

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/**
 * A broken engine invariant. Always a bug, never a runtime condition to recover from.
 */
export class SessionInvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionInvariantViolation";
  }
}

/**
 * Command issued in a lifecycle state that does not accept it.
 */
export class AssessmentCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssessmentCommandError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
