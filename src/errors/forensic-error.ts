/**
 * Structured error type for the forensic toolkit.
 *
 * Carries a machine-readable code, category, and optional
 * remediation hint so callers can programmatically handle errors.
 */

export type ErrorCategory =
  | "timeout"
  | "execution"
  | "exit_status"
  | "validation"
  | "not_found";

export type ErrorCode =
  | "COMMAND_TIMEOUT"
  | "COMMAND_EXECUTION_ERROR"
  | "COMMAND_NON_ZERO_EXIT"
  | "IMAGE_NOT_FOUND"
  | "INVALID_ARGUMENT";

export class ForensicError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    remediation?: string,
  ) {
    super(message);
    this.name = "ForensicError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}
