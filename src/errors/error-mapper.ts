/**
 * Maps raw/unknown errors and command results into ForensicError instances.
 *
 * Catch blocks can call `toForensicError(err)` to get a typed error
 * with code, category, and remediation hint.
 */

import { ForensicError } from "./forensic-error.js";
import type { ExecResult } from "../connectors/index.js";

export const TIMEOUT_MESSAGE = "Command timed out";

export function toForensicError(raw: unknown): ForensicError {
  if (raw instanceof ForensicError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);

  if (/timed?\s?out/i.test(msg)) {
    return new ForensicError(
      msg,
      "COMMAND_TIMEOUT",
      "timeout",
      "Increase --timeout or analyze a smaller image",
    );
  }

  if (/ENOENT|not found/i.test(msg)) {
    return new ForensicError(
      msg,
      "COMMAND_EXECUTION_ERROR",
      "execution",
      "Check that The Sleuth Kit is installed and on PATH",
    );
  }

  if (/is not running/i.test(msg)) {
    return new ForensicError(
      msg,
      "COMMAND_EXECUTION_ERROR",
      "execution",
      "Start the analysis container or use --mode local",
    );
  }

  return new ForensicError(msg, "COMMAND_EXECUTION_ERROR", "execution");
}

/**
 * Classify a finished command. Returns null when it exited cleanly.
 *
 * Exit code -1 is reserved by the command runner for timeouts and
 * invocation errors; any other non-zero code came from the tool itself.
 */
export function classifyCommandResult(result: ExecResult): ForensicError | null {
  if (result.exitCode === 0) {
    return null;
  }

  if (result.exitCode === -1) {
    return result.stderr === TIMEOUT_MESSAGE
      ? new ForensicError(TIMEOUT_MESSAGE, "COMMAND_TIMEOUT", "timeout")
      : new ForensicError(result.stderr, "COMMAND_EXECUTION_ERROR", "execution");
  }

  return new ForensicError(
    result.stderr || `Command exited with status ${result.exitCode}`,
    "COMMAND_NON_ZERO_EXIT",
    "exit_status",
  );
}
