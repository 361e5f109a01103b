/**
 * Command runner: the single place external commands are executed.
 *
 * Never rejects: timeouts and invocation errors come back as exit code -1
 * with a human-readable cause on stderr.
 */

import type { Connector, ExecResult } from "../connectors/index.js";
import { toForensicError, TIMEOUT_MESSAGE } from "../errors/error-mapper.js";

export async function runCommand(
  connector: Connector,
  command: string,
  timeoutMs: number,
): Promise<ExecResult> {
  try {
    return await connector.executeShell(command, { timeout: timeoutMs });
  } catch (error) {
    const mapped = toForensicError(error);
    return {
      stdout: "",
      stderr: mapped.category === "timeout" ? TIMEOUT_MESSAGE : mapped.message,
      exitCode: -1,
    };
  }
}
