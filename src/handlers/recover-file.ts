import type { HandlerDeps } from "./types.js";
import { contextFor } from "./types.js";
import type { RecoverFileArgs } from "../schemas/tools.js";
import { recoverFile } from "../analysis/index.js";
import { formatResponse, formatError } from "../response.js";
import { ForensicError } from "../errors/forensic-error.js";
import { toForensicError } from "../errors/error-mapper.js";

export async function handleRecoverFile(deps: HandlerDeps, args: RecoverFileArgs) {
  const startTime = Date.now();

  try {
    const result = await recoverFile(contextFor(deps, args.image), deps.config.outputDir, args.inode, args.filename);
    if (result.status === "failed") {
      return formatError("recover_file", new ForensicError(
        result.error,
        "COMMAND_NON_ZERO_EXIT",
        "exit_status",
        "Deleted entries marked (realloc) usually cannot be recovered",
      ), startTime);
    }

    return formatResponse("recover_file", { inode: result.inode, path: result.path }, startTime);
  } catch (error) {
    return formatError("recover_file", toForensicError(error), startTime);
  }
}
