import type { HandlerDeps } from "./types.js";
import { contextFor } from "./types.js";
import type { GetInodeMetadataArgs } from "../schemas/tools.js";
import { inspectInode } from "../analysis/index.js";
import { formatResponse, formatError } from "../response.js";
import { ForensicError } from "../errors/forensic-error.js";
import { toForensicError } from "../errors/error-mapper.js";

export async function handleGetInodeMetadata(deps: HandlerDeps, args: GetInodeMetadataArgs) {
  const startTime = Date.now();

  try {
    const result = await inspectInode(contextFor(deps, args.image), args.inode);
    if (result.status === "failed") {
      return formatError("get_inode_metadata", new ForensicError(
        result.error,
        "COMMAND_NON_ZERO_EXIT",
        "exit_status",
        "Check the inode address against the fls listing",
      ), startTime);
    }

    return formatResponse("get_inode_metadata", {
      inode: result.inode,
      fields: result.fields,
      raw_output: result.raw_output,
    }, startTime);
  } catch (error) {
    return formatError("get_inode_metadata", toForensicError(error), startTime);
  }
}
