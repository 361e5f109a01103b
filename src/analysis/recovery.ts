/**
 * Single-inode operations: metadata via istat, content via icat.
 */

import { mkdirSync, rmSync } from "fs";
import { basename, join, posix } from "path";
import { ForensicError } from "../errors/forensic-error.js";
import { classifyCommandResult } from "../errors/error-mapper.js";
import { parseInodeMetadata } from "../parsers/istat.js";
import { buildCommandFromDefinition, isInodeAddress, shellEscape } from "../tools/invoker.js";
import { toolRegistry } from "../tools/registry.js";
import { runCommand } from "../tools/runner.js";
import type { AnalysisContext } from "./context.js";

export const RECOVERED_DIR = "recovered";

export type InodeMetadataResult =
  | { status: "success"; inode: string; raw_output: string; fields: Record<string, string> }
  | { status: "failed"; inode: string; error: string };

export type RecoveryResult =
  | { status: "success"; inode: string; path: string }
  | { status: "failed"; inode: string; error: string };

function requireInode(inode: string): void {
  if (!isInodeAddress(inode)) {
    throw new ForensicError(
      `Invalid inode address: ${inode}`,
      "INVALID_ARGUMENT",
      "validation",
      "Use a metadata address as printed by fls, e.g. 45 or 128-128-2",
    );
  }
}

/** Recovered files land directly in recovered/, so only plain names are allowed. */
export function isRecoveryFilename(filename: string): boolean {
  return (
    filename !== "" &&
    filename !== "." &&
    filename !== ".." &&
    basename(filename) === filename &&
    !filename.includes("\\")
  );
}

export function validateRecoveryFilename(filename: string): void {
  if (!isRecoveryFilename(filename)) {
    throw new ForensicError(
      `Invalid output filename: ${filename}`,
      "INVALID_ARGUMENT",
      "validation",
      "Pass a plain file name without directory components",
    );
  }
}

export async function inspectInode(ctx: AnalysisContext, inode: string): Promise<InodeMetadataResult> {
  requireInode(inode);
  ctx.log(`[*] Analyzing metadata for inode ${inode}...`);

  const command = buildCommandFromDefinition(toolRegistry.require("istat"), ctx.imagePath, inode);
  const result = await runCommand(ctx.connector, command, ctx.timeoutMs);
  const error = classifyCommandResult(result);
  if (error) {
    ctx.log(`[-] Metadata extraction failed: ${error.message}`);
    return { status: "failed", inode, error: error.message };
  }

  ctx.log(`[+] Metadata extracted for inode ${inode}`);
  return { status: "success", inode, raw_output: result.stdout, fields: parseInodeMetadata(result.stdout) };
}

/**
 * Write the content of `inode` to `<outputDir>/recovered/<filename>`.
 *
 * In docker mode icat writes into the container's /tmp and the file is
 * copied out afterwards.
 */
export async function recoverFile(
  ctx: AnalysisContext,
  outputDir: string,
  inode: string,
  filename: string,
): Promise<RecoveryResult> {
  requireInode(inode);
  validateRecoveryFilename(filename);
  ctx.log(`[*] Recovering file inode ${inode}...`);

  mkdirSync(join(outputDir, RECOVERED_DIR), { recursive: true });
  const hostPath = join(outputDir, RECOVERED_DIR, filename);
  const stagingPath = ctx.mode === "local" ? hostPath : posix.join("/tmp", `icat-${inode}-${filename}`);

  const icat = buildCommandFromDefinition(toolRegistry.require("icat"), ctx.imagePath, inode);
  const result = await runCommand(ctx.connector, `${icat} > ${shellEscape(stagingPath)}`, ctx.timeoutMs);
  const error = classifyCommandResult(result);

  if (error) {
    if (ctx.mode === "local") {
      rmSync(hostPath, { force: true });
    }
    ctx.log(`[-] File recovery failed: ${error.message}`);
    return { status: "failed", inode, error: error.message };
  }

  if (ctx.mode !== "local") {
    try {
      await ctx.connector.readFileToPath(stagingPath, hostPath);
    } catch (copyError) {
      const message = copyError instanceof Error ? copyError.message : String(copyError);
      ctx.log(`[-] File recovery failed: ${message}`);
      return { status: "failed", inode, error: message };
    } finally {
      await runCommand(ctx.connector, `rm -f ${shellEscape(stagingPath)}`, ctx.timeoutMs);
    }
  }

  ctx.log(`[+] File recovered to ${hostPath}`);
  return { status: "success", inode, path: hostPath };
}
