/**
 * Analysis modules. Each one runs a single Sleuth Kit command, parses its
 * output, and returns a ModuleOutcome for the aggregator to merge. Modules
 * never throw on tool failure and never touch the filesystem.
 */

import { stripTruncationMarker } from "../connectors/index.js";
import type { ExecResult } from "../connectors/index.js";
import { classifyCommandResult } from "../errors/error-mapper.js";
import {
  classifyDeletedFiles,
  parseFileListing,
  parsePartitions,
  scanStderrWarnings,
  splitByRecoverability,
  summarizeTimeline,
} from "../parsers/index.js";
import type { SkippedLine } from "../parsers/index.js";
import { buildCommandFromDefinition } from "../tools/invoker.js";
import { toolRegistry } from "../tools/registry.js";
import { runCommand } from "../tools/runner.js";
import { toCsv } from "../report/csv.js";
import type { AnalysisContext } from "./context.js";
import type { CompanionFile, ModuleName, ModuleOutcome } from "./report.js";

async function runTool(ctx: AnalysisContext, toolName: string): Promise<ExecResult> {
  const command = buildCommandFromDefinition(toolRegistry.require(toolName), ctx.imagePath);
  return runCommand(ctx.connector, command, ctx.timeoutMs);
}

function csvFile(name: string, records: Parameters<typeof toCsv>[0]): CompanionFile[] {
  const content = toCsv(records);
  return content === null ? [] : [{ name, content }];
}

/**
 * Listing output without the truncation marker. A capped listing is
 * incomplete, which goes into the report warnings.
 */
function listingOutput(ctx: AnalysisContext, label: string, stdout: string, warnings: string[]): string {
  const { output, truncated } = stripTruncationMarker(stdout);
  if (truncated) {
    const warning = `${label} output exceeded the 64MB limit and was truncated; results are incomplete`;
    ctx.log(`[!] ${warning}`);
    warnings.push(warning);
  }
  return output;
}

function logSkipped(ctx: AnalysisContext, skipped: SkippedLine[]): void {
  if (skipped.length > 0) {
    ctx.log(`[!] ${skipped.length} malformed line(s) skipped (first at line ${skipped[0].line_number})`);
  }
}

function failure<N extends ModuleName>(
  ctx: AnalysisContext,
  name: N,
  label: string,
  error: string,
  warnings: string[] = [],
) {
  ctx.log(`[-] ${label} failed: ${error}`);
  return { name, result: { status: "failed" as const, error }, files: [], warnings };
}

export async function analyzePartitions(ctx: AnalysisContext): Promise<ModuleOutcome> {
  ctx.log("[*] Analyzing disk partitions...");
  const result = await runTool(ctx, "mmls");
  const error = classifyCommandResult(result);
  if (error) return failure(ctx, "partitions", "Partition analysis", error.message);

  const warnings: string[] = [];
  const { records, skipped } = parsePartitions(listingOutput(ctx, "Partition table", result.stdout, warnings));
  ctx.log(`[+] Found ${records.length} partitions`);
  logSkipped(ctx, skipped);

  return {
    name: "partitions",
    result: { status: "success", count: records.length, partitions: records, skipped_lines: skipped.length },
    files: csvFile("partitions.csv", records),
    warnings,
  };
}

export async function analyzeFilesystem(ctx: AnalysisContext): Promise<ModuleOutcome> {
  ctx.log("[*] Analyzing filesystem structure...");
  const result = await runTool(ctx, "fsstat");
  const error = classifyCommandResult(result);
  if (error) return failure(ctx, "filesystem_info", "Filesystem analysis", error.message);

  ctx.log("[+] Filesystem analysis complete");
  return {
    name: "filesystem_info",
    result: { status: "success", raw_output: result.stdout },
    files: [{ name: "filesystem_info.txt", content: result.stdout }],
    warnings: [],
  };
}

export async function listFiles(ctx: AnalysisContext): Promise<ModuleOutcome> {
  ctx.log("[*] Extracting file listing...");
  const result = await runTool(ctx, "fls-body");
  const warnings = scanStderrWarnings(result.stderr);
  if (warnings.length > 0) {
    ctx.log("[!] Note: high entropy/encrypted files detected (informational)");
  }

  const error = classifyCommandResult(result);
  if (error) return failure(ctx, "file_listing", "File listing", error.message, warnings);

  const { records, skipped } = parseFileListing(listingOutput(ctx, "File listing", result.stdout, warnings));
  ctx.log(`[+] Found ${records.length} files`);
  logSkipped(ctx, skipped);

  return {
    name: "file_listing",
    result: { status: "success", total_files: records.length, files: records, skipped_lines: skipped.length },
    files: csvFile("file_listing.csv", records),
    warnings,
  };
}

export async function findDeletedFiles(ctx: AnalysisContext): Promise<ModuleOutcome> {
  ctx.log("[*] Searching for deleted files...");
  const result = await runTool(ctx, "fls-deleted");
  const warnings = scanStderrWarnings(result.stderr);

  const error = classifyCommandResult(result);
  if (error) return failure(ctx, "deleted_files", "Deleted file search", error.message, warnings);

  const { records } = classifyDeletedFiles(listingOutput(ctx, "Deleted file listing", result.stdout, warnings));
  const { recoverable, realloc_warning } = splitByRecoverability(records);

  ctx.log(`[+] Found ${records.length} deleted files`);
  ctx.log(`    |- ${recoverable.length} potentially recoverable`);
  ctx.log(`    '- ${realloc_warning.length} with reallocation warnings (may be overwritten)`);

  const files: CompanionFile[] = [{ name: "deleted_files.txt", content: result.stdout }];
  if (recoverable.length > 0) {
    files.push({ name: "deleted_files_recoverable.txt", content: recoverable.join("\n") });
  }
  if (realloc_warning.length > 0) {
    files.push({ name: "deleted_files_realloc.txt", content: realloc_warning.join("\n") });
  }

  return {
    name: "deleted_files",
    result: {
      status: "success",
      count: records.length,
      recoverable_count: recoverable.length,
      realloc_count: realloc_warning.length,
      files: records.map((r) => r.line),
      recoverable,
      realloc_warning,
    },
    files,
    warnings,
  };
}

export async function createTimeline(ctx: AnalysisContext): Promise<ModuleOutcome> {
  ctx.log("[*] Creating filesystem timeline...");
  const result = await runTool(ctx, "fls-body");
  const error = classifyCommandResult(result);
  if (error) return failure(ctx, "timeline", "Timeline creation", error.message);

  const warnings: string[] = [];
  const summary = summarizeTimeline(listingOutput(ctx, "Timeline", result.stdout, warnings));
  ctx.log(`[+] Timeline created with ${summary.entries} entries`);

  return {
    name: "timeline",
    result: { status: "success", ...summary },
    files: [{ name: "timeline.txt", content: result.stdout }],
    warnings,
  };
}

export type AnalysisModule = (ctx: AnalysisContext) => Promise<ModuleOutcome>;

export const ANALYSIS_MODULES: Record<ModuleName, AnalysisModule> = {
  partitions: analyzePartitions,
  filesystem_info: analyzeFilesystem,
  file_listing: listFiles,
  deleted_files: findDeletedFiles,
  timeline: createTimeline,
};
