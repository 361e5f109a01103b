/**
 * Everything the HTML sections read, computed once from the report.
 */

import { MODULE_NAMES, isSuccess } from "../../analysis/report.js";
import type { AnalysisReport, ArtifactResult } from "../../analysis/report.js";
import type { FileEntry, PartitionEntry } from "../../parsers/types.js";
import { formatCount } from "./escape.js";

export const FILESYSTEM_INFO_LIMIT = 2000;
export const FILE_LISTING_LIMIT = 100;

export interface ModuleStatusRow {
  label: string;
  succeeded: boolean;
  /** Upper-cased status, e.g. `SUCCESS` or `FAILED` */
  status: string;
  detail: string;
}

export interface ReportView {
  analysisDate: string;
  imageAnalyzed: string;
  outputDir: string;
  generatedAt: Date;
  totalFiles: number;
  deletedCount: number;
  recoverableCount: number;
  reallocCount: number;
  partitionCount: number;
  timelineEntries: number;
  /** The full listing; sections decide how much to show */
  files: FileEntry[];
  partitions: PartitionEntry[];
  /** Already cut to FILESYSTEM_INFO_LIMIT characters; null when unavailable */
  filesystemInfo: string | null;
  modules: ModuleStatusRow[];
  warnings: string[];
}

/** `file_listing` → `File Listing` */
export function moduleLabel(name: string): string {
  return name
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

export function statusDetail(result: ArtifactResult): string {
  if (result.status === "failed") {
    return result.error || "Failed";
  }

  const details: string[] = [];
  if ("total_files" in result) details.push(`${formatCount(result.total_files)} files`);
  if ("count" in result) details.push(`${result.count} items`);
  if ("entries" in result) details.push(`${formatCount(result.entries)} entries`);
  return details.length > 0 ? details.join(", ") : "Completed";
}

export function buildReportView(
  report: AnalysisReport,
  outputDir: string,
  generatedAt: Date,
): ReportView {
  const { file_listing, deleted_files, partitions, timeline, filesystem_info } = report.artifacts;

  const modules: ModuleStatusRow[] = [];
  for (const name of MODULE_NAMES) {
    const result = report.artifacts[name];
    if (!result) continue;
    modules.push({
      label: moduleLabel(name),
      succeeded: result.status === "success",
      status: result.status.toUpperCase(),
      detail: statusDetail(result),
    });
  }

  return {
    analysisDate: report.analysis_date,
    imageAnalyzed: report.image_analyzed,
    outputDir,
    generatedAt,
    totalFiles: isSuccess(file_listing) ? file_listing.total_files : 0,
    deletedCount: isSuccess(deleted_files) ? deleted_files.count : 0,
    recoverableCount: isSuccess(deleted_files) ? deleted_files.recoverable_count : 0,
    reallocCount: isSuccess(deleted_files) ? deleted_files.realloc_count : 0,
    partitionCount: isSuccess(partitions) ? partitions.count : 0,
    timelineEntries: isSuccess(timeline) ? timeline.entries : 0,
    files: isSuccess(file_listing) ? file_listing.files : [],
    partitions: isSuccess(partitions) ? partitions.partitions : [],
    filesystemInfo: isSuccess(filesystem_info)
      ? Array.from(filesystem_info.raw_output).slice(0, FILESYSTEM_INFO_LIMIT).join("")
      : null,
    modules,
    warnings: report.warnings,
  };
}
