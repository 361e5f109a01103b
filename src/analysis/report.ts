/**
 * The AnalysisReport aggregate and its artifact results.
 *
 * A report value is never mutated: each step returns a new one, so the
 * module order stays explicit and every step is testable on its own.
 * The zod schemas double as the reader for a saved JSON report.
 */

import { z } from "zod";
import type { FileEntry, PartitionEntry } from "../parsers/types.js";

export const MODULE_NAMES = [
  "partitions",
  "filesystem_info",
  "file_listing",
  "deleted_files",
  "timeline",
] as const;
export type ModuleName = (typeof MODULE_NAMES)[number];

const fileEntrySchema: z.ZodType<FileEntry> = z.object({
  type: z.string(),
  inode: z.string(),
  name: z.string(),
  mode: z.string(),
  uid: z.string(),
  gid: z.string(),
  size: z.string(),
  atime: z.string(),
  mtime: z.string(),
  ctime: z.string(),
});

const partitionEntrySchema: z.ZodType<PartitionEntry> = z.object({
  slot: z.string(),
  start: z.string(),
  end: z.string(),
  length: z.string(),
  description: z.string(),
});

const failureSchema = z.object({
  status: z.literal("failed"),
  error: z.string(),
});

const count = z.number().int().nonnegative();

const partitionsSuccessSchema = z.object({
  status: z.literal("success"),
  count,
  partitions: z.array(partitionEntrySchema),
  skipped_lines: count,
});

const filesystemInfoSuccessSchema = z.object({
  status: z.literal("success"),
  raw_output: z.string(),
});

const fileListingSuccessSchema = z.object({
  status: z.literal("success"),
  total_files: count,
  files: z.array(fileEntrySchema),
  skipped_lines: count,
});

const deletedFilesSuccessSchema = z.object({
  status: z.literal("success"),
  count,
  recoverable_count: count,
  realloc_count: count,
  files: z.array(z.string()),
  recoverable: z.array(z.string()),
  realloc_warning: z.array(z.string()),
});

const timelineSuccessSchema = z.object({
  status: z.literal("success"),
  entries: count,
  first_activity: z.string().nullable(),
  last_activity: z.string().nullable(),
});

export type ArtifactFailure = z.infer<typeof failureSchema>;
export type PartitionsArtifact = z.infer<typeof partitionsSuccessSchema>;
export type FilesystemInfoArtifact = z.infer<typeof filesystemInfoSuccessSchema>;
export type FileListingArtifact = z.infer<typeof fileListingSuccessSchema>;
export type DeletedFilesArtifact = z.infer<typeof deletedFilesSuccessSchema>;
export type TimelineArtifact = z.infer<typeof timelineSuccessSchema>;

/** Result type stored under each module's key. */
export interface ArtifactMap {
  partitions: PartitionsArtifact | ArtifactFailure;
  filesystem_info: FilesystemInfoArtifact | ArtifactFailure;
  file_listing: FileListingArtifact | ArtifactFailure;
  deleted_files: DeletedFilesArtifact | ArtifactFailure;
  timeline: TimelineArtifact | ArtifactFailure;
}

export type ArtifactResult = ArtifactMap[ModuleName];

export interface AnalysisReport {
  analysis_date: string;
  image_analyzed: string;
  artifacts: Partial<ArtifactMap>;
  warnings: string[];
}

export const analysisReportSchema: z.ZodType<AnalysisReport> = z.object({
  analysis_date: z.string(),
  image_analyzed: z.string(),
  artifacts: z.object({
    partitions: z.discriminatedUnion("status", [partitionsSuccessSchema, failureSchema]).optional(),
    filesystem_info: z.discriminatedUnion("status", [filesystemInfoSuccessSchema, failureSchema]).optional(),
    file_listing: z.discriminatedUnion("status", [fileListingSuccessSchema, failureSchema]).optional(),
    deleted_files: z.discriminatedUnion("status", [deletedFilesSuccessSchema, failureSchema]).optional(),
    timeline: z.discriminatedUnion("status", [timelineSuccessSchema, failureSchema]).optional(),
  }),
  warnings: z.array(z.string()),
});

/** A file written beside the report for a successful module. */
export interface CompanionFile {
  name: string;
  content: string;
}

/** What one analysis module hands back to the aggregator. */
export type ModuleOutcome = {
  [N in ModuleName]: {
    name: N;
    result: ArtifactMap[N];
    files: CompanionFile[];
    warnings: string[];
  };
}[ModuleName];

export function createReport(imagePath: string, analysisDate: Date): AnalysisReport {
  return {
    analysis_date: analysisDate.toISOString(),
    image_analyzed: imagePath,
    artifacts: {},
    warnings: [],
  };
}

export function withArtifact<N extends ModuleName>(
  report: AnalysisReport,
  name: N,
  result: ArtifactMap[N],
): AnalysisReport {
  const artifacts: Partial<ArtifactMap> = { ...report.artifacts };
  artifacts[name] = result;
  return { ...report, artifacts };
}

/** Append warnings not already on the report. */
export function withWarnings(report: AnalysisReport, warnings: readonly string[]): AnalysisReport {
  const fresh = warnings.filter((w, i) => !report.warnings.includes(w) && warnings.indexOf(w) === i);
  if (fresh.length === 0) return report;
  return { ...report, warnings: [...report.warnings, ...fresh] };
}

export function mergeOutcome(report: AnalysisReport, outcome: ModuleOutcome): AnalysisReport {
  return withWarnings(withArtifact(report, outcome.name, outcome.result), outcome.warnings);
}

export function isSuccess<T extends { status: string }>(
  result: T | undefined,
): result is Extract<T, { status: "success" }> {
  return result?.status === "success";
}
