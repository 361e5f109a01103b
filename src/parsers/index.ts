/**
 * Sleuth Kit output parsers.
 */

export { parseFileListing, MIN_BODY_FIELDS } from "./fls-body.js";
export { parsePartitions } from "./mmls.js";
export { classifyDeletedFiles, splitByRecoverability, REALLOC_MARKER } from "./deleted.js";
export type { DeletedFileBreakdown } from "./deleted.js";
export { summarizeTimeline } from "./timeline.js";
export type { TimelineSummary } from "./timeline.js";
export { parseInodeMetadata } from "./istat.js";
export { scanStderrWarnings, HIGH_ENTROPY_WARNING } from "./warnings.js";
export type {
  FileEntry,
  PartitionEntry,
  DeletedFileEntry,
  DeletedFileClassification,
  SkippedLine,
  ParseResult,
} from "./types.js";
