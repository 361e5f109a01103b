/**
 * Common types for Sleuth Kit output parsing.
 */

/** One row of `fls -m` body output, fields copied verbatim. */
export type FileEntry = {
  type: string;
  inode: string;
  name: string;
  mode: string;
  uid: string;
  gid: string;
  size: string;
  atime: string;
  mtime: string;
  ctime: string;
};

/** One allocated row of `mmls` output. Sector values stay strings. */
export type PartitionEntry = {
  slot: string;
  start: string;
  end: string;
  length: string;
  description: string;
};

export type DeletedFileClassification = "recoverable" | "realloc_warning";

export type DeletedFileEntry = {
  /** Listing line as printed by `fls -d` */
  line: string;
  classification: DeletedFileClassification;
};

/** A line a parser could not use. */
export interface SkippedLine {
  /** 1-based position in the raw output */
  line_number: number;
  line: string;
  reason: string;
}

/**
 * Accepted records plus the lines that were dropped, so data loss on
 * noisy or truncated output stays visible to callers.
 */
export interface ParseResult<T> {
  records: T[];
  skipped: SkippedLine[];
}

/** Split tool output into lines, tolerating CRLF. */
export function splitLines(rawOutput: string): string[] {
  if (rawOutput === "") return [];
  return rawOutput.split("\n").map((line) => line.replace(/\r$/, ""));
}
