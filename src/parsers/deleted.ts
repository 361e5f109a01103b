/**
 * Classifier for `fls -r -d` deleted-entry listings.
 *
 * An entry whose metadata slot was reused by a newer file carries the
 * `(realloc)` marker; its content is most likely overwritten.
 */

import type { DeletedFileEntry, ParseResult } from "./types.js";
import { splitLines } from "./types.js";

export const REALLOC_MARKER = "(realloc)";

export function classifyDeletedFiles(rawOutput: string): ParseResult<DeletedFileEntry> {
  const records = splitLines(rawOutput)
    .filter((line) => line.trim() !== "")
    .map((line): DeletedFileEntry => ({
      line,
      classification: line.includes(REALLOC_MARKER) ? "realloc_warning" : "recoverable",
    }));

  return { records, skipped: [] };
}

export interface DeletedFileBreakdown {
  recoverable: string[];
  realloc_warning: string[];
}

export function splitByRecoverability(entries: DeletedFileEntry[]): DeletedFileBreakdown {
  const breakdown: DeletedFileBreakdown = { recoverable: [], realloc_warning: [] };
  for (const entry of entries) {
    breakdown[entry.classification].push(entry.line);
  }
  return breakdown;
}
