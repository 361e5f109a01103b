/**
 * Parser for `mmls` partition table output.
 *
 * Rows that start with `0` or with a non-digit are table furniture
 * (headers, meta and unallocated slots) and are ignored outright.
 */

import type { ParseResult, PartitionEntry } from "./types.js";
import { splitLines } from "./types.js";

const MIN_PARTITION_TOKENS = 6;

export function parsePartitions(rawOutput: string): ParseResult<PartitionEntry> {
  const result: ParseResult<PartitionEntry> = { records: [], skipped: [] };

  splitLines(rawOutput).forEach((line, index) => {
    if (!/^[1-9]/.test(line)) return;

    const tokens = line.trim().split(/\s+/);
    if (tokens.length < MIN_PARTITION_TOKENS) {
      result.skipped.push({
        line_number: index + 1,
        line,
        reason: `expected at least ${MIN_PARTITION_TOKENS} columns, got ${tokens.length}`,
      });
      return;
    }

    const [slot, start, end, length, ...description] = tokens;
    result.records.push({ slot, start, end, length, description: description.join(" ") });
  });

  return result;
}
