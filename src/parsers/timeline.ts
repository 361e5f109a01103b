/**
 * Timeline summary over `fls -m` body output.
 *
 * Body layout: MD5|name|inode|mode|UID|GID|size|atime|mtime|ctime|crtime
 * with times in seconds since the epoch (0 = not recorded).
 */

import { splitLines } from "./types.js";

const FIRST_TIME_FIELD = 7;
const LAST_TIME_FIELD = 10;

export interface TimelineSummary {
  entries: number;
  /** Earliest recorded time as ISO-8601 UTC, null if none */
  first_activity: string | null;
  last_activity: string | null;
}

export function summarizeTimeline(rawOutput: string): TimelineSummary {
  let entries = 0;
  let earliest = Infinity;
  let latest = -Infinity;

  for (const line of splitLines(rawOutput)) {
    if (line.trim() === "") continue;
    entries++;

    const fields = line.split("|");
    for (let i = FIRST_TIME_FIELD; i <= LAST_TIME_FIELD && i < fields.length; i++) {
      const seconds = Number(fields[i]);
      if (!Number.isInteger(seconds) || seconds <= 0) continue;
      earliest = Math.min(earliest, seconds);
      latest = Math.max(latest, seconds);
    }
  }

  return {
    entries,
    first_activity: Number.isFinite(earliest) ? new Date(earliest * 1000).toISOString() : null,
    last_activity: Number.isFinite(latest) ? new Date(latest * 1000).toISOString() : null,
  };
}
