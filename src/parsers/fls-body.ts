/**
 * Parser for `fls -r -m /` body-file output.
 *
 * Pipe-delimited, one entry per line. Fields are mapped by position and
 * kept verbatim; the trailing change-time field may be absent.
 */

import type { FileEntry, ParseResult } from "./types.js";
import { splitLines } from "./types.js";

export const MIN_BODY_FIELDS = 10;

export function parseFileListing(rawOutput: string): ParseResult<FileEntry> {
  const result: ParseResult<FileEntry> = { records: [], skipped: [] };

  splitLines(rawOutput).forEach((line, index) => {
    if (line.trim() === "" || line.startsWith("#")) return;

    const parts = line.split("|");
    if (parts.length < MIN_BODY_FIELDS) {
      result.skipped.push({
        line_number: index + 1,
        line,
        reason: `expected at least ${MIN_BODY_FIELDS} fields, got ${parts.length}`,
      });
      return;
    }

    result.records.push({
      type: parts[1],
      inode: parts[2],
      name: parts[3],
      mode: parts[4],
      uid: parts[5],
      gid: parts[6],
      size: parts[7],
      atime: parts[8],
      mtime: parts[9],
      ctime: parts[10] ?? "",
    });
  });

  return result;
}
