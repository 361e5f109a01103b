/**
 * Parser for `istat` inode detail output.
 *
 * Extracts `Key: value` lines; section headings and block lists are ignored.
 */

import { splitLines } from "./types.js";

export function parseInodeMetadata(rawOutput: string): Record<string, string> {
  // Null prototype: keys such as "constructor" are ordinary istat fields here
  const fields: Record<string, string> = Object.create(null);

  for (const line of splitLines(rawOutput)) {
    // "Accessed:\t2026-10-01 12:00:00 (UTC)" / "uid / gid: 0 / 0"
    const match = line.match(/^\s*([^:]+?):\s+(.+?)\s*$/);
    if (match) {
      const key = match[1].trim();
      if (!Object.hasOwn(fields, key)) {
        fields[key] = match[2];
      }
    }
  }

  return fields;
}
