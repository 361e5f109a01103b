import { describe, it, expect } from "vitest";
import { parseInodeMetadata } from "../istat.js";

describe("parseInodeMetadata", () => {
  it("extracts key/value lines", () => {
    const output = [
      "inode: 45",
      "Not Allocated",
      "Group: 0",
      "uid / gid: 1000 / 1000",
      "mode: rrw-r--r--",
      "size: 88",
      "",
      "Inode Times:",
      "Accessed:\t2026-10-01 12:00:00 (UTC)",
      "",
      "Direct Blocks:",
      "1234 1235",
    ].join("\n");

    expect(parseInodeMetadata(output)).toEqual({
      inode: "45",
      Group: "0",
      "uid / gid": "1000 / 1000",
      mode: "rrw-r--r--",
      size: "88",
      Accessed: "2026-10-01 12:00:00 (UTC)",
    });
  });

  it("keeps the first occurrence of repeated keys", () => {
    const output = "Accessed:\t2026-10-01 12:00:00 (UTC)\nAccessed:\t2026-09-30 08:00:00 (UTC)";
    expect(parseInodeMetadata(output).Accessed).toBe("2026-10-01 12:00:00 (UTC)");
  });

  it("returns an empty map for empty output", () => {
    expect(parseInodeMetadata("")).toEqual({});
  });

  it("treats keys named like object members as ordinary fields", () => {
    const fields = parseInodeMetadata("constructor: 12\n__proto__: 7\ntoString: x");

    expect(Object.entries(fields)).toEqual([
      ["constructor", "12"],
      ["__proto__", "7"],
      ["toString", "x"],
    ]);
    expect(Object.getPrototypeOf(fields)).toBeNull();
  });
});
