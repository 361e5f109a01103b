/**
 * Unit tests for the response envelope helpers.
 */

import { describe, it, expect } from "vitest";
import { formatResponse, formatError } from "../response.js";

describe("formatResponse", () => {
  it("returns success envelope with data and timing", () => {
    const startTime = Date.now() - 42;
    const result = formatResponse("get_inode_metadata", { inode: "45", fields: { size: "5120" } }, startTime);

    const envelope = JSON.parse(result.content[0].text);
    expect(envelope.success).toBe(true);
    expect(envelope.tool).toBe("get_inode_metadata");
    expect(envelope.data.inode).toBe("45");
    expect(envelope.data.fields).toEqual({ size: "5120" });
    expect(envelope.error).toBeUndefined();
    expect(envelope.metadata.elapsed_ms).toBeGreaterThanOrEqual(42);
    expect(result.isError).toBeUndefined();
  });

  it("pretty-prints small envelopes", () => {
    const result = formatResponse("recover_file", { path: "/out/recovered/a.txt" }, Date.now());
    expect(result.content[0].text).toContain('\n  "success": true');
  });

  it("sends large envelopes without indentation", () => {
    const result = formatResponse("analyze_image", { raw: "x".repeat(60 * 1024) }, Date.now());
    expect(result.content[0].text.startsWith('{"success":true,')).toBe(true);
  });
});

describe("formatError", () => {
  it("returns error envelope with isError true", () => {
    const startTime = Date.now() - 10;
    const result = formatError("recover_file", "icat failed", startTime);

    const envelope = JSON.parse(result.content[0].text);
    expect(envelope.success).toBe(false);
    expect(envelope.tool).toBe("recover_file");
    expect(envelope.error).toBe("icat failed");
    expect(envelope.data).toEqual({});
    expect(envelope.metadata.elapsed_ms).toBeGreaterThanOrEqual(10);
    expect(result.isError).toBe(true);
  });
});
