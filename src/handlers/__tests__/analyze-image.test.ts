import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { handleAnalyzeImage } from "../analyze-image.js";
import { createMockDeps, ok, fail, parseEnvelope } from "./helpers.js";

const BODY = [
  "0|/etc/passwd|12|r/rrw-r--r--|0|0|1024|1700000000|1700000100|1700000200|1700000300",
  "0|/home/user/notes.txt|13|r/rrw-r--r--|1000|1000|64|1700000000|1700000000|1700000000|0",
].join("\n");

describe("handleAnalyzeImage", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "analyze-image-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("returns IMAGE_NOT_FOUND when the image is missing in the container", async () => {
    const deps = createMockDeps({ outputDir });
    vi.mocked(deps.connector.executeShell).mockResolvedValueOnce(fail("", 1));

    const result = await handleAnalyzeImage(deps, { image: "/evidence/missing.dd", module: "full" });
    const env = parseEnvelope(result);

    expect(result.isError).toBe(true);
    expect(env.error_code).toBe("IMAGE_NOT_FOUND");
    expect(env.error_category).toBe("not_found");
    expect(env.error).toBe("Image file '/evidence/missing.dd' not found");
    expect(deps.connector.executeShell).toHaveBeenCalledTimes(1);
  });

  it("runs a single module and reports its summary", async () => {
    const deps = createMockDeps({ outputDir });
    const shell = vi.mocked(deps.connector.executeShell);
    shell
      .mockResolvedValueOnce(ok(""))    // test -e
      .mockResolvedValueOnce(ok(BODY)); // fls -r -m /

    const result = await handleAnalyzeImage(deps, { image: "/evidence/disk.dd", module: "files" });
    const env = parseEnvelope(result);

    expect(env.success).toBe(true);
    expect(env.tool).toBe("analyze_image");
    expect(env.data.image).toBe("/evidence/disk.dd");
    expect(env.data.modules).toEqual({ file_listing: { status: "success", detail: "2 files" } });
    expect(env.data.html_report).toBeNull();
    expect(shell).toHaveBeenNthCalledWith(2, "fls -r -m / '/evidence/disk.dd'", { timeout: 300000 });

    const saved = JSON.parse(readFileSync(env.data.json_report, "utf-8"));
    expect(saved.artifacts.file_listing.total_files).toBe(2);
  });

  it("writes the HTML report for a full run and keeps going past failures", async () => {
    const deps = createMockDeps({ outputDir });
    const shell = vi.mocked(deps.connector.executeShell);
    shell
      .mockResolvedValueOnce(ok(""))                                     // test -e
      .mockResolvedValueOnce(fail("Cannot determine partition type"))   // mmls
      .mockResolvedValueOnce(ok("FILE SYSTEM INFORMATION"))              // fsstat
      .mockResolvedValueOnce(ok(BODY))                                   // fls -m
      .mockResolvedValueOnce(ok("r/r * 20:\tgone.txt"))                 // fls -d
      .mockResolvedValueOnce(ok(BODY));                                  // timeline

    const result = await handleAnalyzeImage(deps, { image: "/evidence/disk.dd", module: "full" });
    const env = parseEnvelope(result);

    expect(env.success).toBe(true);
    expect(env.data.modules.partitions).toEqual({
      status: "failed",
      detail: "Cannot determine partition type",
    });
    expect(env.data.modules.deleted_files).toEqual({ status: "success", detail: "1 items" });
    expect(env.data.modules.timeline).toEqual({ status: "success", detail: "2 entries" });
    expect(env.data.html_report).toMatch(/_forensic_report\.html$/);
  });

  it("honors html: false on a full run", async () => {
    const deps = createMockDeps({ outputDir, mode: "local" });
    const image = join(outputDir, "disk.dd");
    // Local mode checks the host path, so the image must exist
    writeFileSync(image, "");
    vi.mocked(deps.connector.executeShell).mockResolvedValue(ok(""));

    const result = await handleAnalyzeImage(deps, { image, module: "full", html: false });
    const env = parseEnvelope(result);

    expect(env.success).toBe(true);
    expect(env.data.html_report).toBeNull();
    expect(deps.connector.executeShell).toHaveBeenCalledTimes(5);
  });
});
