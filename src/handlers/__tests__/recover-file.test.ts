import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { handleRecoverFile } from "../recover-file.js";
import { createMockDeps, ok, fail, parseEnvelope } from "./helpers.js";

describe("handleRecoverFile", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "recover-file-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("stages in the container, copies out and cleans up", async () => {
    const deps = createMockDeps({ outputDir });
    const shell = vi.mocked(deps.connector.executeShell);
    shell.mockResolvedValue(ok(""));

    const result = await handleRecoverFile(deps, { image: "/evidence/disk.dd", inode: "20", filename: "gone.txt" });
    const env = parseEnvelope(result);

    const hostPath = join(outputDir, "recovered", "gone.txt");
    expect(env.success).toBe(true);
    expect(env.data).toEqual({ inode: "20", path: hostPath });
    expect(shell).toHaveBeenNthCalledWith(
      1,
      "icat '/evidence/disk.dd' 20 > '/tmp/icat-20-gone.txt'",
      { timeout: 300000 },
    );
    expect(deps.connector.readFileToPath).toHaveBeenCalledWith("/tmp/icat-20-gone.txt", hostPath);
    expect(shell).toHaveBeenNthCalledWith(2, "rm -f '/tmp/icat-20-gone.txt'", { timeout: 300000 });
    expect(existsSync(join(outputDir, "recovered"))).toBe(true);
  });

  it("rejects a filename with directory components", async () => {
    const deps = createMockDeps({ outputDir });

    const env = parseEnvelope(
      await handleRecoverFile(deps, { image: "/evidence/disk.dd", inode: "20", filename: "../escape.txt" }),
    );

    expect(env.success).toBe(false);
    expect(env.error_code).toBe("INVALID_ARGUMENT");
    expect(env.error).toBe("Invalid output filename: ../escape.txt");
    expect(deps.connector.executeShell).not.toHaveBeenCalled();
  });

  it("returns the icat error and skips the copy", async () => {
    const deps = createMockDeps({ outputDir });
    vi.mocked(deps.connector.executeShell).mockResolvedValueOnce(fail("icat: Error reading image file"));

    const env = parseEnvelope(
      await handleRecoverFile(deps, { image: "/evidence/disk.dd", inode: "20", filename: "gone.txt" }),
    );

    expect(env.success).toBe(false);
    expect(env.error).toBe("icat: Error reading image file");
    expect(env.error_code).toBe("COMMAND_NON_ZERO_EXIT");
    expect(deps.connector.readFileToPath).not.toHaveBeenCalled();
  });

  it("fails when the copy out of the container fails, still removing the staging file", async () => {
    const deps = createMockDeps({ outputDir });
    const shell = vi.mocked(deps.connector.executeShell);
    shell.mockResolvedValue(ok(""));
    vi.mocked(deps.connector.readFileToPath).mockRejectedValueOnce(new Error("docker cp failed"));

    const env = parseEnvelope(
      await handleRecoverFile(deps, { image: "/evidence/disk.dd", inode: "20", filename: "gone.txt" }),
    );

    expect(env.success).toBe(false);
    expect(env.error).toBe("docker cp failed");
    expect(shell).toHaveBeenLastCalledWith("rm -f '/tmp/icat-20-gone.txt'", { timeout: 300000 });
  });
});
