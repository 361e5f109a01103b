import { describe, it, expect, vi } from "vitest";
import { runCommand } from "../runner.js";
import type { Connector } from "../../connectors/index.js";

function mockConnector(): Connector {
  return {
    execute: vi.fn(),
    executeShell: vi.fn(),
    readFileToPath: vi.fn(),
    disconnect: vi.fn(),
  };
}

describe("runCommand", () => {
  it("passes the command and timeout through", async () => {
    const connector = mockConnector();
    vi.mocked(connector.executeShell).mockResolvedValue({ stdout: "ok", stderr: "", exitCode: 0 });

    const result = await runCommand(connector, "fsstat '/evidence/disk.dd'", 300000);

    expect(result).toEqual({ stdout: "ok", stderr: "", exitCode: 0 });
    expect(connector.executeShell).toHaveBeenCalledWith("fsstat '/evidence/disk.dd'", { timeout: 300000 });
  });

  it("returns non-zero exits unchanged", async () => {
    const connector = mockConnector();
    vi.mocked(connector.executeShell).mockResolvedValue({
      stdout: "",
      stderr: "Cannot determine file system type",
      exitCode: 1,
    });

    const result = await runCommand(connector, "fsstat x", 1000);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("Cannot determine file system type");
  });

  it("converts a timeout rejection into exit code -1", async () => {
    const connector = mockConnector();
    vi.mocked(connector.executeShell).mockRejectedValue(new Error("Command timed out after 300 seconds"));

    const result = await runCommand(connector, "fls -r -m / x", 300000);
    expect(result).toEqual({ stdout: "", stderr: "Command timed out", exitCode: -1 });
  });

  it("converts an invocation error into exit code -1 with its message", async () => {
    const connector = mockConnector();
    vi.mocked(connector.executeShell).mockRejectedValue(new Error("spawn bash ENOENT"));

    const result = await runCommand(connector, "mmls x", 1000);
    expect(result).toEqual({ stdout: "", stderr: "spawn bash ENOENT", exitCode: -1 });
  });
});
