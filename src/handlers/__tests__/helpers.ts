import { vi } from "vitest";
import type { HandlerDeps } from "../types.js";

export function createMockDeps(overrides?: Partial<HandlerDeps["config"]>): HandlerDeps {
  return {
    connector: {
      execute: vi.fn(),
      executeShell: vi.fn(),
      readFileToPath: vi.fn(),
      disconnect: vi.fn(),
    },
    config: {
      outputDir: "/output",
      timeout: 300,
      mode: "docker" as const,
      ...overrides,
    },
    log: vi.fn(),
  };
}

export function ok(stdout: string, exitCode = 0) {
  return { stdout, stderr: "", exitCode };
}

export function fail(stderr: string, exitCode = 1) {
  return { stdout: "", stderr, exitCode };
}

export function parseEnvelope(result: { content: Array<{ type: string; text: string }> }) {
  return JSON.parse(result.content[0].text);
}
