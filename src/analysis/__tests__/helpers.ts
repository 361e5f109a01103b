import { vi } from "vitest";
import type { ConnectorMode } from "../../connectors/index.js";
import type { AnalysisContext } from "../context.js";
import type { ReportWriter } from "../../report/writer.js";

export function createContext(mode: ConnectorMode = "docker", imagePath = "/evidence/disk.dd"): AnalysisContext {
  return {
    connector: {
      execute: vi.fn(),
      executeShell: vi.fn(),
      readFileToPath: vi.fn(),
      disconnect: vi.fn(),
    },
    mode,
    imagePath,
    timeoutMs: 1000,
    log: vi.fn(),
  };
}

export function ok(stdout: string, stderr = "") {
  return { stdout, stderr, exitCode: 0 };
}

export function fail(stderr: string, exitCode = 1) {
  return { stdout: "", stderr, exitCode };
}

/** Keeps written files in memory, keyed by unprefixed name. */
export class MemoryWriter implements ReportWriter {
  readonly outputDir = "/memory";
  readonly files = new Map<string, string>();

  write(name: string, content: string): string {
    this.files.set(name, content);
    return `${this.outputDir}/${name}`;
  }
}

export const BODY_OUTPUT = [
  "0|/etc/hostname|14|r/rrw-r--r--|0|0|9|1700000000|1700000500|1700000500|1699999000",
  "0|/home/user/report, final.doc|15|r/rrw-------|1000|1000|20480|1700001000|1700002000|1700002000|0",
  "0|/lost+found|11|d/drwx------|0|0|12288|0|0|0|0",
].join("\n");

export const MMLS_OUTPUT = [
  "DOS Partition Table",
  "Offset Sector: 0",
  "Units are in 512-byte sectors",
  "",
  "      Slot      Start        End          Length       Description",
  "000:  Meta      0000000000   0000000000   0000000001   Primary Table (#0)",
  "001:  -------   0000000000   0000002047   0000002048   Unallocated",
  "1:0:00 2048 204800 202753 Linux (0x83)",
].join("\n");

export const DELETED_OUTPUT = [
  "r/r * 23:\told-notes.txt",
  "r/r * 24(realloc):\tbudget.xlsx",
  "",
  "d/d * 30:\ttmp-dir",
].join("\n");
