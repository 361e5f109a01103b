/**
 * Writes run outputs into the output directory, each name prefixed with
 * the run timestamp. Writes are not transactional: a crash between two
 * writes leaves the earlier files in place.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { fileTimestamp } from "./timestamp.js";

export interface ReportWriter {
  readonly outputDir: string;
  /** Write `{prefix}_{name}` and return its path. */
  write(name: string, content: string): string;
}

export class FileReportWriter implements ReportWriter {
  readonly outputDir: string;
  private readonly prefix: string;

  constructor(outputDir: string, runStarted: Date) {
    this.outputDir = outputDir;
    this.prefix = fileTimestamp(runStarted);
    mkdirSync(outputDir, { recursive: true });
  }

  write(name: string, content: string): string {
    const filePath = join(this.outputDir, `${this.prefix}_${name}`);
    writeFileSync(filePath, content, "utf-8");
    return filePath;
  }
}
