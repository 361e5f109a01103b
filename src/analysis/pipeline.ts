/**
 * One complete run: selected modules, then the JSON and (optionally)
 * HTML reports. Shared by the CLI and the analyze_image tool.
 */

import { existsSync } from "fs";
import type { Connector, ConnectorMode } from "../connectors/index.js";
import { FileReportWriter } from "../report/writer.js";
import type { ReportWriter } from "../report/writer.js";
import { toJson } from "../report/json.js";
import { renderHtmlReport } from "../report/html/render.js";
import { shellEscape } from "../tools/invoker.js";
import { runCommand } from "../tools/runner.js";
import { runModules } from "./aggregator.js";
import type { AnalysisContext } from "./context.js";
import { MODULE_NAMES } from "./report.js";
import type { AnalysisReport, ModuleName } from "./report.js";

export const MODULE_SELECTIONS = ["full", "filesystem", "files", "deleted", "timeline", "partitions"] as const;
export type ModuleSelection = (typeof MODULE_SELECTIONS)[number];

export const SELECTION_MODULES: Record<ModuleSelection, readonly ModuleName[]> = {
  full: MODULE_NAMES,
  filesystem: ["filesystem_info"],
  files: ["file_listing"],
  deleted: ["deleted_files"],
  timeline: ["timeline"],
  partitions: ["partitions"],
};

export function isModuleSelection(value: string): value is ModuleSelection {
  return (MODULE_SELECTIONS as readonly string[]).includes(value);
}

/** HTML is on by default for a full run only; --html forces it, --no-html drops the default. */
export function shouldGenerateHtml(selection: ModuleSelection, html: boolean, noHtml: boolean): boolean {
  return html || (selection === "full" && !noHtml);
}

export interface PipelineOptions {
  selection: ModuleSelection;
  generateHtml: boolean;
  /** Defaults to a new FileReportWriter under outputDir */
  writer?: ReportWriter;
  outputDir: string;
  /** Run start; sets the analysis date and the file name prefix */
  startedAt?: Date;
  /** Time source for the "report generated" stamp */
  clock?: () => Date;
}

export interface PipelineResult {
  report: AnalysisReport;
  jsonPath: string;
  htmlPath: string | null;
}

export async function runForensicAnalysis(
  ctx: AnalysisContext,
  options: PipelineOptions,
): Promise<PipelineResult> {
  const startedAt = options.startedAt ?? new Date();
  const clock = options.clock ?? (() => new Date());
  const writer = options.writer ?? new FileReportWriter(options.outputDir, startedAt);
  const full = options.selection === "full";

  if (full) {
    ctx.log("=".repeat(60));
    ctx.log("Automated Forensic Analysis Starting");
    ctx.log(`Image: ${ctx.imagePath}`);
    ctx.log(`Output Directory: ${options.outputDir}`);
    ctx.log("=".repeat(60));
  }

  const report = await runModules(ctx, SELECTION_MODULES[options.selection], writer, startedAt);

  const jsonPath = writer.write("forensic_report.json", toJson(report));
  ctx.log(`[+] JSON report saved to ${jsonPath}`);

  let htmlPath: string | null = null;
  if (options.generateHtml) {
    const html = renderHtmlReport(report, { outputDir: options.outputDir, generatedAt: clock() });
    htmlPath = writer.write("forensic_report.html", html);
    ctx.log(`[+] HTML report saved to ${htmlPath}`);
  }

  if (full) {
    ctx.log("=".repeat(60));
    ctx.log("Analysis Complete!");
    ctx.log("=".repeat(60));
  }

  return { report, jsonPath, htmlPath };
}

/**
 * The only fatal precondition of a run. In docker mode the path is
 * checked inside the container, where the tools will open it.
 */
export async function imageExists(
  connector: Connector,
  mode: ConnectorMode,
  imagePath: string,
  timeoutMs: number,
): Promise<boolean> {
  if (mode === "local") {
    return existsSync(imagePath);
  }
  const result = await runCommand(connector, `test -e ${shellEscape(imagePath)}`, timeoutMs);
  return result.exitCode === 0;
}
