/**
 * Runs modules in sequence, threading the report value through each step.
 *
 * A failed module is recorded and the next one runs anyway. Companion
 * files are written only for modules that succeeded.
 */

import type { ReportWriter } from "../report/writer.js";
import type { AnalysisContext } from "./context.js";
import { ANALYSIS_MODULES } from "./modules.js";
import { createReport, mergeOutcome } from "./report.js";
import type { AnalysisReport, ModuleName } from "./report.js";

export async function runModules(
  ctx: AnalysisContext,
  modules: readonly ModuleName[],
  writer: ReportWriter,
  analysisDate: Date,
): Promise<AnalysisReport> {
  let report = createReport(ctx.imagePath, analysisDate);

  for (const name of modules) {
    const outcome = await ANALYSIS_MODULES[name](ctx);
    report = mergeOutcome(report, outcome);

    if (outcome.result.status === "success") {
      for (const file of outcome.files) {
        writer.write(file.name, file.content);
      }
    }
  }

  return report;
}
