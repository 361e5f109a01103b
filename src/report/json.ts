import { analysisReportSchema } from "../analysis/report.js";
import type { AnalysisReport } from "../analysis/report.js";

export function toJson(report: AnalysisReport): string {
  return JSON.stringify(report, null, 2);
}

/** Read a saved report back, validating its shape. */
export function parseReportJson(text: string): AnalysisReport {
  return analysisReportSchema.parse(JSON.parse(text));
}
