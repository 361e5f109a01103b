import type { AnalysisReport } from "../../analysis/report.js";
import { REPORT_SECTIONS, renderSections } from "./sections.js";
import { REPORT_STYLES } from "./styles.js";
import { buildReportView } from "./view.js";

export interface HtmlReportOptions {
  outputDir: string;
  /** Shown as the "Report Generated" time; the only time-dependent text */
  generatedAt: Date;
}

export function renderHtmlReport(report: AnalysisReport, options: HtmlReportOptions): string {
  const view = buildReportView(report, options.outputDir, options.generatedAt);
  return [
    `<!DOCTYPE html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="UTF-8">`,
    `<meta name="viewport" content="width=device-width, initial-scale=1.0">`,
    `<title>Forensic Analysis Report</title>`,
    `<style>${REPORT_STYLES}</style>`,
    `</head>`,
    `<body>`,
    `<div class="container">`,
    renderSections(REPORT_SECTIONS, view),
    `</div>`,
    `</body>`,
    `</html>`,
    ``,
  ].join("\n");
}
