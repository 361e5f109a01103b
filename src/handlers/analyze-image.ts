import type { HandlerDeps } from "./types.js";
import { contextFor } from "./types.js";
import type { AnalyzeImageArgs } from "../schemas/tools.js";
import { MODULE_NAMES, imageExists, runForensicAnalysis } from "../analysis/index.js";
import { statusDetail } from "../report/html/view.js";
import { formatResponse, formatError } from "../response.js";
import { ForensicError } from "../errors/forensic-error.js";
import { toForensicError } from "../errors/error-mapper.js";

export async function handleAnalyzeImage(deps: HandlerDeps, args: AnalyzeImageArgs) {
  const startTime = Date.now();
  const { connector, config } = deps;
  const ctx = contextFor(deps, args.image);

  try {
    if (!(await imageExists(connector, config.mode, args.image, ctx.timeoutMs))) {
      return formatError("analyze_image", new ForensicError(
        `Image file '${args.image}' not found`,
        "IMAGE_NOT_FOUND",
        "not_found",
        config.mode === "docker"
          ? "The path is resolved inside the container; check the evidence mount"
          : "Check the image path",
      ), startTime);
    }

    const { report, jsonPath, htmlPath } = await runForensicAnalysis(ctx, {
      selection: args.module,
      generateHtml: args.html ?? args.module === "full",
      outputDir: config.outputDir,
    });

    // The full listing stays in the saved reports; the response carries the summary
    const modules: Record<string, { status: string; detail: string }> = {};
    for (const name of MODULE_NAMES) {
      const result = report.artifacts[name];
      if (result) {
        modules[name] = { status: result.status, detail: statusDetail(result) };
      }
    }

    return formatResponse("analyze_image", {
      image: report.image_analyzed,
      analysis_date: report.analysis_date,
      modules,
      warnings: report.warnings,
      json_report: jsonPath,
      html_report: htmlPath,
    }, startTime);
  } catch (error) {
    return formatError("analyze_image", toForensicError(error), startTime);
  }
}
