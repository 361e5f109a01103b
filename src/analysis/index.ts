export {
  MODULE_NAMES,
  analysisReportSchema,
  createReport,
  withArtifact,
  withWarnings,
  mergeOutcome,
  isSuccess,
} from "./report.js";
export type {
  AnalysisReport,
  ArtifactMap,
  ArtifactResult,
  ArtifactFailure,
  CompanionFile,
  ModuleName,
  ModuleOutcome,
} from "./report.js";
export type { AnalysisContext, ProgressLog } from "./context.js";
export { ANALYSIS_MODULES } from "./modules.js";
export { runModules } from "./aggregator.js";
export {
  MODULE_SELECTIONS,
  SELECTION_MODULES,
  isModuleSelection,
  shouldGenerateHtml,
  runForensicAnalysis,
  imageExists,
} from "./pipeline.js";
export type { ModuleSelection, PipelineOptions, PipelineResult } from "./pipeline.js";
export { inspectInode, recoverFile, validateRecoveryFilename, RECOVERED_DIR } from "./recovery.js";
export type { InodeMetadataResult, RecoveryResult } from "./recovery.js";
