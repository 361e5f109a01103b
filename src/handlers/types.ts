import type { Connector, ConnectorMode } from "../connectors/index.js";
import type { AnalysisContext, ProgressLog } from "../analysis/index.js";

export interface HandlerConfig {
  outputDir: string;
  /** Per-command timeout in seconds */
  timeout: number;
  mode: ConnectorMode;
}

export interface HandlerDeps {
  connector: Connector;
  config: HandlerConfig;
  log: ProgressLog;
}

export function contextFor(deps: HandlerDeps, imagePath: string): AnalysisContext {
  return {
    connector: deps.connector,
    mode: deps.config.mode,
    imagePath,
    timeoutMs: deps.config.timeout * 1000,
    log: deps.log,
  };
}
