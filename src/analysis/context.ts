import type { Connector, ConnectorMode } from "../connectors/index.js";

/** Receives one human-readable progress line at a time. */
export type ProgressLog = (message: string) => void;

/** Everything an analysis module needs to run its command. */
export interface AnalysisContext {
  connector: Connector;
  mode: ConnectorMode;
  /** Image path as seen by the connector (a container path in docker mode) */
  imagePath: string;
  timeoutMs: number;
  log: ProgressLog;
}
