export interface ExecOptions {
  /** Timeout in milliseconds */
  timeout?: number;
  cwd?: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

// Recursive fls listings of large images get big
export const MAX_OUTPUT_SIZE = 64 * 1024 * 1024;
export const TRUNCATION_MARKER = "[OUTPUT TRUNCATED - exceeded 64MB limit]";

/** Separate a capped stream from the marker the connectors append to it. */
export function stripTruncationMarker(output: string): { output: string; truncated: boolean } {
  if (!output.endsWith(TRUNCATION_MARKER)) {
    return { output, truncated: false };
  }
  return { output: output.slice(0, -TRUNCATION_MARKER.length).trimEnd(), truncated: true };
}

export type ConnectorMode = "local" | "docker";

/** Where the Sleuth Kit binaries run. */
export interface Connector {
  execute(command: string[], options?: ExecOptions): Promise<ExecResult>;
  executeShell(command: string, options?: ExecOptions): Promise<ExecResult>;
  readFileToPath(remotePath: string, hostPath: string): Promise<void>;
  disconnect(): Promise<void>;
}

export interface ConnectorConfig {
  mode: ConnectorMode;
  container?: string;
}

export const DEFAULT_CONTAINER = "sleuthkit";

export async function createConnector(config: ConnectorConfig): Promise<Connector> {
  switch (config.mode) {
    case "docker": {
      const { DockerConnector } = await import("./docker.js");
      return new DockerConnector(config.container || DEFAULT_CONTAINER);
    }

    case "local": {
      const { LocalConnector } = await import("./local.js");
      return new LocalConnector();
    }

    default:
      throw new Error(`Unknown connection mode: ${String(config.mode)}`);
  }
}
