import Docker from "dockerode";
import { StringDecoder } from "string_decoder";
import type { Duplex } from "stream";
import { MAX_OUTPUT_SIZE, TRUNCATION_MARKER } from "./index.js";
import type { Connector, ExecOptions, ExecResult } from "./index.js";

/**
 * Runs the Sleuth Kit inside a long-lived container that has the
 * evidence mounted. Image paths are container paths in this mode.
 */
export class DockerConnector implements Connector {
  private docker: Docker;
  private containerName: string;

  constructor(containerName: string) {
    // Docker container names can only contain [a-zA-Z0-9][a-zA-Z0-9_.-]*
    const sanitized = containerName.replace(/[^a-zA-Z0-9_.-]/g, "");
    if (sanitized !== containerName) {
      throw new Error(`Invalid container name: ${containerName}`);
    }
    this.docker = new Docker();
    this.containerName = containerName;
  }

  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const container = this.docker.getContainer(this.containerName);

    const info = await container.inspect();
    if (!info.State.Running) {
      throw new Error(`Container '${this.containerName}' is not running`);
    }

    const exec = await container.exec({
      Cmd: command,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: options.cwd || "/",
    });

    return new Promise((resolve, reject) => {
      const timeout = options.timeout || 300000;
      let timedOut = false;
      let activeStream: Duplex | null = null;

      const timer = setTimeout(() => {
        timedOut = true;
        activeStream?.destroy();
        reject(new Error(`Command timed out after ${timeout / 1000} seconds`));
      }, timeout);

      exec.start({ hijack: true, stdin: false }, (err, stream) => {
        if (err) {
          clearTimeout(timer);
          return reject(err);
        }

        if (!stream) {
          clearTimeout(timer);
          return reject(new Error("No stream returned from exec"));
        }

        activeStream = stream;

        let stdout = "";
        let stderr = "";
        let outputTruncated = false;

        const append = (current: string, payload: string): string => {
          if (current.length >= MAX_OUTPUT_SIZE) return current;
          const next = current + payload;
          if (next.length >= MAX_OUTPUT_SIZE) {
            outputTruncated = true;
            return next.slice(0, MAX_OUTPUT_SIZE);
          }
          return next;
        };

        // Multiplexed frames: [type(1)][0][0][0][size(4 bytes BE)] payload
        // type 1 = stdout, 2 = stderr
        let buffer = Buffer.alloc(0);
        // One decoder per stream: a UTF-8 sequence can span two frames
        const stdoutDecoder = new StringDecoder("utf8");
        const stderrDecoder = new StringDecoder("utf8");

        const processBuffer = () => {
          while (buffer.length >= 8) {
            const streamType = buffer[0];
            const payloadSize = buffer.readUInt32BE(4);
            if (buffer.length < 8 + payloadSize) {
              break;
            }

            const payload = buffer.subarray(8, 8 + payloadSize);
            buffer = buffer.subarray(8 + payloadSize);

            if (streamType === 1) {
              stdout = append(stdout, stdoutDecoder.write(payload));
            } else if (streamType === 2) {
              stderr = append(stderr, stderrDecoder.write(payload));
            }
          }
        };

        stream.on("data", (chunk: Buffer) => {
          buffer = Buffer.concat([buffer, chunk]);
          processBuffer();
        });

        stream.on("end", () => {
          if (timedOut) return;
          clearTimeout(timer);
          processBuffer();
          stdout = append(stdout, stdoutDecoder.end());
          stderr = append(stderr, stderrDecoder.end());

          // No frame headers (TTY attached): everything is stdout
          if (stdout === "" && stderr === "" && buffer.length > 0) {
            stdout = append("", buffer.toString("utf8"));
          }

          let finalStdout = stdout.trim();
          if (outputTruncated) {
            finalStdout += `\n\n${TRUNCATION_MARKER}`;
          }

          exec.inspect().then(
            (inspectResult) => resolve({
              stdout: finalStdout,
              stderr: stderr.trim(),
              exitCode: inspectResult.ExitCode ?? 0,
            }),
            (inspectErr: unknown) => resolve({
              stdout: finalStdout,
              stderr: inspectErr instanceof Error ? inspectErr.message : String(inspectErr),
              exitCode: -1,
            }),
          );
        });

        stream.on("error", (streamErr: Error) => {
          clearTimeout(timer);
          reject(streamErr);
        });
      });
    });
  }

  async executeShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    return this.execute(["bash", "-c", command], options);
  }

  async readFileToPath(remotePath: string, hostPath: string): Promise<void> {
    const escapedRemotePath = remotePath.replace(/'/g, "'\\''");
    const escapedHostPath = hostPath.replace(/'/g, "'\\''");
    const { execSync } = await import("child_process");
    execSync(
      `docker cp '${this.containerName}:${escapedRemotePath}' '${escapedHostPath}'`,
      { stdio: "pipe" },
    );
  }

  async disconnect(): Promise<void> {
    // Docker client doesn't maintain persistent connections
  }
}
