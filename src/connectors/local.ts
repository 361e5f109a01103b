import { spawn } from "child_process";
import { copyFileSync } from "fs";
import { MAX_OUTPUT_SIZE, TRUNCATION_MARKER } from "./index.js";
import type { Connector, ExecOptions, ExecResult } from "./index.js";

// Only pass the variables the Sleuth Kit tools need
const ALLOWED_ENV_VARS = [
  "PATH",
  "HOME",
  "USER",
  "SHELL",
  "LANG",
  "LC_ALL",
  "TZ",
];

export class LocalConnector implements Connector {
  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const timeout = options.timeout || 300000;
    const [cmd, ...args] = command;

    const filteredEnv: NodeJS.ProcessEnv = {};
    for (const key of ALLOWED_ENV_VARS) {
      if (process.env[key]) {
        filteredEnv[key] = process.env[key];
      }
    }

    return new Promise((resolve, reject) => {
      let timedOut = false;
      let stdout = "";
      let stderr = "";
      let outputTruncated = false;

      const proc = spawn(cmd, args, {
        cwd: options.cwd,
        env: filteredEnv,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
        reject(new Error(`Command timed out after ${timeout / 1000} seconds`));
      }, timeout);

      // Decode across chunk boundaries so multi-byte file names survive
      proc.stdout.setEncoding("utf8");
      proc.stderr.setEncoding("utf8");

      proc.stdout.on("data", (data: string) => {
        if (stdout.length < MAX_OUTPUT_SIZE) {
          stdout += data;
          if (stdout.length >= MAX_OUTPUT_SIZE) {
            stdout = stdout.slice(0, MAX_OUTPUT_SIZE);
            outputTruncated = true;
          }
        }
      });

      proc.stderr.on("data", (data: string) => {
        if (stderr.length < MAX_OUTPUT_SIZE) {
          stderr += data;
          if (stderr.length >= MAX_OUTPUT_SIZE) {
            stderr = stderr.slice(0, MAX_OUTPUT_SIZE);
            outputTruncated = true;
          }
        }
      });

      proc.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });

      proc.on("close", (code) => {
        if (timedOut) return;
        clearTimeout(timer);

        let finalStdout = stdout.trim();
        if (outputTruncated) {
          finalStdout += `\n\n${TRUNCATION_MARKER}`;
        }

        resolve({
          stdout: finalStdout,
          stderr: stderr.trim(),
          exitCode: code ?? 0,
        });
      });
    });
  }

  async executeShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    // bash -c so that icat can redirect into the recovery directory
    return this.execute(["bash", "-c", command], options);
  }

  async readFileToPath(remotePath: string, hostPath: string): Promise<void> {
    if (remotePath === hostPath) return;
    copyFileSync(remotePath, hostPath);
  }

  async disconnect(): Promise<void> {
    // No persistent connection for local mode
  }
}
