/**
 * Command-line parsing for the reporter. No process access here: argv and
 * the environment are passed in, and the result says what to do.
 */

import { DEFAULT_CONTAINER } from "./connectors/index.js";
import type { ConnectorMode } from "./connectors/index.js";
import { MODULE_SELECTIONS, isModuleSelection, shouldGenerateHtml } from "./analysis/pipeline.js";
import type { ModuleSelection } from "./analysis/pipeline.js";
import { isRecoveryFilename } from "./analysis/recovery.js";
import { isInodeAddress } from "./tools/invoker.js";
import type { ServerConfig } from "./index.js";

export const DEFAULT_OUTPUT_DIR = "forensic_output";
export const DEFAULT_TIMEOUT_SECONDS = 300;

export interface RecoveryRequest {
  inode: string;
  filename: string;
}

export interface AnalysisConfig {
  imagePath: string;
  outputDir: string;
  /** Per-command timeout in seconds */
  timeout: number;
  mode: ConnectorMode;
  container?: string;
  selection: ModuleSelection;
  generateHtml: boolean;
  /** False when only --recover/--istat were asked for */
  runAnalysis: boolean;
  recover: RecoveryRequest[];
  istat: string[];
}

export type CliCommand =
  | { kind: "analyze"; config: AnalysisConfig }
  | { kind: "serve"; config: ServerConfig }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export type Env = Record<string, string | undefined>;

function parseRecovery(value: string): RecoveryRequest | null {
  const sep = value.indexOf(":");
  if (sep <= 0 || sep === value.length - 1) return null;
  return { inode: value.slice(0, sep), filename: value.slice(sep + 1) };
}

export function parseCliArgs(argv: readonly string[], env: Env = {}): CliCommand {
  let imagePath: string | undefined;
  let outputDir = env.FORENSIC_OUTPUT_DIR || DEFAULT_OUTPUT_DIR;
  let timeout = DEFAULT_TIMEOUT_SECONDS;
  let mode: ConnectorMode = "local";
  let container = env.TSK_CONTAINER || undefined;
  let selection: ModuleSelection = "full";
  let moduleGiven = false;
  let html = false;
  let noHtml = false;
  let serve = false;
  const recover: RecoveryRequest[] = [];
  const istat: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    let arg = argv[i];
    let value: string | undefined = argv[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    // Only skip the next arg if the value came from it
    const takeValue = (): string | null => {
      if (value === undefined) return null;
      if (!usedEqualsSyntax) i++;
      return value;
    };

    switch (arg) {
      case "-o":
      case "--output": {
        const v = takeValue();
        if (v === null || v === "") return { kind: "error", message: `${arg} requires a directory` };
        outputDir = v;
        break;
      }
      case "-m":
      case "--module": {
        const v = takeValue();
        if (v === null || !isModuleSelection(v)) {
          return {
            kind: "error",
            message: `${arg} must be one of: ${MODULE_SELECTIONS.join(", ")}`,
          };
        }
        selection = v;
        moduleGiven = true;
        break;
      }
      case "--html":
        html = true;
        break;
      case "--no-html":
        noHtml = true;
        break;
      case "--timeout": {
        const v = takeValue();
        const seconds = v === null ? NaN : Number(v);
        if (!Number.isInteger(seconds) || seconds <= 0) {
          return { kind: "error", message: "--timeout must be a positive number of seconds" };
        }
        timeout = seconds;
        break;
      }
      case "--mode": {
        const v = takeValue();
        if (v !== "local" && v !== "docker") {
          return { kind: "error", message: "--mode must be local or docker" };
        }
        mode = v;
        break;
      }
      case "--container": {
        const v = takeValue();
        if (v === null || v === "") return { kind: "error", message: "--container requires a name" };
        container = v;
        break;
      }
      case "--recover": {
        const v = takeValue();
        const request = v === null ? null : parseRecovery(v);
        if (!request) return { kind: "error", message: "--recover expects INODE:FILENAME" };
        if (!isInodeAddress(request.inode)) {
          return { kind: "error", message: `Invalid inode address: ${request.inode}` };
        }
        if (!isRecoveryFilename(request.filename)) {
          return { kind: "error", message: `Invalid output filename: ${request.filename}` };
        }
        recover.push(request);
        break;
      }
      case "--istat": {
        const v = takeValue();
        if (v === null || v === "") return { kind: "error", message: "--istat requires an inode address" };
        if (!isInodeAddress(v)) return { kind: "error", message: `Invalid inode address: ${v}` };
        istat.push(v);
        break;
      }
      case "--serve":
        serve = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--version":
      case "-v":
        return { kind: "version" };
      default:
        if (arg.startsWith("-")) {
          return { kind: "error", message: `Unknown option: ${arg}` };
        }
        if (imagePath !== undefined) {
          return { kind: "error", message: `Unexpected argument: ${arg}` };
        }
        imagePath = arg;
    }
  }

  if (mode === "docker" && !container) {
    container = DEFAULT_CONTAINER;
  }

  if (serve) {
    return { kind: "serve", config: { mode, container, outputDir, timeout } };
  }

  if (imagePath === undefined) {
    return { kind: "error", message: "Missing disk image path" };
  }

  return {
    kind: "analyze",
    config: {
      imagePath,
      outputDir,
      timeout,
      mode,
      container,
      selection,
      generateHtml: shouldGenerateHtml(selection, html, noHtml),
      runAnalysis: moduleGiven || (recover.length === 0 && istat.length === 0),
      recover,
      istat,
    },
  };
}

export const HELP_TEXT = `
disk-forensics-reporter - Automated disk image analysis with The Sleuth Kit

USAGE:
  disk-forensics-reporter <image> [OPTIONS]
  disk-forensics-reporter --serve [OPTIONS]

OPTIONS:
  -o, --output <dir>        Output directory (default: ${DEFAULT_OUTPUT_DIR}, or FORENSIC_OUTPUT_DIR)
  -m, --module <module>     Analysis module: ${MODULE_SELECTIONS.join(", ")} (default: full)
  --html                    Generate the HTML report (default for full analysis)
  --no-html                 Skip the HTML report for a full analysis
  --timeout <seconds>       Per-command timeout (default: ${DEFAULT_TIMEOUT_SECONDS})
  --mode <mode>             Where the Sleuth Kit runs: local or docker (default: local)
  --container <name>        Docker container name/ID (default: ${DEFAULT_CONTAINER}, or TSK_CONTAINER)
  --recover <inode:name>    Recover an inode to <output>/recovered/<name> (repeatable)
  --istat <inode>           Print the metadata of an inode (repeatable)
  --serve                   Start the MCP server on stdio instead of analyzing
  -h, --help                Show this help message
  -v, --version             Show version

With --recover or --istat alone, no analysis modules run unless -m is given.

EXAMPLES:
  # Full analysis with HTML report
  disk-forensics-reporter evidence.dd -o case42

  # Deleted files only, run inside a Sleuth Kit container
  disk-forensics-reporter /evidence/disk.E01 -m deleted --mode=docker --container=tsk

  # Recover one deleted file after reviewing the listing
  disk-forensics-reporter evidence.dd --istat 1234 --recover 1234:invoice.pdf
`;
