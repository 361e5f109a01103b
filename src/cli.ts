#!/usr/bin/env node

import { createRequire } from "node:module";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { startServer } from "./index.js";
import { HELP_TEXT, parseCliArgs } from "./args.js";
import type { AnalysisConfig } from "./args.js";
import { createConnector } from "./connectors/index.js";
import { imageExists, inspectInode, recoverFile, runForensicAnalysis } from "./analysis/index.js";
import type { AnalysisContext } from "./analysis/index.js";
import { toForensicError } from "./errors/error-mapper.js";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

function packageVersion(): string {
  const _require = createRequire(import.meta.url);
  const { version } = _require("../package.json") as { version: string };
  return version;
}

async function analyze(config: AnalysisConfig): Promise<number> {
  const connector = await createConnector({ mode: config.mode, container: config.container });
  const ctx: AnalysisContext = {
    connector,
    mode: config.mode,
    imagePath: config.imagePath,
    timeoutMs: config.timeout * 1000,
    log: (message) => console.log(message),
  };

  try {
    if (!(await imageExists(connector, config.mode, config.imagePath, ctx.timeoutMs))) {
      console.log(`[-] Error: Image file '${config.imagePath}' not found`);
      return EXIT_FAILURE;
    }

    if (config.runAnalysis) {
      const { htmlPath } = await runForensicAnalysis(ctx, {
        selection: config.selection,
        generateHtml: config.generateHtml,
        outputDir: config.outputDir,
      });
      if (htmlPath) {
        console.log("[*] Open the HTML report in your browser:");
        console.log(`    ${pathToFileURL(resolve(htmlPath)).href}`);
      }
    }

    for (const inode of config.istat) {
      const result = await inspectInode(ctx, inode);
      if (result.status === "success") {
        console.log(result.raw_output);
      }
    }

    for (const { inode, filename } of config.recover) {
      await recoverFile(ctx, config.outputDir, inode, filename);
    }

    return EXIT_OK;
  } finally {
    await connector.disconnect();
  }
}

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv, process.env);

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return EXIT_OK;
    case "version":
      console.log(`disk-forensics-reporter v${packageVersion()}`);
      return EXIT_OK;
    case "error":
      console.error(`Error: ${command.message}`);
      console.error("Run with --help for usage.");
      return EXIT_USAGE;
    case "serve":
      await startServer(command.config);
      // The server keeps the process alive until a signal arrives
      return EXIT_OK;
    case "analyze":
      return analyze(command.config);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    // Leave a serving process running
    if (code !== EXIT_OK) process.exit(code);
  },
  (error) => {
    const err = toForensicError(error);
    console.error(`[-] ${err.message}`);
    if (err.remediation) console.error(`    ${err.remediation}`);
    process.exit(EXIT_FAILURE);
  },
);
