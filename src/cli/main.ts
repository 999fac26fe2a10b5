#!/usr/bin/env node
import process from "node:process";
import readline from "node:readline";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadGraphFile } from "../graph/loader.js";
import { StructuredLogger } from "../logger.js";
import type { GraphMode } from "../types.js";
import { formatFailure } from "./format.js";
import { GraphSession } from "./session.js";
import { resolveSessionSettings } from "./settings.js";

interface CliOptions {
  /** Graph file loaded before the first prompt. */
  readonly file?: string;
  readonly mode: GraphMode;
  readonly help: boolean;
}

function parseArgs(argv: readonly string[]): CliOptions {
  let file: string | undefined;
  let mode: GraphMode = "undirected";
  let help = false;

  for (const token of argv) {
    switch (token) {
      case "--directed":
        mode = "directed";
        break;
      case "--undirected":
        mode = "undirected";
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        if (token.startsWith("-")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        if (file !== undefined) {
          throw new Error("Only one graph file can be preloaded");
        }
        file = token;
    }
  }

  return { mode, help, ...(file === undefined ? {} : { file }) };
}

function writeLines(lines: readonly string[]): void {
  if (lines.length > 0) {
    process.stdout.write(`${lines.join("\n")}\n`);
  }
}

function printUsage(): void {
  writeLines([
    "Usage: graph-studio [file] [--directed|--undirected]",
    "",
    "Reads one command per line from stdin; type 'help' for the command list.",
    "Environment: GRAPH_CONNECTIVITY, GRAPH_SELF_LOOPS, GRAPH_PRECISION, GRAPH_LOG_LEVEL, GRAPH_LOG_FILE",
  ]);
}

async function main(argv: string[]): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    printUsage();
    return 0;
  }

  const settings = resolveSessionSettings();
  const logger = new StructuredLogger({ level: settings.logLevel, logFile: settings.logFile });
  const session = new GraphSession(settings, logger);

  if (options.file !== undefined) {
    const loaded = await loadGraphFile(options.file, options.mode, { selfLoops: settings.selfLoops });
    if (!loaded.ok) {
      writeLines(formatFailure(loaded));
      await logger.flush();
      return 1;
    }
    session.replaceGraph(loaded.value);
    writeLines([`loaded ${options.mode} graph from ${options.file}`]);
  }

  const interactive = process.stdin.isTTY === true;
  const rl = readline.createInterface({
    input: process.stdin,
    output: interactive ? process.stdout : undefined,
    crlfDelay: Infinity,
  });
  rl.setPrompt("graph> ");
  if (interactive) {
    writeLines(["graph-studio: type 'help' for the command list"]);
    rl.prompt();
  }

  let failures = 0;
  for await (const line of rl) {
    const report = await session.execute(line);
    writeLines(report.lines);
    if (report.exit) {
      break;
    }
    if (!report.ok) {
      failures += 1;
    }
    if (interactive) {
      rl.prompt();
    }
  }
  rl.close();
  await logger.flush();
  // Scripts piped on stdin report failures through the exit status.
  return !interactive && failures > 0 ? 1 : 0;
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return realpathSync(executedFromCli) === thisModulePath;
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
};
