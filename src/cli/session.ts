import type { Graph } from "../graph/store.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, fail, type ErrorCode } from "../types.js";
import { COMMANDS, EXIT_COMMANDS, type CommandContext, type CommandOutput } from "./commands.js";
import { formatFailure } from "./format.js";
import type { SessionSettings } from "./settings.js";

/** Outcome of one shell line, ready to be printed. */
export interface CommandReport {
  /** Lower-cased command name, `null` for blank lines. */
  readonly command: string | null;
  readonly ok: boolean;
  readonly lines: string[];
  /** True once the user asked to leave the shell. */
  readonly exit: boolean;
  readonly code?: ErrorCode;
}

/**
 * One interactive session: owns at most one graph, replaced wholesale by
 * `create` and `load`, and runs commands strictly one after another.
 */
export class GraphSession {
  private graph: Graph | null = null;

  constructor(
    readonly settings: SessionSettings,
    private readonly logger: StructuredLogger,
  ) {}

  /** Active graph, `null` before the first successful `create` or `load`. */
  get current(): Graph | null {
    return this.graph;
  }

  /** Installs a graph built outside the command table (e.g. preloaded at start-up). */
  replaceGraph(graph: Graph): void {
    this.graph = graph;
    this.logger.info("graph_loaded", {
      mode: graph.mode,
      vertices: graph.vertexCount,
      edges: graph.edgeCount,
    });
  }

  async execute(line: string): Promise<CommandReport> {
    const [rawName, ...args] = line.trim().split(/\s+/).filter((token) => token.length > 0);
    if (rawName === undefined) {
      return { command: null, ok: true, lines: [], exit: false };
    }
    const name = rawName.toLowerCase();
    if (EXIT_COMMANDS.has(name)) {
      return { command: name, ok: true, lines: [], exit: true };
    }

    const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
    let output: CommandOutput;
    if (!command) {
      output = fail(ERROR_CODES.CLI_UNKNOWN_COMMAND, `unknown command '${rawName}'`, "type 'help' to list commands");
    } else {
      try {
        output = await command.execute(this.context(), args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error("command_crashed", { command: name, message });
        return { command: name, ok: false, lines: [`error: ${message}`], exit: false };
      }
    }

    if (!output.ok) {
      this.logger.warn("command_failed", { command: name, code: output.code, message: output.message });
      return { command: name, ok: false, lines: formatFailure(output), exit: false, code: output.code };
    }
    this.logger.debug("command_executed", { command: name, args });
    return { command: name, ok: true, lines: output.value, exit: false };
  }

  private context(): CommandContext {
    return {
      settings: this.settings,
      graph: this.graph,
      replaceGraph: (graph) => this.replaceGraph(graph),
    };
  }
}
