import { z } from "zod";

import { components, isConnected } from "../graph/algorithms/connectivity.js";
import { distances, shortestPath } from "../graph/algorithms/dijkstra.js";
import { mst } from "../graph/algorithms/prim.js";
import { loadGraphFile } from "../graph/loader.js";
import { INTEGER_PATTERN } from "../graph/parser.js";
import { createGraph, type Graph } from "../graph/store.js";
import { describeGraph } from "../graph/summary.js";
import { ERROR_CODES, fail, succeed, type Outcome } from "../types.js";
import {
  arrowFor,
  formatComponents,
  formatDistances,
  formatEdges,
  formatNumber,
  formatShortestPath,
  formatSpanningTree,
  formatSummary,
  renderTable,
} from "./format.js";
import type { SessionSettings } from "./settings.js";

/** What a command sees of the session running it. */
export interface CommandContext {
  readonly settings: SessionSettings;
  /** Active graph, `null` until `create` or `load` succeeded. */
  readonly graph: Graph | null;
  /** Swaps the session graph in one step. */
  replaceGraph(graph: Graph): void;
}

/** Rendered output of a command, or the failure to render instead. */
export type CommandOutput = Outcome<string[]>;

/** Type-erased command entry stored in {@link COMMANDS}. */
export interface Command {
  readonly usage: string;
  readonly description: string;
  execute(context: CommandContext, args: readonly string[]): Promise<CommandOutput>;
}

const vertexArg = z
  .string()
  .regex(INTEGER_PATTERN, "expected a non-negative integer")
  .pipe(z.coerce.number().int().nonnegative().safe());
const weightArg = z.coerce.number().finite();
const modeArg = z.enum(["directed", "undirected"]);
const noArgs = z.object({}).strict();

interface CommandDefinition<Schema extends z.ZodTypeAny> {
  readonly usage: string;
  readonly description: string;
  /** Names given to positional arguments, in order, before schema validation. */
  readonly params: readonly string[];
  readonly schema: Schema;
}

/**
 * Binds positional arguments to the declared parameter names and validates
 * them with the command's schema. Zod issues are reported as
 * `E-CLI-INVALID-ARGS` carrying the usage line as hint.
 */
function parseArgs<Schema extends z.ZodTypeAny>(
  definition: CommandDefinition<Schema>,
  args: readonly string[],
): Outcome<z.infer<Schema>> {
  if (args.length > definition.params.length) {
    return fail(ERROR_CODES.CLI_INVALID_ARGS, `too many arguments (expected at most ${definition.params.length})`, `usage: ${definition.usage}`);
  }
  const named: Record<string, string> = {};
  args.forEach((value, index) => {
    named[definition.params[index]] = value;
  });
  const parsed = definition.schema.safeParse(named);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return fail(ERROR_CODES.CLI_INVALID_ARGS, `${where}${issue?.message ?? "invalid arguments"}`, `usage: ${definition.usage}`, {
      issues: parsed.error.issues,
    });
  }
  return succeed(parsed.data);
}

/** Command that works with or without an active graph. */
function sessionCommand<Schema extends z.ZodTypeAny>(
  definition: CommandDefinition<Schema>,
  run: (context: CommandContext, args: z.infer<Schema>) => Promise<CommandOutput> | CommandOutput,
): Command {
  return {
    usage: definition.usage,
    description: definition.description,
    async execute(context, args) {
      const parsed = parseArgs(definition, args);
      if (!parsed.ok) {
        return parsed;
      }
      return run(context, parsed.value);
    },
  };
}

/** Command that needs the session graph; fails with `E-CLI-NO-GRAPH` before one exists. */
function graphCommand<Schema extends z.ZodTypeAny>(
  definition: CommandDefinition<Schema>,
  run: (graph: Graph, args: z.infer<Schema>, settings: SessionSettings) => CommandOutput,
): Command {
  return sessionCommand(definition, (context, args) => {
    if (!context.graph) {
      return fail(ERROR_CODES.CLI_NO_GRAPH, "no graph yet", "use 'create' or 'load' first");
    }
    return run(context.graph, args, context.settings);
  });
}

function edgeLabel(graph: Graph, from: number, to: number): string {
  return `${from} ${arrowFor(graph.mode)} ${to}`;
}

export const COMMANDS: Readonly<Record<string, Command>> = {
  create: sessionCommand(
    {
      usage: "create <directed|undirected> [size]",
      description: "create an empty graph, optionally with vertices 0..size-1",
      params: ["mode", "size"],
      schema: z.object({ mode: modeArg, size: vertexArg.optional() }).strict(),
    },
    (context, { mode, size }) => {
      const count = size ?? 0;
      context.replaceGraph(createGraph(mode, { selfLoops: context.settings.selfLoops, size: count }));
      return succeed([`created ${mode} graph with ${count} vertices`]);
    },
  ),
  load: sessionCommand(
    {
      usage: "load <path> [directed|undirected]",
      description: "load a graph from a text file (undirected by default)",
      params: ["path", "mode"],
      schema: z.object({ path: z.string().min(1), mode: modeArg.default("undirected") }).strict(),
    },
    async (context, { path, mode }) => {
      const loaded = await loadGraphFile(path, mode, { selfLoops: context.settings.selfLoops });
      if (!loaded.ok) {
        return loaded;
      }
      context.replaceGraph(loaded.value);
      const summary = describeGraph(loaded.value, { policy: context.settings.connectivity });
      return succeed([`loaded ${mode} graph from ${path}`, ...formatSummary(summary)]);
    },
  ),
  add_vertex: graphCommand(
    {
      usage: "add_vertex <v>",
      description: "add a vertex",
      params: ["vertex"],
      schema: z.object({ vertex: vertexArg }).strict(),
    },
    (graph, { vertex }) => {
      const added = graph.addVertex(vertex);
      return added.ok ? succeed([`vertex ${vertex} added`]) : added;
    },
  ),
  add_edge: graphCommand(
    {
      usage: "add_edge <u> <v> [weight]",
      description: "add an edge or replace its weight (default weight 1)",
      params: ["from", "to", "weight"],
      schema: z.object({ from: vertexArg, to: vertexArg, weight: weightArg.optional() }).strict(),
    },
    (graph, { from, to, weight }, settings) => {
      const added = weight === undefined ? graph.addEdge(from, to) : graph.addEdge(from, to, weight);
      if (!added.ok) {
        return added;
      }
      const { edge, replaced, previousWeight } = added.value;
      const label = edgeLabel(graph, edge.from, edge.to);
      const current = formatNumber(edge.weight, settings.precision);
      if (replaced && previousWeight !== undefined) {
        return succeed([`edge ${label} updated (weight ${formatNumber(previousWeight, settings.precision)} -> ${current})`]);
      }
      return succeed([`edge ${label} added (weight ${current})`]);
    },
  ),
  remove_vertex: graphCommand(
    {
      usage: "remove_vertex <v>",
      description: "remove a vertex and every edge touching it",
      params: ["vertex"],
      schema: z.object({ vertex: vertexArg }).strict(),
    },
    (graph, { vertex }) => {
      const removed = graph.removeVertex(vertex);
      if (!removed.ok) {
        return removed;
      }
      const count = removed.value.removedEdges;
      return succeed([`vertex ${vertex} removed along with ${count} ${count === 1 ? "edge" : "edges"}`]);
    },
  ),
  remove_edge: graphCommand(
    {
      usage: "remove_edge <u> <v>",
      description: "remove an edge",
      params: ["from", "to"],
      schema: z.object({ from: vertexArg, to: vertexArg }).strict(),
    },
    (graph, { from, to }) => {
      const removed = graph.removeEdge(from, to);
      return removed.ok ? succeed([`edge ${edgeLabel(graph, removed.value.from, removed.value.to)} removed`]) : removed;
    },
  ),
  list_vertices: graphCommand(
    { usage: "list_vertices", description: "list every vertex", params: [], schema: noArgs },
    (graph) => {
      const vertices = graph.listVertices();
      return succeed([`vertices: ${vertices.length > 0 ? vertices.join(", ") : "(none)"}`, `total vertices: ${vertices.length}`]);
    },
  ),
  list_edges: graphCommand(
    {
      usage: "list_edges [v]",
      description: "list every edge, or the edges leaving one vertex",
      params: ["vertex"],
      schema: z.object({ vertex: vertexArg.optional() }).strict(),
    },
    (graph, { vertex }, settings) => {
      if (vertex !== undefined && !graph.hasVertex(vertex)) {
        return fail(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `vertex ${vertex} does not exist`, null, { vertex });
      }
      const edges = vertex === undefined ? graph.listEdges() : graph.incidentEdges(vertex);
      if (edges.length === 0) {
        return succeed(["no edges"]);
      }
      const title = vertex === undefined ? "edges" : `edges of vertex ${vertex}`;
      return succeed(formatEdges(title, edges, settings.precision));
    },
  ),
  connected: graphCommand(
    { usage: "connected", description: "check whether the graph is connected", params: [], schema: noArgs },
    (graph, _args, settings) => {
      const connected = isConnected(graph, { policy: settings.connectivity });
      const qualifier = graph.isDirected ? ` (${settings.connectivity} connectivity)` : "";
      return succeed([`the graph is ${connected ? "" : "not "}connected${qualifier}`]);
    },
  ),
  components: graphCommand(
    { usage: "components", description: "list connected components", params: [], schema: noArgs },
    (graph, _args, settings) => {
      const groups = components(graph, { policy: settings.connectivity });
      const title = graph.isDirected ? `${settings.connectivity} components` : "components";
      return succeed(formatComponents(title, groups));
    },
  ),
  shortest_path: graphCommand(
    {
      usage: "shortest_path <source> <target>",
      description: "shortest path between two vertices (Dijkstra)",
      params: ["source", "target"],
      schema: z.object({ source: vertexArg, target: vertexArg }).strict(),
    },
    (graph, { source, target }, settings) => {
      const result = shortestPath(graph, source, target);
      return result.ok ? succeed(formatShortestPath(source, target, result.value, settings.precision)) : result;
    },
  ),
  distances: graphCommand(
    {
      usage: "distances <source>",
      description: "distances from one vertex to every other",
      params: ["source"],
      schema: z.object({ source: vertexArg }).strict(),
    },
    (graph, { source }, settings) => {
      const result = distances(graph, source);
      return result.ok ? succeed(formatDistances(source, result.value, settings.precision)) : result;
    },
  ),
  mst: graphCommand(
    {
      usage: "mst <start>",
      description: "minimum spanning tree (Prim)",
      params: ["start"],
      schema: z.object({ start: vertexArg }).strict(),
    },
    (graph, { start }, settings) => {
      const result = mst(graph, start);
      return result.ok ? succeed(formatSpanningTree(result.value, settings.precision)) : result;
    },
  ),
  info: graphCommand(
    { usage: "info", description: "summary of the graph", params: [], schema: noArgs },
    (graph, _args, settings) => succeed(formatSummary(describeGraph(graph, { policy: settings.connectivity }))),
  ),
  help: sessionCommand({ usage: "help", description: "show this help", params: [], schema: noArgs }, () =>
    succeed(renderHelp()),
  ),
};

/** Names accepted by the shell in addition to {@link COMMANDS}. */
export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["exit", "quit"]);

export function renderHelp(): string[] {
  const rows = Object.values(COMMANDS).map((command) => [command.usage, command.description]);
  rows.push(["exit", "leave the shell"]);
  return renderTable("available commands", [{ header: "command" }, { header: "description" }], rows);
}
