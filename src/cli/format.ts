import type { Component } from "../graph/algorithms/connectivity.js";
import type { DistanceTable, ShortestPath } from "../graph/algorithms/dijkstra.js";
import type { SpanningTree } from "../graph/algorithms/prim.js";
import type { GraphSummary } from "../graph/summary.js";
import type { Edge, Failure, GraphMode, Vertex } from "../types.js";

export type Alignment = "left" | "right";

export interface Column {
  readonly header: string;
  readonly align?: Alignment;
}

/**
 * Renders rows as a plain-text table: a header line, a dashed underline, then
 * one line per row. Cells are separated by two spaces and trailing padding is
 * trimmed.
 */
export function renderTable(title: string, columns: readonly Column[], rows: readonly string[][]): string[] {
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );
  const renderRow = (cells: readonly string[]): string =>
    columns
      .map((column, index) => {
        const cell = cells[index] ?? "";
        return column.align === "right" ? cell.padStart(widths[index]) : cell.padEnd(widths[index]);
      })
      .join("  ")
      .trimEnd();

  return [
    title,
    renderRow(columns.map((column) => column.header)),
    widths.map((width) => "-".repeat(width)).join("  "),
    ...rows.map(renderRow),
  ];
}

export function formatNumber(value: number, precision: number): string {
  return value.toFixed(precision);
}

export function arrowFor(mode: GraphMode): string {
  return mode === "directed" ? "->" : "--";
}

export function formatPath(path: readonly Vertex[]): string {
  return path.join(" -> ");
}

export function formatEdges(title: string, edges: readonly Edge[], precision: number): string[] {
  const rows = edges.map((edge, index) => [
    String(index + 1),
    String(edge.from),
    String(edge.to),
    formatNumber(edge.weight, precision),
  ]);
  return [
    ...renderTable(
      title,
      [{ header: "#", align: "right" }, { header: "from", align: "right" }, { header: "to", align: "right" }, {
        header: "weight",
        align: "right",
      }],
      rows,
    ),
    `total edges: ${edges.length}`,
  ];
}

export function formatComponents(title: string, groups: readonly Component[]): string[] {
  const rows = groups.map((group, index) => [String(index + 1), group.join(", "), String(group.length)]);
  return [
    ...renderTable(title, [{ header: "#", align: "right" }, { header: "vertices" }, { header: "size", align: "right" }], rows),
    `total components: ${groups.length}`,
  ];
}

export function formatShortestPath(source: Vertex, target: Vertex, result: ShortestPath, precision: number): string[] {
  return [
    `shortest path from ${source} to ${target}`,
    `path: ${formatPath(result.path)}`,
    `distance: ${formatNumber(result.distance, precision)}`,
  ];
}

export function formatDistances(source: Vertex, table: DistanceTable, precision: number): string[] {
  const rows: string[][] = [];
  for (const [vertex, entry] of table) {
    rows.push(
      entry.reachable
        ? [String(vertex), formatNumber(entry.distance, precision), formatPath(entry.path)]
        : [String(vertex), "unreachable", "-"],
    );
  }
  return renderTable(
    `distances from vertex ${source}`,
    [{ header: "vertex", align: "right" }, { header: "distance", align: "right" }, { header: "path" }],
    rows,
  );
}

export function formatSpanningTree(tree: SpanningTree, precision: number): string[] {
  const rows = tree.edges.map((edge) => [
    String(edge.step),
    String(edge.from),
    String(edge.to),
    formatNumber(edge.weight, precision),
  ]);
  return [
    ...renderTable(
      `minimum spanning tree from vertex ${tree.root} (Prim)`,
      [{ header: "step", align: "right" }, { header: "from", align: "right" }, { header: "to", align: "right" }, {
        header: "weight",
        align: "right",
      }],
      rows,
    ),
    `total weight: ${formatNumber(tree.totalWeight, precision)}`,
  ];
}

export function formatSummary(summary: GraphSummary): string[] {
  const componentLabel = summary.mode === "directed" ? `${summary.policy} components` : "components";
  return [
    `mode: ${summary.mode}`,
    `vertices: ${summary.vertexCount}`,
    `edges: ${summary.edgeCount}`,
    `weighted: ${summary.weighted ? "yes" : "no"}`,
    `connected: ${summary.connected ? "yes" : "no"}`,
    `${componentLabel}: ${summary.componentCount}`,
  ];
}

export function formatFailure(failure: Failure): string[] {
  const lines = [`error [${failure.code}]: ${failure.message}`];
  if (failure.hint) {
    lines.push(`hint: ${failure.hint}`);
  }
  return lines;
}
