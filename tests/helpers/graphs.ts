import { createGraph, loadGraph, type EdgeInput, type Graph, type GraphOptions } from "../../src/graph/store.js";
import type { GraphMode } from "../../src/types.js";
import { expectOk } from "./outcomes.js";

/** Builds a graph from `[from, to, weight?]` tuples, failing the test on rejection. */
export function buildGraph(
  mode: GraphMode,
  vertexCount: number,
  edges: ReadonlyArray<readonly [number, number, number?]>,
  options: Omit<GraphOptions, "size"> = {},
): Graph {
  const inputs: EdgeInput[] = edges.map(([from, to, weight]) => (weight === undefined ? { from, to } : { from, to, weight }));
  return expectOk(loadGraph(vertexCount, inputs, mode, options), "fixture load");
}

/** Directed weighted graph whose shortest 0 -> 4 route is 0, 2, 1, 3, 4 (weight 10). */
export function buildRoutingGraph(): Graph {
  return buildGraph("directed", 5, [
    [0, 1, 4],
    [0, 2, 2],
    [1, 3, 5],
    [2, 1, 1],
    [2, 3, 8],
    [2, 4, 10],
    [3, 4, 2],
  ]);
}

/** Undirected weighted graph whose minimum spanning tree weighs 9.6. */
export function buildSpanningGraph(): Graph {
  return buildGraph("undirected", 5, [
    [0, 1, 4],
    [0, 2, 1],
    [1, 2, 2.5],
    [1, 3, 5.9],
    [2, 3, 4.1],
    [2, 4, 10],
    [3, 4, 2],
  ]);
}

/** Empty graph helper mirroring the shell's `create` command. */
export function emptyGraph(mode: GraphMode, size = 0, options: Omit<GraphOptions, "size"> = {}): Graph {
  return createGraph(mode, { ...options, size });
}

/** Deterministic Park–Miller generator so randomised suites replay identically. */
export function seededRandom(seed: number): () => number {
  let state = seed % 2147483647;
  if (state <= 0) {
    state += 2147483646;
  }
  return () => {
    state = (state * 48271) % 2147483647;
    return (state - 1) / 2147483646;
  };
}
