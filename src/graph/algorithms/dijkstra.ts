import { ERROR_CODES, fail, succeed, type Edge, type Failure, type Outcome, type Vertex } from "../../types.js";
import type { Graph } from "../store.js";
import { MinHeap } from "./heap.js";

export interface ShortestPath {
  /** Vertices from source to target, both included. */
  readonly path: Vertex[];
  /** Sum of the edge weights along {@link path}. */
  readonly distance: number;
  /** Vertices in the order they were settled before the target was reached. */
  readonly visitedOrder: Vertex[];
}

/** Entry of a {@link DistanceTable}. Unreachable vertices carry an explicit marker. */
export type DistanceEntry =
  | {
      readonly reachable: true;
      readonly distance: number;
      /** Previous vertex on the shortest path, `null` for the source itself. */
      readonly predecessor: Vertex | null;
      readonly path: Vertex[];
    }
  | { readonly reachable: false };

/** Single-source distances keyed by every vertex of the graph, in ascending order. */
export type DistanceTable = ReadonlyMap<Vertex, DistanceEntry>;

interface SearchState {
  readonly distances: Map<Vertex, number>;
  readonly previous: Map<Vertex, Vertex>;
  readonly visitedOrder: Vertex[];
}

/**
 * Minimum-weight path between two vertices. Neighbours are relaxed in the
 * store's listing order and a tentative distance is only replaced by a
 * strictly shorter one, so among equal-weight paths the first one discovered
 * is returned.
 */
export function shortestPath(graph: Graph, source: Vertex, target: Vertex): Outcome<ShortestPath> {
  const guard = checkSearchable(graph, [source, target]);
  if (guard) {
    return guard;
  }

  const state = search(graph, source, target);
  const distance = state.distances.get(target);
  if (distance === undefined) {
    return fail(ERROR_CODES.ALGO_NO_PATH, `no path from ${source} to ${target}`, null, { source, target });
  }

  return succeed({ path: tracePath(state.previous, source, target), distance, visitedOrder: state.visitedOrder });
}

/** Runs the same search to completion and reports every vertex. */
export function distances(graph: Graph, source: Vertex): Outcome<DistanceTable> {
  const guard = checkSearchable(graph, [source]);
  if (guard) {
    return guard;
  }

  const state = search(graph, source, null);
  const table = new Map<Vertex, DistanceEntry>();
  for (const vertex of graph.listVertices()) {
    const distance = state.distances.get(vertex);
    if (distance === undefined) {
      table.set(vertex, { reachable: false });
      continue;
    }
    table.set(vertex, {
      reachable: true,
      distance,
      predecessor: state.previous.get(vertex) ?? null,
      path: tracePath(state.previous, source, vertex),
    });
  }
  return succeed(table);
}

/**
 * Validates the endpoints and rejects graphs holding a negative weight
 * anywhere, whether or not the edge would be reached.
 */
function checkSearchable(graph: Graph, endpoints: Vertex[]): Failure | null {
  for (const vertex of endpoints) {
    if (!graph.hasVertex(vertex)) {
      return fail(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `vertex ${vertex} does not exist`, null, { vertex });
    }
  }
  const negative = graph.listEdges().find((edge: Edge) => edge.weight < 0);
  if (negative) {
    return fail(
      ERROR_CODES.ALGO_NEGATIVE_WEIGHT,
      `edge ${negative.from} -> ${negative.to} has negative weight ${negative.weight}`,
      "shortest paths require non-negative weights",
      { from: negative.from, to: negative.to, weight: negative.weight },
    );
  }
  return null;
}

function search(graph: Graph, source: Vertex, target: Vertex | null): SearchState {
  const distances = new Map<Vertex, number>([[source, 0]]);
  const previous = new Map<Vertex, Vertex>();
  const visitedOrder: Vertex[] = [];
  const settled = new Set<Vertex>();

  const queue = new MinHeap<Vertex>();
  queue.enqueue(source, 0);

  while (!queue.isEmpty()) {
    const current = queue.dequeue();
    if (!current || settled.has(current.item)) {
      continue;
    }
    settled.add(current.item);
    visitedOrder.push(current.item);

    if (current.item === target) {
      break;
    }

    for (const edge of graph.incidentEdges(current.item)) {
      if (settled.has(edge.to)) {
        continue;
      }
      const tentative = current.priority + edge.weight;
      const known = distances.get(edge.to);
      if (known === undefined || tentative < known) {
        distances.set(edge.to, tentative);
        previous.set(edge.to, current.item);
        queue.enqueue(edge.to, tentative);
      }
    }
  }

  return { distances, previous, visitedOrder };
}

function tracePath(previous: Map<Vertex, Vertex>, source: Vertex, target: Vertex): Vertex[] {
  const path: Vertex[] = [target];
  let current = target;
  while (current !== source) {
    const step = previous.get(current);
    if (step === undefined) {
      break;
    }
    path.unshift(step);
    current = step;
  }
  return path;
}
