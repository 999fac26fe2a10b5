import { ERROR_CODES, fail, succeed, type Edge, type Outcome, type Vertex } from "../../types.js";
import type { Graph } from "../store.js";
import { isConnected } from "./connectivity.js";
import { MinHeap } from "./heap.js";

/** Tree edge annotated with the step at which Prim's algorithm selected it. */
export interface SpanningEdge extends Edge {
  /** 1-based selection order. */
  readonly step: number;
}

export interface SpanningTree {
  readonly root: Vertex;
  /** Selected edges, oriented from the tree side towards the vertex they attached. */
  readonly edges: SpanningEdge[];
  readonly totalWeight: number;
}

/**
 * Prim's algorithm rooted at {@link start}. Candidate edges are kept in a heap
 * keyed by weight; equal weights go to the edge listed first by
 * {@link Graph.listEdges}.
 */
export function mst(graph: Graph, start: Vertex): Outcome<SpanningTree> {
  if (!graph.hasVertex(start)) {
    return fail(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `vertex ${start} does not exist`, null, { vertex: start });
  }
  if (graph.isDirected) {
    return fail(ERROR_CODES.ALGO_NOT_UNDIRECTED, "minimum spanning trees require an undirected graph", null);
  }
  if (!isConnected(graph)) {
    return fail(ERROR_CODES.ALGO_DISCONNECTED, "the graph is not connected", "connect every component first");
  }

  const listingRank = new Map<string, number>();
  graph.listEdges().forEach((edge, position) => listingRank.set(pairKey(edge), position));

  const inTree = new Set<Vertex>();
  const queue = new MinHeap<Edge>();
  const edges: SpanningEdge[] = [];
  let totalWeight = 0;

  const attach = (vertex: Vertex): void => {
    inTree.add(vertex);
    for (const edge of graph.incidentEdges(vertex)) {
      if (!inTree.has(edge.to)) {
        queue.enqueue(edge, edge.weight, listingRank.get(pairKey(edge)) ?? 0);
      }
    }
  };

  attach(start);
  while (!queue.isEmpty() && inTree.size < graph.vertexCount) {
    const candidate = queue.dequeue();
    if (!candidate || inTree.has(candidate.item.to)) {
      continue;
    }
    const { from, to, weight } = candidate.item;
    edges.push({ from, to, weight, step: edges.length + 1 });
    totalWeight += weight;
    attach(to);
  }

  return succeed({ root: start, edges, totalWeight });
}

/** Orientation-free key of an undirected edge. */
function pairKey(edge: Edge): string {
  return edge.from <= edge.to ? `${edge.from}:${edge.to}` : `${edge.to}:${edge.from}`;
}
