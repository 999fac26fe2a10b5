import {
  ERROR_CODES,
  fail,
  isVertexId,
  succeed,
  type Edge,
  type GraphMode,
  type Outcome,
  type Vertex,
} from "../types.js";

/** How the store treats edges whose endpoints coincide. */
export type SelfLoopPolicy = "reject" | "allow";

/** Options fixed when a graph is created. */
export interface GraphOptions {
  /** Self-loop handling, `"reject"` unless explicitly allowed. */
  readonly selfLoops?: SelfLoopPolicy;
  /** Number of vertices (`0..size-1`) created up front. */
  readonly size?: number;
}

/** Raw edge tuple consumed by {@link loadGraph}; the weight defaults to 1. */
export interface EdgeInput {
  readonly from: Vertex;
  readonly to: Vertex;
  readonly weight?: number;
}

/** Result of {@link Graph.addEdge}. */
export interface EdgeInsertion {
  readonly edge: Edge;
  /** True when the pair already had an edge whose weight got replaced. */
  readonly replaced: boolean;
  /** Weight held by the pair before the call, when {@link replaced}. */
  readonly previousWeight?: number;
}

/** Result of {@link Graph.removeVertex}. */
export interface VertexRemoval {
  readonly vertex: Vertex;
  /** Number of incident edges dropped along with the vertex. */
  readonly removedEdges: number;
}

/** Default weight applied when an edge is declared without one. */
export const DEFAULT_EDGE_WEIGHT = 1;

/**
 * In-memory graph store. Vertices are kept in a set, edges in an
 * insertion-ordered index keyed by their (ordered or unordered) endpoint pair,
 * and every vertex tracks the keys of its incident edges so removals and
 * neighbourhood scans never walk the full edge list.
 *
 * Mutations validate everything before touching any collection: a failed call
 * leaves the graph exactly as it was.
 */
export class Graph {
  readonly mode: GraphMode;
  readonly selfLoops: SelfLoopPolicy;
  private readonly vertices = new Set<Vertex>();
  private readonly edges = new Map<string, Edge>();
  /** Keys of the edges leaving each vertex (every incident edge when undirected). */
  private readonly outgoing = new Map<Vertex, Set<string>>();
  /** Keys of the arcs entering each vertex. Only maintained for directed graphs. */
  private readonly incoming = new Map<Vertex, Set<string>>();

  constructor(mode: GraphMode, options: GraphOptions = {}) {
    this.mode = mode;
    this.selfLoops = options.selfLoops ?? "reject";
    const size = options.size ?? 0;
    for (let vertex = 0; vertex < size; vertex += 1) {
      this.insertVertex(vertex);
    }
  }

  get isDirected(): boolean {
    return this.mode === "directed";
  }

  get vertexCount(): number {
    return this.vertices.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  hasVertex(vertex: Vertex): boolean {
    return this.vertices.has(vertex);
  }

  hasEdge(from: Vertex, to: Vertex): boolean {
    return this.edges.has(this.keyOf(from, to));
  }

  /** Weight of the edge between the pair, `undefined` when there is none. */
  getWeight(from: Vertex, to: Vertex): number | undefined {
    return this.edges.get(this.keyOf(from, to))?.weight;
  }

  addVertex(vertex: Vertex): Outcome<Vertex> {
    if (!isVertexId(vertex)) {
      return fail(ERROR_CODES.INPUT_MALFORMED, `vertex '${vertex}' is not a non-negative integer`, null, { vertex });
    }
    if (this.vertices.has(vertex)) {
      return fail(ERROR_CODES.GRAPH_DUPLICATE_VERTEX, `vertex ${vertex} already exists`, null, { vertex });
    }
    this.insertVertex(vertex);
    return succeed(vertex);
  }

  /**
   * Inserts the edge or, when the pair is already connected, replaces its
   * weight in place ("last definition wins"). The edge keeps its original
   * listing position on replacement.
   */
  addEdge(from: Vertex, to: Vertex, weight: number = DEFAULT_EDGE_WEIGHT): Outcome<EdgeInsertion> {
    for (const endpoint of [from, to]) {
      if (!this.vertices.has(endpoint)) {
        return fail(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `vertex ${endpoint} does not exist`, "add the vertex first", {
          vertex: endpoint,
        });
      }
    }
    if (!Number.isFinite(weight)) {
      return fail(ERROR_CODES.INPUT_MALFORMED, `edge weight '${weight}' is not a finite number`, null, { weight });
    }
    if (from === to && this.selfLoops === "reject") {
      return fail(ERROR_CODES.GRAPH_SELF_LOOP, `self-loop on vertex ${from} rejected`, "self-loops are disabled", {
        vertex: from,
      });
    }

    const key = this.keyOf(from, to);
    const edge = this.normalise(from, to, weight);
    const existing = this.edges.get(key);
    this.edges.set(key, edge);
    if (existing) {
      return succeed({ edge, replaced: true, previousWeight: existing.weight });
    }

    this.link(edge, key);
    return succeed({ edge, replaced: false });
  }

  /** Removes the vertex together with every edge touching it. */
  removeVertex(vertex: Vertex): Outcome<VertexRemoval> {
    if (!this.vertices.has(vertex)) {
      return fail(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `vertex ${vertex} does not exist`, null, { vertex });
    }

    const keys = new Set<string>([
      ...(this.outgoing.get(vertex) ?? []),
      ...(this.incoming.get(vertex) ?? []),
    ]);
    for (const key of keys) {
      const edge = this.edges.get(key);
      if (edge) {
        this.unlink(edge, key);
        this.edges.delete(key);
      }
    }

    this.vertices.delete(vertex);
    this.outgoing.delete(vertex);
    this.incoming.delete(vertex);
    return succeed({ vertex, removedEdges: keys.size });
  }

  /** Removes the single logical edge between the pair (symmetric when undirected). */
  removeEdge(from: Vertex, to: Vertex): Outcome<Edge> {
    const key = this.keyOf(from, to);
    const edge = this.edges.get(key);
    if (!edge) {
      const arrow = this.isDirected ? "->" : "--";
      return fail(ERROR_CODES.GRAPH_UNKNOWN_EDGE, `edge ${from} ${arrow} ${to} does not exist`, null, { from, to });
    }
    this.unlink(edge, key);
    this.edges.delete(key);
    return succeed(edge);
  }

  /** Vertices in ascending order. */
  listVertices(): Vertex[] {
    return Array.from(this.vertices).sort((a, b) => a - b);
  }

  /** Edges in insertion order; undirected edges appear once with `from <= to`. */
  listEdges(): Edge[] {
    return Array.from(this.edges.values());
  }

  /**
   * Edges leaving {@link vertex} in listing order. Undirected edges are
   * oriented away from the vertex so callers can always follow `edge.to`.
   */
  incidentEdges(vertex: Vertex): Edge[] {
    const result: Edge[] = [];
    for (const key of this.outgoing.get(vertex) ?? []) {
      const edge = this.edges.get(key);
      if (!edge) {
        continue;
      }
      result.push(edge.from === vertex ? edge : { from: vertex, to: edge.from, weight: edge.weight });
    }
    return result;
  }

  /** Arcs entering {@link vertex}. Identical to {@link incidentEdges} for undirected graphs. */
  incomingEdges(vertex: Vertex): Edge[] {
    if (!this.isDirected) {
      return this.incidentEdges(vertex);
    }
    const result: Edge[] = [];
    for (const key of this.incoming.get(vertex) ?? []) {
      const edge = this.edges.get(key);
      if (edge) {
        result.push(edge);
      }
    }
    return result;
  }

  private insertVertex(vertex: Vertex): void {
    this.vertices.add(vertex);
    this.outgoing.set(vertex, new Set());
    if (this.isDirected) {
      this.incoming.set(vertex, new Set());
    }
  }

  private keyOf(from: Vertex, to: Vertex): string {
    if (this.isDirected || from <= to) {
      return `${from}:${to}`;
    }
    return `${to}:${from}`;
  }

  private normalise(from: Vertex, to: Vertex, weight: number): Edge {
    if (this.isDirected || from <= to) {
      return { from, to, weight };
    }
    return { from: to, to: from, weight };
  }

  private link(edge: Edge, key: string): void {
    this.outgoing.get(edge.from)?.add(key);
    if (this.isDirected) {
      this.incoming.get(edge.to)?.add(key);
    } else {
      this.outgoing.get(edge.to)?.add(key);
    }
  }

  private unlink(edge: Edge, key: string): void {
    this.outgoing.get(edge.from)?.delete(key);
    if (this.isDirected) {
      this.incoming.get(edge.to)?.delete(key);
    } else {
      this.outgoing.get(edge.to)?.delete(key);
    }
  }
}

/** Creates an empty graph of the requested mode. */
export function createGraph(mode: GraphMode, options: GraphOptions = {}): Graph {
  return new Graph(mode, options);
}

/**
 * Builds a graph holding vertices `0..vertexCount-1` and the given edges.
 * Endpoints outside the declared range are rejected rather than silently
 * extending the vertex set. Duplicate pairs keep the last declared weight.
 * Nothing is returned unless every edge was accepted.
 */
export function loadGraph(
  vertexCount: number,
  edges: Iterable<EdgeInput>,
  mode: GraphMode,
  options: Omit<GraphOptions, "size"> = {},
): Outcome<Graph> {
  if (!Number.isSafeInteger(vertexCount) || vertexCount < 0) {
    return fail(ERROR_CODES.INPUT_MALFORMED, `vertex count '${vertexCount}' must be a non-negative integer`, null, {
      vertexCount,
    });
  }

  const graph = new Graph(mode, { ...options, size: vertexCount });
  let index = 0;
  for (const input of edges) {
    for (const endpoint of [input.from, input.to]) {
      if (!isVertexId(endpoint) || endpoint >= vertexCount) {
        return fail(
          ERROR_CODES.INPUT_MALFORMED,
          `edge #${index + 1} references vertex '${endpoint}' outside 0..${vertexCount - 1}`,
          "declare a larger vertex count",
          { edge: index, vertex: endpoint },
        );
      }
    }
    const inserted = graph.addEdge(input.from, input.to, input.weight ?? DEFAULT_EDGE_WEIGHT);
    if (!inserted.ok) {
      return { ...inserted, details: { ...inserted.details, edge: index } };
    }
    index += 1;
  }
  return succeed(graph);
}
