import type { Edge, Vertex } from "../../types.js";
import type { Graph } from "../store.js";

/**
 * How connectivity is read on directed graphs. `"weak"` ignores arc
 * directions, `"strong"` requires mutual reachability. Undirected graphs
 * behave identically under both policies.
 */
export type ConnectivityPolicy = "weak" | "strong";

export interface ConnectivityOptions {
  readonly policy?: ConnectivityPolicy;
}

export type Component = Vertex[];

/**
 * Partitions every vertex into maximal connected groups. Groups are ordered by
 * the first vertex reached when scanning vertices in ascending order; members
 * are listed in ascending order.
 */
export function components(graph: Graph, options: ConnectivityOptions = {}): Component[] {
  const policy = options.policy ?? "weak";
  const groups = graph.isDirected && policy === "strong" ? tarjanScc(graph) : weakComponents(graph);
  return groups.map((group) => [...group].sort((a, b) => a - b));
}

/** True when the graph forms at most one component. The empty graph is connected. */
export function isConnected(graph: Graph, options: ConnectivityOptions = {}): boolean {
  if (graph.vertexCount === 0) {
    return true;
  }
  return components(graph, options).length === 1;
}

/** Breadth-first sweep treating every edge as undirected. */
function weakComponents(graph: Graph): Component[] {
  const visited = new Set<Vertex>();
  const groups: Component[] = [];

  for (const root of graph.listVertices()) {
    if (visited.has(root)) {
      continue;
    }
    const group: Vertex[] = [];
    const queue: Vertex[] = [root];
    visited.add(root);
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      group.push(current);
      const neighbours = graph.isDirected
        ? [...graph.incidentEdges(current).map((edge) => edge.to), ...graph.incomingEdges(current).map((edge) => edge.from)]
        : graph.incidentEdges(current).map((edge) => edge.to);
      for (const next of neighbours) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
    groups.push(group);
  }

  return groups;
}

interface TarjanFrame {
  readonly vertex: Vertex;
  readonly discovered: number;
  lowlink: number;
  readonly arcs: Iterator<Edge>;
}

/**
 * Tarjan's strongly connected components, driven by an explicit frame stack so
 * long paths do not exhaust the call stack. Tarjan emits components in reverse
 * topological order; they are re-sorted by the discovery index of their first
 * visited member so the ordering matches the weak sweep.
 */
function tarjanScc(graph: Graph): Component[] {
  let index = 0;
  const stack: Vertex[] = [];
  const onStack = new Set<Vertex>();
  const indices = new Map<Vertex, number>();
  const frames: TarjanFrame[] = [];
  const found: Array<{ members: Vertex[]; discovered: number }> = [];

  const open = (vertex: Vertex): void => {
    indices.set(vertex, index);
    frames.push({ vertex, discovered: index, lowlink: index, arcs: graph.incidentEdges(vertex).values() });
    index += 1;
    stack.push(vertex);
    onStack.add(vertex);
  };

  for (const root of graph.listVertices()) {
    if (indices.has(root)) {
      continue;
    }
    open(root);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const next = frame.arcs.next();
      if (!next.done) {
        const neighbour = next.value.to;
        const neighbourIndex = indices.get(neighbour);
        if (neighbourIndex === undefined) {
          open(neighbour);
        } else if (onStack.has(neighbour)) {
          frame.lowlink = Math.min(frame.lowlink, neighbourIndex);
        }
        continue;
      }

      frames.pop();
      if (frame.lowlink === frame.discovered) {
        const members: Vertex[] = [];
        while (true) {
          const candidate = stack.pop();
          if (candidate === undefined) {
            break;
          }
          onStack.delete(candidate);
          members.push(candidate);
          if (candidate === frame.vertex) {
            break;
          }
        }
        found.push({ members, discovered: frame.discovered });
      }
      const parent = frames[frames.length - 1];
      if (parent) {
        parent.lowlink = Math.min(parent.lowlink, frame.lowlink);
      }
    }
  }

  return found.sort((a, b) => a.discovered - b.discovered).map((entry) => entry.members);
}
