import type { GraphMode } from "../types.js";
import { components, type ConnectivityOptions, type ConnectivityPolicy } from "./algorithms/connectivity.js";
import { DEFAULT_EDGE_WEIGHT, type Graph } from "./store.js";

/** Overview rendered by the shell's `info` command. */
export interface GraphSummary {
  readonly mode: GraphMode;
  readonly vertexCount: number;
  readonly edgeCount: number;
  /** True as soon as one edge carries a weight other than the default. */
  readonly weighted: boolean;
  readonly policy: ConnectivityPolicy;
  readonly connected: boolean;
  readonly componentCount: number;
}

export function describeGraph(graph: Graph, options: ConnectivityOptions = {}): GraphSummary {
  const policy = options.policy ?? "weak";
  const componentCount = components(graph, { policy }).length;
  return {
    mode: graph.mode,
    vertexCount: graph.vertexCount,
    edgeCount: graph.edgeCount,
    weighted: graph.listEdges().some((edge) => edge.weight !== DEFAULT_EDGE_WEIGHT),
    policy,
    connected: componentCount <= 1,
    componentCount,
  };
}
