export * from "./types.js";
export * from "./graph/store.js";
export * from "./graph/parser.js";
export * from "./graph/loader.js";
export * from "./graph/summary.js";
export * from "./graph/algorithms/connectivity.js";
export * from "./graph/algorithms/dijkstra.js";
export * from "./graph/algorithms/prim.js";
