import { describe, it } from "mocha";
import { expect } from "chai";

import { mst } from "../src/graph/algorithms/prim.js";
import { ERROR_CODES } from "../src/types.js";
import { buildGraph, buildSpanningGraph, emptyGraph } from "./helpers/graphs.js";
import { expectFailure, expectOk } from "./helpers/outcomes.js";

describe("graph minimum spanning tree", () => {
  it("grows the tree greedily from the start vertex", () => {
    const tree = expectOk(mst(buildSpanningGraph(), 0));
    expect(tree.root).to.equal(0);
    expect(tree.edges).to.deep.equal([
      { from: 0, to: 2, weight: 1, step: 1 },
      { from: 2, to: 1, weight: 2.5, step: 2 },
      { from: 2, to: 3, weight: 4.1, step: 3 },
      { from: 3, to: 4, weight: 2, step: 4 },
    ]);
    expect(tree.totalWeight).to.be.closeTo(9.6, 1e-9);
  });

  it("returns the same total weight from any start vertex", () => {
    const graph = buildSpanningGraph();
    for (const start of graph.listVertices()) {
      const tree = expectOk(mst(graph, start));
      expect(tree.edges).to.have.lengthOf(graph.vertexCount - 1);
      expect(tree.totalWeight).to.be.closeTo(9.6, 1e-9);
    }
  });

  it("breaks weight ties by edge-listing order", () => {
    const graph = buildGraph("undirected", 3, [
      [0, 1, 1],
      [0, 2, 1],
      [1, 2, 1],
    ]);
    const tree = expectOk(mst(graph, 0));
    expect(tree.edges.map((edge) => [edge.from, edge.to])).to.deep.equal([
      [0, 1],
      [0, 2],
    ]);
  });

  it("prefers the earlier listed edge even when it is discovered later", () => {
    // 1-2 is listed first but only becomes a candidate once 1 joins the tree.
    const graph = buildGraph("undirected", 4, [
      [1, 2, 1],
      [0, 1, 1],
      [0, 3, 1],
    ]);
    const tree = expectOk(mst(graph, 0));
    expect(tree.edges).to.deep.equal([
      { from: 0, to: 1, weight: 1, step: 1 },
      { from: 1, to: 2, weight: 1, step: 2 },
      { from: 0, to: 3, weight: 1, step: 3 },
    ]);
  });

  it("returns an empty tree for a single vertex", () => {
    const tree = expectOk(mst(emptyGraph("undirected", 1), 0));
    expect(tree.edges).to.deep.equal([]);
    expect(tree.totalWeight).to.equal(0);
  });

  it("accepts negative weights", () => {
    const graph = buildGraph("undirected", 3, [
      [0, 1, -2],
      [1, 2, 3],
      [0, 2, 5],
    ]);
    expect(expectOk(mst(graph, 0)).totalWeight).to.equal(1);
  });

  it("rejects directed graphs", () => {
    const graph = buildGraph("directed", 2, [[0, 1]]);
    expectFailure(mst(graph, 0), ERROR_CODES.ALGO_NOT_UNDIRECTED);
  });

  it("rejects disconnected graphs", () => {
    const graph = buildGraph("undirected", 4, [
      [0, 1],
      [2, 3],
    ]);
    expectFailure(mst(graph, 0), ERROR_CODES.ALGO_DISCONNECTED);
  });

  it("rejects an unknown start vertex", () => {
    expectFailure(mst(buildSpanningGraph(), 8), ERROR_CODES.GRAPH_UNKNOWN_VERTEX);
  });

  it("never selects an allowed self-loop", () => {
    const graph = buildGraph(
      "undirected",
      2,
      [
        [0, 0, -5],
        [0, 1, 2],
      ],
      { selfLoops: "allow" },
    );
    expect(expectOk(mst(graph, 0)).edges).to.deep.equal([{ from: 0, to: 1, weight: 2, step: 1 }]);
  });
});
