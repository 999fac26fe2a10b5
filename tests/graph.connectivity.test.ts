import { describe, it } from "mocha";
import { expect } from "chai";

import { components, isConnected } from "../src/graph/algorithms/connectivity.js";
import { buildGraph, emptyGraph } from "./helpers/graphs.js";
import { expectOk } from "./helpers/outcomes.js";

describe("graph connectivity", () => {
  it("treats the empty graph as connected", () => {
    const graph = emptyGraph("undirected");
    expect(isConnected(graph)).to.equal(true);
    expect(components(graph)).to.deep.equal([]);
  });

  it("treats a single isolated vertex as connected", () => {
    expect(isConnected(emptyGraph("directed", 1))).to.equal(true);
  });

  it("splits two undirected pairs into two components", () => {
    const graph = buildGraph("undirected", 4, [
      [0, 1],
      [2, 3],
    ]);
    expect(isConnected(graph)).to.equal(false);
    expect(components(graph)).to.deep.equal([
      [0, 1],
      [2, 3],
    ]);
  });

  it("orders groups by their first visited vertex and members ascending", () => {
    const graph = buildGraph("undirected", 6, [
      [5, 1],
      [1, 3],
      [0, 4],
    ]);
    expect(components(graph)).to.deep.equal([[0, 4], [1, 3, 5], [2]]);
  });

  it("places every vertex in exactly one group", () => {
    const graph = buildGraph("undirected", 7, [
      [0, 6],
      [6, 2],
      [3, 4],
    ]);
    const groups = components(graph);
    const flattened = groups.flat().sort((a, b) => a - b);
    expect(flattened).to.deep.equal(graph.listVertices());
  });

  it("reflects mutations immediately", () => {
    const graph = buildGraph("undirected", 3, [[0, 1]]);
    expect(isConnected(graph)).to.equal(false);
    expectOk(graph.addEdge(1, 2));
    expect(isConnected(graph)).to.equal(true);
    expectOk(graph.removeVertex(1));
    expect(components(graph)).to.deep.equal([[0], [2]]);
  });

  describe("directed policies", () => {
    const buildChain = () =>
      buildGraph("directed", 3, [
        [0, 1],
        [1, 2],
      ]);

    it("uses weak connectivity by default", () => {
      const graph = buildChain();
      expect(isConnected(graph)).to.equal(true);
      expect(components(graph)).to.deep.equal([[0, 1, 2]]);
    });

    it("follows incoming arcs under the weak policy", () => {
      const graph = buildGraph("directed", 3, [
        [1, 0],
        [2, 0],
      ]);
      expect(components(graph, { policy: "weak" })).to.deep.equal([[0, 1, 2]]);
    });

    it("requires mutual reachability under the strong policy", () => {
      const graph = buildChain();
      expect(isConnected(graph, { policy: "strong" })).to.equal(false);
      expect(components(graph, { policy: "strong" })).to.deep.equal([[0], [1], [2]]);
    });

    it("groups cycles into strongly connected components", () => {
      const graph = buildGraph("directed", 5, [
        [0, 1],
        [1, 2],
        [2, 0],
        [2, 3],
        [3, 4],
        [4, 3],
      ]);
      expect(components(graph, { policy: "strong" })).to.deep.equal([
        [0, 1, 2],
        [3, 4],
      ]);
      expect(isConnected(graph, { policy: "strong" })).to.equal(false);
      expect(isConnected(graph, { policy: "weak" })).to.equal(true);
    });

    it("reports a strongly connected cycle as connected", () => {
      const graph = buildGraph("directed", 3, [
        [0, 1],
        [1, 2],
        [2, 0],
      ]);
      expect(isConnected(graph, { policy: "strong" })).to.equal(true);
    });

    it("handles long directed chains without recursion limits", () => {
      const size = 50_000;
      const graph = emptyGraph("directed", size);
      for (let vertex = 0; vertex + 1 < size; vertex += 1) {
        expectOk(graph.addEdge(vertex, vertex + 1));
      }

      const groups = components(graph, { policy: "strong" });
      expect(groups).to.have.lengthOf(size);
      expect(groups[0]).to.deep.equal([0]);
      expect(groups[size - 1]).to.deep.equal([size - 1]);
      expect(isConnected(graph, { policy: "strong" })).to.equal(false);

      expectOk(graph.addEdge(size - 1, 0));
      expect(isConnected(graph, { policy: "strong" })).to.equal(true);
    });

    it("ignores the policy on undirected graphs", () => {
      const graph = buildGraph("undirected", 3, [
        [0, 1],
        [1, 2],
      ]);
      expect(components(graph, { policy: "strong" })).to.deep.equal([[0, 1, 2]]);
    });
  });

  it("does not let an allowed self-loop connect anything", () => {
    const graph = buildGraph("undirected", 2, [[0, 0, 3]], { selfLoops: "allow" });
    expect(components(graph)).to.deep.equal([[0], [1]]);
  });
});
