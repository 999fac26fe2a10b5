import { describe, it } from "mocha";
import { expect } from "chai";

import { __testing } from "../src/cli/main.js";
import { DEFAULT_SETTINGS, resolveSessionSettings } from "../src/cli/settings.js";
import { readEnum, readInt, readOptionalString } from "../src/config/env.js";

describe("session settings", () => {
  it("falls back to the defaults on an empty environment", () => {
    expect(resolveSessionSettings({})).to.deep.equal(DEFAULT_SETTINGS);
  });

  it("reads every supported variable", () => {
    const settings = resolveSessionSettings({
      GRAPH_CONNECTIVITY: "Strong",
      GRAPH_SELF_LOOPS: "allow",
      GRAPH_PRECISION: " 4 ",
      GRAPH_LOG_LEVEL: "DEBUG",
      GRAPH_LOG_FILE: "/tmp/graph.log",
    });
    expect(settings).to.deep.equal({
      connectivity: "strong",
      selfLoops: "allow",
      precision: 4,
      logLevel: "debug",
      logFile: "/tmp/graph.log",
    });
  });

  it("ignores invalid values", () => {
    const settings = resolveSessionSettings({
      GRAPH_CONNECTIVITY: "sideways",
      GRAPH_SELF_LOOPS: "",
      GRAPH_PRECISION: "11",
      GRAPH_LOG_LEVEL: "verbose",
      GRAPH_LOG_FILE: "   ",
    });
    expect(settings).to.deep.equal(DEFAULT_SETTINGS);
  });
});

describe("environment readers", () => {
  it("rejects non-integer literals", () => {
    expect(readInt("N", 7, undefined, { N: "2.5" })).to.equal(7);
    expect(readInt("N", 7, undefined, { N: "-3" })).to.equal(-3);
    expect(readInt("N", 7, { min: 0 }, { N: "-3" })).to.equal(7);
  });

  it("matches enum values case-insensitively", () => {
    expect(readEnum("MODE", ["weak", "strong"] as const, "weak", { MODE: "STRONG" })).to.equal("strong");
  });

  it("trims optional strings", () => {
    expect(readOptionalString("PATH_HINT", { PATH_HINT: "  graph.txt " })).to.equal("graph.txt");
    expect(readOptionalString("PATH_HINT", {})).to.equal(undefined);
  });
});

describe("graph-studio command line", () => {
  const { parseArgs } = __testing;

  it("defaults to an undirected session without a file", () => {
    expect(parseArgs([])).to.deep.equal({ mode: "undirected", help: false });
  });

  it("accepts a file and a mode flag in any order", () => {
    expect(parseArgs(["--directed", "graph.txt"])).to.deep.equal({ mode: "directed", help: false, file: "graph.txt" });
  });

  it("recognises the help flags", () => {
    expect(parseArgs(["-h"]).help).to.equal(true);
    expect(parseArgs(["--help"]).help).to.equal(true);
  });

  it("rejects unknown flags and a second file", () => {
    expect(() => parseArgs(["--weighted"])).to.throw("Unknown argument '--weighted'");
    expect(() => parseArgs(["a.txt", "b.txt"])).to.throw("Only one graph file can be preloaded");
  });
});
