import { readFile } from "node:fs/promises";

import { ERROR_CODES, fail, type GraphMode, type Outcome } from "../types.js";
import { parseGraphSource } from "./parser.js";
import { loadGraph, type Graph, type GraphOptions } from "./store.js";

/** Reads a load file from disk and builds a fresh graph from it. */
export async function loadGraphFile(
  path: string,
  mode: GraphMode,
  options: Omit<GraphOptions, "size"> = {},
): Promise<Outcome<Graph>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ERROR_CODES.INPUT_UNAVAILABLE, `cannot read '${path}': ${reason}`, "check the file path", { path });
  }

  const source = parseGraphSource(text);
  if (!source.ok) {
    return { ...source, details: { ...source.details, path } };
  }
  return loadGraph(source.value.vertexCount, source.value.edges, mode, options);
}
