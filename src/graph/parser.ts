import { ERROR_CODES, fail, succeed, type Failure, type Outcome } from "../types.js";
import type { EdgeInput } from "./store.js";

/** Raw content of a load file before it is turned into a graph. */
export interface GraphSource {
  readonly vertexCount: number;
  readonly edges: EdgeInput[];
}

/** Decimal literal accepted for vertex labels and counts. */
export const INTEGER_PATTERN = /^[+]?\d+$/;

/**
 * Parses the line-oriented load format:
 *
 * ```text
 * 4
 * 0 1
 * 1 2 2.5
 * ```
 *
 * The first non-blank line holds the vertex count, every following non-blank
 * line an edge `u v [weight]`. Range checks against the vertex count are left
 * to {@link loadGraph}; this function only validates the shape of each line.
 */
export function parseGraphSource(text: string): Outcome<GraphSource> {
  const lines = text.split(/\r?\n/);
  let vertexCount: number | null = null;
  const edges: EdgeInput[] = [];

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (line.length === 0) {
      continue;
    }
    const lineNumber = index + 1;
    const fields = line.split(/\s+/);

    if (vertexCount === null) {
      if (fields.length !== 1 || !INTEGER_PATTERN.test(fields[0])) {
        return malformed(lineNumber, `expected a non-negative vertex count, got '${line}'`);
      }
      vertexCount = Number.parseInt(fields[0], 10);
      continue;
    }

    if (fields.length < 2 || fields.length > 3) {
      return malformed(lineNumber, `expected 'u v [weight]', got '${line}'`);
    }
    const [fromField, toField, weightField] = fields;
    if (!INTEGER_PATTERN.test(fromField) || !INTEGER_PATTERN.test(toField)) {
      return malformed(lineNumber, `vertex labels must be non-negative integers, got '${line}'`);
    }
    const from = Number.parseInt(fromField, 10);
    const to = Number.parseInt(toField, 10);
    if (weightField === undefined) {
      edges.push({ from, to });
      continue;
    }
    const weight = Number(weightField);
    if (!Number.isFinite(weight)) {
      return malformed(lineNumber, `weight '${weightField}' is not a finite number`);
    }
    edges.push({ from, to, weight });
  }

  if (vertexCount === null) {
    return fail(ERROR_CODES.INPUT_MALFORMED, "the source is empty: the first line must hold the vertex count", null, {
      line: 1,
    });
  }
  return succeed({ vertexCount, edges });
}

function malformed(line: number, message: string): Failure {
  return fail(ERROR_CODES.INPUT_MALFORMED, `line ${line}: ${message}`, null, { line });
}
