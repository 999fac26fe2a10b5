/**
 * Shared types used across the engine and the shell. Grouping these
 * definitions keeps the error codes and the success/failure envelopes
 * consistent between modules.
 */

/** Vertex identifier as seen by users: a non-negative integer label. */
export type Vertex = number;

/** Whether edges are direction-sensitive. Fixed once a graph is created. */
export type GraphMode = "directed" | "undirected";

/** Weighted edge record. Undirected edges are normalised to `from <= to`. */
export interface Edge {
  readonly from: Vertex;
  readonly to: Vertex;
  readonly weight: number;
}

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures the engine and the shell emit
 * consistent codes which simplifies rendering and testing.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    UNKNOWN_VERTEX: "E-GRAPH-UNKNOWN-VERTEX",
    DUPLICATE_VERTEX: "E-GRAPH-DUPLICATE-VERTEX",
    UNKNOWN_EDGE: "E-GRAPH-UNKNOWN-EDGE",
    SELF_LOOP: "E-GRAPH-SELF-LOOP",
  },
  INPUT: {
    MALFORMED: "E-INPUT-MALFORMED",
    UNAVAILABLE: "E-INPUT-UNAVAILABLE",
  },
  ALGO: {
    NOT_UNDIRECTED: "E-ALGO-NOT-UNDIRECTED",
    DISCONNECTED: "E-ALGO-DISCONNECTED",
    NO_PATH: "E-ALGO-NO-PATH",
    NEGATIVE_WEIGHT: "E-ALGO-NEGATIVE-WEIGHT",
  },
  CLI: {
    NO_GRAPH: "E-CLI-NO-GRAPH",
    UNKNOWN_COMMAND: "E-CLI-UNKNOWN-COMMAND",
    INVALID_ARGS: "E-CLI-INVALID-ARGS",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_UNKNOWN_VERTEX`). The helper keeps runtime data immutable
 * while preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.ALGO_NO_PATH`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/** Collapses runs of whitespace and cuts the text to {@link ERROR_TEXT_MAX_LENGTH}. */
function clampErrorText(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length <= ERROR_TEXT_MAX_LENGTH ? collapsed : `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Normalised error message; blank text becomes {@link fallback}. */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  return clampErrorText(text) || fallback;
}

/** Normalised hint; blank hints are dropped. */
export function normaliseErrorHint(hint?: string): string | undefined {
  return hint === undefined ? undefined : clampErrorText(hint) || undefined;
}

/** Canonical failure payload returned by every engine operation. */
export interface Failure<Code extends ErrorCode = ErrorCode> {
  /** Marker discriminating failures from successful payloads. */
  ok: false;
  /** Stable error code helping callers branch on the failure kind. */
  code: Code;
  /** Human readable message after normalisation and truncation. */
  message: string;
  /** Optional hint describing how to resolve the failure. */
  hint?: string;
  /** Optional structured context (offending vertex, line number, ...). */
  details?: Record<string, unknown>;
}

/** Successful payload. */
export interface Success<T> {
  ok: true;
  value: T;
}

/** Result of an engine operation: a complete value or a typed failure. */
export type Outcome<T, Code extends ErrorCode = ErrorCode> = Success<T> | Failure<Code>;

/** Wraps a value into a {@link Success}. */
export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

/**
 * Builds a {@link Failure} using the canonical error normalisation rules. The
 * hint is removed entirely when it collapses to an empty string so payloads
 * never expose `undefined` values.
 */
export function fail<Code extends ErrorCode>(
  code: Code,
  message: string,
  hint?: string | null,
  details?: Record<string, unknown>,
): Failure<Code> {
  const failure: Failure<Code> = {
    ok: false,
    code,
    message: normaliseErrorMessage(message),
  };
  const normalisedHint = normaliseErrorHint(hint ?? undefined);
  if (normalisedHint) {
    failure.hint = normalisedHint;
  }
  if (details !== undefined) {
    failure.details = details;
  }
  return failure;
}

/** Returns true when the value is a non-negative safe integer usable as a vertex. */
export function isVertexId(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
