/**
 * Shared error helpers used across the routing engine. Grouping the codes and
 * the normalisation rules here keeps every failure surfaced to callers
 * consistent regardless of the module that produced it.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Callers branch on these codes rather than on message text.
 */
export const ERROR_CATALOG = {
  ROUTE: {
    UNKNOWN_POINT: "E-ROUTE-UNKNOWN-POINT",
    INVALID_CONSTRAINT: "E-ROUTE-INVALID-CONSTRAINT",
    NOT_FOUND: "E-ROUTE-NOT-FOUND",
  },
  INDEX: {
    CORRUPT: "E-INDEX-CORRUPT",
    UNSUPPORTED_VERSION: "E-INDEX-UNSUPPORTED-VERSION",
    MALFORMED: "E-INDEX-MALFORMED",
  },
  HEAT: {
    CALCULATION: "E-HEAT-CALCULATION",
  },
  GRAPH: {
    INVARIANT: "E-GRAPH-INVARIANT",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Every `FAMILY_CODE` key of the catalogue paired with its own literal code. */
type CatalogEntry<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string]: {
    [Code in keyof T[Family] & string]: { readonly key: `${Family}_${Code}`; readonly value: T[Family][Code] };
  }[keyof T[Family] & string];
}[keyof T & string];

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Entry in CatalogEntry<T> as Entry["key"]]: Entry["value"];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `ROUTE_NOT_FOUND`).
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

/** Flat access to all stable error codes (e.g. `ERROR_CODES.ROUTE_NOT_FOUND`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the engine. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so callers never receive an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Normalises the optional hint attached to an error. Empty strings collapse to
 * `undefined` while overly long hints are truncated.
 */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Canonical failure payload returned by engine operations. */
export interface Failure<Code extends string = string, Details = Record<string, unknown>> {
  /** Marker discriminating failures from successful payloads. */
  ok: false;
  /** Stable error code helping callers branch on the failure kind. */
  code: Code;
  /** Human readable message after normalisation and truncation. */
  message: string;
  /** Optional hint describing how to adjust the request. */
  hint?: string;
  /** Structured context (names, thresholds) the caller can act upon. */
  details: Details;
}

/**
 * Builds a {@link Failure} using the canonical normalisation rules. The hint is
 * removed entirely when it collapses to an empty string so payloads never
 * expose `undefined` values.
 */
export function fail<Code extends string, Details>(
  code: Code,
  message: string,
  details: Details,
  hint?: string | null,
): Failure<Code, Details> {
  const failure: Failure<Code, Details> = {
    ok: false,
    code,
    message: normaliseErrorMessage(message),
    details,
  };
  const normalisedHint = normaliseErrorHint(hint ?? undefined);
  if (normalisedHint) {
    failure.hint = normalisedHint;
  }
  return failure;
}

/**
 * Error thrown when an in-memory structure breaks one of its invariants. Correct
 * operation never reaches this state, so it is the only unrecoverable error.
 */
export class GraphInvariantError extends Error {
  public readonly code: typeof ERROR_CODES.GRAPH_INVARIANT;

  constructor(message: string) {
    super(message);
    this.name = "GraphInvariantError";
    this.code = ERROR_CODES.GRAPH_INVARIANT;
  }
}
