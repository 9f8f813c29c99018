import { ERROR_CODES, fail, type Failure } from "../types.js";
import type { GraphMode } from "../graph/model.js";
import { formatSuggestions } from "../universe/suggestions.js";
import type { ConstraintRuleName } from "./constraints.js";
import type { RouteAlgorithm } from "./planners.js";

/** Which request field named the unknown point. */
export type PointRole = "start" | "goal" | "avoid" | "origin";

export type UnknownPointFailure = Failure<
  typeof ERROR_CODES.ROUTE_UNKNOWN_POINT,
  { name: string; role: PointRole; suggestions: string[] }
>;

export type InvalidConstraintFailure = Failure<
  typeof ERROR_CODES.ROUTE_INVALID_CONSTRAINT,
  { reason: string; issues?: string[] }
>;

export type RouteNotFoundFailure = Failure<
  typeof ERROR_CODES.ROUTE_NOT_FOUND,
  {
    start: string;
    goal: string;
    algorithm: RouteAlgorithm;
    graphMode: GraphMode;
    limitingRule: ConstraintRuleName | null;
    rejections: Partial<Record<ConstraintRuleName, number>>;
  }
>;

export type RouteFailure = UnknownPointFailure | InvalidConstraintFailure | RouteNotFoundFailure;

export function unknownPoint(name: string, role: PointRole, suggestions: string[]): UnknownPointFailure {
  return fail(
    ERROR_CODES.ROUTE_UNKNOWN_POINT,
    `Unknown system '${name}'${formatSuggestions(suggestions)}`,
    { name, role, suggestions },
    suggestions.length > 0 ? null : "check the spelling of the system name",
  );
}

export function invalidConstraint(reason: string, message: string, issues?: string[]): InvalidConstraintFailure {
  return fail(ERROR_CODES.ROUTE_INVALID_CONSTRAINT, message, issues ? { reason, issues } : { reason });
}

export function routeNotFound(
  details: RouteNotFoundFailure["details"],
  hint: string,
): RouteNotFoundFailure {
  return fail(ERROR_CODES.ROUTE_NOT_FOUND, `No route found between ${details.start} and ${details.goal}`, details, hint);
}
