import { buildGraph, type GraphBuildOptions } from "../graph/builders.js";
import type { EdgeKind, GraphMode, RouteEdge, RoutingGraph } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import { SpatialIndex } from "../spatial/spatialIndex.js";
import { GraphInvariantError } from "../types.js";
import type { PointId, PointSet } from "../universe/pointSet.js";
import { createLevenshteinSuggester, type SuggestionProvider } from "../universe/suggestions.js";
import { compileConstraints, validateConstraints, type ConstraintPipeline, type RouteConstraints } from "./constraints.js";
import {
  invalidConstraint,
  routeNotFound,
  unknownPoint,
  type PointRole,
  type RouteFailure,
  type UnknownPointFailure,
} from "./errors.js";
import type { LoadoutProvider, ShipLoadout } from "./heat.js";
import { resolveGraphMode, selectPlanner, type RouteAlgorithm } from "./planners.js";
import { RouteRequestSchema } from "./request.js";

/** Algorithm used when neither the request nor the host picks one. */
export const DEFAULT_ROUTE_ALGORITHM: RouteAlgorithm = "a-star";

/** Suggestions appended to unknown-name failures. */
export const DEFAULT_SUGGESTION_LIMIT = 3;

/** Supplies the derived artifacts a request needs. */
export interface RoutingArtifacts {
  /**
   * Graph for `mode`. With `maxTemperature`, spatial neighbourhoods skip
   * systems hotter than the cap; the gate graph ignores it.
   */
  graph(mode: GraphMode, maxTemperature?: number): RoutingGraph;
  spatialIndex(): SpatialIndex;
}

/** Cache key of a graph built for `mode` under an optional temperature cap. */
export function graphCacheKey(mode: GraphMode, maxTemperature?: number): string {
  return mode === "gate" || maxTemperature === undefined ? mode : `${mode}@${maxTemperature}`;
}

export interface RouteHop {
  readonly from: PointId;
  readonly to: PointId;
  readonly kind: EdgeKind;
  readonly distance?: number;
}

export interface RoutePlan {
  readonly algorithm: RouteAlgorithm;
  readonly graphMode: GraphMode;
  readonly start: PointId;
  readonly goal: PointId;
  readonly steps: PointId[];
  readonly stepNames: string[];
  readonly hops: RouteHop[];
  readonly hopCount: number;
  /** Hops taken through gates. */
  readonly gates: number;
  /** Hops taken as spatial jumps. */
  readonly jumps: number;
  /** Sum of the known hop distances. */
  readonly totalDistance: number;
  /** Hops whose distance is unknown (gates between unpositioned points). */
  readonly unknownDistanceHops: number;
  readonly warnings: string[];
}

export type RouteOutcome = { readonly ok: true; readonly plan: RoutePlan } | RouteFailure;

export interface RouteDependencies {
  readonly artifacts?: RoutingArtifacts;
  readonly suggestions?: SuggestionProvider;
  readonly suggestionLimit?: number;
  readonly loadouts?: LoadoutProvider;
  readonly heatCalibration?: number;
  readonly defaultAlgorithm?: RouteAlgorithm;
  /** Used by the on-demand artifacts when no {@link artifacts} are supplied. */
  readonly graphOptions?: Omit<GraphBuildOptions, "spatialIndex" | "logger" | "maxTemperature">;
  readonly logger?: StructuredLogger;
}

/**
 * Builds each artifact at most once, on first use. The spatial graph and the
 * A* planner share the same index.
 */
export function createOnDemandArtifacts(
  pointSet: PointSet,
  options: Omit<GraphBuildOptions, "spatialIndex" | "maxTemperature"> = {},
): RoutingArtifacts {
  let index: SpatialIndex | null = null;
  const graphs = new Map<string, RoutingGraph>();
  const artifacts: RoutingArtifacts = {
    spatialIndex() {
      if (!index) {
        index = SpatialIndex.build(pointSet, { logger: options.logger });
      }
      return index;
    },
    graph(mode, maxTemperature) {
      const key = graphCacheKey(mode, maxTemperature);
      let graph = graphs.get(key);
      if (!graph) {
        graph =
          mode === "gate"
            ? buildGraph(mode, pointSet, { logger: options.logger })
            : buildGraph(mode, pointSet, {
                ...options,
                ...(maxTemperature !== undefined ? { maxTemperature } : {}),
                spatialIndex: artifacts.spatialIndex(),
              });
        graphs.set(key, graph);
      }
      return graph;
    },
  };
  return artifacts;
}

export type Resolution = { ok: true; id: PointId } | { ok: false; failure: UnknownPointFailure };

/** Looks a name up, or builds the unknown-point failure with suggestions. */
export function resolveName(
  pointSet: PointSet,
  name: string,
  role: PointRole,
  suggestions: SuggestionProvider,
  limit: number,
): Resolution {
  const id = pointSet.idByName(name);
  if (id !== undefined) {
    return { ok: true, id };
  }
  return { ok: false, failure: unknownPoint(name, role, suggestions.suggest(name, limit)) };
}

function deriveHops(
  graph: RoutingGraph,
  steps: readonly PointId[],
  pointSet: PointSet,
  pipeline: ConstraintPipeline,
): RouteHop[] {
  const hops: RouteHop[] = [];
  for (let index = 1; index < steps.length; index += 1) {
    const from = steps[index - 1];
    const to = steps[index];
    const target = pointSet.get(to);
    const edge: RouteEdge | undefined = graph
      .edgesBetween(from, to)
      .find((candidate) => pipeline.firstRejection({ edge: candidate, target }) === null);
    if (!edge) {
      throw new GraphInvariantError(`planned hop ${from}->${to} has no admissible edge`);
    }
    hops.push({ from, to, kind: edge.kind, ...(edge.distance !== undefined ? { distance: edge.distance } : {}) });
  }
  return hops;
}

function describePlan(
  algorithm: RouteAlgorithm,
  graph: RoutingGraph,
  steps: PointId[],
  pointSet: PointSet,
  pipeline: ConstraintPipeline,
): RoutePlan {
  const hops = deriveHops(graph, steps, pointSet, pipeline);
  let totalDistance = 0;
  let unknownDistanceHops = 0;
  let gates = 0;
  for (const hop of hops) {
    if (hop.kind === "gate") {
      gates += 1;
    }
    if (hop.distance === undefined) {
      unknownDistanceHops += 1;
    } else {
      totalDistance += hop.distance;
    }
  }
  return {
    algorithm,
    graphMode: graph.mode,
    start: steps[0],
    goal: steps[steps.length - 1],
    steps,
    stepNames: steps.map((id) => pointSet.nameOf(id) ?? String(id)),
    hops,
    hopCount: hops.length,
    gates,
    jumps: hops.length - gates,
    totalDistance,
    unknownDistanceHops,
    warnings: [...graph.warnings, ...pipeline.warnings],
  };
}

/**
 * Plans a route between two named points. Request, name and constraint
 * problems are returned as failures before any search work; only broken
 * internal invariants throw.
 */
export function planRoute(pointSet: PointSet, rawRequest: unknown, dependencies: RouteDependencies = {}): RouteOutcome {
  const logger = dependencies.logger;
  const parsed = RouteRequestSchema.safeParse(rawRequest);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
    return invalidConstraint("malformed_request", `Invalid route request: ${issues.join("; ")}`, issues);
  }
  const request = parsed.data;
  const algorithm = request.algorithm ?? dependencies.defaultAlgorithm ?? DEFAULT_ROUTE_ALGORITHM;

  const suggestions = dependencies.suggestions ?? createLevenshteinSuggester(pointSet.names());
  const limit = dependencies.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;
  const start = resolveName(pointSet, request.start, "start", suggestions, limit);
  if (!start.ok) {
    return start.failure;
  }
  const goal = resolveName(pointSet, request.goal, "goal", suggestions, limit);
  if (!goal.ok) {
    return goal.failure;
  }
  const avoided = new Set<PointId>();
  for (const name of request.avoid) {
    const resolved = resolveName(pointSet, name, "avoid", suggestions, limit);
    if (!resolved.ok) {
      return resolved.failure;
    }
    avoided.add(resolved.id);
  }

  let loadout: ShipLoadout | undefined;
  if (request.avoidCriticalHeat && request.ship !== undefined) {
    loadout = dependencies.loadouts?.(request.ship);
    if (!loadout) {
      return invalidConstraint("unknown_ship", `Unknown ship '${request.ship}'`);
    }
  }

  const constraints: RouteConstraints = {
    avoided,
    avoidGates: request.avoidGates,
    avoidCriticalHeat: request.avoidCriticalHeat,
    ...(request.maxJump !== undefined ? { maxJump: request.maxJump } : {}),
    ...(request.maxTemperature !== undefined ? { maxTemperature: request.maxTemperature } : {}),
    ...(loadout ? { loadout } : {}),
    ...(dependencies.heatCalibration !== undefined ? { heatCalibration: dependencies.heatCalibration } : {}),
  };
  const violation = validateConstraints(constraints, start.id, goal.id);
  if (violation) {
    return invalidConstraint(violation.reason, violation.message);
  }

  const artifacts =
    dependencies.artifacts ?? createOnDemandArtifacts(pointSet, { ...dependencies.graphOptions, logger });
  const planner = selectPlanner(algorithm);
  const graphMode = resolveGraphMode(algorithm, request.avoidGates);
  const graph = artifacts.graph(graphMode, request.maxTemperature);
  const spatialIndex = planner.requiresSpatialIndex ? artifacts.spatialIndex() : undefined;
  const pipeline = compileConstraints(constraints, logger);

  const steps = planner.findPath(graph, spatialIndex, start.id, goal.id, { pointSet, constraints: pipeline, logger });
  if (!steps) {
    const limitingRule = pipeline.mostRestrictive();
    const hint = limitingRule
      ? pipeline.hintFor(limitingRule)
      : `the systems are not connected in the ${graphMode} graph`;
    logger?.info("route_not_found", { start: request.start, goal: request.goal, algorithm, graph_mode: graphMode, limiting_rule: limitingRule });
    return routeNotFound(
      {
        start: request.start,
        goal: request.goal,
        algorithm,
        graphMode,
        limitingRule,
        rejections: pipeline.rejectionCounts(),
      },
      hint,
    );
  }

  const plan = describePlan(algorithm, graph, steps, pointSet, pipeline);
  logger?.info("route_planned", {
    start: request.start,
    goal: request.goal,
    algorithm,
    graph_mode: graphMode,
    hops: plan.hopCount,
    total_distance: plan.totalDistance,
  });
  return { ok: true, plan };
}
