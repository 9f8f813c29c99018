import { z } from "zod";

import { buildGateGraph } from "../graph/builders.js";
import type { StructuredLogger } from "../logger.js";
import type { Neighbour } from "../spatial/kdTree.js";
import { SpatialIndex } from "../spatial/spatialIndex.js";
import type { PointId, PointSet } from "../universe/pointSet.js";
import { createLevenshteinSuggester, type SuggestionProvider } from "../universe/suggestions.js";
import { invalidConstraint, type InvalidConstraintFailure, type UnknownPointFailure } from "./errors.js";
import { DEFAULT_SUGGESTION_LIMIT, resolveName, type RoutingArtifacts } from "./orchestrator.js";

/** Rows returned by a range scout when the query names no limit. */
export const DEFAULT_SCOUT_LIMIT = 10;
export const MAX_SCOUT_LIMIT = 100;

export const ScoutRangeOptionsSchema = z
  .object({
    radius: z.number().finite().positive("radius must be positive").optional(),
    limit: z.number().int().min(1).max(MAX_SCOUT_LIMIT).default(DEFAULT_SCOUT_LIMIT),
    maxTemperature: z.number().positive("maxTemperature must be positive").optional(),
  })
  .strict();

export type ScoutRangeOptions = z.input<typeof ScoutRangeOptionsSchema>;

export interface GateNeighbour {
  readonly id: PointId;
  readonly name: string;
  /** Absent when the gate has no known length. */
  readonly distance?: number;
}

export interface GateScout {
  readonly system: string;
  readonly systemId: PointId;
  readonly count: number;
  readonly neighbours: GateNeighbour[];
}

export interface RangeNeighbour {
  readonly id: PointId;
  readonly name: string;
  readonly distance: number;
  readonly temperature?: number;
}

export interface RangeScout {
  readonly system: string;
  readonly systemId: PointId;
  readonly count: number;
  readonly radius?: number;
  readonly maxTemperature?: number;
  readonly neighbours: RangeNeighbour[];
}

export type ScoutFailure = UnknownPointFailure | InvalidConstraintFailure;

export type ScoutOutcome<T> = { readonly ok: true; readonly scout: T } | ScoutFailure;

export interface ScoutDependencies {
  readonly artifacts?: RoutingArtifacts;
  readonly suggestions?: SuggestionProvider;
  readonly suggestionLimit?: number;
  readonly logger?: StructuredLogger;
}

function resolveOrigin(pointSet: PointSet, name: string, dependencies: ScoutDependencies) {
  const suggestions = dependencies.suggestions ?? createLevenshteinSuggester(pointSet.names());
  return resolveName(pointSet, name, "origin", suggestions, dependencies.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT);
}

/** Systems one gate away from `name`, nearest first. */
export function scoutGates(
  pointSet: PointSet,
  name: string,
  dependencies: ScoutDependencies = {},
): ScoutOutcome<GateScout> {
  const origin = resolveOrigin(pointSet, name, dependencies);
  if (!origin.ok) {
    return origin.failure;
  }
  const graph = dependencies.artifacts?.graph("gate") ?? buildGateGraph(pointSet, { logger: dependencies.logger });
  const neighbours = graph.neighbours(origin.id).map((edge): GateNeighbour => ({
    id: edge.to,
    name: pointSet.nameOf(edge.to) ?? String(edge.to),
    ...(edge.distance !== undefined ? { distance: edge.distance } : {}),
  }));
  const system = pointSet.nameOf(origin.id) ?? name;
  dependencies.logger?.info("scout_gates", { system, count: neighbours.length });
  return { ok: true, scout: { system, systemId: origin.id, count: neighbours.length, neighbours } };
}

/**
 * Positioned systems around `name` by straight-line distance, optionally
 * bounded by a radius and a temperature cap. Systems without a known
 * temperature pass the cap.
 */
export function scoutRange(
  pointSet: PointSet,
  name: string,
  rawOptions: unknown = {},
  dependencies: ScoutDependencies = {},
): ScoutOutcome<RangeScout> {
  const parsed = ScoutRangeOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
    return invalidConstraint("malformed_scout", `Invalid scout query: ${issues.join("; ")}`, issues);
  }
  const options = parsed.data;

  const origin = resolveOrigin(pointSet, name, dependencies);
  if (!origin.ok) {
    return origin.failure;
  }
  const system = pointSet.nameOf(origin.id) ?? name;
  const position = pointSet.get(origin.id)?.position;
  if (!position) {
    return invalidConstraint("origin_without_coordinates", `System '${system}' has no spatial coordinates`);
  }

  const index = dependencies.artifacts?.spatialIndex() ?? SpatialIndex.build(pointSet, { logger: dependencies.logger });
  // The origin is its own nearest neighbour.
  const k = options.limit + 1;
  const filter = options.maxTemperature === undefined ? undefined : { maxTemperature: options.maxTemperature };
  let found: Neighbour[];
  if (options.radius === undefined) {
    found = filter ? index.nearestFiltered(position, k, filter) : index.nearest(position, k);
  } else {
    const inRange = filter
      ? index.withinRadiusFiltered(position, options.radius, filter)
      : index.withinRadius(position, options.radius);
    found = inRange.slice(0, k);
  }

  const neighbours = found
    .filter((neighbour) => neighbour.id !== origin.id)
    .slice(0, options.limit)
    .map((neighbour): RangeNeighbour => {
      const temperature = index.temperature(neighbour.id);
      return {
        id: neighbour.id,
        name: pointSet.nameOf(neighbour.id) ?? String(neighbour.id),
        distance: neighbour.distance,
        ...(temperature !== undefined ? { temperature } : {}),
      };
    });

  dependencies.logger?.info("scout_range", {
    system,
    count: neighbours.length,
    radius: options.radius ?? null,
    max_temperature: options.maxTemperature ?? null,
  });
  return {
    ok: true,
    scout: {
      system,
      systemId: origin.id,
      count: neighbours.length,
      ...(options.radius !== undefined ? { radius: options.radius } : {}),
      ...(options.maxTemperature !== undefined ? { maxTemperature: options.maxTemperature } : {}),
      neighbours,
    },
  };
}
