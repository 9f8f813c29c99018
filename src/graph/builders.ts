import type { StructuredLogger } from "../logger.js";
import { createQueryStats, type Neighbour, type QueryStats, type TemperatureFilter } from "../spatial/kdTree.js";
import { SpatialIndex } from "../spatial/spatialIndex.js";
import { distanceBetween, type Position } from "../universe/geometry.js";
import type { PointId, PointSet } from "../universe/pointSet.js";
import { compareEdges, RoutingGraph, type GraphMode, type RouteEdge } from "./model.js";

/** Neighbourhood size used when connecting points by spatial jumps. */
export const MAX_SPATIAL_NEIGHBORS = 12;

export interface GraphBuildOptions {
  /** Index reused for spatial neighbourhoods; built on the spot when absent. */
  readonly spatialIndex?: SpatialIndex;
  readonly maxSpatialNeighbors?: number;
  /** Upper bound on the length of generated spatial edges. */
  readonly maxJump?: number;
  /**
   * Hottest neighbour a point may spend one of its spatial slots on. Points
   * without a known temperature always qualify.
   */
  readonly maxTemperature?: number;
  readonly logger?: StructuredLogger;
}

function pairKey(from: PointId, to: PointId): string {
  return `${from}>${to}`;
}

function gateEdges(pointSet: PointSet, warnings: string[], logger: StructuredLogger | undefined): RouteEdge[] {
  const skip = (reason: string, link: { from: PointId; to: PointId }): void => {
    warnings.push(`gate ${link.from}-${link.to} skipped: ${reason}`);
    logger?.warn("graph_gate_skipped", { from: link.from, to: link.to, reason });
  };
  const edges: RouteEdge[] = [];
  const seen = new Set<string>();
  for (const link of pointSet.gates()) {
    const from = pointSet.get(link.from);
    const to = pointSet.get(link.to);
    if (!from || !to) {
      const missing = from ? link.to : link.from;
      skip(`unknown point ${missing}`, link);
      continue;
    }
    if (from.id === to.id) {
      skip("self loop", link);
      continue;
    }
    if (seen.has(pairKey(from.id, to.id))) {
      continue;
    }
    const distance = from.position && to.position ? distanceBetween(from.position, to.position) : link.distance;
    for (const [source, target] of [
      [from.id, to.id],
      [to.id, from.id],
    ] as const) {
      seen.add(pairKey(source, target));
      edges.push({ from: source, to: target, kind: "gate", ...(distance !== undefined ? { distance } : {}) });
    }
  }
  return edges;
}

function neighbourhood(
  index: SpatialIndex,
  position: Position,
  count: number,
  maxJump: number | undefined,
  filter: TemperatureFilter | undefined,
  stats: QueryStats,
): Neighbour[] {
  if (maxJump === undefined) {
    return filter ? index.nearestFiltered(position, count, filter, stats) : index.nearest(position, count);
  }
  const inRange = filter
    ? index.withinRadiusFiltered(position, maxJump, filter, stats)
    : index.withinRadius(position, maxJump);
  return inRange.slice(0, count);
}

function spatialEdges(pointSet: PointSet, options: GraphBuildOptions, warnings: string[]): RouteEdge[] {
  const index = options.spatialIndex ?? SpatialIndex.build(pointSet, { includeMetadata: false, logger: options.logger });
  const k = Math.max(0, Math.floor(options.maxSpatialNeighbors ?? MAX_SPATIAL_NEIGHBORS));
  const maxJump = options.maxJump;
  const filter: TemperatureFilter | undefined =
    options.maxTemperature === undefined ? undefined : { maxTemperature: options.maxTemperature, includeUnknown: true };
  const stats = createQueryStats();

  const unpositioned: PointId[] = [];
  const linked = new Set<string>();
  const edges: RouteEdge[] = [];
  const add = (from: PointId, to: PointId, distance: number): void => {
    const key = pairKey(from, to);
    if (linked.has(key)) {
      return;
    }
    linked.add(key);
    edges.push({ from, to, kind: "spatial", distance });
  };

  for (const point of pointSet.points()) {
    const position = point.position;
    if (!position) {
      unpositioned.push(point.id);
      continue;
    }
    // One extra neighbour since the point finds itself first.
    const candidates = neighbourhood(index, position, k + 1, maxJump, filter, stats);
    let taken = 0;
    for (const neighbour of candidates) {
      if (neighbour.id === point.id || !pointSet.has(neighbour.id) || neighbour.distance <= 0) {
        continue;
      }
      if (taken >= k) {
        break;
      }
      taken += 1;
      add(point.id, neighbour.id, neighbour.distance);
      add(neighbour.id, point.id, neighbour.distance);
    }
  }

  if (filter) {
    options.logger?.debug("graph_temperature_filter", {
      max_temperature: filter.maxTemperature,
      visited_nodes: stats.visitedNodes,
      pruned_subtrees: stats.prunedSubtrees,
      accepted_subtrees: stats.acceptedSubtrees,
    });
  }
  if (unpositioned.length > 0) {
    warnings.push(`${unpositioned.length} point(s) without coordinates have no spatial edges`);
    options.logger?.warn("graph_points_without_coordinates", {
      count: unpositioned.length,
      sample: unpositioned.slice(0, 10),
    });
  }
  return edges;
}

function assemble(
  mode: GraphMode,
  pointSet: PointSet,
  edges: RouteEdge[],
  warnings: string[],
  logger: StructuredLogger | undefined,
): RoutingGraph {
  const ordered = mode === "gate" ? edges : [...edges].sort(compareEdges);
  const graph = new RoutingGraph(mode, pointSet.ids(), ordered, warnings);
  logger?.info("graph_built", { mode, nodes: graph.nodeCount, edges: graph.edgeCount, warnings: warnings.length });
  return graph;
}

/** Gate links only, in relation order; both directions per link. */
export function buildGateGraph(pointSet: PointSet, options: Pick<GraphBuildOptions, "logger"> = {}): RoutingGraph {
  const warnings: string[] = [];
  return assemble("gate", pointSet, gateEdges(pointSet, warnings, options.logger), warnings, options.logger);
}

/** k-nearest spatial jumps between positioned points, symmetrised. */
export function buildSpatialGraph(pointSet: PointSet, options: GraphBuildOptions = {}): RoutingGraph {
  const warnings: string[] = [];
  return assemble("spatial", pointSet, spatialEdges(pointSet, options, warnings), warnings, options.logger);
}

/** Union of gate and spatial edges; a pair joined by both keeps both. */
export function buildHybridGraph(pointSet: PointSet, options: GraphBuildOptions = {}): RoutingGraph {
  const warnings: string[] = [];
  const edges = [...gateEdges(pointSet, warnings, options.logger), ...spatialEdges(pointSet, options, warnings)];
  return assemble("hybrid", pointSet, edges, warnings, options.logger);
}

/** Dispatches on the graph mode. */
export function buildGraph(mode: GraphMode, pointSet: PointSet, options: GraphBuildOptions = {}): RoutingGraph {
  switch (mode) {
    case "gate":
      return buildGateGraph(pointSet, options);
    case "spatial":
      return buildSpatialGraph(pointSet, options);
    case "hybrid":
      return buildHybridGraph(pointSet, options);
  }
}
