import type { StructuredLogger } from "../logger.js";
import type { GraphMode, RoutingGraph } from "../graph/model.js";
import type { SpatialIndex } from "../spatial/spatialIndex.js";
import { distanceBetween, type Position } from "../universe/geometry.js";
import type { PointId, PointSet } from "../universe/pointSet.js";
import { GraphInvariantError } from "../types.js";
import type { ConstraintPipeline } from "./constraints.js";
import { MinHeap } from "./minHeap.js";

export const ROUTE_ALGORITHMS = ["bfs", "dijkstra", "a-star"] as const;

export type RouteAlgorithm = (typeof ROUTE_ALGORITHMS)[number];

/** Everything a planner consults besides the graph. */
export interface PlannerContext {
  readonly pointSet: PointSet;
  readonly constraints: ConstraintPipeline;
  readonly logger?: StructuredLogger;
}

export interface PathPlanner {
  readonly algorithm: RouteAlgorithm;
  /** Graph the planner runs on unless gates are excluded. */
  readonly graphMode: GraphMode;
  readonly requiresSpatialIndex: boolean;
  /** Ordered ids from start to goal inclusive, or `null` when unreachable. */
  findPath(
    graph: RoutingGraph,
    spatialIndex: SpatialIndex | undefined,
    start: PointId,
    goal: PointId,
    context: PlannerContext,
  ): PointId[] | null;
}

function reconstruct(parents: ReadonlyMap<PointId, PointId>, start: PointId, goal: PointId): PointId[] {
  const path: PointId[] = [goal];
  let current = goal;
  while (current !== start) {
    const parent = parents.get(current);
    if (parent === undefined || path.length > parents.size + 1) {
      throw new GraphInvariantError(`broken predecessor chain at point ${current}`);
    }
    path.push(parent);
    current = parent;
  }
  return path.reverse();
}

/** Fewest hops; tolerates edges without a distance. */
export const bfsPlanner: PathPlanner = {
  algorithm: "bfs",
  graphMode: "gate",
  requiresSpatialIndex: false,
  findPath(graph, _spatialIndex, start, goal, context) {
    if (!graph.hasNode(start) || !graph.hasNode(goal)) {
      return null;
    }
    if (start === goal) {
      return [start];
    }
    const parents = new Map<PointId, PointId>();
    const visited = new Set<PointId>([start]);
    const queue: PointId[] = [start];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const edge of graph.neighbours(current)) {
        if (visited.has(edge.to) || !context.constraints.allows(edge, context.pointSet.get(edge.to))) {
          continue;
        }
        visited.add(edge.to);
        parents.set(edge.to, current);
        if (edge.to === goal) {
          return reconstruct(parents, start, goal);
        }
        queue.push(edge.to);
      }
    }
    return null;
  },
};

type Heuristic = (id: PointId) => number;

/**
 * Shared best-first search. Each node is finalized once; edges without a
 * distance are skipped and counted.
 */
function bestFirst(
  graph: RoutingGraph,
  start: PointId,
  goal: PointId,
  context: PlannerContext,
  heuristic: Heuristic,
  algorithm: RouteAlgorithm,
): PointId[] | null {
  if (!graph.hasNode(start) || !graph.hasNode(goal)) {
    return null;
  }
  if (start === goal) {
    return [start];
  }
  const best = new Map<PointId, number>([[start, 0]]);
  const parents = new Map<PointId, PointId>();
  const finalized = new Set<PointId>();
  const frontier = new MinHeap<PointId>();
  frontier.push(start, heuristic(start));
  let withoutDistance = 0;
  let found = false;

  while (!frontier.isEmpty()) {
    const entry = frontier.pop();
    if (!entry) {
      break;
    }
    const current = entry.value;
    if (finalized.has(current)) {
      continue;
    }
    finalized.add(current);
    if (current === goal) {
      found = true;
      break;
    }
    const base = best.get(current);
    if (base === undefined) {
      throw new GraphInvariantError(`point ${current} was queued without a distance`);
    }
    for (const edge of graph.neighbours(current)) {
      if (finalized.has(edge.to)) {
        continue;
      }
      if (edge.distance === undefined) {
        withoutDistance += 1;
        continue;
      }
      if (!context.constraints.allows(edge, context.pointSet.get(edge.to))) {
        continue;
      }
      const tentative = base + edge.distance;
      if (tentative < (best.get(edge.to) ?? Number.POSITIVE_INFINITY)) {
        best.set(edge.to, tentative);
        parents.set(edge.to, current);
        frontier.push(edge.to, tentative + heuristic(edge.to));
      }
    }
  }

  if (withoutDistance > 0) {
    context.logger?.debug("planner_edges_without_distance", { algorithm, skipped: withoutDistance });
  }
  return found ? reconstruct(parents, start, goal) : null;
}

/** Shortest total distance. */
export const dijkstraPlanner: PathPlanner = {
  algorithm: "dijkstra",
  graphMode: "hybrid",
  requiresSpatialIndex: false,
  findPath(graph, _spatialIndex, start, goal, context) {
    return bestFirst(graph, start, goal, context, () => 0, "dijkstra");
  },
};

/** Dijkstra guided by the straight-line distance to the goal. */
export const aStarPlanner: PathPlanner = {
  algorithm: "a-star",
  graphMode: "hybrid",
  requiresSpatialIndex: true,
  findPath(graph, spatialIndex, start, goal, context) {
    const locate = (id: PointId): Position | undefined =>
      spatialIndex ? spatialIndex.position(id) : context.pointSet.get(id)?.position;
    const target = locate(goal);
    const heuristic: Heuristic = (id) => {
      const position = locate(id);
      return target && position ? distanceBetween(position, target) : 0;
    };
    return bestFirst(graph, start, goal, context, heuristic, "a-star");
  },
};

export function selectPlanner(algorithm: RouteAlgorithm): PathPlanner {
  switch (algorithm) {
    case "bfs":
      return bfsPlanner;
    case "dijkstra":
      return dijkstraPlanner;
    case "a-star":
      return aStarPlanner;
    default: {
      const exhaustive: never = algorithm;
      throw new GraphInvariantError(`unknown routing algorithm ${String(exhaustive)}`);
    }
  }
}

/** Graph a request runs on; excluding gates forces the spatial graph. */
export function resolveGraphMode(algorithm: RouteAlgorithm, avoidGates: boolean): GraphMode {
  return avoidGates ? "spatial" : selectPlanner(algorithm).graphMode;
}
