import type { PointId } from "../universe/pointSet.js";

/** Routing graph variants produced by the builders. */
export type GraphMode = "gate" | "spatial" | "hybrid";

/** Classification of a traversable link. */
export type EdgeKind = "gate" | "spatial";

export interface RouteEdge {
  readonly from: PointId;
  readonly to: PointId;
  readonly kind: EdgeKind;
  /** Positive length in light-years; absent for gates between unpositioned points. */
  readonly distance?: number;
}

/** Edge ordering used by every adjacency list: distance (unknown last), kind, target. */
export function compareEdges(left: RouteEdge, right: RouteEdge): number {
  const leftDistance = left.distance ?? Number.POSITIVE_INFINITY;
  const rightDistance = right.distance ?? Number.POSITIVE_INFINITY;
  if (leftDistance !== rightDistance) {
    return leftDistance < rightDistance ? -1 : 1;
  }
  if (left.kind !== right.kind) {
    return left.kind === "gate" ? -1 : 1;
  }
  return left.to - right.to;
}

/**
 * Immutable traversal structure. Every node of the source point-set is present
 * (possibly with an empty adjacency list) so planners never have to special
 * case isolated points.
 */
export class RoutingGraph {
  private readonly adjacency: ReadonlyMap<PointId, readonly RouteEdge[]>;
  readonly warnings: readonly string[];

  constructor(
    readonly mode: GraphMode,
    nodes: Iterable<PointId>,
    edges: Iterable<RouteEdge>,
    warnings: readonly string[] = [],
  ) {
    const adjacency = new Map<PointId, RouteEdge[]>();
    for (const node of nodes) {
      adjacency.set(node, []);
    }
    for (const edge of edges) {
      let list = adjacency.get(edge.from);
      if (!list) {
        list = [];
        adjacency.set(edge.from, list);
      }
      list.push(Object.freeze({ ...edge }));
    }
    const frozen = new Map<PointId, readonly RouteEdge[]>();
    for (const [node, list] of adjacency) {
      frozen.set(node, Object.freeze(list));
    }
    this.adjacency = frozen;
    this.warnings = Object.freeze([...warnings]);
  }

  hasNode(id: PointId): boolean {
    return this.adjacency.has(id);
  }

  /** Outgoing edges in adjacency order. */
  neighbours(id: PointId): readonly RouteEdge[] {
    return this.adjacency.get(id) ?? [];
  }

  nodeIds(): PointId[] {
    return Array.from(this.adjacency.keys());
  }

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const list of this.adjacency.values()) {
      count += list.length;
    }
    return count;
  }

  listEdges(): RouteEdge[] {
    const edges: RouteEdge[] = [];
    for (const list of this.adjacency.values()) {
      edges.push(...list);
    }
    return edges;
  }

  /** Every edge from `from` to `to`, in adjacency order (a hybrid pair may hold both kinds). */
  edgesBetween(from: PointId, to: PointId): RouteEdge[] {
    return this.neighbours(from).filter((edge) => edge.to === to);
  }
}
