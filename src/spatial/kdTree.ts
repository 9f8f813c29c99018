import { squaredDistance, type Vector3 } from "../universe/geometry.js";
import type { PointId } from "../universe/pointSet.js";

/** Split axis: 0 = x, 1 = y, 2 = z. */
export type Axis = 0 | 1 | 2;

/** Point payload stored in the tree. */
export interface KdEntry {
  readonly id: PointId;
  readonly coords: Vector3;
  readonly temperature?: number;
}

/**
 * Tree node. Temperature aggregates cover the whole subtree rooted here and
 * drive the pruning performed by filtered queries.
 */
export interface KdNode extends KdEntry {
  readonly axis: Axis;
  readonly left: KdNode | null;
  readonly right: KdNode | null;
  /** Number of entries in the subtree (this node included). */
  readonly size: number;
  /** Smallest known temperature in the subtree, `+Infinity` when none is known. */
  readonly minTemperature: number;
  /** Largest known temperature in the subtree, `-Infinity` when none is known. */
  readonly maxTemperature: number;
  /** Entries of the subtree without a temperature. */
  readonly unknownTemperatures: number;
}

/** Result row of every query. */
export interface Neighbour {
  readonly id: PointId;
  readonly distance: number;
}

/**
 * Scalar filter on the stored temperature: entries hotter than
 * `maxTemperature` are rejected. Entries without a temperature pass unless
 * `includeUnknown` is false.
 */
export interface TemperatureFilter {
  readonly maxTemperature: number;
  readonly includeUnknown?: boolean;
}

/** Counters filled by filtered queries when the caller passes a stats object. */
export interface QueryStats {
  visitedNodes: number;
  temperatureChecks: number;
  prunedSubtrees: number;
  acceptedSubtrees: number;
}

export function createQueryStats(): QueryStats {
  return { visitedNodes: 0, temperatureChecks: 0, prunedSubtrees: 0, acceptedSubtrees: 0 };
}

/** Assembles a node and derives its subtree aggregates from the children. */
export function createKdNode(entry: KdEntry, axis: Axis, left: KdNode | null, right: KdNode | null): KdNode {
  let size = 1;
  let minTemperature = entry.temperature ?? Number.POSITIVE_INFINITY;
  let maxTemperature = entry.temperature ?? Number.NEGATIVE_INFINITY;
  let unknownTemperatures = entry.temperature === undefined ? 1 : 0;
  for (const child of [left, right]) {
    if (!child) {
      continue;
    }
    size += child.size;
    minTemperature = Math.min(minTemperature, child.minTemperature);
    maxTemperature = Math.max(maxTemperature, child.maxTemperature);
    unknownTemperatures += child.unknownTemperatures;
  }

  const node: KdNode = {
    id: entry.id,
    coords: entry.coords,
    axis,
    left,
    right,
    size,
    minTemperature,
    maxTemperature,
    unknownTemperatures,
    ...(entry.temperature !== undefined ? { temperature: entry.temperature } : {}),
  };
  return Object.freeze(node);
}

function compareOnAxis(left: KdEntry, right: KdEntry, axis: Axis): number {
  return left.coords[axis] - right.coords[axis] || left.id - right.id;
}

function swap(entries: KdEntry[], left: number, right: number): void {
  const held = entries[left];
  entries[left] = entries[right];
  entries[right] = held;
}

function partition(entries: KdEntry[], lo: number, hi: number, pivotIndex: number, axis: Axis): number {
  const pivot = entries[pivotIndex];
  swap(entries, pivotIndex, hi);
  let store = lo;
  for (let index = lo; index < hi; index += 1) {
    if (compareOnAxis(entries[index], pivot, axis) < 0) {
      swap(entries, store, index);
      store += 1;
    }
  }
  swap(entries, hi, store);
  return store;
}

/** Quickselect: places the k-th entry (by axis, then id) at index `k` within `[lo, hi]`. */
function select(entries: KdEntry[], lo: number, hi: number, k: number, axis: Axis): void {
  let low = lo;
  let high = hi;
  while (high > low) {
    const pivotIndex = partition(entries, low, high, (low + high) >>> 1, axis);
    if (pivotIndex === k) {
      return;
    }
    if (k < pivotIndex) {
      high = pivotIndex - 1;
    } else {
      low = pivotIndex + 1;
    }
  }
}

function axisForDepth(depth: number): Axis {
  const axis = depth % 3;
  return axis === 0 ? 0 : axis === 1 ? 1 : 2;
}

function buildRange(entries: KdEntry[], lo: number, hi: number, depth: number): KdNode | null {
  if (lo > hi) {
    return null;
  }
  const axis = axisForDepth(depth);
  const median = lo + ((hi - lo) >>> 1);
  select(entries, lo, hi, median, axis);
  const left = buildRange(entries, lo, median - 1, depth + 1);
  const right = buildRange(entries, median + 1, hi, depth + 1);
  return createKdNode(entries[median], axis, left, right);
}

/**
 * Builds a balanced tree by recursive median split, alternating x, y and z per
 * depth. The input array is left untouched.
 */
export function buildKdTree(entries: readonly KdEntry[]): KdNode | null {
  const working = [...entries];
  return buildRange(working, 0, working.length - 1, 0);
}

/** Depth-first pre-order walk. */
export function walkKdTree(root: KdNode | null, visit: (node: KdNode) => void): void {
  const stack: KdNode[] = root ? [root] : [];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    visit(node);
    if (node.right) {
      stack.push(node.right);
    }
    if (node.left) {
      stack.push(node.left);
    }
  }
}

type FilterMode = "none" | "check" | "accept";

function classifySubtree(node: KdNode, filter: TemperatureFilter): "accept" | "reject" | "check" {
  const unknownPass = filter.includeUnknown ?? true;
  const hasKnown = node.size > node.unknownTemperatures;
  const hasUnknown = node.unknownTemperatures > 0;
  const knownAllPass = !hasKnown || node.maxTemperature <= filter.maxTemperature;
  const knownAllFail = !hasKnown || node.minTemperature > filter.maxTemperature;
  if (knownAllPass && (!hasUnknown || unknownPass)) {
    return "accept";
  }
  if (knownAllFail && (!hasUnknown || !unknownPass)) {
    return "reject";
  }
  return "check";
}

function passesFilter(entry: KdEntry, filter: TemperatureFilter): boolean {
  if (entry.temperature === undefined) {
    return filter.includeUnknown ?? true;
  }
  return entry.temperature <= filter.maxTemperature;
}

/**
 * Resolves the filter mode for a subtree: a subtree whose aggregates prove
 * every entry passes is accepted wholesale, one where every entry fails is
 * skipped (`null`).
 */
function enterSubtree(
  node: KdNode,
  mode: FilterMode,
  filter: TemperatureFilter | undefined,
  stats: QueryStats | undefined,
): FilterMode | null {
  if (mode !== "check" || !filter) {
    return mode;
  }
  const verdict = classifySubtree(node, filter);
  if (verdict === "reject") {
    if (stats) stats.prunedSubtrees += 1;
    return null;
  }
  if (verdict === "accept") {
    if (stats) stats.acceptedSubtrees += 1;
    return "accept";
  }
  return "check";
}

function admits(
  node: KdNode,
  mode: FilterMode,
  filter: TemperatureFilter | undefined,
  stats: QueryStats | undefined,
): boolean {
  if (stats) stats.visitedNodes += 1;
  if (mode !== "check" || !filter) {
    return true;
  }
  if (stats) stats.temperatureChecks += 1;
  return passesFilter(node, filter);
}

interface Candidate {
  readonly id: PointId;
  readonly squared: number;
}

function candidateBefore(left: Candidate, right: Candidate): boolean {
  return left.squared < right.squared || (left.squared === right.squared && left.id < right.id);
}

/** Sorted list capped at `capacity`, ordered by squared distance then id. */
class BoundedCandidates {
  readonly items: Candidate[] = [];

  constructor(private readonly capacity: number) {}

  get full(): boolean {
    return this.items.length >= this.capacity;
  }

  /** Squared distance of the current worst kept candidate. */
  get worst(): number {
    const last = this.items[this.items.length - 1];
    return this.full && last ? last.squared : Number.POSITIVE_INFINITY;
  }

  offer(candidate: Candidate): void {
    const last = this.items[this.items.length - 1];
    if (this.full && last && !candidateBefore(candidate, last)) {
      return;
    }
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (candidateBefore(this.items[middle], candidate)) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    this.items.splice(low, 0, candidate);
    if (this.items.length > this.capacity) {
      this.items.pop();
    }
  }
}

function toNeighbours(candidates: readonly Candidate[]): Neighbour[] {
  return candidates.map((candidate) => ({ id: candidate.id, distance: Math.sqrt(candidate.squared) }));
}

/**
 * Exact k-nearest search, nearest first with ties broken by id. Far branches
 * are visited whenever the splitting plane is not farther than the current
 * worst candidate, so equidistant entries are never missed.
 */
export function kNearest(
  root: KdNode | null,
  target: Vector3,
  k: number,
  filter?: TemperatureFilter,
  stats?: QueryStats,
): Neighbour[] {
  if (!root || k <= 0) {
    return [];
  }
  const best = new BoundedCandidates(Math.floor(k));

  const search = (node: KdNode, inherited: FilterMode): void => {
    const mode = enterSubtree(node, inherited, filter, stats);
    if (mode === null) {
      return;
    }
    if (admits(node, mode, filter, stats)) {
      best.offer({ id: node.id, squared: squaredDistance(target, node.coords) });
    }
    const delta = target[node.axis] - node.coords[node.axis];
    const near = delta < 0 ? node.left : node.right;
    const far = delta < 0 ? node.right : node.left;
    if (near) {
      search(near, mode);
    }
    if (far && delta * delta <= best.worst) {
      search(far, mode);
    }
  };

  search(root, filter ? "check" : "none");
  return toNeighbours(best.items);
}

/** Every entry within `radius` (inclusive), sorted by distance then id. */
export function withinRadius(
  root: KdNode | null,
  target: Vector3,
  radius: number,
  filter?: TemperatureFilter,
  stats?: QueryStats,
): Neighbour[] {
  if (!root || !(radius >= 0)) {
    return [];
  }
  const limit = radius * radius;
  const found: Candidate[] = [];

  const search = (node: KdNode, inherited: FilterMode): void => {
    const mode = enterSubtree(node, inherited, filter, stats);
    if (mode === null) {
      return;
    }
    const squared = squaredDistance(target, node.coords);
    if (admits(node, mode, filter, stats) && squared <= limit) {
      found.push({ id: node.id, squared });
    }
    const delta = target[node.axis] - node.coords[node.axis];
    const near = delta < 0 ? node.left : node.right;
    const far = delta < 0 ? node.right : node.left;
    if (near) {
      search(near, mode);
    }
    if (far && delta * delta <= limit) {
      search(far, mode);
    }
  };

  search(root, filter ? "check" : "none");
  found.sort((left, right) => left.squared - right.squared || left.id - right.id);
  return toNeighbours(found);
}
