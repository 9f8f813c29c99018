import type { StructuredLogger } from "../logger.js";
import { toVector, type Position } from "../universe/geometry.js";
import type { PointId, PointSet } from "../universe/pointSet.js";
import {
  buildKdTree,
  kNearest,
  walkKdTree,
  withinRadius,
  type KdEntry,
  type KdNode,
  type Neighbour,
  type QueryStats,
  type TemperatureFilter,
} from "./kdTree.js";

/** Width of the stored coordinates. */
export type CoordinatePrecision = 32 | 64;

/** Format version written by this engine. */
export const SPATIAL_INDEX_FORMAT_VERSION = 2;

/** Pre-metadata layout, still readable. */
export const LEGACY_INDEX_FORMAT_VERSION = 1;

/** Provenance of the point-set an index was built from. */
export interface SourceMetadata {
  /** SHA-256 fingerprint of the source point-set (32 bytes). */
  readonly checksum: Uint8Array;
  readonly releaseTag: string | null;
  /** Unix seconds. */
  readonly buildTimestamp: number;
}

export interface SpatialIndexBuildOptions {
  readonly precision?: CoordinatePrecision;
  /** Attach source metadata (default true). */
  readonly includeMetadata?: boolean;
  /** Overrides the recorded build time, in Unix seconds. */
  readonly buildTimestamp?: number;
  readonly logger?: StructuredLogger;
}

/** Internal construction payload shared by the builder and the codec. */
export interface SpatialIndexParts {
  readonly root: KdNode | null;
  readonly precision: CoordinatePrecision;
  readonly metadata: SourceMetadata | null;
  readonly formatVersion: number;
}

/**
 * Immutable k-d tree over the positioned points of a point-set. Answers exact
 * nearest-neighbour and radius queries, optionally filtered on temperature,
 * and serves O(1) coordinate lookups for the A* heuristic.
 */
export class SpatialIndex {
  readonly root: KdNode | null;
  readonly precision: CoordinatePrecision;
  readonly sourceMetadata: SourceMetadata | null;
  readonly formatVersion: number;
  private readonly lookup: ReadonlyMap<PointId, KdNode>;

  constructor(parts: SpatialIndexParts) {
    this.root = parts.root;
    this.precision = parts.precision;
    this.sourceMetadata = parts.metadata
      ? Object.freeze({ ...parts.metadata, checksum: new Uint8Array(parts.metadata.checksum) })
      : null;
    this.formatVersion = parts.formatVersion;
    const lookup = new Map<PointId, KdNode>();
    walkKdTree(parts.root, (node) => {
      lookup.set(node.id, node);
    });
    this.lookup = lookup;
  }

  /** Indexes every positioned point of `pointSet`; unpositioned points are skipped. */
  static build(pointSet: PointSet, options: SpatialIndexBuildOptions = {}): SpatialIndex {
    const startedAt = Date.now();
    const precision = options.precision ?? 64;
    const entries: KdEntry[] = [];
    let skipped = 0;
    for (const point of pointSet.points()) {
      if (!point.position) {
        skipped += 1;
        continue;
      }
      const [x, y, z] = toVector(point.position);
      const coords =
        precision === 32 ? ([Math.fround(x), Math.fround(y), Math.fround(z)] as const) : ([x, y, z] as const);
      entries.push({
        id: point.id,
        coords,
        ...(point.temperature !== undefined ? { temperature: point.temperature } : {}),
      });
    }

    const metadata: SourceMetadata | null =
      options.includeMetadata === false
        ? null
        : {
            checksum: pointSet.checksum(),
            releaseTag: pointSet.releaseTag,
            buildTimestamp: options.buildTimestamp ?? Math.floor(startedAt / 1000),
          };

    const index = new SpatialIndex({
      root: buildKdTree(entries),
      precision,
      metadata,
      formatVersion: SPATIAL_INDEX_FORMAT_VERSION,
    });
    options.logger?.info("spatial_index_built", {
      points: index.size,
      skipped_without_coordinates: skipped,
      precision,
      duration_ms: Date.now() - startedAt,
    });
    return index;
  }

  get size(): number {
    return this.lookup.size;
  }

  get hasTemperature(): boolean {
    return this.root !== null && this.root.unknownTemperatures < this.root.size;
  }

  has(id: PointId): boolean {
    return this.lookup.has(id);
  }

  /** Indexed ids in tree pre-order. */
  ids(): PointId[] {
    return Array.from(this.lookup.keys());
  }

  position(id: PointId): Position | undefined {
    const node = this.lookup.get(id);
    if (!node) {
      return undefined;
    }
    return { x: node.coords[0], y: node.coords[1], z: node.coords[2] };
  }

  temperature(id: PointId): number | undefined {
    return this.lookup.get(id)?.temperature;
  }

  /** The `k` nearest indexed points, nearest first, ties by id. */
  nearest(point: Position, k: number): Neighbour[] {
    return kNearest(this.root, toVector(point), k);
  }

  /** Every indexed point within `radius` (inclusive), sorted by distance then id. */
  withinRadius(point: Position, radius: number): Neighbour[] {
    return withinRadius(this.root, toVector(point), radius);
  }

  nearestFiltered(point: Position, k: number, filter: TemperatureFilter, stats?: QueryStats): Neighbour[] {
    return kNearest(this.root, toVector(point), k, filter, stats);
  }

  withinRadiusFiltered(point: Position, radius: number, filter: TemperatureFilter, stats?: QueryStats): Neighbour[] {
    return withinRadius(this.root, toVector(point), radius, filter, stats);
  }
}
