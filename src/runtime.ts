import { buildGraph, type GraphBuildOptions } from "./graph/builders.js";
import type { GraphMode, RoutingGraph } from "./graph/model.js";
import type { StructuredLogger } from "./logger.js";
import {
  DEFAULT_SUGGESTION_LIMIT,
  graphCacheKey,
  planRoute,
  type RouteOutcome,
  type RoutingArtifacts,
} from "./routing/orchestrator.js";
import type { LoadoutProvider } from "./routing/heat.js";
import {
  scoutGates,
  scoutRange,
  type GateScout,
  type RangeScout,
  type ScoutDependencies,
  type ScoutOutcome,
} from "./routing/scout.js";
import type { RouteAlgorithm } from "./routing/planners.js";
import { deserializeSpatialIndex, serializeSpatialIndex } from "./spatial/codec.js";
import { SpatialIndexError } from "./spatial/errors.js";
import { checkIndexFreshness, type IndexFreshness } from "./spatial/freshness.js";
import { SpatialIndex, type CoordinatePrecision } from "./spatial/spatialIndex.js";
import type { PointSet } from "./universe/pointSet.js";
import { createLevenshteinSuggester, type SuggestionProvider } from "./universe/suggestions.js";
import { ERROR_CODES } from "./types.js";

export interface RoutingRuntimeOptions {
  readonly graph?: Omit<GraphBuildOptions, "spatialIndex" | "logger" | "maxTemperature">;
  readonly precision?: CoordinatePrecision;
  readonly compressionLevel?: number;
  /**
   * Keep an index that carries no source metadata (a version 1 file, or a
   * current one written without it) instead of rebuilding.
   */
  readonly acceptLegacyIndex?: boolean;
  readonly suggestions?: SuggestionProvider;
  readonly suggestionLimit?: number;
  readonly loadouts?: LoadoutProvider;
  readonly heatCalibration?: number;
  readonly defaultAlgorithm?: RouteAlgorithm;
  readonly logger?: StructuredLogger;
}

/** Why a serialized index was not used. */
export type IndexRejection = "missing" | "malformed" | "unsupported_version" | "corrupt" | "stale" | "legacy_format" | "unverifiable";

/** How the runtime obtained its spatial index. */
export type IndexOrigin =
  | { readonly source: "built" }
  | { readonly source: "loaded"; readonly freshness: IndexFreshness }
  | { readonly source: "rebuilt"; readonly reason: IndexRejection; readonly detail?: string };

function rejectionFor(error: SpatialIndexError): IndexRejection {
  switch (error.code) {
    case ERROR_CODES.INDEX_MALFORMED:
      return "malformed";
    case ERROR_CODES.INDEX_UNSUPPORTED_VERSION:
      return "unsupported_version";
    case ERROR_CODES.INDEX_CORRUPT:
      return "corrupt";
  }
}

/**
 * Host-owned bundle of a point-set and its derived artifacts. Graphs and the
 * spatial index are built at most once per handle and shared by every request
 * planned through it.
 */
export class RoutingRuntime implements RoutingArtifacts {
  private readonly graphs = new Map<string, RoutingGraph>();
  private index: SpatialIndex | null;
  private readonly origin: IndexOrigin;
  private readonly suggestions: SuggestionProvider;

  private constructor(
    readonly pointSet: PointSet,
    private readonly options: RoutingRuntimeOptions,
    index: SpatialIndex | null,
    origin: IndexOrigin,
  ) {
    this.index = index;
    this.origin = origin;
    this.suggestions = options.suggestions ?? createLevenshteinSuggester(pointSet.names());
  }

  /** Runtime that builds every artifact on first use. */
  static create(pointSet: PointSet, options: RoutingRuntimeOptions = {}): RoutingRuntime {
    return new RoutingRuntime(pointSet, options, null, { source: "built" });
  }

  /**
   * Reuses a cached index when it decodes cleanly and matches the point-set.
   * Any other outcome falls back to rebuilding; the reason is kept in
   * {@link indexOrigin}.
   */
  static fromSerializedIndex(
    pointSet: PointSet,
    bytes: Uint8Array | null | undefined,
    options: RoutingRuntimeOptions = {},
  ): RoutingRuntime {
    const logger = options.logger;
    const rebuild = (reason: IndexRejection, detail?: string): RoutingRuntime => {
      logger?.warn("spatial_index_rebuild", { reason, ...(detail !== undefined ? { detail } : {}) });
      return new RoutingRuntime(pointSet, options, null, {
        source: "rebuilt",
        reason,
        ...(detail !== undefined ? { detail } : {}),
      });
    };

    if (!bytes || bytes.byteLength === 0) {
      return rebuild("missing");
    }

    let index: SpatialIndex;
    try {
      index = deserializeSpatialIndex(bytes, { logger });
    } catch (error) {
      if (error instanceof SpatialIndexError) {
        return rebuild(rejectionFor(error), error.message);
      }
      throw error;
    }

    const freshness = checkIndexFreshness(index, pointSet);
    if (freshness.status === "stale") {
      return rebuild("stale", `expected ${freshness.expectedChecksum}, found ${freshness.actualChecksum}`);
    }
    if ((freshness.status === "legacy_format" || freshness.status === "unverifiable") && !options.acceptLegacyIndex) {
      return rebuild(freshness.status);
    }
    return new RoutingRuntime(pointSet, options, index, { source: "loaded", freshness });
  }

  get indexOrigin(): IndexOrigin {
    return this.origin;
  }

  spatialIndex(): SpatialIndex {
    if (!this.index) {
      this.index = SpatialIndex.build(this.pointSet, {
        precision: this.options.precision,
        logger: this.options.logger,
      });
    }
    return this.index;
  }

  /** One graph per mode and temperature cap, built on first use. */
  graph(mode: GraphMode, maxTemperature?: number): RoutingGraph {
    const key = graphCacheKey(mode, maxTemperature);
    let graph = this.graphs.get(key);
    if (!graph) {
      const logger = this.options.logger;
      graph =
        mode === "gate"
          ? buildGraph(mode, this.pointSet, { logger })
          : buildGraph(mode, this.pointSet, {
              ...this.options.graph,
              ...(maxTemperature !== undefined ? { maxTemperature } : {}),
              spatialIndex: this.spatialIndex(),
              logger,
            });
      this.graphs.set(key, graph);
    }
    return graph;
  }

  planRoute(request: unknown): RouteOutcome {
    return planRoute(this.pointSet, request, {
      artifacts: this,
      suggestions: this.suggestions,
      suggestionLimit: this.options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT,
      loadouts: this.options.loadouts,
      heatCalibration: this.options.heatCalibration,
      defaultAlgorithm: this.options.defaultAlgorithm,
      logger: this.options.logger,
    });
  }

  scoutGates(name: string): ScoutOutcome<GateScout> {
    return scoutGates(this.pointSet, name, this.scoutDependencies());
  }

  scoutRange(name: string, options: unknown = {}): ScoutOutcome<RangeScout> {
    return scoutRange(this.pointSet, name, options, this.scoutDependencies());
  }

  private scoutDependencies(): ScoutDependencies {
    return {
      artifacts: this,
      suggestions: this.suggestions,
      suggestionLimit: this.options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT,
      logger: this.options.logger,
    };
  }

  /**
   * Serializes the index with source metadata. A loaded legacy index carries
   * none, so a fresh one is built for the export.
   */
  exportSpatialIndex(): Uint8Array {
    let index = this.spatialIndex();
    if (!index.sourceMetadata) {
      index = SpatialIndex.build(this.pointSet, { precision: index.precision, logger: this.options.logger });
    }
    return serializeSpatialIndex(index, { compressionLevel: this.options.compressionLevel });
  }
}
