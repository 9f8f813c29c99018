export { PointSet, PointSetValidationError } from "./universe/pointSet.js";
export type { GateLink, GateLinkInput, Point, PointId, PointInput, PointSetInput } from "./universe/pointSet.js";
export { distanceBetween } from "./universe/geometry.js";
export type { Position } from "./universe/geometry.js";
export { createLevenshteinSuggester, formatSuggestions, levenshteinDistance } from "./universe/suggestions.js";
export type { SuggestionProvider } from "./universe/suggestions.js";

export { RoutingGraph, compareEdges } from "./graph/model.js";
export type { EdgeKind, GraphMode, RouteEdge } from "./graph/model.js";
export { MAX_SPATIAL_NEIGHBORS, buildGateGraph, buildGraph, buildHybridGraph, buildSpatialGraph } from "./graph/builders.js";
export type { GraphBuildOptions } from "./graph/builders.js";

export { SpatialIndex, SPATIAL_INDEX_FORMAT_VERSION, LEGACY_INDEX_FORMAT_VERSION } from "./spatial/spatialIndex.js";
export type { CoordinatePrecision, SourceMetadata, SpatialIndexBuildOptions } from "./spatial/spatialIndex.js";
export { createQueryStats } from "./spatial/kdTree.js";
export type { Neighbour, QueryStats, TemperatureFilter } from "./spatial/kdTree.js";
export { deserializeSpatialIndex, serializeSpatialIndex } from "./spatial/codec.js";
export { checkIndexFreshness } from "./spatial/freshness.js";
export type { FreshnessReference, IndexFreshness } from "./spatial/freshness.js";
export {
  CorruptIndexError,
  SpatialIndexError,
  SpatialIndexFormatError,
  UnsupportedIndexVersionError,
} from "./spatial/errors.js";

export {
  CONSTRAINT_RULES,
  ConstraintPipeline,
  NO_CONSTRAINTS,
  compileConstraints,
  validateConstraints,
} from "./routing/constraints.js";
export type { ConstraintRuleName, RouteConstraints } from "./routing/constraints.js";
export {
  DEFAULT_HEAT_CALIBRATION,
  HEAT_CRITICAL,
  HeatCalculationError,
  calculateJumpHeat,
  createShipLoadout,
  postJumpTemperature,
} from "./routing/heat.js";
export type { LoadoutProvider, ShipLoadout, ShipSpec } from "./routing/heat.js";
export {
  ROUTE_ALGORITHMS,
  aStarPlanner,
  bfsPlanner,
  dijkstraPlanner,
  resolveGraphMode,
  selectPlanner,
} from "./routing/planners.js";
export type { PathPlanner, PlannerContext, RouteAlgorithm } from "./routing/planners.js";
export { RouteRequestSchema } from "./routing/request.js";
export type { RouteRequest, RouteRequestInput } from "./routing/request.js";
export { createOnDemandArtifacts, planRoute } from "./routing/orchestrator.js";
export type { RouteDependencies, RouteHop, RouteOutcome, RoutePlan, RoutingArtifacts } from "./routing/orchestrator.js";
export { DEFAULT_SCOUT_LIMIT, MAX_SCOUT_LIMIT, ScoutRangeOptionsSchema, scoutGates, scoutRange } from "./routing/scout.js";
export type {
  GateNeighbour,
  GateScout,
  RangeNeighbour,
  RangeScout,
  ScoutDependencies,
  ScoutFailure,
  ScoutOutcome,
  ScoutRangeOptions,
} from "./routing/scout.js";
export type { RouteFailure } from "./routing/errors.js";

export { RoutingRuntime } from "./runtime.js";
export type { IndexOrigin, IndexRejection, RoutingRuntimeOptions } from "./runtime.js";

export { createEngineLogger, loadEngineConfig, runtimeOptionsFromConfig } from "./config/engine.js";
export type { EngineConfig } from "./config/engine.js";
export { StructuredLogger } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export { ERROR_CODES, GraphInvariantError } from "./types.js";
export type { ErrorCode, Failure } from "./types.js";
