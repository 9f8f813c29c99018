import { StructuredLogger, type LogLevel } from "../logger.js";
import { ROUTE_ALGORITHMS, type RouteAlgorithm } from "../routing/planners.js";
import { DEFAULT_HEAT_CALIBRATION } from "../routing/heat.js";
import type { RoutingRuntimeOptions } from "../runtime.js";
import type { CoordinatePrecision } from "../spatial/spatialIndex.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString, type EnvSource } from "./env.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const PRECISIONS = ["32", "64"] as const;

/** Engine settings resolved from the environment. */
export interface EngineConfig {
  readonly maxSpatialNeighbors: number;
  readonly indexPrecision: CoordinatePrecision;
  readonly compressionLevel: number;
  readonly heatCalibration: number;
  readonly suggestionLimit: number;
  readonly defaultAlgorithm: RouteAlgorithm;
  readonly acceptLegacyIndex: boolean;
  readonly logFile: string | null;
  readonly logLevel: LogLevel;
}

/**
 * Reads the `STARLANE_*` variables. Invalid or out-of-range values fall back to
 * the defaults rather than failing.
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  return {
    maxSpatialNeighbors: readInt("STARLANE_MAX_SPATIAL_NEIGHBORS", 12, { min: 1, max: 256 }, env),
    indexPrecision: readEnum("STARLANE_INDEX_PRECISION", PRECISIONS, "64", env) === "32" ? 32 : 64,
    compressionLevel: readInt("STARLANE_INDEX_COMPRESSION_LEVEL", 6, { min: 0, max: 9 }, env),
    heatCalibration: readNumber("STARLANE_HEAT_CALIBRATION", DEFAULT_HEAT_CALIBRATION, { min: Number.MIN_VALUE }, env),
    suggestionLimit: readInt("STARLANE_SUGGESTION_LIMIT", 3, { min: 0, max: 20 }, env),
    defaultAlgorithm: readEnum("STARLANE_DEFAULT_ALGORITHM", ROUTE_ALGORITHMS, "a-star", env),
    acceptLegacyIndex: readBool("STARLANE_ACCEPT_LEGACY_INDEX", false, env),
    logFile: readOptionalString("STARLANE_LOG_FILE", env) ?? null,
    logLevel: readEnum("STARLANE_LOG_LEVEL", LOG_LEVELS, "info", env),
  };
}

export function createEngineLogger(config: EngineConfig): StructuredLogger {
  return new StructuredLogger({ logFile: config.logFile, minLevel: config.logLevel });
}

/** Maps the configuration onto {@link RoutingRuntimeOptions}; `extra` wins on overlap. */
export function runtimeOptionsFromConfig(
  config: EngineConfig,
  extra: RoutingRuntimeOptions = {},
): RoutingRuntimeOptions {
  return {
    graph: { maxSpatialNeighbors: config.maxSpatialNeighbors },
    precision: config.indexPrecision,
    compressionLevel: config.compressionLevel,
    acceptLegacyIndex: config.acceptLegacyIndex,
    suggestionLimit: config.suggestionLimit,
    heatCalibration: config.heatCalibration,
    defaultAlgorithm: config.defaultAlgorithm,
    ...extra,
  };
}
