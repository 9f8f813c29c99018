import type { StructuredLogger } from "../logger.js";
import type { RouteEdge } from "../graph/model.js";
import type { Point, PointId } from "../universe/pointSet.js";
import { DEFAULT_HEAT_CALIBRATION, HEAT_CRITICAL, HeatCalculationError, postJumpTemperature, type ShipLoadout } from "./heat.js";

/** Operational limits applied to every candidate edge. */
export interface RouteConstraints {
  /** Longest single hop allowed, any edge kind. */
  readonly maxJump?: number;
  readonly avoided: ReadonlySet<PointId>;
  /** Forbid gate edges altogether. */
  readonly avoidGates: boolean;
  /** Hottest spatial-jump target allowed. */
  readonly maxTemperature?: number;
  readonly avoidCriticalHeat: boolean;
  readonly loadout?: ShipLoadout;
  readonly heatCalibration?: number;
}

export const NO_CONSTRAINTS: RouteConstraints = Object.freeze({
  avoided: new Set<PointId>(),
  avoidGates: false,
  avoidCriticalHeat: false,
});

/** Rule identifiers, in evaluation order. */
export const CONSTRAINT_RULES = ["avoided", "avoid_gates", "max_jump", "max_temperature", "critical_heat"] as const;

export type ConstraintRuleName = (typeof CONSTRAINT_RULES)[number];

/** What a rule sees for one candidate edge. */
export interface EdgeCandidate {
  readonly edge: RouteEdge;
  /** Target point, `undefined` when the graph references an id the point-set lacks. */
  readonly target: Point | undefined;
}

type RulePredicate = (candidate: EdgeCandidate) => boolean;

interface CompiledRule {
  readonly name: ConstraintRuleName;
  readonly passes: RulePredicate;
}

/** Reasons reported by {@link validateConstraints}. */
export type ConstraintViolationReason =
  | "avoided_endpoint"
  | "max_jump_not_positive"
  | "max_temperature_not_finite"
  | "missing_loadout"
  | "heat_calibration_not_positive";

export interface ConstraintViolation {
  readonly reason: ConstraintViolationReason;
  readonly message: string;
}

/**
 * Checks the constraints against the resolved endpoints before any search
 * work. Returns the first violation or `null`.
 */
export function validateConstraints(
  constraints: RouteConstraints,
  start: PointId,
  goal: PointId,
): ConstraintViolation | null {
  if (constraints.avoided.has(start) || constraints.avoided.has(goal)) {
    return { reason: "avoided_endpoint", message: "the start or goal system is in the avoid list" };
  }
  if (constraints.maxJump !== undefined && !(constraints.maxJump > 0)) {
    return { reason: "max_jump_not_positive", message: `maxJump must be positive, got ${constraints.maxJump}` };
  }
  if (constraints.maxTemperature !== undefined && !Number.isFinite(constraints.maxTemperature)) {
    return {
      reason: "max_temperature_not_finite",
      message: `maxTemperature must be finite, got ${constraints.maxTemperature}`,
    };
  }
  if (constraints.avoidCriticalHeat && !constraints.loadout) {
    return { reason: "missing_loadout", message: "avoidCriticalHeat requires a ship loadout" };
  }
  const calibration = constraints.heatCalibration;
  if (calibration !== undefined && !(calibration > 0 && Number.isFinite(calibration))) {
    return {
      reason: "heat_calibration_not_positive",
      message: `heat calibration must be finite and positive, got ${calibration}`,
    };
  }
  return null;
}

const RULE_HINTS: Record<ConstraintRuleName, string> = {
  avoided: "avoided systems cut every path; remove entries from the avoid list",
  avoid_gates: "gates are excluded; allow gates or raise maxJump",
  max_jump: "no path fits the jump limit; increase maxJump",
  max_temperature: "hot systems are excluded; raise maxTemperature",
  critical_heat: "jumps would reach critical heat; disable avoidCriticalHeat or lighten the ship",
};

/**
 * Compiled, per-request evaluator. Rules run in {@link CONSTRAINT_RULES} order
 * and stop at the first rejection; rejections are tallied per rule so a failed
 * search can name the most restrictive one.
 */
export class ConstraintPipeline {
  private readonly tally = new Map<ConstraintRuleName, number>();

  constructor(
    private readonly rules: readonly CompiledRule[],
    private readonly heatWarnings: readonly string[] = [],
  ) {}

  /** Names of the active rules, in evaluation order. */
  get activeRules(): ConstraintRuleName[] {
    return this.rules.map((rule) => rule.name);
  }

  /** First rule rejecting the candidate, `null` when every rule passes. Does not tally. */
  firstRejection(candidate: EdgeCandidate): ConstraintRuleName | null {
    for (const rule of this.rules) {
      if (!rule.passes(candidate)) {
        return rule.name;
      }
    }
    return null;
  }

  /** Evaluates the candidate and records the rejecting rule, if any. */
  allows(edge: RouteEdge, target: Point | undefined): boolean {
    const rejected = this.firstRejection({ edge, target });
    if (rejected === null) {
      return true;
    }
    this.tally.set(rejected, (this.tally.get(rejected) ?? 0) + 1);
    return false;
  }

  rejectionCounts(): Partial<Record<ConstraintRuleName, number>> {
    const counts: Partial<Record<ConstraintRuleName, number>> = {};
    for (const [name, count] of this.tally) {
      counts[name] = count;
    }
    return counts;
  }

  /** Rule with the most rejections; ties go to the earlier rule. */
  mostRestrictive(): ConstraintRuleName | null {
    let best: ConstraintRuleName | null = null;
    let bestCount = 0;
    for (const name of CONSTRAINT_RULES) {
      const count = this.tally.get(name) ?? 0;
      if (count > bestCount) {
        best = name;
        bestCount = count;
      }
    }
    return best;
  }

  hintFor(rule: ConstraintRuleName): string {
    return RULE_HINTS[rule];
  }

  /** Distinct heat computation failures met while evaluating edges. */
  get warnings(): readonly string[] {
    return this.heatWarnings;
  }
}

function toHeatError(error: unknown): HeatCalculationError {
  if (error instanceof HeatCalculationError) {
    return error;
  }
  return new HeatCalculationError(
    `heat computation failed: ${error instanceof Error ? error.message : String(error)}`,
  );
}

/** Builds the pipeline holding only the rules the constraints activate. */
export function compileConstraints(constraints: RouteConstraints, logger?: StructuredLogger): ConstraintPipeline {
  const rules: CompiledRule[] = [];
  const heatWarnings: string[] = [];
  const reportHeatFailure = (error: HeatCalculationError, edge: RouteEdge): void => {
    if (!heatWarnings.includes(error.message)) {
      heatWarnings.push(error.message);
    }
    logger?.warn("heat_check_failed", { from: edge.from, to: edge.to, code: error.code, message: error.message });
  };

  if (constraints.avoided.size > 0) {
    const avoided = constraints.avoided;
    rules.push({ name: "avoided", passes: ({ edge }) => !avoided.has(edge.to) });
  }
  if (constraints.avoidGates) {
    rules.push({ name: "avoid_gates", passes: ({ edge }) => edge.kind !== "gate" });
  }
  const maxJump = constraints.maxJump;
  if (maxJump !== undefined) {
    rules.push({ name: "max_jump", passes: ({ edge }) => edge.distance === undefined || edge.distance <= maxJump });
  }
  const maxTemperature = constraints.maxTemperature;
  if (maxTemperature !== undefined) {
    rules.push({
      name: "max_temperature",
      passes: ({ edge, target }) =>
        edge.kind !== "spatial" || target?.temperature === undefined || target.temperature <= maxTemperature,
    });
  }
  const loadout = constraints.loadout;
  if (constraints.avoidCriticalHeat && loadout) {
    const calibration = constraints.heatCalibration ?? DEFAULT_HEAT_CALIBRATION;
    rules.push({
      name: "critical_heat",
      passes: ({ edge, target }) => {
        if (edge.kind !== "spatial") {
          return true;
        }
        try {
          if (edge.distance === undefined) {
            throw new HeatCalculationError(`spatial edge ${edge.from}->${edge.to} has no distance`);
          }
          return postJumpTemperature(loadout, target?.temperature, edge.distance, calibration) < HEAT_CRITICAL;
        } catch (error) {
          reportHeatFailure(toHeatError(error), edge);
          return false;
        }
      },
    });
  }

  return new ConstraintPipeline(rules, heatWarnings);
}
