import { z } from "zod";

import { ERROR_CODES } from "../types.js";

/** Post-jump temperature at or above which a hop is considered critical. */
export const HEAT_CRITICAL = 150;

/** Calibration constant applied when the caller does not provide one. */
export const DEFAULT_HEAT_CALIBRATION = 1e-7;

/** Mass of one fuel unit in kilograms. */
export const FUEL_MASS_PER_UNIT_KG = 1;

/** Raised when jump heat cannot be computed from the supplied figures. */
export class HeatCalculationError extends Error {
  public readonly code: typeof ERROR_CODES.HEAT_CALCULATION;

  constructor(message: string) {
    super(message);
    this.name = "HeatCalculationError";
    this.code = ERROR_CODES.HEAT_CALCULATION;
  }
}

/**
 * Ship collaborator consulted by the critical-heat rule. Implementations may
 * throw; the rule then rejects the edge.
 */
export interface ShipLoadout {
  readonly name: string;
  readonly hullMassKg: number;
  /** Mass carried during the jump (hull, fuel and cargo). */
  operatingMassKg(): number;
  /** Temperature rise caused by one jump of `distance` light-years. */
  heatDelta(currentMassKg: number, hullMassKg: number, distance: number, calibration: number): number;
}

/** Resolves a ship name to its loadout, `undefined` when unknown. */
export type LoadoutProvider = (shipName: string) => ShipLoadout | undefined;

function requirePositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new HeatCalculationError(`${label} must be finite and positive, got ${value}`);
  }
}

/**
 * Jump heat energy: `3 · mass · distance / (calibration · hull mass)`. A zero
 * distance yields zero heat.
 */
export function calculateJumpHeat(
  totalMassKg: number,
  distance: number,
  hullMassKg: number,
  calibration: number,
): number {
  if (!Number.isFinite(distance) || distance < 0) {
    throw new HeatCalculationError(`distance must be finite and non-negative, got ${distance}`);
  }
  requirePositive(totalMassKg, "total mass");
  requirePositive(hullMassKg, "hull mass");
  requirePositive(calibration, "calibration constant");
  return (3 * totalMassKg * distance) / (calibration * hullMassKg);
}

const ShipSpecSchema = z.object({
  name: z.string().trim().min(1),
  hullMassKg: z.number().finite().positive(),
  specificHeat: z.number().finite().positive(),
  fuelLoad: z.number().finite().nonnegative().default(0),
  cargoMassKg: z.number().finite().nonnegative().default(0),
});

export type ShipSpec = z.input<typeof ShipSpecSchema>;

/**
 * Reference loadout: temperature rise is the jump heat divided by
 * `mass · specificHeat`. Throws a zod error when the spec is invalid.
 */
export function createShipLoadout(spec: ShipSpec): ShipLoadout {
  const parsed = ShipSpecSchema.parse(spec);
  const operatingMass = parsed.hullMassKg + parsed.fuelLoad * FUEL_MASS_PER_UNIT_KG + parsed.cargoMassKg;
  return Object.freeze({
    name: parsed.name,
    hullMassKg: parsed.hullMassKg,
    operatingMassKg: () => operatingMass,
    heatDelta(currentMassKg: number, hullMassKg: number, distance: number, calibration: number): number {
      const energy = calculateJumpHeat(currentMassKg, distance, hullMassKg, calibration);
      return energy / (currentMassKg * parsed.specificHeat);
    },
  });
}

/**
 * Temperature after jumping into a system: ambient (unknown counts as 0) plus
 * the loadout's rise. Throws {@link HeatCalculationError} when the result is
 * not a finite number.
 */
export function postJumpTemperature(
  loadout: ShipLoadout,
  ambient: number | undefined,
  distance: number,
  calibration: number,
): number {
  const delta = loadout.heatDelta(loadout.operatingMassKg(), loadout.hullMassKg, distance, calibration);
  const total = (ambient ?? 0) + delta;
  if (!Number.isFinite(total)) {
    throw new HeatCalculationError(`loadout '${loadout.name}' produced a non-finite temperature`);
  }
  return total;
}
