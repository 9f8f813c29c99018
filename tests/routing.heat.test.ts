import { describe, it } from "mocha";
import { expect } from "chai";
import { ZodError } from "zod";

import {
  DEFAULT_HEAT_CALIBRATION,
  HEAT_CRITICAL,
  HeatCalculationError,
  calculateJumpHeat,
  createShipLoadout,
  postJumpTemperature,
  type ShipLoadout,
} from "../src/routing/heat.js";
import { ERROR_CODES } from "../src/types.js";

describe("routing/heat", () => {
  it("exposes the critical threshold and default calibration", () => {
    expect(HEAT_CRITICAL).to.equal(150);
    expect(DEFAULT_HEAT_CALIBRATION).to.equal(1e-7);
  });

  it("scales jump heat with mass and distance over calibrated hull mass", () => {
    expect(calculateJumpHeat(2, 1, 2, 1)).to.equal(3);
    expect(calculateJumpHeat(4, 5, 2, 2)).to.equal(15);
    expect(calculateJumpHeat(4, 0, 2, 2)).to.equal(0);
  });

  it("rejects figures it cannot compute with", () => {
    expect(() => calculateJumpHeat(1, -1, 1, 1)).to.throw(HeatCalculationError, /distance must be finite/);
    expect(() => calculateJumpHeat(0, 1, 1, 1)).to.throw(HeatCalculationError, /total mass/);
    expect(() => calculateJumpHeat(1, 1, 1, 0)).to.throw(HeatCalculationError, /calibration constant/);
    try {
      calculateJumpHeat(1, Number.NaN, 1, 1);
    } catch (error) {
      expect(error).to.have.property("code", ERROR_CODES.HEAT_CALCULATION);
    }
  });

  it("builds a reference loadout from a validated ship spec", () => {
    const loadout = createShipLoadout({ name: "Reflex", hullMassKg: 1e6, specificHeat: 1, fuelLoad: 500, cargoMassKg: 250 });
    expect(loadout.name).to.equal("Reflex");
    expect(loadout.operatingMassKg()).to.equal(1_000_750);
    expect(() => createShipLoadout({ name: "Broken", hullMassKg: -1, specificHeat: 1 })).to.throw(ZodError);
  });

  it("adds the jump rise to the ambient temperature", () => {
    const loadout = createShipLoadout({ name: "Reflex", hullMassKg: 1e6, specificHeat: 1 });
    expect(postJumpTemperature(loadout, undefined, 2, DEFAULT_HEAT_CALIBRATION)).to.be.closeTo(60, 1e-6);
    expect(postJumpTemperature(loadout, 100, 2, DEFAULT_HEAT_CALIBRATION)).to.be.closeTo(160, 1e-6);
  });

  it("refuses non-finite results from custom loadouts", () => {
    const faulty: ShipLoadout = {
      name: "Faulty",
      hullMassKg: 1,
      operatingMassKg: () => 1,
      heatDelta: () => Number.NaN,
    };
    expect(() => postJumpTemperature(faulty, 0, 1, 1)).to.throw(HeatCalculationError, "loadout 'Faulty' produced a non-finite temperature");
  });
});
