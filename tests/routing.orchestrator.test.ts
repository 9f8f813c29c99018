import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { createShipLoadout } from "../src/routing/heat.js";
import { createOnDemandArtifacts, planRoute, type RouteOutcome, type RoutePlan } from "../src/routing/orchestrator.js";
import type { RouteFailure } from "../src/routing/errors.js";
import { ERROR_CODES } from "../src/types.js";
import { PointSet } from "../src/universe/pointSet.js";
import type { SuggestionProvider } from "../src/universe/suggestions.js";
import { gateLine, ringedPair, shortcutTriangle } from "./helpers/universes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function expectPlan(outcome: RouteOutcome): RoutePlan {
  if (!outcome.ok) {
    throw new Error(`expected a plan, got ${outcome.code}: ${outcome.message}`);
  }
  return outcome.plan;
}

function expectFailure(outcome: RouteOutcome): RouteFailure {
  if (outcome.ok) {
    throw new Error(`expected a failure, got steps ${outcome.plan.steps.join(",")}`);
  }
  return outcome;
}

/** Two positioned systems without gates; C sits `distance` units from A. */
function jumpPair(distance: number, cTemperature?: number): PointSet {
  return PointSet.from({
    points: [
      { id: 1, name: "A", position: { x: 0, y: 0, z: 0 } },
      {
        id: 2,
        name: "C",
        position: { x: distance, y: 0, z: 0 },
        ...(cTemperature !== undefined ? { temperature: cTemperature } : {}),
      },
    ],
  });
}

describe("routing/orchestrator", () => {
  it("routes over gates breadth-first", () => {
    const plan = expectPlan(planRoute(gateLine(), { start: "A", goal: "C", algorithm: "bfs" }));
    expect(plan.steps).to.deep.equal([1, 2, 3]);
    expect(plan.stepNames).to.deep.equal(["A", "B", "C"]);
    expect(plan.graphMode).to.equal("gate");
    expect(plan.hopCount).to.equal(2);
    expect(plan.gates).to.equal(2);
    expect(plan.jumps).to.equal(0);
    expect(plan.totalDistance).to.equal(20);
    expect(plan.hops[0]).to.deep.equal({ from: 1, to: 2, kind: "gate", distance: 10 });
  });

  it("takes the direct spatial jump when it is shorter than the gate path", () => {
    const plan = expectPlan(planRoute(shortcutTriangle(), { start: "A", goal: "C", algorithm: "dijkstra" }));
    expect(plan.steps).to.deep.equal([1, 3]);
    expect(plan.graphMode).to.equal("hybrid");
    expect(plan.hopCount).to.equal(1);
    expect(plan.jumps).to.equal(1);
    expect(plan.gates).to.equal(0);
    expect(plan.totalDistance).to.equal(15);
    expect(plan.warnings).to.deep.equal(["1 point(s) without coordinates have no spatial edges"]);
  });

  it("reports no route when the only intermediate system is avoided", () => {
    const failure = expectFailure(planRoute(gateLine(), { start: "A", goal: "C", algorithm: "bfs", avoid: ["B"] }));
    expect(failure.code).to.equal(ERROR_CODES.ROUTE_NOT_FOUND);
    expect(failure.message).to.equal("No route found between A and C");
    expect(failure.hint).to.equal("avoided systems cut every path; remove entries from the avoid list");
    expect(failure.details).to.deep.include({ start: "A", goal: "C", limitingRule: "avoided" });
  });

  it("reports no route when the only jump targets a system above the temperature cap", () => {
    const failure = expectFailure(
      planRoute(jumpPair(20, 500), { start: "A", goal: "C", algorithm: "dijkstra", maxTemperature: 300 }),
    );
    expect(failure.code).to.equal(ERROR_CODES.ROUTE_NOT_FOUND);
    expect(failure.details).to.deep.include({ limitingRule: "max_temperature", rejections: { max_temperature: 1 } });
    expect(failure.hint).to.equal("hot systems are excluded; raise maxTemperature");
  });

  it("reaches a cool goal past a ring of hot neighbours when a temperature cap is set", () => {
    const set = ringedPair();
    const uncapped = expectFailure(planRoute(set, { start: "S", goal: "G", algorithm: "dijkstra" }));
    expect(uncapped.hint).to.equal("the systems are not connected in the hybrid graph");

    const plan = expectPlan(planRoute(set, { start: "S", goal: "G", algorithm: "dijkstra", maxTemperature: 300 }));
    expect(plan.steps).to.deep.equal([1, 2]);
    expect(plan.totalDistance).to.equal(20);
    expect(plan.hops).to.deep.equal([{ from: 1, to: 2, kind: "spatial", distance: 20 }]);
  });

  it("builds one graph per temperature cap on shared artifacts", () => {
    const set = ringedPair();
    const artifacts = createOnDemandArtifacts(set);
    const graphSpy = sinon.spy(artifacts, "graph");

    expectPlan(planRoute(set, { start: "S", goal: "G", algorithm: "dijkstra", maxTemperature: 300 }, { artifacts }));
    expectFailure(planRoute(set, { start: "S", goal: "G", algorithm: "dijkstra" }, { artifacts }));
    expectPlan(planRoute(set, { start: "S", goal: "G", algorithm: "dijkstra", maxTemperature: 300 }, { artifacts }));

    expect(graphSpy.firstCall.args).to.deep.equal(["hybrid", 300]);
    expect(graphSpy.secondCall.args).to.deep.equal(["hybrid", undefined]);
    expect(graphSpy.firstCall.returnValue).to.not.equal(graphSpy.secondCall.returnValue);
    expect(graphSpy.thirdCall.returnValue).to.equal(graphSpy.firstCall.returnValue);
  });

  it("explains disconnection when no constraint rejected anything", () => {
    const set = PointSet.from({ points: [{ id: 1, name: "A" }, { id: 2, name: "B" }] });
    const failure = expectFailure(planRoute(set, { start: "A", goal: "B", algorithm: "bfs" }));
    expect(failure.hint).to.equal("the systems are not connected in the gate graph");
  });

  it("suggests close names for unknown systems", () => {
    const set = PointSet.from({
      points: [
        { id: 1, name: "Sol" },
        { id: 2, name: "Solace" },
        { id: 3, name: "Vega" },
      ],
    });
    const failure = expectFailure(planRoute(set, { start: "Sool", goal: "Vega" }));
    expect(failure.code).to.equal(ERROR_CODES.ROUTE_UNKNOWN_POINT);
    expect(failure.message).to.equal("Unknown system 'Sool'. Did you mean 'Sol'?");
    expect(failure.details).to.deep.equal({ name: "Sool", role: "start", suggestions: ["Sol"] });
    expect(failure.hint).to.equal(undefined);
  });

  it("asks the suggestion collaborator with the configured limit", () => {
    const suggest = sinon.stub<[string, number], string[]>().returns(["A", "B"]);
    const suggestions: SuggestionProvider = { suggest };
    const failure = expectFailure(
      planRoute(gateLine(), { start: "A", goal: "C", avoid: ["Nowhere"] }, { suggestions, suggestionLimit: 2 }),
    );
    expect(suggest.calledOnceWithExactly("Nowhere", 2)).to.equal(true);
    expect(failure.message).to.equal("Unknown system 'Nowhere'. Did you mean one of: 'A', 'B'?");
    expect(failure.details).to.deep.include({ role: "avoid" });
  });

  it("rejects malformed requests and invalid constraints before searching", () => {
    const malformed = expectFailure(planRoute(gateLine(), { start: "", goal: "C" }));
    expect(malformed.code).to.equal(ERROR_CODES.ROUTE_INVALID_CONSTRAINT);
    expect(malformed.details).to.have.property("reason", "malformed_request");

    const unexpected = expectFailure(planRoute(gateLine(), { start: "A", goal: "C", speed: 3 }));
    expect(unexpected.details).to.have.property("reason", "malformed_request");

    const avoidedStart = expectFailure(planRoute(gateLine(), { start: "A", goal: "C", avoid: ["A"] }));
    expect(avoidedStart.code).to.equal(ERROR_CODES.ROUTE_INVALID_CONSTRAINT);
    expect(avoidedStart.details).to.deep.equal({ reason: "avoided_endpoint" });

    const badJump = expectFailure(planRoute(gateLine(), { start: "A", goal: "C", maxJump: -1 }));
    expect(badJump.details).to.deep.equal({ reason: "max_jump_not_positive" });

    const noShip = expectFailure(planRoute(gateLine(), { start: "A", goal: "C", avoidCriticalHeat: true }));
    expect(noShip.details).to.deep.equal({ reason: "missing_loadout" });

    const unknownShip = expectFailure(
      planRoute(gateLine(), { start: "A", goal: "C", avoidCriticalHeat: true, ship: "Ghost" }, { loadouts: () => undefined }),
    );
    expect(unknownShip.details).to.deep.equal({ reason: "unknown_ship" });
    expect(unknownShip.message).to.equal("Unknown ship 'Ghost'");
  });

  it("avoids jumps that would reach critical heat", () => {
    // Temperature rise is 30 per unit of distance for this loadout.
    const reflex = createShipLoadout({ name: "Reflex", hullMassKg: 1e6, specificHeat: 1 });
    const loadouts = (name: string) => (name === "Reflex" ? reflex : undefined);
    const request = { start: "A", goal: "C", algorithm: "dijkstra", avoidCriticalHeat: true, ship: "Reflex" };

    const tooFar = expectFailure(planRoute(jumpPair(10), request, { loadouts }));
    expect(tooFar.details).to.deep.include({ limitingRule: "critical_heat" });

    const plan = expectPlan(planRoute(jumpPair(4), request, { loadouts }));
    expect(plan.steps).to.deep.equal([1, 2]);
  });

  it("uses the host default algorithm and forces the spatial graph without gates", () => {
    expect(expectPlan(planRoute(gateLine(), { start: "A", goal: "C" }, { defaultAlgorithm: "bfs" })).algorithm).to.equal(
      "bfs",
    );

    const plan = expectPlan(planRoute(shortcutTriangle(), { start: "A", goal: "C", avoidGates: true }));
    expect(plan.algorithm).to.equal("a-star");
    expect(plan.graphMode).to.equal("spatial");
    expect(plan.steps).to.deep.equal([1, 3]);
  });

  it("reuses supplied artifacts and logs the outcome", () => {
    const logger = new RecordingLogger();
    const set = shortcutTriangle();
    const artifacts = createOnDemandArtifacts(set);
    const graphSpy = sinon.spy(artifacts, "graph");
    const indexSpy = sinon.spy(artifacts, "spatialIndex");

    expectPlan(planRoute(set, { start: "A", goal: "C", algorithm: "a-star" }, { artifacts, logger }));
    expectPlan(planRoute(set, { start: "C", goal: "A", algorithm: "a-star" }, { artifacts, logger }));

    expect(graphSpy.callCount).to.equal(2);
    expect(graphSpy.firstCall.returnValue).to.equal(graphSpy.secondCall.returnValue);
    expect(indexSpy.firstCall.returnValue).to.equal(indexSpy.lastCall.returnValue);
    expect(logger.find("route_planned")[0].payload).to.include({ start: "A", goal: "C", hops: 1, total_distance: 15 });
  });
});
