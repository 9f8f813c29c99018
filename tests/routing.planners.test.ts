import { describe, it } from "mocha";
import { expect } from "chai";

import { buildGateGraph, buildHybridGraph } from "../src/graph/builders.js";
import { NO_CONSTRAINTS, compileConstraints } from "../src/routing/constraints.js";
import {
  aStarPlanner,
  bfsPlanner,
  dijkstraPlanner,
  resolveGraphMode,
  selectPlanner,
  type PlannerContext,
} from "../src/routing/planners.js";
import { SpatialIndex } from "../src/spatial/spatialIndex.js";
import { PointSet, type GateLinkInput } from "../src/universe/pointSet.js";
import { gateLine, shortcutTriangle } from "./helpers/universes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function context(pointSet: PointSet, logger?: RecordingLogger): PlannerContext {
  return { pointSet, constraints: compileConstraints(NO_CONSTRAINTS), logger };
}

function square(gates: GateLinkInput[]): PointSet {
  return PointSet.from({
    points: [1, 2, 3, 4].map((id) => ({ id, name: `Q${id}` })),
    gates,
  });
}

describe("routing/planners", () => {
  it("dispatches algorithms to planners and graph modes", () => {
    expect(selectPlanner("bfs")).to.equal(bfsPlanner);
    expect(selectPlanner("dijkstra")).to.equal(dijkstraPlanner);
    expect(selectPlanner("a-star")).to.equal(aStarPlanner);
    expect(resolveGraphMode("bfs", false)).to.equal("gate");
    expect(resolveGraphMode("dijkstra", false)).to.equal("hybrid");
    expect(resolveGraphMode("a-star", true)).to.equal("spatial");
    expect(aStarPlanner.requiresSpatialIndex).to.equal(true);
    expect(bfsPlanner.requiresSpatialIndex).to.equal(false);
  });

  it("walks gates breadth-first", () => {
    const set = gateLine();
    const graph = buildGateGraph(set);
    expect(bfsPlanner.findPath(graph, undefined, 1, 3, context(set))).to.deep.equal([1, 2, 3]);
    expect(bfsPlanner.findPath(graph, undefined, 2, 2, context(set))).to.deep.equal([2]);
  });

  it("prefers fewer hops over shorter distance in breadth-first search", () => {
    const set = square([
      { from: 1, to: 4, distance: 100 },
      { from: 1, to: 2, distance: 1 },
      { from: 2, to: 4, distance: 1 },
    ]);
    const graph = buildGateGraph(set);
    expect(bfsPlanner.findPath(graph, undefined, 1, 4, context(set))).to.deep.equal([1, 4]);
    expect(dijkstraPlanner.findPath(graph, undefined, 1, 4, context(set))).to.deep.equal([1, 2, 4]);
  });

  it("returns null when the goal is unreachable", () => {
    const set = square([{ from: 1, to: 2, distance: 1 }]);
    const graph = buildGateGraph(set);
    expect(bfsPlanner.findPath(graph, undefined, 1, 4, context(set))).to.equal(null);
    expect(dijkstraPlanner.findPath(graph, undefined, 1, 4, context(set))).to.equal(null);
  });

  it("expands equal-cost neighbours in adjacency order", () => {
    const viaTwo = square([
      { from: 1, to: 2, distance: 1 },
      { from: 1, to: 3, distance: 1 },
      { from: 2, to: 4, distance: 1 },
      { from: 3, to: 4, distance: 1 },
    ]);
    const viaThree = square([
      { from: 1, to: 3, distance: 1 },
      { from: 1, to: 2, distance: 1 },
      { from: 3, to: 4, distance: 1 },
      { from: 2, to: 4, distance: 1 },
    ]);
    expect(dijkstraPlanner.findPath(buildGateGraph(viaTwo), undefined, 1, 4, context(viaTwo))).to.deep.equal([1, 2, 4]);
    expect(dijkstraPlanner.findPath(buildGateGraph(viaThree), undefined, 1, 4, context(viaThree))).to.deep.equal([
      1, 3, 4,
    ]);
  });

  it("skips edges without a distance in weighted search", () => {
    const logger = new RecordingLogger();
    const set = square([
      { from: 1, to: 2 },
      { from: 2, to: 3, distance: 1 },
    ]);
    const graph = buildGateGraph(set);
    expect(dijkstraPlanner.findPath(graph, undefined, 1, 3, context(set, logger))).to.equal(null);
    expect(logger.find("planner_edges_without_distance")[0].payload).to.deep.equal({
      algorithm: "dijkstra",
      skipped: 1,
    });
    expect(bfsPlanner.findPath(graph, undefined, 1, 3, context(set))).to.deep.equal([1, 2, 3]);
  });

  it("takes the spatial shortcut on the hybrid graph", () => {
    const set = shortcutTriangle();
    const graph = buildHybridGraph(set);
    const index = SpatialIndex.build(set);
    expect(dijkstraPlanner.findPath(graph, undefined, 1, 3, context(set))).to.deep.equal([1, 3]);
    expect(aStarPlanner.findPath(graph, index, 1, 3, context(set))).to.deep.equal([1, 3]);
    expect(aStarPlanner.findPath(graph, undefined, 1, 3, context(set))).to.deep.equal([1, 3]);
  });

  it("applies the constraint pipeline while searching", () => {
    const set = shortcutTriangle();
    const graph = buildHybridGraph(set);
    const pipeline = compileConstraints({ ...NO_CONSTRAINTS, maxJump: 12 });
    expect(dijkstraPlanner.findPath(graph, undefined, 1, 3, { pointSet: set, constraints: pipeline })).to.deep.equal([
      1, 2, 3,
    ]);
    expect(pipeline.rejectionCounts()).to.deep.equal({ max_jump: 1 });
  });
});
