import { describe, it } from "mocha";
import { expect } from "chai";

import { deserializeSpatialIndex, serializeSpatialIndex } from "../src/spatial/codec.js";
import { SpatialIndex } from "../src/spatial/spatialIndex.js";
import { scatteredUniverse } from "./helpers/universes.js";

describe("spatial/codec round trip", () => {
  const universe = scatteredUniverse(1_000, 42);
  const origin = { x: 50, y: 50, z: 50 };

  it("answers radius queries identically after a save and load", () => {
    const index = SpatialIndex.build(universe);
    const restored = deserializeSpatialIndex(serializeSpatialIndex(index, { compressionLevel: 9 }));

    const before = index.withinRadius(origin, 50);
    expect(before.length).to.be.greaterThan(0);
    expect(restored.withinRadius(origin, 50)).to.deep.equal(before);
    expect(restored.nearestFiltered(origin, 25, { maxTemperature: 120 })).to.deep.equal(
      index.nearestFiltered(origin, 25, { maxTemperature: 120 }),
    );
  });

  it("keeps single precision indexes stable across repeated round trips", () => {
    const index = SpatialIndex.build(universe, { precision: 32 });
    const once = deserializeSpatialIndex(serializeSpatialIndex(index));
    const twice = deserializeSpatialIndex(serializeSpatialIndex(once));

    expect(twice.withinRadius(origin, 50)).to.deep.equal(index.withinRadius(origin, 50));
    expect(twice.ids()).to.deep.equal(index.ids());
    expect(twice.position(17)).to.deep.equal(index.position(17));
  });
});
