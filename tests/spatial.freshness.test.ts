import { Buffer } from "node:buffer";

import { describe, it } from "mocha";
import { expect } from "chai";

import { deserializeSpatialIndex, serializeSpatialIndex } from "../src/spatial/codec.js";
import { checkIndexFreshness } from "../src/spatial/freshness.js";
import { LEGACY_INDEX_FORMAT_VERSION, SPATIAL_INDEX_FORMAT_VERSION, SpatialIndex } from "../src/spatial/spatialIndex.js";
import { PointSet } from "../src/universe/pointSet.js";

describe("spatial/freshness", () => {
  const original = PointSet.from({
    points: [
      { id: 1, name: "A", position: { x: 0, y: 0, z: 0 } },
      { id: 2, name: "B", position: { x: 4, y: 0, z: 0 } },
    ],
    releaseTag: "cycle-1",
  });
  const updated = PointSet.from({
    points: [
      { id: 1, name: "A", position: { x: 0, y: 0, z: 0 } },
      { id: 2, name: "B", position: { x: 5, y: 0, z: 0 } },
    ],
    releaseTag: "cycle-2",
  });

  it("reports an index built from the same content as fresh", () => {
    const index = deserializeSpatialIndex(serializeSpatialIndex(SpatialIndex.build(original)));
    expect(checkIndexFreshness(index, original)).to.deep.equal({ status: "fresh" });
    expect(checkIndexFreshness(index, { checksum: original.checksum() })).to.deep.equal({ status: "fresh" });
  });

  it("reports both checksums and tags when the content changed", () => {
    const index = SpatialIndex.build(original);
    expect(checkIndexFreshness(index, updated)).to.deep.equal({
      status: "stale",
      expectedChecksum: updated.checksumHex(),
      actualChecksum: original.checksumHex(),
      expectedTag: "cycle-2",
      actualTag: "cycle-1",
    });
  });

  it("accepts a bare checksum reference without a tag", () => {
    const index = SpatialIndex.build(original);
    const result = checkIndexFreshness(index, { checksum: Buffer.alloc(32) });
    expect(result).to.deep.include({ status: "stale", expectedTag: null, actualTag: "cycle-1" });
  });

  it("reports version 1 files as legacy", () => {
    const bytes = Buffer.from(serializeSpatialIndex(SpatialIndex.build(original, { includeMetadata: false })));
    bytes.writeUInt8(LEGACY_INDEX_FORMAT_VERSION, 4);
    const index = deserializeSpatialIndex(bytes);
    expect(checkIndexFreshness(index, original)).to.deep.equal({ status: "legacy_format" });
  });

  it("reports current-format indexes without metadata as unverifiable", () => {
    const index = deserializeSpatialIndex(
      serializeSpatialIndex(SpatialIndex.build(original, { includeMetadata: false })),
    );
    expect(index.formatVersion).to.equal(SPATIAL_INDEX_FORMAT_VERSION);
    expect(checkIndexFreshness(index, original)).to.deep.equal({ status: "unverifiable" });
  });
});
