import { Buffer } from "node:buffer";

import { PointSet } from "../universe/pointSet.js";
import { LEGACY_INDEX_FORMAT_VERSION, type SpatialIndex } from "./spatialIndex.js";

/** Outcome of comparing an index against the point-set it should describe. */
export type IndexFreshness =
  | { readonly status: "fresh" }
  | {
      readonly status: "stale";
      /** Hex checksum of the point-set in use. */
      readonly expectedChecksum: string;
      /** Hex checksum recorded in the index. */
      readonly actualChecksum: string;
      readonly expectedTag: string | null;
      readonly actualTag: string | null;
    }
  | { readonly status: "legacy_format" }
  /** Current format written without source metadata; nothing to compare. */
  | { readonly status: "unverifiable" };

/** Reference the index is checked against: a point-set or a bare checksum. */
export type FreshnessReference = PointSet | { readonly checksum: Uint8Array; readonly releaseTag?: string | null };

function referenceChecksum(reference: FreshnessReference): Uint8Array {
  return reference instanceof PointSet ? reference.checksum() : reference.checksum;
}

/**
 * Compares the checksum recorded in the index with the reference. Version 1
 * files report `legacy_format`; later versions written without metadata report
 * `unverifiable`. Only the checksum decides freshness; tags are informational.
 */
export function checkIndexFreshness(index: SpatialIndex, reference: FreshnessReference): IndexFreshness {
  const metadata = index.sourceMetadata;
  if (index.formatVersion === LEGACY_INDEX_FORMAT_VERSION) {
    return { status: "legacy_format" };
  }
  if (!metadata) {
    return { status: "unverifiable" };
  }
  const expected = Buffer.from(referenceChecksum(reference));
  const actual = Buffer.from(metadata.checksum);
  if (expected.equals(actual)) {
    return { status: "fresh" };
  }
  return {
    status: "stale",
    expectedChecksum: expected.toString("hex"),
    actualChecksum: actual.toString("hex"),
    expectedTag: reference.releaseTag ?? null,
    actualTag: metadata.releaseTag,
  };
}
