import { Buffer } from "node:buffer";
import { createHash, timingSafeEqual } from "node:crypto";
import { deflateSync, inflateSync } from "node:zlib";

import type { StructuredLogger } from "../logger.js";
import { CorruptIndexError, SpatialIndexError, SpatialIndexFormatError, UnsupportedIndexVersionError } from "./errors.js";
import { createKdNode, walkKdTree, type Axis, type KdNode } from "./kdTree.js";
import {
  LEGACY_INDEX_FORMAT_VERSION,
  SPATIAL_INDEX_FORMAT_VERSION,
  SpatialIndex,
  type CoordinatePrecision,
  type SourceMetadata,
} from "./spatialIndex.js";

/** File magic: "SLKD". */
export const SPATIAL_INDEX_MAGIC = Buffer.from("SLKD", "ascii");

export const HEADER_LENGTH = 16;
const CHECKSUM_LENGTH = 32;
const TRAILER_LENGTH = 32;

const FLAG_HAS_TEMPERATURE = 0b01;
const FLAG_HAS_METADATA = 0b10;

const NODE_HAS_LEFT = 0b001;
const NODE_HAS_RIGHT = 0b010;
const NODE_HAS_TEMPERATURE = 0b100;

export interface SerializeOptions {
  /** zlib deflate level, -1 (library default) to 9. */
  readonly compressionLevel?: number;
}

export interface DeserializeOptions {
  readonly logger?: StructuredLogger;
}

function coordinateWidth(precision: CoordinatePrecision): number {
  return precision === 32 ? 4 : 8;
}

function encodedNodeLength(node: KdNode, precision: CoordinatePrecision): number {
  return 2 + 8 + 3 * coordinateWidth(precision) + (node.temperature !== undefined ? 8 : 0);
}

function encodeBody(index: SpatialIndex): Buffer {
  let length = 0;
  walkKdTree(index.root, (node) => {
    length += encodedNodeLength(node, index.precision);
  });

  const body = Buffer.alloc(length);
  let offset = 0;
  walkKdTree(index.root, (node) => {
    let flags = 0;
    if (node.left) flags |= NODE_HAS_LEFT;
    if (node.right) flags |= NODE_HAS_RIGHT;
    if (node.temperature !== undefined) flags |= NODE_HAS_TEMPERATURE;
    offset = body.writeUInt8(flags, offset);
    offset = body.writeUInt8(node.axis, offset);
    offset = body.writeBigInt64LE(BigInt(node.id), offset);
    for (const value of node.coords) {
      offset = index.precision === 32 ? body.writeFloatLE(value, offset) : body.writeDoubleLE(value, offset);
    }
    if (node.temperature !== undefined) {
      offset = body.writeDoubleLE(node.temperature, offset);
    }
  });
  return body;
}

function encodeMetadata(metadata: SourceMetadata): Buffer {
  if (metadata.checksum.byteLength !== CHECKSUM_LENGTH) {
    throw new RangeError(`source checksum must be ${CHECKSUM_LENGTH} bytes, got ${metadata.checksum.byteLength}`);
  }
  const tag = Buffer.from(metadata.releaseTag ?? "", "utf8");
  if (tag.length > 0xffff) {
    throw new RangeError("release tag exceeds 65535 bytes");
  }
  const buffer = Buffer.alloc(CHECKSUM_LENGTH + 2 + tag.length + 8);
  Buffer.from(metadata.checksum).copy(buffer, 0);
  let offset = buffer.writeUInt16LE(tag.length, CHECKSUM_LENGTH);
  offset += tag.copy(buffer, offset);
  buffer.writeBigInt64LE(BigInt(Math.trunc(metadata.buildTimestamp)), offset);
  return buffer;
}

/**
 * Encodes the index in the current format version: header, optional source
 * metadata, deflate-compressed pre-order body and a SHA-256 trailer over the
 * compressed body.
 */
export function serializeSpatialIndex(index: SpatialIndex, options: SerializeOptions = {}): Uint8Array {
  const compressed = deflateSync(encodeBody(index), { level: options.compressionLevel ?? -1 });
  const metadata = index.sourceMetadata ? encodeMetadata(index.sourceMetadata) : Buffer.alloc(0);

  const header = Buffer.alloc(HEADER_LENGTH);
  SPATIAL_INDEX_MAGIC.copy(header, 0);
  header.writeUInt8(SPATIAL_INDEX_FORMAT_VERSION, 4);
  let flags = 0;
  if (index.hasTemperature) flags |= FLAG_HAS_TEMPERATURE;
  if (index.sourceMetadata) flags |= FLAG_HAS_METADATA;
  header.writeUInt8(flags, 5);
  header.writeUInt32LE(index.size, 6);
  header.writeUInt8(index.precision, 10);

  const trailer = createHash("sha256").update(compressed).digest();
  return new Uint8Array(Buffer.concat([header, metadata, compressed, trailer]));
}

interface ParsedHeader {
  readonly version: number;
  readonly flags: number;
  readonly nodeCount: number;
  readonly precision: CoordinatePrecision;
}

function parseHeader(buffer: Buffer): ParsedHeader {
  if (buffer.length < HEADER_LENGTH) {
    throw new SpatialIndexFormatError(`spatial index truncated: ${buffer.length} bytes, header needs ${HEADER_LENGTH}`);
  }
  if (!buffer.subarray(0, 4).equals(SPATIAL_INDEX_MAGIC)) {
    throw new SpatialIndexFormatError("spatial index magic bytes do not match");
  }
  const version = buffer.readUInt8(4);
  if (version === 0) {
    throw new SpatialIndexFormatError("spatial index declares format version 0");
  }
  if (version > SPATIAL_INDEX_FORMAT_VERSION) {
    throw new UnsupportedIndexVersionError(version, SPATIAL_INDEX_FORMAT_VERSION);
  }
  const rawPrecision = buffer.readUInt8(10);
  if (rawPrecision !== 32 && rawPrecision !== 64) {
    throw new SpatialIndexFormatError(`unknown coordinate precision ${rawPrecision}`);
  }
  return {
    version,
    flags: buffer.readUInt8(5),
    nodeCount: buffer.readUInt32LE(6),
    precision: rawPrecision,
  };
}

function parseMetadata(buffer: Buffer, offset: number): { metadata: SourceMetadata; next: number } {
  const fixedEnd = offset + CHECKSUM_LENGTH + 2;
  if (buffer.length < fixedEnd) {
    throw new SpatialIndexFormatError("spatial index metadata truncated");
  }
  const checksum = new Uint8Array(buffer.subarray(offset, offset + CHECKSUM_LENGTH));
  const tagLength = buffer.readUInt16LE(offset + CHECKSUM_LENGTH);
  const tagEnd = fixedEnd + tagLength;
  if (buffer.length < tagEnd + 8) {
    throw new SpatialIndexFormatError("spatial index metadata truncated");
  }
  const tag = buffer.toString("utf8", fixedEnd, tagEnd);
  const buildTimestamp = Number(buffer.readBigInt64LE(tagEnd));
  return {
    metadata: { checksum, releaseTag: tag.length > 0 ? tag : null, buildTimestamp },
    next: tagEnd + 8,
  };
}

function toAxis(value: number): Axis {
  if (value === 0 || value === 1 || value === 2) {
    return value;
  }
  throw new CorruptIndexError(`invalid split axis ${value}`);
}

/** Pre-order reader rebuilding nodes (and their aggregates) bottom-up. */
class BodyReader {
  private offset = 0;
  private readonly seen = new Set<number>();

  constructor(
    private readonly body: Buffer,
    private readonly precision: CoordinatePrecision,
    private readonly temperaturesDeclared: boolean,
  ) {}

  get consumed(): number {
    return this.offset;
  }

  get nodeCount(): number {
    return this.seen.size;
  }

  private ensure(length: number): void {
    if (this.offset + length > this.body.length) {
      throw new CorruptIndexError("spatial index body ends in the middle of a node");
    }
  }

  private readCoordinate(): number {
    if (this.precision === 32) {
      this.ensure(4);
      const value = this.body.readFloatLE(this.offset);
      this.offset += 4;
      return value;
    }
    this.ensure(8);
    const value = this.body.readDoubleLE(this.offset);
    this.offset += 8;
    return value;
  }

  readNode(): KdNode {
    this.ensure(10);
    const flags = this.body.readUInt8(this.offset);
    const axis = toAxis(this.body.readUInt8(this.offset + 1));
    const id = Number(this.body.readBigInt64LE(this.offset + 2));
    this.offset += 10;
    if (!Number.isSafeInteger(id) || this.seen.has(id)) {
      throw new CorruptIndexError(`invalid or duplicate point id ${id}`);
    }
    this.seen.add(id);

    const coords = [this.readCoordinate(), this.readCoordinate(), this.readCoordinate()] as const;
    let temperature: number | undefined;
    if (flags & NODE_HAS_TEMPERATURE) {
      if (!this.temperaturesDeclared) {
        throw new CorruptIndexError("node carries a temperature but the header declares none");
      }
      this.ensure(8);
      temperature = this.body.readDoubleLE(this.offset);
      this.offset += 8;
    }

    const left = flags & NODE_HAS_LEFT ? this.readNode() : null;
    const right = flags & NODE_HAS_RIGHT ? this.readNode() : null;
    return createKdNode({ id, coords, ...(temperature !== undefined ? { temperature } : {}) }, axis, left, right);
  }
}

/**
 * Decodes an index produced by {@link serializeSpatialIndex}. Version 1 files
 * load with `sourceMetadata === null`.
 *
 * @throws SpatialIndexFormatError for a truncated buffer or bad magic.
 * @throws UnsupportedIndexVersionError for a newer format version.
 * @throws CorruptIndexError when the trailer, compression or body is inconsistent.
 */
export function deserializeSpatialIndex(bytes: Uint8Array, options: DeserializeOptions = {}): SpatialIndex {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const header = parseHeader(buffer);

  let offset = HEADER_LENGTH;
  let metadata: SourceMetadata | null = null;
  if (header.version >= SPATIAL_INDEX_FORMAT_VERSION && header.flags & FLAG_HAS_METADATA) {
    const parsed = parseMetadata(buffer, offset);
    metadata = parsed.metadata;
    offset = parsed.next;
  }

  if (buffer.length < offset + TRAILER_LENGTH) {
    throw new SpatialIndexFormatError("spatial index truncated before its checksum trailer");
  }
  const compressed = buffer.subarray(offset, buffer.length - TRAILER_LENGTH);
  const trailer = buffer.subarray(buffer.length - TRAILER_LENGTH);
  const digest = createHash("sha256").update(compressed).digest();
  if (!timingSafeEqual(digest, trailer)) {
    throw new CorruptIndexError("spatial index checksum mismatch");
  }

  let root: KdNode | null = null;
  try {
    const body = inflateSync(compressed);
    const reader = new BodyReader(body, header.precision, (header.flags & FLAG_HAS_TEMPERATURE) !== 0);
    root = body.length > 0 ? reader.readNode() : null;
    if (reader.consumed !== body.length) {
      throw new CorruptIndexError("spatial index body has trailing bytes");
    }
    if (reader.nodeCount !== header.nodeCount) {
      throw new CorruptIndexError(`spatial index declares ${header.nodeCount} nodes but holds ${reader.nodeCount}`);
    }
  } catch (error) {
    if (error instanceof SpatialIndexError) {
      throw error;
    }
    throw new CorruptIndexError(
      `spatial index body could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const index = new SpatialIndex({ root, precision: header.precision, metadata, formatVersion: header.version });
  if (header.version === LEGACY_INDEX_FORMAT_VERSION) {
    options.logger?.warn("spatial_index_legacy_format", { version: header.version, points: index.size });
  }
  options.logger?.info("spatial_index_loaded", {
    version: header.version,
    points: index.size,
    precision: header.precision,
    has_metadata: metadata !== null,
  });
  return index;
}
