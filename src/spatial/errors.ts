import { ERROR_CODES } from "../types.js";

/** Codes surfaced by the spatial-index reader. */
export type SpatialIndexErrorCode =
  | typeof ERROR_CODES.INDEX_CORRUPT
  | typeof ERROR_CODES.INDEX_UNSUPPORTED_VERSION
  | typeof ERROR_CODES.INDEX_MALFORMED;

/** Base class of every failure raised while decoding a serialized index. */
export abstract class SpatialIndexError extends Error {
  /** Stable code callers branch on. */
  public readonly code: SpatialIndexErrorCode;

  /** Optional operator hint describing how to recover. */
  public readonly hint?: string;

  protected constructor(code: SpatialIndexErrorCode, message: string, hint?: string) {
    super(message);
    this.code = code;
    this.hint = hint;
  }
}

/** Truncated buffer or wrong magic bytes: the input is not an index at all. */
export class SpatialIndexFormatError extends SpatialIndexError {
  constructor(message: string) {
    super(ERROR_CODES.INDEX_MALFORMED, message, "rebuild the spatial index from the point-set");
    this.name = "SpatialIndexFormatError";
  }
}

/** Format version newer than this reader understands. */
export class UnsupportedIndexVersionError extends SpatialIndexError {
  public readonly version: number;
  public readonly supported: number;

  constructor(version: number, supported: number) {
    super(
      ERROR_CODES.INDEX_UNSUPPORTED_VERSION,
      `spatial index format version ${version} is newer than the supported version ${supported}`,
      "upgrade the engine or rebuild the index with this version",
    );
    this.name = "UnsupportedIndexVersionError";
    this.version = version;
    this.supported = supported;
  }
}

/** Checksum mismatch, decompression failure or an inconsistent body. */
export class CorruptIndexError extends SpatialIndexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.INDEX_CORRUPT, message, "delete the cached index and rebuild it");
    this.name = "CorruptIndexError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
