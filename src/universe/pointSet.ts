import { createHash } from "node:crypto";
import { z } from "zod";

import { ERROR_CODES } from "../types.js";
import type { Position } from "./geometry.js";

/** Stable identity of a point (star system) within a point-set. */
export type PointId = number;

/** Immutable point as stored in a {@link PointSet}. */
export interface Point {
  readonly id: PointId;
  readonly name: string;
  readonly position?: Position;
  readonly region?: string;
  /** Opaque ambient temperature scalar (Kelvin) supplied by the data collaborator. */
  readonly temperature?: number;
}

/**
 * Undirected gate connection. The explicit distance is only consulted when one
 * of the endpoints has no coordinates.
 */
export interface GateLink {
  readonly from: PointId;
  readonly to: PointId;
  readonly distance?: number;
}

const PositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

const PointInputSchema = z.object({
  id: z.number().int().refine(Number.isSafeInteger, "id must be a safe integer"),
  name: z.string().trim().min(1),
  position: PositionSchema.optional(),
  region: z.string().optional(),
  temperature: z.number().finite().optional(),
});

const GateLinkSchema = z.object({
  from: z.number().int(),
  to: z.number().int(),
  distance: z.number().finite().positive().optional(),
});

export type PointInput = z.input<typeof PointInputSchema>;
export type GateLinkInput = z.input<typeof GateLinkSchema>;

/** Raw content accepted by {@link PointSet.from}. */
export interface PointSetInput {
  readonly points: Iterable<PointInput>;
  readonly gates?: Iterable<GateLinkInput>;
  /** Human readable label of the dataset release the snapshot comes from. */
  readonly releaseTag?: string;
}

/** Error raised when the supplied point-set content is malformed. */
export class PointSetValidationError extends Error {
  public readonly code: typeof ERROR_CODES.GRAPH_INVALID_INPUT;
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid point-set: ${issues.join("; ")}`);
    this.name = "PointSetValidationError";
    this.code = ERROR_CODES.GRAPH_INVALID_INPUT;
    this.issues = issues;
  }
}

function freezePoint(input: z.output<typeof PointInputSchema>): Point {
  const point: {
    id: PointId;
    name: string;
    position?: Position;
    region?: string;
    temperature?: number;
  } = { id: input.id, name: input.name };
  if (input.position) {
    point.position = Object.freeze({ ...input.position });
  }
  if (input.region !== undefined) {
    point.region = input.region;
  }
  if (input.temperature !== undefined) {
    point.temperature = input.temperature;
  }
  return Object.freeze(point);
}

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `.${issue.path.join(".")}` : "";
    return `${prefix}${path}: ${issue.message}`;
  });
}

/**
 * Immutable snapshot of the universe: points, the gate relation and a name
 * index. Derived artifacts (graphs, spatial index) are built from it and can be
 * matched against its {@link checksum} fingerprint.
 */
export class PointSet {
  private readonly byId: ReadonlyMap<PointId, Point>;
  private readonly byName: ReadonlyMap<string, PointId>;
  private readonly gateLinks: readonly GateLink[];
  private digest: Buffer | null = null;

  private constructor(
    points: Point[],
    gates: GateLink[],
    readonly releaseTag: string | null,
  ) {
    this.byId = new Map(points.map((point) => [point.id, point]));
    this.byName = new Map(points.map((point) => [point.name, point.id]));
    this.gateLinks = Object.freeze(gates);
  }

  /**
   * Validates the raw content and freezes it. Duplicate ids or names are
   * rejected; gate links naming unknown points are kept and reported by the
   * graph builders.
   */
  static from(input: PointSetInput): PointSet {
    const issues: string[] = [];
    const points: Point[] = [];
    const seenIds = new Set<PointId>();
    const seenNames = new Set<string>();

    let index = 0;
    for (const raw of input.points) {
      const parsed = PointInputSchema.safeParse(raw);
      if (!parsed.success) {
        issues.push(...formatIssues(`points[${index}]`, parsed.error));
      } else if (seenIds.has(parsed.data.id)) {
        issues.push(`points[${index}]: duplicate id ${parsed.data.id}`);
      } else if (seenNames.has(parsed.data.name)) {
        issues.push(`points[${index}]: duplicate name '${parsed.data.name}'`);
      } else {
        seenIds.add(parsed.data.id);
        seenNames.add(parsed.data.name);
        points.push(freezePoint(parsed.data));
      }
      index += 1;
    }

    const gates: GateLink[] = [];
    index = 0;
    for (const raw of input.gates ?? []) {
      const parsed = GateLinkSchema.safeParse(raw);
      if (parsed.success) {
        gates.push(Object.freeze({ ...parsed.data }));
      } else {
        issues.push(...formatIssues(`gates[${index}]`, parsed.error));
      }
      index += 1;
    }

    if (issues.length > 0) {
      throw new PointSetValidationError(issues);
    }

    const tag = input.releaseTag?.trim();
    return new PointSet(points, gates, tag && tag.length > 0 ? tag : null);
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: PointId): Point | undefined {
    return this.byId.get(id);
  }

  has(id: PointId): boolean {
    return this.byId.has(id);
  }

  /** Points in insertion order. */
  points(): Point[] {
    return Array.from(this.byId.values());
  }

  ids(): PointId[] {
    return Array.from(this.byId.keys());
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  gates(): readonly GateLink[] {
    return this.gateLinks;
  }

  idByName(name: string): PointId | undefined {
    return this.byName.get(name);
  }

  nameOf(id: PointId): string | undefined {
    return this.byId.get(id)?.name;
  }

  /**
   * SHA-256 fingerprint of the canonical content (points sorted by id, gate
   * pairs normalised and sorted). Two snapshots with equal content share the
   * same checksum regardless of input order.
   */
  checksum(): Uint8Array {
    if (!this.digest) {
      this.digest = computeDigest(this.points(), this.gateLinks);
    }
    return new Uint8Array(this.digest);
  }

  checksumHex(): string {
    return Buffer.from(this.checksum()).toString("hex");
  }
}

function formatOptional(value: number | string | undefined): string {
  return value === undefined ? "" : String(value);
}

function computeDigest(points: readonly Point[], gates: readonly GateLink[]): Buffer {
  const hash = createHash("sha256");
  const sortedPoints = [...points].sort((a, b) => a.id - b.id);
  for (const point of sortedPoints) {
    const position = point.position;
    hash.update(
      [
        "P",
        point.id,
        JSON.stringify(point.name),
        formatOptional(position?.x),
        formatOptional(position?.y),
        formatOptional(position?.z),
        formatOptional(point.region === undefined ? undefined : JSON.stringify(point.region)),
        formatOptional(point.temperature),
      ].join("|"),
    );
    hash.update("\n");
  }

  const pairs = new Map<string, string>();
  for (const gate of gates) {
    const low = Math.min(gate.from, gate.to);
    const high = Math.max(gate.from, gate.to);
    const key = `${low}|${high}`;
    const line = `G|${key}|${formatOptional(gate.distance)}`;
    const existing = pairs.get(key);
    if (existing === undefined || line < existing) {
      pairs.set(key, line);
    }
  }
  for (const line of Array.from(pairs.values()).sort()) {
    hash.update(line);
    hash.update("\n");
  }
  return hash.digest();
}
