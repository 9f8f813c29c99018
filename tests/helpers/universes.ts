import { PointSet, type GateLinkInput, type PointInput } from "../../src/universe/pointSet.js";

/** Three unpositioned systems joined by gates A-B and B-C, 10 units each. */
export function gateLine(): PointSet {
  return PointSet.from({
    points: [
      { id: 1, name: "A" },
      { id: 2, name: "B" },
      { id: 3, name: "C" },
    ],
    gates: [
      { from: 1, to: 2, distance: 10 },
      { from: 2, to: 3, distance: 10 },
    ],
  });
}

/**
 * A and C are positioned 15 units apart; B has no coordinates and sits on
 * the 10 + 10 gate path between them.
 */
export function shortcutTriangle(extra: { cTemperature?: number } = {}): PointSet {
  return PointSet.from({
    points: [
      { id: 1, name: "A", position: { x: 0, y: 0, z: 0 } },
      { id: 2, name: "B" },
      {
        id: 3,
        name: "C",
        position: { x: 15, y: 0, z: 0 },
        ...(extra.cTemperature !== undefined ? { temperature: extra.cTemperature } : {}),
      },
    ],
    gates: [
      { from: 1, to: 2, distance: 10 },
      { from: 2, to: 3, distance: 10 },
    ],
  });
}

const RING_OFFSETS: ReadonlyArray<readonly [number, number, number]> = [
  [1, 1, 0],
  [1, -1, 0],
  [-1, 1, 0],
  [-1, -1, 0],
  [1, 0, 1],
  [1, 0, -1],
  [-1, 0, 1],
  [-1, 0, -1],
  [0, 1, 1],
  [0, 1, -1],
  [0, -1, 1],
  [0, -1, -1],
];

/**
 * Cool systems S (id 1) and G (id 2), 20 units apart, each ringed by twelve
 * hot systems (temperature 500) one diagonal step away. Without a
 * temperature cap the rings fill every spatial neighbourhood.
 */
export function ringedPair(): PointSet {
  const ring = (firstId: number, prefix: string, centreX: number): PointInput[] =>
    RING_OFFSETS.map(([x, y, z], index) => ({
      id: firstId + index,
      name: `${prefix}-${index + 1}`,
      position: { x: centreX + x, y, z },
      temperature: 500,
    }));
  return PointSet.from({
    points: [
      { id: 1, name: "S", position: { x: 0, y: 0, z: 0 }, temperature: 100 },
      { id: 2, name: "G", position: { x: 20, y: 0, z: 0 }, temperature: 100 },
      ...ring(10, "SR", 0),
      ...ring(30, "GR", 20),
    ],
  });
}

/** Deterministic pseudo-random generator (mulberry32). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * `count` positioned systems scattered in a 100-unit cube. Every third system
 * has no temperature; the others get one between 0 and 200.
 */
export function scatteredPoints(count: number, seed = 7): PointInput[] {
  const random = seededRandom(seed);
  const points: PointInput[] = [];
  for (let id = 1; id <= count; id += 1) {
    const position = { x: random() * 100, y: random() * 100, z: random() * 100 };
    const temperature = random() * 200;
    points.push({
      id,
      name: `S-${id}`,
      position,
      ...(id % 3 === 0 ? {} : { temperature }),
    });
  }
  return points;
}

export function scatteredUniverse(count: number, seed = 7, gates: GateLinkInput[] = []): PointSet {
  return PointSet.from({ points: scatteredPoints(count, seed), gates, releaseTag: "test-release" });
}
