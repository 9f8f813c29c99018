/** Cartesian coordinates of a point, in light-years. */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Coordinates as a tuple indexed by split axis (0 = x, 1 = y, 2 = z). */
export type Vector3 = readonly [number, number, number];

export function toVector(position: Position): Vector3 {
  return [position.x, position.y, position.z];
}

export function squaredDistance(a: Vector3, b: Vector3): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  const dz = a[2] - b[2];
  return dx * dx + dy * dy + dz * dz;
}

/** Straight-line distance between two positions. */
export function distanceBetween(a: Position, b: Position): number {
  return Math.sqrt(squaredDistance(toVector(a), toVector(b)));
}
