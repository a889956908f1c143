/**
 * Integer 3D vector operations
 *
 * Cube positions are integer tuples centered on the origin: cubie index k
 * along an axis maps to 2k - (N - 1). Everything here is exact integer math.
 */

export type Vec3 = readonly [number, number, number];

/**
 * Coordinate axis index: 0 = x (L to R), 1 = y (D to U), 2 = z (B to F)
 */
export type Axis = 0 | 1 | 2;

export const AXES: readonly Axis[] = [0, 1, 2];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Add two vectors: a + b
 */
export function add3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Negate a vector
 */
export function neg3(v: Vec3): Vec3 {
  return [-v[0], -v[1], -v[2]];
}

/**
 * Dot product: a · b
 */
export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function equals3(a: Vec3, b: Vec3): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/**
 * Stable string key, used for position lookups
 */
export function key3(v: Vec3): string {
  return `${v[0]},${v[1]},${v[2]}`;
}


/**
 * Axis of a vector that has exactly one non-zero component, or null
 */
export function axisOf(v: Vec3): Axis | null {
  const nonZero = AXES.filter((a) => v[a] !== 0);
  return nonZero.length === 1 ? nonZero[0] : null;
}

/**
 * True when a and b lie on the same line through the origin
 */
export function isParallel3(a: Vec3, b: Vec3): boolean {
  const ab = dot3(a, b);
  return ab * ab === dot3(a, a) * dot3(b, b);
}
