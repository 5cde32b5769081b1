export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export type Vec3Tuple = [number, number, number];

const EPSILON = 1e-8;

export const ZERO_VEC3: Readonly<Vec3> = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(vec: Vec3, factor: number): Vec3 {
  return { x: vec.x * factor, y: vec.y * factor, z: vec.z * factor };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function length(vec: Vec3): number {
  return Math.hypot(vec.x, vec.y, vec.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(subtract(a, b));
}

/**
 * Unit-length copy of `vec`. Degenerate input falls back to +Z, the
 * bookmark forward axis.
 */
export function normalize(vec: Vec3): Vec3 {
  const len = length(vec);
  if (len < EPSILON) {
    return { x: 0, y: 0, z: 1 };
  }
  return {
    x: vec.x / len,
    y: vec.y / len,
    z: vec.z / len,
  };
}

export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export function cloneVec3(vec: Vec3): Vec3 {
  return { x: vec.x, y: vec.y, z: vec.z };
}

export function vec3ToTuple(vec: Vec3): Vec3Tuple {
  return [vec.x, vec.y, vec.z];
}

export function vec3FromTuple(tuple: readonly [number, number, number]): Vec3 {
  return { x: tuple[0], y: tuple[1], z: tuple[2] };
}
