import * as THREE from "three";
import { degToRad, radToDeg } from "./scalar.js";
import type { Vec3 } from "./vec3.js";

export interface Quaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

export type QuaternionTuple = [number, number, number, number];

// Rotations apply Z first, then X, then Y.
const EULER_ORDER = "YXZ";

const _qa = new THREE.Quaternion();
const _qb = new THREE.Quaternion();
const _vec = new THREE.Vector3();
const _euler = new THREE.Euler();

function toThree(target: THREE.Quaternion, q: Quaternion): THREE.Quaternion {
  return target.set(q.x, q.y, q.z, q.w);
}

function fromThree(q: THREE.Quaternion): Quaternion {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}

export function identityQuaternion(): Quaternion {
  return { x: 0, y: 0, z: 0, w: 1 };
}

export function normalizeQuaternion(q: Quaternion): Quaternion {
  const len = Math.hypot(q.x, q.y, q.z, q.w);
  if (len === 0) return identityQuaternion();
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/**
 * The +Z axis rotated by `q`; bookmarks look down their local +Z.
 */
export function forward(q: Quaternion): Vec3 {
  _vec.set(0, 0, 1).applyQuaternion(toThree(_qa, normalizeQuaternion(q)));
  return { x: _vec.x, y: _vec.y, z: _vec.z };
}

export function slerpQuaternion(a: Quaternion, b: Quaternion, t: number): Quaternion {
  toThree(_qa, a);
  toThree(_qb, b);
  return fromThree(_qa.slerp(_qb, t));
}

export function quaternionFromEulerDegrees(x: number, y: number, z: number): Quaternion {
  _euler.set(degToRad(x), degToRad(y), degToRad(z), EULER_ORDER);
  return fromThree(_qa.setFromEuler(_euler));
}

export function eulerDegreesFromQuaternion(q: Quaternion): Vec3 {
  _euler.setFromQuaternion(toThree(_qa, normalizeQuaternion(q)), EULER_ORDER);
  return { x: radToDeg(_euler.x), y: radToDeg(_euler.y), z: radToDeg(_euler.z) };
}

export function cloneQuaternion(q: Quaternion): Quaternion {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}

export function quaternionToTuple(q: Quaternion): QuaternionTuple {
  return [q.x, q.y, q.z, q.w];
}

export function quaternionFromTuple(tuple: readonly [number, number, number, number]): Quaternion {
  return { x: tuple[0], y: tuple[1], z: tuple[2], w: tuple[3] };
}
