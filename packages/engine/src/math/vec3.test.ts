import { describe, expect, it } from "vitest";
import {
  add,
  distance,
  dot,
  lerpVec3,
  normalize,
  scale,
  subtract,
  vec3FromTuple,
  vec3ToTuple,
} from "./vec3.js";

describe("vec3", () => {
  it("adds, subtracts and scales component-wise", () => {
    expect(add({ x: 1, y: 2, z: 3 }, { x: 0.5, y: -2, z: 1 })).toEqual({ x: 1.5, y: 0, z: 4 });
    expect(subtract({ x: 1, y: 2, z: 3 }, { x: 1, y: 1, z: 1 })).toEqual({ x: 0, y: 1, z: 2 });
    expect(scale({ x: 1, y: -2, z: 0.5 }, 4)).toEqual({ x: 4, y: -8, z: 2 });
  });

  it("computes dot products and distances", () => {
    expect(dot({ x: 1, y: 2, z: 3 }, { x: 4, y: -5, z: 6 })).toBe(12);
    expect(distance({ x: 0, y: 0, z: 0 }, { x: 3, y: 4, z: 0 })).toBe(5);
  });

  it("normalizes to unit length and falls back to +Z for zero vectors", () => {
    expect(normalize({ x: 0, y: 0, z: -8 })).toEqual({ x: 0, y: 0, z: -1 });
    expect(normalize({ x: 0, y: 0, z: 0 })).toEqual({ x: 0, y: 0, z: 1 });
  });

  it("interpolates linearly", () => {
    expect(lerpVec3({ x: 0, y: 0, z: 0 }, { x: 10, y: -4, z: 2 }, 0.5)).toEqual({ x: 5, y: -2, z: 1 });
  });

  it("converts to and from tuples", () => {
    expect(vec3ToTuple({ x: 1, y: 2, z: 3 })).toEqual([1, 2, 3]);
    expect(vec3FromTuple([4, 5, 6])).toEqual({ x: 4, y: 5, z: 6 });
  });
});
