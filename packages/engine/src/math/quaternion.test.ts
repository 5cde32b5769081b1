import { describe, expect, it } from "vitest";
import {
  eulerDegreesFromQuaternion,
  forward,
  identityQuaternion,
  quaternionFromEulerDegrees,
  slerpQuaternion,
} from "./quaternion.js";

describe("quaternion helpers", () => {
  it("looks down +Z with the identity rotation", () => {
    const dir = forward(identityQuaternion());
    expect(dir.x).toBeCloseTo(0, 10);
    expect(dir.y).toBeCloseTo(0, 10);
    expect(dir.z).toBeCloseTo(1, 10);
  });

  it("turns forward to +X after a 90 degree yaw", () => {
    const dir = forward(quaternionFromEulerDegrees(0, 90, 0));
    expect(dir.x).toBeCloseTo(1, 6);
    expect(dir.y).toBeCloseTo(0, 6);
    expect(dir.z).toBeCloseTo(0, 6);
  });

  it("turns forward to -Y after a 90 degree pitch", () => {
    const dir = forward(quaternionFromEulerDegrees(90, 0, 0));
    expect(dir.x).toBeCloseTo(0, 6);
    expect(dir.y).toBeCloseTo(-1, 6);
    expect(dir.z).toBeCloseTo(0, 6);
  });

  it("builds the yaw quaternion from euler degrees", () => {
    const q = quaternionFromEulerDegrees(0, 90, 0);
    expect(q.x).toBeCloseTo(0, 10);
    expect(q.y).toBeCloseTo(Math.SQRT1_2, 10);
    expect(q.z).toBeCloseTo(0, 10);
    expect(q.w).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("recovers euler degrees from a quaternion", () => {
    const euler = eulerDegreesFromQuaternion(quaternionFromEulerDegrees(30, 45, 10));
    expect(euler.x).toBeCloseTo(30, 6);
    expect(euler.y).toBeCloseTo(45, 6);
    expect(euler.z).toBeCloseTo(10, 6);
  });

  it("slerps halfway between two yaws", () => {
    const half = slerpQuaternion(identityQuaternion(), quaternionFromEulerDegrees(0, 90, 0), 0.5);
    const expectedHalfAngle = Math.PI / 8;
    expect(half.x).toBeCloseTo(0, 10);
    expect(half.y).toBeCloseTo(Math.sin(expectedHalfAngle), 6);
    expect(half.z).toBeCloseTo(0, 10);
    expect(half.w).toBeCloseTo(Math.cos(expectedHalfAngle), 6);
  });

  it("returns the endpoints at t = 0 and t = 1", () => {
    const target = quaternionFromEulerDegrees(10, 20, 30);
    const end = slerpQuaternion(identityQuaternion(), target, 1);
    expect(end.x).toBeCloseTo(target.x, 10);
    expect(end.w).toBeCloseTo(target.w, 10);
    expect(slerpQuaternion(identityQuaternion(), target, 0)).toEqual(identityQuaternion());
  });
});
