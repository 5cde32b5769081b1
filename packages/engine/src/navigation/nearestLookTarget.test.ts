import { describe, expect, it } from "vitest";
import { createBookmarkRecord } from "../bookmark/record.js";
import type { BookmarkRecord } from "../bookmark/types.js";
import type { Vec3 } from "../math/vec3.js";
import { nearestLookTarget, scoreLookTarget } from "./nearestLookTarget.js";

function atPivot(name: string, pivot: Vec3): BookmarkRecord {
  // Identity orientation looks down +Z, so the camera sits `distance` behind the pivot.
  return createBookmarkRecord({
    name,
    cameraPosition: { x: pivot.x, y: pivot.y, z: pivot.z - 2 },
    cameraDistance: 2,
  });
}

const ORIGIN = { x: 0, y: 0, z: 0 };
const ALONG_X = { x: 1, y: 0, z: 0 };

describe("scoreLookTarget", () => {
  it("scores a point on the ray as zero", () => {
    expect(scoreLookTarget({ x: 10, y: 0, z: 0 }, ORIGIN, ALONG_X)).toBe(0);
  });

  it("uses the perpendicular distance in front of the origin", () => {
    expect(scoreLookTarget({ x: 4, y: 3, z: 0 }, ORIGIN, ALONG_X)).toBe(3);
  });

  it("doubles the distance behind the origin", () => {
    expect(scoreLookTarget({ x: -3, y: 4, z: 0 }, ORIGIN, ALONG_X)).toBe(8);
  });

  it("does not penalize a point level with the origin", () => {
    expect(scoreLookTarget({ x: 0, y: 0, z: -5 }, ORIGIN, ALONG_X)).toBe(5);
  });
});

describe("nearestLookTarget", () => {
  it("returns null for an empty list", () => {
    expect(nearestLookTarget([], ORIGIN, ALONG_X)).toBeNull();
  });

  it("returns the only record with its perpendicular distance", () => {
    const match = nearestLookTarget([atPivot("Solo", { x: 6, y: 0, z: 2 })], ORIGIN, ALONG_X);
    expect(match).toEqual({ index: 0, score: 2 });
  });

  it("prefers the first of equally scored records", () => {
    const records = [
      atPivot("A", { x: 0, y: 0, z: 0 }),
      atPivot("B", { x: 10, y: 0, z: 0 }),
      atPivot("C", { x: 0, y: 0, z: -5 }),
    ];
    expect(nearestLookTarget(records, ORIGIN, ALONG_X)).toEqual({ index: 0, score: 0 });
  });

  it("lets a record in front beat a closer one behind", () => {
    const records = [
      atPivot("Behind", { x: -1, y: 2, z: 0 }),
      atPivot("Ahead", { x: 8, y: 3, z: 0 }),
    ];
    expect(nearestLookTarget(records, ORIGIN, ALONG_X)).toEqual({ index: 1, score: 3 });
  });

  it("picks the record closest to an off-axis ray", () => {
    const direction = { x: 0, y: 0, z: -1 };
    const records = [
      atPivot("Far", { x: 5, y: 0, z: -10 }),
      atPivot("Near", { x: 0, y: 1, z: -20 }),
      atPivot("Wide", { x: -3, y: 0, z: -4 }),
    ];
    expect(nearestLookTarget(records, { x: 0, y: 0, z: 0 }, direction)).toEqual({ index: 1, score: 1 });
  });
});
