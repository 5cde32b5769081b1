import { describe, expect, it } from "vitest";
import { identityQuaternion, quaternionFromEulerDegrees } from "../math/quaternion.js";
import {
  cameraDistanceFromPosition,
  cameraPositionFromPose,
  cloneRecord,
  createBookmarkRecord,
  defaultBookmarkName,
  poseFromRecord,
  recordFromPose,
  withCameraPosition,
} from "./record.js";

describe("createBookmarkRecord", () => {
  it("derives the pivot from camera position, forward axis and distance", () => {
    const record = createBookmarkRecord({
      name: "Gate",
      cameraPosition: { x: 1, y: 2, z: 3 },
      cameraDistance: 5,
    });
    expect(record.pivotPoint).toEqual({ x: 1, y: 2, z: 8 });
    expect(record.orientation).toEqual(identityQuaternion());
    expect(record.color).toEqual({ r: 1, g: 1, b: 1, a: 1 });
  });

  it("floors a negative distance at zero", () => {
    const record = createBookmarkRecord({
      name: "Flat",
      cameraPosition: { x: 4, y: 0, z: 0 },
      cameraDistance: -3,
    });
    expect(record.cameraDistance).toBe(0);
    expect(record.pivotPoint).toEqual({ x: 4, y: 0, z: 0 });
  });
});

describe("withCameraPosition", () => {
  it("moves the pivot along with the camera", () => {
    const record = createBookmarkRecord({
      name: "Side",
      cameraPosition: { x: 0, y: 0, z: 0 },
      orientation: quaternionFromEulerDegrees(0, 90, 0),
      cameraDistance: 2,
    });
    const moved = withCameraPosition(record, { x: 0, y: 5, z: 0 });
    expect(moved.cameraPosition).toEqual({ x: 0, y: 5, z: 0 });
    expect(moved.pivotPoint.x).toBeCloseTo(2, 6);
    expect(moved.pivotPoint.y).toBeCloseTo(5, 6);
    expect(moved.pivotPoint.z).toBeCloseTo(0, 6);
    expect(record.cameraPosition).toEqual({ x: 0, y: 0, z: 0 });
  });
});

describe("pose conversion", () => {
  it("round-trips a pose through a record", () => {
    const pose = {
      pivot: { x: 0, y: 0, z: 10 },
      rotation: identityQuaternion(),
      size: 4,
      orthographic: true,
      distance: 6,
    };
    const record = recordFromPose(pose, "Top");
    expect(record.cameraPosition).toEqual({ x: 0, y: 0, z: 4 });
    expect(poseFromRecord(record)).toEqual(pose);
  });

  it("computes the camera position behind the pivot", () => {
    const position = cameraPositionFromPose({
      pivot: { x: 3, y: 0, z: 0 },
      rotation: identityQuaternion(),
      size: 1,
      orthographic: false,
      distance: 2,
    });
    expect(position).toEqual({ x: 3, y: 0, z: -2 });
  });
});

describe("cameraDistanceFromPosition", () => {
  it("projects the pivot offset onto the forward axis", () => {
    const d = cameraDistanceFromPosition({ x: 1, y: 7, z: 9 }, { x: 0, y: 0, z: 1 }, identityQuaternion());
    expect(d).toBe(8);
  });

  it("returns zero when the pivot is behind the camera", () => {
    const d = cameraDistanceFromPosition({ x: 0, y: 0, z: -4 }, { x: 0, y: 0, z: 0 }, identityQuaternion());
    expect(d).toBe(0);
  });
});

describe("cloneRecord", () => {
  it("shares no nested objects with the source", () => {
    const record = createBookmarkRecord({ name: "A", cameraPosition: { x: 0, y: 0, z: 0 } });
    const copy = cloneRecord(record);
    copy.pivotPoint.x = 99;
    copy.color.r = 0;
    expect(record.pivotPoint.x).toBe(0);
    expect(record.color.r).toBe(1);
  });
});

describe("defaultBookmarkName", () => {
  it("formats the local time as HHmmss", () => {
    expect(defaultBookmarkName(new Date(2024, 4, 6, 9, 3, 7))).toBe("Bookmark 090307");
  });
});
