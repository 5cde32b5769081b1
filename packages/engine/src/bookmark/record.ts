import { cloneQuaternion, forward, identityQuaternion, type Quaternion } from "../math/quaternion.js";
import { add, cloneVec3, dot, scale, subtract, type Vec3 } from "../math/vec3.js";
import { WHITE, type BookmarkRecord, type Pose, type Rgba } from "./types.js";

/**
 * Pivot implied by a camera position, orientation and distance:
 * `cameraPosition + forward(orientation) * max(0, cameraDistance)`.
 */
export function pivotFromCamera(cameraPosition: Vec3, orientation: Quaternion, cameraDistance: number): Vec3 {
  return add(cameraPosition, scale(forward(orientation), Math.max(0, cameraDistance)));
}

export function cameraPositionFromPose(pose: Pose): Vec3 {
  return subtract(pose.pivot, scale(forward(pose.rotation), Math.max(0, pose.distance)));
}

/**
 * Distance for hosts that do not track one: the pivot's projection onto the
 * camera's forward axis, floored at zero.
 */
export function cameraDistanceFromPosition(pivot: Vec3, cameraPosition: Vec3, rotation: Quaternion): number {
  return Math.max(0, dot(subtract(pivot, cameraPosition), forward(rotation)));
}

export function reconcilePivot(record: BookmarkRecord): BookmarkRecord {
  return {
    ...cloneRecord(record),
    pivotPoint: pivotFromCamera(record.cameraPosition, record.orientation, record.cameraDistance),
  };
}

export function withCameraPosition(record: BookmarkRecord, position: Vec3): BookmarkRecord {
  return reconcilePivot({ ...record, cameraPosition: cloneVec3(position) });
}

export function poseFromRecord(record: BookmarkRecord): Pose {
  return {
    pivot: pivotFromCamera(record.cameraPosition, record.orientation, record.cameraDistance),
    rotation: cloneQuaternion(record.orientation),
    size: record.projectionSize,
    orthographic: record.orthographic,
    distance: Math.max(0, record.cameraDistance),
  };
}

export function recordFromPose(pose: Pose, name: string, color: Rgba = WHITE): BookmarkRecord {
  return {
    name,
    pivotPoint: cloneVec3(pose.pivot),
    orientation: cloneQuaternion(pose.rotation),
    projectionSize: pose.size,
    orthographic: pose.orthographic,
    color: { ...color },
    cameraDistance: Math.max(0, pose.distance),
    cameraPosition: cameraPositionFromPose(pose),
  };
}

export function clonePose(pose: Pose): Pose {
  return {
    pivot: cloneVec3(pose.pivot),
    rotation: cloneQuaternion(pose.rotation),
    size: pose.size,
    orthographic: pose.orthographic,
    distance: pose.distance,
  };
}

export function cloneRecord(record: BookmarkRecord): BookmarkRecord {
  return {
    name: record.name,
    pivotPoint: cloneVec3(record.pivotPoint),
    orientation: cloneQuaternion(record.orientation),
    projectionSize: record.projectionSize,
    orthographic: record.orthographic,
    color: { ...record.color },
    cameraDistance: record.cameraDistance,
    cameraPosition: cloneVec3(record.cameraPosition),
  };
}

/** First field holding a non-finite number, e.g. "cameraPosition.x", or null. */
export function findNonFiniteField(record: BookmarkRecord): string | null {
  const fields: Array<[string, number]> = [
    ["pivotPoint.x", record.pivotPoint.x],
    ["pivotPoint.y", record.pivotPoint.y],
    ["pivotPoint.z", record.pivotPoint.z],
    ["orientation.x", record.orientation.x],
    ["orientation.y", record.orientation.y],
    ["orientation.z", record.orientation.z],
    ["orientation.w", record.orientation.w],
    ["projectionSize", record.projectionSize],
    ["color.r", record.color.r],
    ["color.g", record.color.g],
    ["color.b", record.color.b],
    ["color.a", record.color.a],
    ["cameraDistance", record.cameraDistance],
    ["cameraPosition.x", record.cameraPosition.x],
    ["cameraPosition.y", record.cameraPosition.y],
    ["cameraPosition.z", record.cameraPosition.z],
  ];
  for (const [field, value] of fields) {
    if (!Number.isFinite(value)) return field;
  }
  return null;
}

export interface CreateBookmarkInput {
  name: string;
  cameraPosition: Vec3;
  orientation?: Quaternion;
  cameraDistance?: number;
  projectionSize?: number;
  orthographic?: boolean;
  color?: Rgba;
}

/**
 * Build a record from a camera placement; the pivot is derived, never passed.
 */
export function createBookmarkRecord(input: CreateBookmarkInput): BookmarkRecord {
  const orientation = input.orientation ?? identityQuaternion();
  const cameraDistance = Math.max(0, input.cameraDistance ?? 10);
  return {
    name: input.name,
    pivotPoint: pivotFromCamera(input.cameraPosition, orientation, cameraDistance),
    orientation: cloneQuaternion(orientation),
    projectionSize: input.projectionSize ?? 10,
    orthographic: input.orthographic ?? false,
    color: { ...(input.color ?? WHITE) },
    cameraDistance,
    cameraPosition: cloneVec3(input.cameraPosition),
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function defaultBookmarkName(date: Date): string {
  return `Bookmark ${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}
