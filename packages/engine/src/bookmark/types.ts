import type { Quaternion } from "../math/quaternion.js";
import type { Vec3 } from "../math/vec3.js";

/**
 * Identifies the scene a bookmark bucket belongs to. Distinct keys never share
 * bookmarks.
 */
export type ContextKey = string;

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface BookmarkRecord {
  name: string;
  /** Point the camera orbits around. Kept in sync with `cameraPosition`. */
  pivotPoint: Vec3;
  orientation: Quaternion;
  /** Orthographic half-height, or the perspective framing size. */
  projectionSize: number;
  orthographic: boolean;
  color: Rgba;
  /** Camera-to-pivot distance along the forward axis, never negative. */
  cameraDistance: number;
  cameraPosition: Vec3;
}

/**
 * Viewpoint as read from or pushed to a host viewport.
 */
export interface Pose {
  pivot: Vec3;
  rotation: Quaternion;
  size: number;
  orthographic: boolean;
  distance: number;
}

export interface BookmarkPreferences {
  showMarkers: boolean;
  showLabels: boolean;
  animate: boolean;
  transitionSeconds: number;
}

export const DEFAULT_PREFERENCES: Readonly<BookmarkPreferences> = Object.freeze({
  showMarkers: true,
  showLabels: true,
  animate: true,
  transitionSeconds: 0.4,
});

export const WHITE: Readonly<Rgba> = Object.freeze({ r: 1, g: 1, b: 1, a: 1 });
