// Math
export type { Vec3, Vec3Tuple } from "./math/vec3.js";
export {
  ZERO_VEC3,
  vec3,
  add,
  subtract,
  scale,
  dot,
  length,
  distance,
  normalize,
  lerpVec3,
  cloneVec3,
  vec3ToTuple,
  vec3FromTuple,
} from "./math/vec3.js";
export { degToRad, radToDeg, clamp01, lerp, smoothstep } from "./math/scalar.js";
export type { Quaternion, QuaternionTuple } from "./math/quaternion.js";
export {
  identityQuaternion,
  normalizeQuaternion,
  forward,
  slerpQuaternion,
  quaternionFromEulerDegrees,
  eulerDegreesFromQuaternion,
  cloneQuaternion,
  quaternionToTuple,
  quaternionFromTuple,
} from "./math/quaternion.js";

// Results and logging
export type { BookmarkErrorCode, BookmarkSuccess, BookmarkFailure, BookmarkResult } from "./result.js";
export { succeed, fail, indexOutOfRange } from "./result.js";
export type { LogLevel, Logger, LoggerOptions } from "./logging.js";
export { createLogger } from "./logging.js";

// Bookmarks
export type { ContextKey, Rgba, BookmarkRecord, Pose, BookmarkPreferences } from "./bookmark/types.js";
export { DEFAULT_PREFERENCES, WHITE } from "./bookmark/types.js";
export type { CreateBookmarkInput } from "./bookmark/record.js";
export {
  pivotFromCamera,
  cameraPositionFromPose,
  cameraDistanceFromPosition,
  reconcilePivot,
  withCameraPosition,
  poseFromRecord,
  recordFromPose,
  clonePose,
  cloneRecord,
  findNonFiniteField,
  createBookmarkRecord,
  defaultBookmarkName,
} from "./bookmark/record.js";
export type { RandomSource } from "./bookmark/color.js";
export { hsvToRgb, saturationOf, perceivedLuminance, randomBrightColor } from "./bookmark/color.js";

// Store
export type { TaskScheduler } from "./store/scheduler.js";
export { microtaskScheduler } from "./store/scheduler.js";
export type {
  BookmarkStore,
  BookmarkStoreOptions,
  ChangeListener,
  ContextSummary,
  Unsubscribe,
} from "./store/bookmarkStore.js";
export { DEFAULT_CONTEXT, createBookmarkStore } from "./store/bookmarkStore.js";

// Snapshots
export type { BookmarkBucketSnapshot, BookmarkSnapshot } from "./snapshot/types.js";
export type { SerializedBookmark, SerializedBucket, SerializedSnapshot } from "./snapshot/snapshotSchema.js";
export { LATEST_SNAPSHOT_VERSION, SerializedSnapshotSchema, describeSchemaIssue } from "./snapshot/snapshotSchema.js";
export type { SnapshotMigrationResult } from "./snapshot/snapshotMigrations.js";
export { migrateSnapshotToLatest } from "./snapshot/snapshotMigrations.js";
export type { ParsedSnapshot } from "./snapshot/snapshot.js";
export {
  serializeRecord,
  deserializeRecord,
  toSerializedSnapshot,
  fromSerializedSnapshot,
  serializeSnapshot,
  parseSnapshotData,
  parseSnapshot,
  restoreStoreFromText,
} from "./snapshot/snapshot.js";

// Navigation
export type { LookTargetMatch } from "./navigation/nearestLookTarget.js";
export { BEHIND_ORIGIN_PENALTY, scoreLookTarget, nearestLookTarget } from "./navigation/nearestLookTarget.js";
export type { HotkeyDigit, HotkeyEvent } from "./navigation/hotkeys.js";
export { hotkeyIndex, hotkeyIndexFromKeyCode, resolveHotkey } from "./navigation/hotkeys.js";

// Viewport
export type {
  TransitionState,
  Clock,
  TransitionFrame,
  ViewportTransitionOptions,
  ViewportTransition,
} from "./transition/viewportTransition.js";
export {
  DEFAULT_TRANSITION_SECONDS,
  MIN_TRANSITION_SECONDS,
  interpolatePose,
  createViewportTransition,
} from "./transition/viewportTransition.js";
export type { Viewport, CaptureOptions, JumpOptions, JumpMode } from "./viewport.js";
export { captureBookmark, jumpToBookmark } from "./viewport.js";
