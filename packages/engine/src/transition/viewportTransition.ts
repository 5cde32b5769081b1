import { clonePose, poseFromRecord } from "../bookmark/record.js";
import type { BookmarkRecord, Pose } from "../bookmark/types.js";
import { slerpQuaternion } from "../math/quaternion.js";
import { clamp01, lerp, smoothstep } from "../math/scalar.js";
import { lerpVec3 } from "../math/vec3.js";
import type { Viewport } from "../viewport.js";

export const DEFAULT_TRANSITION_SECONDS = 0.4;
export const MIN_TRANSITION_SECONDS = 1e-4;

export type TransitionState = "idle" | "animating";

/** Seconds on a monotonic clock. */
export type Clock = () => number;

export interface TransitionFrame {
  pose: Pose;
  /** Normalized elapsed time before easing. */
  progress: number;
  done: boolean;
}

export interface ViewportTransitionOptions {
  viewport: Viewport;
  clock?: Clock;
  defaultDurationSeconds?: number;
}

export interface ViewportTransition {
  readonly state: TransitionState;
  start(currentPose: Pose, target: BookmarkRecord, durationSeconds?: number): void;
  tick(): TransitionFrame | null;
  cancel(): void;
}

interface ActiveTransition {
  startPose: Pose;
  targetPose: Pose;
  startTime: number;
  duration: number;
}

const performanceClock: Clock = () => performance.now() / 1000;

export function interpolatePose(from: Pose, to: Pose, eased: number): Pose {
  return {
    pivot: lerpVec3(from.pivot, to.pivot, eased),
    rotation: slerpQuaternion(from.rotation, to.rotation, eased),
    size: lerp(from.size, to.size, eased),
    orthographic: to.orthographic,
    distance: lerp(from.distance, to.distance, eased),
  };
}

/**
 * Eases a viewport from its current pose to a bookmark over a fixed duration.
 * The host calls `tick` once per frame; the last tick snaps to the exact
 * target pose and returns the machine to idle.
 */
export function createViewportTransition(options: ViewportTransitionOptions): ViewportTransition {
  const { viewport } = options;
  const clock = options.clock ?? performanceClock;
  const defaultDuration = options.defaultDurationSeconds ?? DEFAULT_TRANSITION_SECONDS;
  let active: ActiveTransition | null = null;

  return {
    get state(): TransitionState {
      return active === null ? "idle" : "animating";
    },

    start(currentPose, target, durationSeconds) {
      const requested = durationSeconds ?? defaultDuration;
      active = {
        startPose: clonePose(currentPose),
        targetPose: poseFromRecord(target),
        startTime: clock(),
        duration: Number.isFinite(requested) ? Math.max(requested, MIN_TRANSITION_SECONDS) : MIN_TRANSITION_SECONDS,
      };
    },

    tick() {
      if (active === null) return null;
      const current = active;
      const progress = clamp01((clock() - current.startTime) / current.duration);

      if (progress >= 1) {
        active = null;
        viewport.applyPose(clonePose(current.targetPose), true);
        return { pose: clonePose(current.targetPose), progress: 1, done: true };
      }

      const pose = interpolatePose(current.startPose, current.targetPose, smoothstep(progress));
      viewport.applyPose(pose, false);
      return { pose: clonePose(pose), progress, done: false };
    },

    cancel() {
      active = null;
    },
  };
}
