import { clonePose, type Pose, type Viewport } from "@viewmark/engine";

export interface AppliedFrame {
  pose: Pose;
  instant: boolean;
}

export interface MemoryViewport extends Viewport {
  readonly frames: AppliedFrame[];
}

export const DEFAULT_VIEW_POSE: Readonly<Pose> = Object.freeze({
  pivot: { x: 0, y: 0, z: 0 },
  rotation: { x: 0, y: 0, z: 0, w: 1 },
  size: 10,
  orthographic: false,
  distance: 10,
});

/** Stand-in for a host camera: holds one pose and records every pose applied. */
export function createMemoryViewport(initial: Pose = DEFAULT_VIEW_POSE): MemoryViewport {
  let current = clonePose(initial);
  const frames: AppliedFrame[] = [];
  return {
    frames,
    readCurrentPose() {
      return clonePose(current);
    },
    applyPose(pose, instant) {
      current = clonePose(pose);
      frames.push({ pose: clonePose(pose), instant });
    },
  };
}
