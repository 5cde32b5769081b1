import { describe, expect, it } from "vitest";
import { createBookmarkRecord, poseFromRecord } from "../bookmark/record.js";
import type { Pose } from "../bookmark/types.js";
import { identityQuaternion, quaternionFromEulerDegrees } from "../math/quaternion.js";
import type { Viewport } from "../viewport.js";
import { createViewportTransition } from "./viewportTransition.js";

interface AppliedPose {
  pose: Pose;
  instant: boolean;
}

function createRecordingViewport(initial: Pose): Viewport & { applied: AppliedPose[] } {
  const applied: AppliedPose[] = [];
  let current = initial;
  return {
    applied,
    readCurrentPose: () => current,
    applyPose(pose, instant) {
      applied.push({ pose, instant });
      current = pose;
    },
  };
}

function createFakeClock() {
  let now = 0;
  return {
    clock: () => now,
    set(seconds: number) {
      now = seconds;
    },
  };
}

const START_POSE: Pose = {
  pivot: { x: 0, y: 0, z: 0 },
  rotation: identityQuaternion(),
  size: 1,
  orthographic: false,
  distance: 1,
};

const TARGET = createBookmarkRecord({
  name: "Overlook",
  cameraPosition: { x: 10, y: 0, z: -4 },
  cameraDistance: 4,
  projectionSize: 3,
  orthographic: true,
});

describe("viewport transition", () => {
  it("starts idle and ignores ticks", () => {
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: createFakeClock().clock });
    expect(transition.state).toBe("idle");
    expect(transition.tick()).toBeNull();
    expect(viewport.applied).toEqual([]);
  });

  it("eases the intermediate poses with smoothstep", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock });
    transition.start(START_POSE, TARGET, 0.4);
    expect(transition.state).toBe("animating");

    time.set(0.1);
    const frame = transition.tick();
    expect(frame?.done).toBe(false);
    expect(frame?.progress).toBeCloseTo(0.25, 10);
    // smoothstep(0.25) = 0.15625
    expect(frame?.pose.pivot.x).toBeCloseTo(1.5625, 9);
    expect(frame?.pose.size).toBeCloseTo(1.3125, 9);
    expect(frame?.pose.distance).toBeCloseTo(1.46875, 9);
    expect(frame?.pose.orthographic).toBe(true);
    expect(viewport.applied).toHaveLength(1);
    expect(viewport.applied[0]?.instant).toBe(false);

    time.set(0.2);
    expect(transition.tick()?.pose.pivot.x).toBeCloseTo(5, 9);
  });

  it("snaps exactly to the target once the duration has elapsed", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock });
    transition.start(START_POSE, TARGET, 0.4);

    time.set(0.3);
    transition.tick();
    time.set(1.0);
    const frame = transition.tick();

    expect(frame).toEqual({ pose: poseFromRecord(TARGET), progress: 1, done: true });
    expect(viewport.applied.at(-1)).toEqual({ pose: poseFromRecord(TARGET), instant: true });
    expect(transition.state).toBe("idle");
    expect(transition.tick()).toBeNull();
    expect(viewport.applied).toHaveLength(2);
  });

  it("clamps a zero duration instead of dividing by zero", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock });
    transition.start(START_POSE, TARGET, 0);

    const first = transition.tick();
    expect(first?.progress).toBe(0);
    expect(first?.pose.pivot).toEqual({ x: 0, y: 0, z: 0 });

    time.set(0.001);
    expect(transition.tick()?.done).toBe(true);
    expect(transition.state).toBe("idle");
  });

  it("replaces an in-flight transition", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock });
    transition.start(START_POSE, TARGET, 0.4);
    time.set(0.2);
    transition.tick();

    const other = createBookmarkRecord({
      name: "Tower",
      cameraPosition: { x: 0, y: 20, z: 0 },
      orientation: quaternionFromEulerDegrees(90, 0, 0),
      cameraDistance: 5,
    });
    const midway = viewport.readCurrentPose();
    expect(midway).not.toBeNull();
    if (midway) transition.start(midway, other, 0.4);

    time.set(0.7);
    const frame = transition.tick();
    expect(frame?.done).toBe(true);
    expect(frame?.pose).toEqual(poseFromRecord(other));
  });

  it("uses the default duration when none is given", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock, defaultDurationSeconds: 2 });
    transition.start(START_POSE, TARGET);
    time.set(1);
    expect(transition.tick()?.progress).toBe(0.5);
  });

  it("returns to idle on cancel without touching the viewport", () => {
    const time = createFakeClock();
    const viewport = createRecordingViewport(START_POSE);
    const transition = createViewportTransition({ viewport, clock: time.clock });
    transition.start(START_POSE, TARGET, 0.4);
    transition.cancel();
    time.set(1);
    expect(transition.state).toBe("idle");
    expect(transition.tick()).toBeNull();
    expect(viewport.applied).toEqual([]);
  });
});
