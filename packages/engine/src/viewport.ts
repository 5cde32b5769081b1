import { randomBrightColor } from "./bookmark/color.js";
import { defaultBookmarkName, poseFromRecord, recordFromPose } from "./bookmark/record.js";
import type { BookmarkRecord, Pose, Rgba } from "./bookmark/types.js";
import { fail, succeed, type BookmarkResult } from "./result.js";
import type { ViewportTransition } from "./transition/viewportTransition.js";

/**
 * The host's camera. `applyPose` is called with `instant = false` for
 * in-flight transition frames and `instant = true` for settled poses.
 */
export interface Viewport {
  /** Null when the host has no live view to read. */
  readCurrentPose(): Pose | null;
  applyPose(pose: Pose, instant: boolean): void;
}

export interface CaptureOptions {
  name?: string;
  color?: Rgba;
  now?: Date;
}

function noViewport(action: string) {
  return fail("NO_ACTIVE_VIEWPORT", `No active viewport to ${action}.`);
}

export function captureBookmark(
  viewport: Viewport | null | undefined,
  options: CaptureOptions = {},
): BookmarkResult<BookmarkRecord> {
  if (!viewport) return noViewport("capture");
  const pose = viewport.readCurrentPose();
  if (pose === null) return noViewport("capture");
  const name = options.name && options.name.trim().length > 0
    ? options.name
    : defaultBookmarkName(options.now ?? new Date());
  return succeed(recordFromPose(pose, name, options.color ?? randomBrightColor()));
}

export interface JumpOptions {
  animate: boolean;
  transition?: ViewportTransition;
  durationSeconds?: number;
}

export type JumpMode = "instant" | "animated";

/**
 * Moves the viewport to a bookmark. Animated jumps only start the transition;
 * the host keeps ticking it.
 */
export function jumpToBookmark(
  viewport: Viewport | null | undefined,
  record: BookmarkRecord,
  options: JumpOptions,
): BookmarkResult<JumpMode> {
  if (!viewport) return noViewport("jump");

  if (options.animate && options.transition) {
    const current = viewport.readCurrentPose();
    if (current === null) return noViewport("jump");
    options.transition.start(current, record, options.durationSeconds);
    return succeed("animated");
  }

  options.transition?.cancel();
  viewport.applyPose(poseFromRecord(record), true);
  return succeed("instant");
}
