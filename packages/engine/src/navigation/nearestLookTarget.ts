import type { BookmarkRecord } from "../bookmark/types.js";
import { add, distance, dot, scale, subtract, type Vec3 } from "../math/vec3.js";

export const BEHIND_ORIGIN_PENALTY = 2;

export interface LookTargetMatch {
  index: number;
  score: number;
}

/**
 * Perpendicular distance from `pivot` to the look ray, doubled when the pivot
 * projects behind the origin. `direction` must be unit length; the result is
 * meaningless otherwise.
 */
export function scoreLookTarget(pivot: Vec3, origin: Vec3, direction: Vec3): number {
  const t = dot(subtract(pivot, origin), direction);
  const closestOnLine = add(origin, scale(direction, t));
  const perpendicular = distance(pivot, closestOnLine);
  return perpendicular * (t < 0 ? BEHIND_ORIGIN_PENALTY : 1);
}

/**
 * Bookmark whose pivot sits closest to the ray from `origin` along the unit
 * vector `direction`. The lowest index wins ties; an empty list yields null.
 */
export function nearestLookTarget(
  records: readonly BookmarkRecord[],
  origin: Vec3,
  direction: Vec3,
): LookTargetMatch | null {
  let best: LookTargetMatch | null = null;
  for (let i = 0; i < records.length; i++) {
    const score = scoreLookTarget(records[i].pivotPoint, origin, direction);
    if (best === null || score < best.score) {
      best = { index: i, score };
    }
  }
  return best;
}
