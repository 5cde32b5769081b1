import type { BookmarkPreferences, BookmarkRecord, ContextKey } from "../bookmark/types.js";

export interface BookmarkBucketSnapshot {
  key: ContextKey;
  /** Host path of the scene, kept for display only. */
  contextPath: string;
  records: BookmarkRecord[];
}

/**
 * In-memory snapshot of a store. `legacyRecords` holds a flat pre-bucket list
 * still waiting to be merged into the active context.
 */
export interface BookmarkSnapshot {
  /** Null when the snapshot names no context; restoring keeps the store's own. */
  activeContext: ContextKey | null;
  buckets: BookmarkBucketSnapshot[];
  legacyRecords: BookmarkRecord[];
  preferences: BookmarkPreferences;
}
