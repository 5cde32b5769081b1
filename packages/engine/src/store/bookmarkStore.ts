import { cloneRecord, findNonFiniteField, withCameraPosition } from "../bookmark/record.js";
import {
  DEFAULT_PREFERENCES,
  type BookmarkPreferences,
  type BookmarkRecord,
  type ContextKey,
} from "../bookmark/types.js";
import { createLogger, type Logger } from "../logging.js";
import type { Vec3 } from "../math/vec3.js";
import { fail, indexOutOfRange, succeed, type BookmarkResult } from "../result.js";
import type { BookmarkSnapshot } from "../snapshot/types.js";
import { microtaskScheduler, type TaskScheduler } from "./scheduler.js";

export const DEFAULT_CONTEXT: ContextKey = "default";

const PREFERENCE_KEYS: readonly (keyof BookmarkPreferences)[] = [
  "showMarkers",
  "showLabels",
  "animate",
  "transitionSeconds",
];

export type ChangeListener = () => void;
export type Unsubscribe = () => void;

export interface ContextSummary {
  key: ContextKey;
  contextPath: string;
  count: number;
  active: boolean;
}

export interface BookmarkStoreOptions {
  activeContext?: ContextKey;
  contextPath?: string;
  scheduler?: TaskScheduler;
  logger?: Logger;
}

export interface BookmarkStore {
  readonly activeContext: ContextKey;

  setActiveContext(key: ContextKey, contextPath?: string): BookmarkResult<ContextKey>;
  contexts(): ContextSummary[];

  list(context?: ContextKey): BookmarkRecord[];
  count(context?: ContextKey): number;
  get(index: number, context?: ContextKey): BookmarkRecord | null;

  add(record: BookmarkRecord, context?: ContextKey): BookmarkResult<number>;
  removeAt(index: number, context?: ContextKey): BookmarkResult<BookmarkRecord>;
  rename(index: number, name: string, context?: ContextKey): BookmarkResult<BookmarkRecord>;
  replace(index: number, record: BookmarkRecord, context?: ContextKey): BookmarkResult<BookmarkRecord>;
  setPosition(index: number, position: Vec3, context?: ContextKey): BookmarkResult<BookmarkRecord>;
  reorder(oldIndex: number, newIndex: number, context?: ContextKey): BookmarkResult<number>;

  getPreferences(): BookmarkPreferences;
  updatePreferences(patch: Partial<BookmarkPreferences>): BookmarkResult<BookmarkPreferences>;

  subscribe(listener: ChangeListener): Unsubscribe;

  toSnapshot(): BookmarkSnapshot;
  restore(snapshot: BookmarkSnapshot): void;
  clear(): void;
}

interface Bucket {
  key: ContextKey;
  contextPath: string;
  records: BookmarkRecord[];
}

function isValidIndex(index: number, count: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < count;
}

/**
 * Per-context ordered bookmark lists. Records go in and come out as copies, so
 * the pivot rule enforced by the mutators cannot be bypassed. Change
 * notifications run on a later scheduler turn and coalesce.
 */
export function createBookmarkStore(options: BookmarkStoreOptions = {}): BookmarkStore {
  const schedule = options.scheduler ?? microtaskScheduler;
  const logger = options.logger ?? createLogger();
  const buckets = new Map<ContextKey, Bucket>();
  const listeners = new Set<ChangeListener>();
  let activeContext: ContextKey = options.activeContext ?? DEFAULT_CONTEXT;
  let preferences: BookmarkPreferences = { ...DEFAULT_PREFERENCES };
  let notifyPending = false;

  getOrCreateBucket(activeContext).contextPath = options.contextPath ?? "";

  function getOrCreateBucket(key: ContextKey): Bucket {
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { key, contextPath: "", records: [] };
      buckets.set(key, bucket);
    }
    return bucket;
  }

  function bucketFor(context: ContextKey | undefined): Bucket {
    return getOrCreateBucket(context ?? activeContext);
  }

  function flush() {
    notifyPending = false;
    for (const listener of [...listeners]) {
      try {
        listener();
      } catch (error) {
        logger.error("Bookmark change listener failed", error);
      }
    }
  }

  function notifyChanged() {
    if (notifyPending) return;
    notifyPending = true;
    schedule(flush);
  }

  /** Copy of `record` fit for storage: finite fields, distance floored at zero. */
  function admit(record: BookmarkRecord): BookmarkResult<BookmarkRecord> {
    const field = findNonFiniteField(record);
    if (field !== null) {
      return fail("INVALID_RECORD", `Bookmark "${record.name}" has a non-finite ${field}.`);
    }
    return succeed({ ...cloneRecord(record), cameraDistance: Math.max(0, record.cameraDistance) });
  }

  function withRecord(
    index: number,
    context: ContextKey | undefined,
    mutate: (bucket: Bucket, current: BookmarkRecord) => BookmarkRecord | null,
  ): BookmarkResult<BookmarkRecord> {
    const bucket = bucketFor(context);
    if (!isValidIndex(index, bucket.records.length)) {
      return indexOutOfRange(index, bucket.records.length);
    }
    const current = bucket.records[index];
    const next = mutate(bucket, current);
    if (next === null) {
      return succeed(cloneRecord(current));
    }
    bucket.records[index] = next;
    notifyChanged();
    return succeed(cloneRecord(next));
  }

  return {
    get activeContext() {
      return activeContext;
    },

    setActiveContext(key, contextPath) {
      if (key === activeContext) {
        return fail("NO_OP", `Context "${key}" is already active.`);
      }
      activeContext = key;
      const bucket = getOrCreateBucket(key);
      if (contextPath !== undefined) {
        bucket.contextPath = contextPath;
      }
      logger.debug(`Switching to context "${key}" (${bucket.records.length} bookmarks)`);
      notifyChanged();
      return succeed(key);
    },

    contexts() {
      return Array.from(buckets.values()).map((bucket) => ({
        key: bucket.key,
        contextPath: bucket.contextPath,
        count: bucket.records.length,
        active: bucket.key === activeContext,
      }));
    },

    list(context) {
      return bucketFor(context).records.map(cloneRecord);
    },

    count(context) {
      return bucketFor(context).records.length;
    },

    get(index, context) {
      const bucket = bucketFor(context);
      if (!isValidIndex(index, bucket.records.length)) return null;
      return cloneRecord(bucket.records[index]);
    },

    add(record, context) {
      const admitted = admit(record);
      if (!admitted.ok) return admitted;
      const bucket = bucketFor(context);
      bucket.records.push(admitted.value);
      const index = bucket.records.length - 1;
      logger.debug(`Creating "${record.name}" at #${index}`);
      notifyChanged();
      return succeed(index);
    },

    removeAt(index, context) {
      const bucket = bucketFor(context);
      if (!isValidIndex(index, bucket.records.length)) {
        return indexOutOfRange(index, bucket.records.length);
      }
      const [removed] = bucket.records.splice(index, 1);
      logger.debug(`Removing "${removed.name}" at #${index}`);
      notifyChanged();
      return succeed(removed);
    },

    rename(index, name, context) {
      return withRecord(index, context, (_bucket, current) => {
        if (current.name === name) return null;
        logger.debug(`Renaming "${current.name}" to "${name}" at #${index}`);
        return { ...cloneRecord(current), name };
      });
    },

    replace(index, record, context) {
      const admitted = admit(record);
      if (!admitted.ok) return admitted;
      const stored = admitted.value;
      return withRecord(index, context, () => stored);
    },

    setPosition(index, position, context) {
      if (![position.x, position.y, position.z].every(Number.isFinite)) {
        return fail("INVALID_RECORD", "Camera position must be finite.");
      }
      return withRecord(index, context, (_bucket, current) => withCameraPosition(current, position));
    },

    reorder(oldIndex, newIndex, context) {
      const bucket = bucketFor(context);
      const count = bucket.records.length;
      if (!isValidIndex(oldIndex, count)) return indexOutOfRange(oldIndex, count);
      if (!isValidIndex(newIndex, count)) return indexOutOfRange(newIndex, count);
      if (oldIndex === newIndex) {
        return fail("NO_OP", `Bookmark #${oldIndex} is already in place.`);
      }
      // newIndex is the final position: moving forward, the slot after the
      // target shifts left by one once the record is removed.
      const insertAt = newIndex;
      const [moved] = bucket.records.splice(oldIndex, 1);
      bucket.records.splice(insertAt, 0, moved);
      logger.debug(`Moving "${moved.name}" from #${oldIndex} to #${insertAt}`);
      notifyChanged();
      return succeed(insertAt);
    },

    getPreferences() {
      return { ...preferences };
    },

    updatePreferences(patch) {
      const next: BookmarkPreferences = { ...preferences, ...patch };
      if (!Number.isFinite(next.transitionSeconds) || next.transitionSeconds < 0) {
        next.transitionSeconds = preferences.transitionSeconds;
      }
      const changed = PREFERENCE_KEYS.some((key) => next[key] !== preferences[key]);
      if (!changed) {
        return fail("NO_OP", "Preferences are unchanged.");
      }
      preferences = next;
      notifyChanged();
      return succeed({ ...preferences });
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    toSnapshot() {
      return {
        activeContext,
        buckets: Array.from(buckets.values()).map((bucket) => ({
          key: bucket.key,
          contextPath: bucket.contextPath,
          records: bucket.records.map(cloneRecord),
        })),
        legacyRecords: [],
        preferences: { ...preferences },
      };
    },

    restore(snapshot) {
      buckets.clear();
      for (const source of snapshot.buckets) {
        const bucket = getOrCreateBucket(source.key);
        if (source.contextPath.length > 0) {
          bucket.contextPath = source.contextPath;
        }
        bucket.records.push(...source.records.map(cloneRecord));
      }
      activeContext = snapshot.activeContext ?? activeContext;
      const active = getOrCreateBucket(activeContext);
      if (snapshot.legacyRecords.length > 0) {
        logger.info(`Migrating ${snapshot.legacyRecords.length} legacy bookmarks into "${activeContext}"`);
        active.records.push(...snapshot.legacyRecords.map(cloneRecord));
      }
      preferences = { ...snapshot.preferences };
      notifyChanged();
    },

    clear() {
      buckets.clear();
      getOrCreateBucket(activeContext);
      notifyChanged();
    },
  };
}
