import { DEFAULT_PREFERENCES, type BookmarkRecord } from "../bookmark/types.js";
import type { Logger } from "../logging.js";
import { quaternionFromTuple, quaternionToTuple } from "../math/quaternion.js";
import { vec3FromTuple, vec3ToTuple } from "../math/vec3.js";
import { fail, succeed, type BookmarkResult } from "../result.js";
import type { BookmarkStore } from "../store/bookmarkStore.js";
import { migrateSnapshotToLatest } from "./snapshotMigrations.js";
import {
  LATEST_SNAPSHOT_VERSION,
  SerializedSnapshotSchema,
  describeSchemaIssue,
  type SerializedBookmark,
  type SerializedSnapshot,
} from "./snapshotSchema.js";
import type { BookmarkSnapshot } from "./types.js";

export interface ParsedSnapshot {
  snapshot: BookmarkSnapshot;
  /** Migration steps applied while loading, e.g. "v1->v2". */
  applied: string[];
}

export function serializeRecord(record: BookmarkRecord): SerializedBookmark {
  return {
    name: record.name,
    pivot: vec3ToTuple(record.pivotPoint),
    rotation: quaternionToTuple(record.orientation),
    size: record.projectionSize,
    orthographic: record.orthographic,
    color: [record.color.r, record.color.g, record.color.b, record.color.a],
    cameraDistance: record.cameraDistance,
    cameraPosition: vec3ToTuple(record.cameraPosition),
  };
}

export function deserializeRecord(row: SerializedBookmark): BookmarkRecord {
  return {
    name: row.name,
    pivotPoint: vec3FromTuple(row.pivot),
    orientation: quaternionFromTuple(row.rotation),
    projectionSize: row.size,
    orthographic: row.orthographic,
    color: { r: row.color[0], g: row.color[1], b: row.color[2], a: row.color[3] },
    cameraDistance: row.cameraDistance,
    cameraPosition: vec3FromTuple(row.cameraPosition),
  };
}

export function toSerializedSnapshot(snapshot: BookmarkSnapshot): SerializedSnapshot {
  return {
    version: LATEST_SNAPSHOT_VERSION,
    ...(snapshot.activeContext === null ? {} : { activeContext: snapshot.activeContext }),
    buckets: snapshot.buckets.map((bucket) => ({
      key: bucket.key,
      contextPath: bucket.contextPath,
      records: bucket.records.map(serializeRecord),
    })),
    legacyRecords: snapshot.legacyRecords.map(serializeRecord),
    preferences: { ...snapshot.preferences },
  };
}

export function fromSerializedSnapshot(data: SerializedSnapshot): BookmarkSnapshot {
  return {
    activeContext: data.activeContext ?? null,
    buckets: data.buckets.map((bucket) => ({
      key: bucket.key,
      contextPath: bucket.contextPath,
      records: bucket.records.map(deserializeRecord),
    })),
    legacyRecords: data.legacyRecords.map(deserializeRecord),
    preferences: { ...DEFAULT_PREFERENCES, ...data.preferences },
  };
}

export function serializeSnapshot(snapshot: BookmarkSnapshot): string {
  return `${JSON.stringify(toSerializedSnapshot(snapshot), null, 2)}\n`;
}

function malformed(message: string) {
  return fail("MALFORMED_SNAPSHOT", `Malformed snapshot: ${message}`);
}

export function parseSnapshotData(input: unknown): BookmarkResult<ParsedSnapshot> {
  const migrated = migrateSnapshotToLatest(input);
  if (migrated.version === null) {
    return malformed("version must be a finite number at path version");
  }
  if (migrated.version !== LATEST_SNAPSHOT_VERSION) {
    return malformed(`unsupported snapshot version ${migrated.version}`);
  }
  const parsed = SerializedSnapshotSchema.safeParse(migrated.data);
  if (!parsed.success) {
    return malformed(describeSchemaIssue(parsed.error));
  }
  return succeed({
    snapshot: fromSerializedSnapshot(parsed.data),
    applied: migrated.applied,
  });
}

export function parseSnapshot(text: string): BookmarkResult<ParsedSnapshot> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return malformed(error instanceof Error ? error.message : String(error));
  }
  return parseSnapshotData(raw);
}

/**
 * Loads persisted text into `store`. A malformed snapshot leaves the store
 * empty and is reported back rather than thrown.
 */
export function restoreStoreFromText(
  store: BookmarkStore,
  text: string,
  logger?: Logger,
): BookmarkResult<ParsedSnapshot> {
  const result = parseSnapshot(text);
  if (!result.ok) {
    logger?.warn(`${result.message}; starting with an empty bookmark store`);
    store.clear();
    return result;
  }
  if (result.value.applied.length > 0) {
    logger?.info(`Migrated bookmark snapshot (${result.value.applied.join(", ")})`);
  }
  store.restore(result.value.snapshot);
  return result;
}
