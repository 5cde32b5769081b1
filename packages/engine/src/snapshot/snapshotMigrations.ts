import { LATEST_SNAPSHOT_VERSION } from "./snapshotSchema.js";

interface MutableSnapshot {
  version?: unknown;
  [key: string]: unknown;
}

export interface SnapshotMigrationResult {
  data: MutableSnapshot;
  version: number | null;
  applied: string[];
}

const WHITE_TUPLE = [1, 1, 1, 1];

function isObjectRecord(value: unknown): value is MutableSnapshot {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Version 1 records predate colours and stored the camera position under
 * `cameraPositionAtSave`.
 */
function upgradeV1Record(row: unknown): unknown {
  if (!isObjectRecord(row)) return row;
  const next: Record<string, unknown> = { ...row };
  if (next.cameraPosition === undefined && next.cameraPositionAtSave !== undefined) {
    next.cameraPosition = next.cameraPositionAtSave;
  }
  delete next.cameraPositionAtSave;
  if (next.color === undefined) {
    next.color = [...WHITE_TUPLE];
  }
  return next;
}

/**
 * Version 1 files hold one flat list with no context. It becomes
 * `legacyRecords` and no active context is named, so restoring merges it into
 * whatever context the store has open.
 */
function migrateV1ToV2(input: MutableSnapshot): MutableSnapshot {
  const { bookmarks, ...rest } = input;
  const legacy = Array.isArray(bookmarks) ? bookmarks.map(upgradeV1Record) : [];
  return {
    ...rest,
    version: 2,
    buckets: Array.isArray(rest.buckets) ? rest.buckets : [],
    legacyRecords: legacy,
  };
}

export function migrateSnapshotToLatest(input: unknown): SnapshotMigrationResult {
  if (!isObjectRecord(input)) {
    return {
      data: { version: null },
      version: null,
      applied: [],
    };
  }

  let working = structuredClone(input);
  const applied: string[] = [];
  const currentVersion = typeof working.version === "number" && Number.isFinite(working.version)
    ? working.version
    : null;

  if (currentVersion === null) {
    return {
      data: working,
      version: null,
      applied,
    };
  }

  while (typeof working.version === "number" && working.version < LATEST_SNAPSHOT_VERSION) {
    if (working.version === 1) {
      working = migrateV1ToV2(working);
      applied.push("v1->v2");
      continue;
    }
    break;
  }

  return {
    data: working,
    version: typeof working.version === "number" && Number.isFinite(working.version) ? working.version : null,
    applied,
  };
}
