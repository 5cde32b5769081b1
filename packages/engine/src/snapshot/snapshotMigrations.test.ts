import { describe, expect, it } from "vitest";
import { LATEST_SNAPSHOT_VERSION } from "./snapshotSchema.js";
import { migrateSnapshotToLatest } from "./snapshotMigrations.js";

const V1_RECORD = {
  name: "Old view",
  pivot: [0, 0, 5],
  rotation: [0, 0, 0, 1],
  size: 10,
  orthographic: false,
  cameraDistance: 5,
  cameraPositionAtSave: [0, 0, 0],
};

describe("snapshot migrations", () => {
  it("moves the v1 flat list into legacyRecords", () => {
    const v1 = { version: 1, bookmarks: [V1_RECORD] };
    const migrated = migrateSnapshotToLatest(v1);
    expect(migrated.version).toBe(LATEST_SNAPSHOT_VERSION);
    expect(migrated.applied).toEqual(["v1->v2"]);
    expect(migrated.data).toEqual({
      version: 2,
      buckets: [],
      legacyRecords: [
        {
          name: "Old view",
          pivot: [0, 0, 5],
          rotation: [0, 0, 0, 1],
          size: 10,
          orthographic: false,
          cameraDistance: 5,
          cameraPosition: [0, 0, 0],
          color: [1, 1, 1, 1],
        },
      ],
    });
  });

  it("does not mutate the input", () => {
    const v1 = { version: 1, bookmarks: [V1_RECORD] };
    migrateSnapshotToLatest(v1);
    expect(v1.version).toBe(1);
    expect(v1.bookmarks[0]).toHaveProperty("cameraPositionAtSave");
  });

  it("keeps latest version data unchanged", () => {
    const v2 = { version: 2, activeContext: "a", buckets: [], legacyRecords: [] };
    const migrated = migrateSnapshotToLatest(v2);
    expect(migrated.applied).toEqual([]);
    expect(migrated.data).toEqual(v2);
  });

  it("reports a null version for unversioned or non-object input", () => {
    expect(migrateSnapshotToLatest({ bookmarks: [] }).version).toBeNull();
    expect(migrateSnapshotToLatest([1, 2]).version).toBeNull();
    expect(migrateSnapshotToLatest("text").version).toBeNull();
  });

  it("leaves unknown future versions alone", () => {
    const migrated = migrateSnapshotToLatest({ version: 9 });
    expect(migrated.version).toBe(9);
    expect(migrated.applied).toEqual([]);
  });
});
