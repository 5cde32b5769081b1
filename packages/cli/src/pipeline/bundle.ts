import { createHash } from "node:crypto";
import { strFromU8, strToU8, unzipSync, zipSync } from "fflate";
import { z } from "zod";
import { LATEST_SNAPSHOT_VERSION, type BookmarkSnapshot } from "@viewmark/engine";
import { CliError } from "../runtime/errors.js";

export const BUNDLE_SNAPSHOT_FILE = "bookmarks.json";
export const BUNDLE_MANIFEST_FILE = "manifest.json";

const BundleManifestSchema = z.object({
  schemaVersion: z.literal(1),
  snapshotVersion: z.number().int(),
  snapshotSha256: z.string().regex(/^[0-9a-f]{64}$/),
  contexts: z.number().int().min(0),
  bookmarks: z.number().int().min(0),
});

export type BundleManifest = z.infer<typeof BundleManifestSchema>;

export interface BundleContents {
  manifest: BundleManifest;
  snapshotText: string;
}

export function sha256HexFromString(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export function buildBundleManifest(snapshotText: string, snapshot: BookmarkSnapshot): BundleManifest {
  return {
    schemaVersion: 1,
    snapshotVersion: LATEST_SNAPSHOT_VERSION,
    snapshotSha256: sha256HexFromString(snapshotText),
    contexts: snapshot.buckets.length,
    bookmarks: snapshot.buckets.reduce((total, bucket) => total + bucket.records.length, 0),
  };
}

export function createBundle(snapshotText: string, snapshot: BookmarkSnapshot): Uint8Array {
  const manifest = buildBundleManifest(snapshotText, snapshot);
  return zipSync(
    {
      [BUNDLE_SNAPSHOT_FILE]: strToU8(snapshotText),
      [BUNDLE_MANIFEST_FILE]: strToU8(`${JSON.stringify(manifest, null, 2)}\n`),
    },
    { level: 6 },
  );
}

function parseManifest(text: string): BundleManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new CliError("BUNDLE_INVALID", `${BUNDLE_MANIFEST_FILE} is not valid JSON.`);
  }
  const parsed = BundleManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CliError("BUNDLE_INVALID", `${BUNDLE_MANIFEST_FILE} is invalid${where}.`);
  }
  return parsed.data;
}

/**
 * Unpacks a bundle and checks the snapshot against the manifest hash. The
 * snapshot text itself is validated later by the engine.
 */
export function readBundle(bytes: Uint8Array): BundleContents {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(bytes);
  } catch (error) {
    throw new CliError(
      "BUNDLE_INVALID",
      `Bundle is not a readable zip archive: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const manifestBytes = files[BUNDLE_MANIFEST_FILE];
  if (!manifestBytes) {
    throw new CliError("BUNDLE_INVALID", `Bundle is missing ${BUNDLE_MANIFEST_FILE}.`);
  }
  const snapshotBytes = files[BUNDLE_SNAPSHOT_FILE];
  if (!snapshotBytes) {
    throw new CliError("BUNDLE_INVALID", `Bundle is missing ${BUNDLE_SNAPSHOT_FILE}.`);
  }

  const manifest = parseManifest(strFromU8(manifestBytes));
  const snapshotText = strFromU8(snapshotBytes);
  if (sha256HexFromString(snapshotText) !== manifest.snapshotSha256) {
    throw new CliError("BUNDLE_INVALID", `${BUNDLE_SNAPSHOT_FILE} does not match the manifest hash.`);
  }
  return { manifest, snapshotText };
}
