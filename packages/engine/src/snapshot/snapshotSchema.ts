import { z } from "zod";

export const LATEST_SNAPSHOT_VERSION = 2;

const FiniteNumberSchema = z.number().finite();

export const Vec3TupleSchema = z.tuple([FiniteNumberSchema, FiniteNumberSchema, FiniteNumberSchema]);

export const QuaternionTupleSchema = z.tuple([
  FiniteNumberSchema,
  FiniteNumberSchema,
  FiniteNumberSchema,
  FiniteNumberSchema,
]);

export const ColorTupleSchema = z.tuple([
  FiniteNumberSchema,
  FiniteNumberSchema,
  FiniteNumberSchema,
  FiniteNumberSchema,
]);

export const SerializedBookmarkSchema = z.object({
  name: z.string(),
  pivot: Vec3TupleSchema,
  rotation: QuaternionTupleSchema,
  size: FiniteNumberSchema,
  orthographic: z.boolean(),
  color: ColorTupleSchema,
  cameraDistance: FiniteNumberSchema.min(0),
  cameraPosition: Vec3TupleSchema,
});

export const SerializedBucketSchema = z.object({
  key: z.string(),
  contextPath: z.string().default(""),
  records: z.array(SerializedBookmarkSchema),
});

export const SerializedPreferencesSchema = z.object({
  showMarkers: z.boolean(),
  showLabels: z.boolean(),
  animate: z.boolean(),
  transitionSeconds: FiniteNumberSchema.min(0),
});

export const SerializedSnapshotSchema = z.object({
  version: z.literal(LATEST_SNAPSHOT_VERSION),
  activeContext: z.string().optional(),
  buckets: z.array(SerializedBucketSchema),
  legacyRecords: z.array(SerializedBookmarkSchema).default([]),
  preferences: SerializedPreferencesSchema.partial().optional(),
});

export type SerializedBookmark = z.infer<typeof SerializedBookmarkSchema>;
export type SerializedBucket = z.infer<typeof SerializedBucketSchema>;
export type SerializedSnapshot = z.infer<typeof SerializedSnapshotSchema>;

/**
 * "buckets[1].records[0].pivot: Expected number, received string"
 */
export function describeSchemaIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "snapshot does not match the expected layout";
  let path = "";
  for (const segment of issue.path) {
    path += typeof segment === "number" ? `[${segment}]` : path.length > 0 ? `.${segment}` : segment;
  }
  return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
}
