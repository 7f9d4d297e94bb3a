import { z } from 'zod';

// ─── Building blocks ────────────────────────────────────────────────────────

/** Site codes, find numbers, dive numbers: `WRK01`, `F-102`, `D.07`. */
export const CODE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const codeSchema = z.string().trim().min(1).max(64).regex(CODE_PATTERN, 'invalid code');

export const relatedKindSchema = z.enum(['site', 'find', 'dive_log']);

export const entityRefSchema = z.object({
  kind: relatedKindSchema,
  siteCode: codeSchema.optional(),
  key: codeSchema,
  raw: z.string(),
});

/** `YYYY-MM-DD` naming a real calendar day. */
export function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const isoDateSchema = z.string().refine(isCalendarDate, 'expected a YYYY-MM-DD calendar date');

export const contentHashSchema = z.string().regex(/^[0-9a-f]{64}$/, 'expected a sha-256 hex digest');

export const mediaDescriptorSchema = z.object({
  blobRef: z.string().min(1),
  contentHash: contentHashSchema,
  fileName: z.string().min(1),
  caption: z.string().optional(),
});

export const locationPinSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  accuracy: z.number().min(0).nullable(),
});

// ─── Records produced by the normalizer ─────────────────────────────────────

export const findReportSchema = z.object({
  type: z.literal('find_report'),
  siteRef: codeSchema,
  findNumber: codeSchema,
  materialType: z.string().optional(),
  objectType: z.string().optional(),
  description: z.string().optional(),
  condition: z.string().optional(),
  quantity: z.number().int().positive().optional(),
  depth: z.number().optional(),
  findDate: isoDateSchema.optional(),
  finderName: z.string().optional(),
  locationPin: locationPinSchema.optional(),
  photoRefs: z.array(mediaDescriptorSchema),
});

export const mediaAssetSchema = z.object({
  type: z.literal('media_asset'),
  kind: z.enum(['photo', 'video', 'signature']),
  blobRef: z.string().min(1),
  contentHash: contentHashSchema,
  fileName: z.string().min(1),
  mimeType: z.string().optional(),
  caption: z.string().optional(),
  relatedEntityRef: entityRefSchema.optional(),
});

export const locationRecordSchema = locationPinSchema.extend({
  type: z.literal('location_pin'),
  contentHash: contentHashSchema,
  relatedEntityRef: entityRefSchema.optional(),
});

export const diveLogReportSchema = z.object({
  type: z.literal('dive_log'),
  siteRef: codeSchema,
  diveNumber: codeSchema,
  diveDate: isoDateSchema.optional(),
  diveStart: z.string().optional(),
  diveEnd: z.string().optional(),
  maxDepth: z.number().optional(),
  objectives: z.string().optional(),
  workCompleted: z.string().optional(),
  teamMembers: z.array(z.string().min(1)),
});

export const normalizedRecordSchema = z.discriminatedUnion('type', [
  findReportSchema,
  mediaAssetSchema,
  locationRecordSchema,
  diveLogReportSchema,
]);

export type RelatedKind = z.infer<typeof relatedKindSchema>;
export type EntityRef = z.infer<typeof entityRefSchema>;
export type MediaDescriptor = z.infer<typeof mediaDescriptorSchema>;
export type LocationPin = z.infer<typeof locationPinSchema>;
export type FindReport = z.infer<typeof findReportSchema>;
export type MediaAsset = z.infer<typeof mediaAssetSchema>;
export type LocationRecord = z.infer<typeof locationRecordSchema>;
export type DiveLogReport = z.infer<typeof diveLogReportSchema>;
export type NormalizedRecord = z.infer<typeof normalizedRecordSchema>;
