import { createHash } from 'node:crypto';
import { MalformedInputError } from '../shared/errors.js';
import type { InboundMessage } from '../shared/types.js';
import {
  CODE_PATTERN,
  isCalendarDate,
  normalizedRecordSchema,
  type EntityRef,
  type LocationPin,
  type MediaDescriptor,
  type NormalizedRecord,
} from './records.js';

// ─── Field names ────────────────────────────────────────────────────────────

/** Accepted spellings for each canonical field, after snake_casing. */
const FIELD_ALIASES: Record<string, readonly string[]> = {
  site: ['site', 'site_code', 'site_ref'],
  find: ['find', 'find_number', 'find_no', 'number', 'no', 'nr'],
  material: ['material', 'material_type'],
  object: ['object', 'object_type'],
  description: ['description', 'desc'],
  condition: ['condition'],
  qty: ['qty', 'quantity', 'count'],
  depth: ['depth'],
  date: ['date', 'find_date', 'dive_date'],
  finder: ['finder', 'finder_name'],
  lat: ['lat', 'latitude'],
  lon: ['lon', 'lng', 'long', 'longitude'],
  accuracy: ['accuracy', 'acc'],
  photos: ['photos', 'photo', 'photo_refs'],
  ref: ['ref', 'related', 'related_entity_ref'],
  caption: ['caption', 'note'],
  file_name: ['file_name', 'filename', 'file'],
  mime_type: ['mime_type', 'mime'],
  content_hash: ['content_hash', 'hash', 'sha256'],
  dive: ['dive', 'dive_number', 'dive_no'],
  start: ['start', 'dive_start'],
  end: ['end', 'dive_end'],
  max_depth: ['max_depth'],
  objectives: ['objectives', 'dive_objectives'],
  work: ['work', 'work_completed'],
  team: ['team', 'team_members', 'divers'],
};

const CANONICAL_FIELD = new Map<string, string>(
  Object.entries(FIELD_ALIASES).flatMap(([field, aliases]) => aliases.map((a): [string, string] => [a, field])),
);

function canonicalKey(raw: string): string | undefined {
  const snake = raw
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
  return CANONICAL_FIELD.get(snake);
}

// ─── Payload parsing ────────────────────────────────────────────────────────

type FieldValue = string | number | string[];

interface ParsedPayload {
  fields: Map<string, FieldValue>;
  /** Lines that were not `key: value` pairs, header removed. */
  freeText: string[];
}

function parseText(text: string): ParsedPayload {
  const fields = new Map<string, FieldValue>();
  const freeText: string[] = [];
  // A leading hashtag (`#find`, `#dive`) only names the kind.
  const body = text.trim().replace(/^#\w+\s*/, '');

  for (const segment of body.split(/[\n;]/)) {
    const line = segment.trim();
    if (!line) continue;
    const sep = line.search(/[:=]/);
    const key = sep > 0 ? canonicalKey(line.slice(0, sep)) : undefined;
    if (key) {
      fields.set(key, line.slice(sep + 1).trim());
    } else {
      freeText.push(line);
    }
  }
  return { fields, freeText };
}

function parseObject(payload: Record<string, unknown>): ParsedPayload {
  const fields = new Map<string, FieldValue>();
  for (const [rawKey, value] of Object.entries(payload)) {
    const key = canonicalKey(rawKey);
    if (!key) continue;
    if (typeof value === 'string' || typeof value === 'number') {
      fields.set(key, value);
    } else if (Array.isArray(value)) {
      fields.set(
        key,
        value.filter((v): v is string => typeof v === 'string'),
      );
    }
  }
  return { fields, freeText: [] };
}

/** Typed reads over the parsed fields; violations accumulate in `problems`. */
class FieldReader {
  readonly problems: string[] = [];

  constructor(private readonly fields: Map<string, FieldValue>) {}

  text(key: string): string | undefined {
    const value = this.fields.get(key);
    if (value === undefined) return undefined;
    const str = Array.isArray(value) ? value.join(', ') : String(value);
    const trimmed = str.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  required(key: string): string | undefined {
    const value = this.text(key);
    if (value === undefined) this.problems.push(`${key} is required`);
    return value;
  }

  code(key: string, required: boolean): string | undefined {
    const value = required ? this.required(key) : this.text(key);
    if (value !== undefined && !CODE_PATTERN.test(value)) {
      this.problems.push(`${key} '${value}' is not a valid code`);
      return undefined;
    }
    return value;
  }

  number(key: string, check?: { min?: number; max?: number; integer?: boolean }): number | undefined {
    const raw = this.text(key);
    if (raw === undefined) return undefined;
    const value = Number(raw.replace(',', '.'));
    if (!Number.isFinite(value)) {
      this.problems.push(`${key} '${raw}' is not a number`);
      return undefined;
    }
    if (check?.integer && !Number.isInteger(value)) {
      this.problems.push(`${key} must be an integer`);
      return undefined;
    }
    const { min, max } = check ?? {};
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      this.problems.push(
        min !== undefined && max !== undefined
          ? `${key} must be between ${min} and ${max}`
          : min !== undefined
            ? `${key} must be at least ${min}`
            : `${key} must be at most ${max}`,
      );
      return undefined;
    }
    return value;
  }

  list(key: string): string[] {
    const value = this.fields.get(key);
    if (value === undefined) return [];
    const items = Array.isArray(value) ? value : String(value).split(',');
    return items.map((s) => s.trim()).filter((s) => s !== '');
  }

  date(key: string): string | undefined {
    const value = this.text(key);
    if (value === undefined) return undefined;
    if (!isCalendarDate(value)) {
      this.problems.push(`${key} '${value}' is not a YYYY-MM-DD date`);
      return undefined;
    }
    return value;
  }

  ref(): EntityRef | undefined {
    const raw = this.text('ref');
    if (raw === undefined) return undefined;
    const ref = parseEntityRef(raw);
    if (!ref) this.problems.push(`ref '${raw}' is not a valid reference`);
    return ref ?? undefined;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function mediaContentHash(kind: string, blobRef: string): string {
  return sha256(`${kind}:${blobRef}`);
}

export function locationContentHash(lat: number, lon: number): string {
  return sha256(`location:${lat.toFixed(6)},${lon.toFixed(6)}`);
}

function fileNameOf(blobRef: string): string {
  const tail = blobRef.split(/[/\\]/).filter(Boolean).pop();
  return tail ?? blobRef;
}

/**
 * Parses `F-102`, `WRK01/F-102`, `find:WRK01/F-102`, `dive:WRK01/D-07` and
 * `site:WRK01`. A bare key is a find number.
 */
export function parseEntityRef(raw: string): EntityRef | null {
  const trimmed = raw.trim();
  const prefixed = /^(find|dive|site):(.*)$/i.exec(trimmed);
  const prefix = prefixed?.[1]?.toLowerCase();
  const rest = (prefixed?.[2] ?? trimmed).trim();

  if (prefix === 'site') {
    return CODE_PATTERN.test(rest) ? { kind: 'site', key: rest, raw: trimmed } : null;
  }

  const kind = prefix === 'dive' ? 'dive_log' : 'find';
  const parts = rest.split('/');
  if (parts.length > 2) return null;
  const [first, second] = parts;
  if (second === undefined) {
    return first !== undefined && CODE_PATTERN.test(first) ? { kind, key: first, raw: trimmed } : null;
  }
  if (first === undefined || !CODE_PATTERN.test(first) || !CODE_PATTERN.test(second)) return null;
  return { kind, siteCode: first, key: second, raw: trimmed };
}

// ─── Per-kind builders ──────────────────────────────────────────────────────

function buildFind(r: FieldReader, message: InboundMessage): Record<string, unknown> {
  const siteRef = r.code('site', true);
  const findNumber = r.code('find', true);
  const lat = r.number('lat', { min: -90, max: 90 });
  const lon = r.number('lon', { min: -180, max: 180 });
  const accuracy = r.number('accuracy', { min: 0 });

  let locationPin: LocationPin | undefined;
  if (lat !== undefined && lon !== undefined) {
    locationPin = { lat, lon, accuracy: accuracy ?? null };
  } else if ((r.text('lat') === undefined) !== (r.text('lon') === undefined)) {
    r.problems.push('lat and lon must be given together');
  }

  const blobRefs = [...r.list('photos'), ...(message.mediaBlobRef ? [message.mediaBlobRef] : [])];
  const photoRefs = new Map<string, MediaDescriptor>();
  for (const blobRef of blobRefs) {
    const contentHash = mediaContentHash('photo', blobRef);
    if (!photoRefs.has(contentHash)) {
      photoRefs.set(contentHash, { blobRef, contentHash, fileName: fileNameOf(blobRef) });
    }
  }

  return {
    type: 'find_report',
    siteRef,
    findNumber,
    materialType: r.text('material'),
    objectType: r.text('object'),
    description: r.text('description'),
    condition: r.text('condition'),
    quantity: r.number('qty', { min: 1, integer: true }),
    depth: r.number('depth'),
    findDate: r.date('date'),
    finderName: r.text('finder'),
    locationPin,
    photoRefs: [...photoRefs.values()],
  };
}

function buildMedia(
  r: FieldReader,
  message: InboundMessage,
  kind: 'photo' | 'video' | 'signature',
  freeText: string[],
): Record<string, unknown> {
  const blobRef = message.mediaBlobRef?.trim();
  if (!blobRef) r.problems.push('a media attachment is required');

  let contentHash: string | undefined;
  const provided = r.text('content_hash');
  if (provided !== undefined) {
    if (/^[0-9a-fA-F]{64}$/.test(provided)) contentHash = provided.toLowerCase();
    else r.problems.push('content_hash must be a sha-256 hex digest');
  } else if (blobRef) {
    contentHash = mediaContentHash(kind, blobRef);
  }

  const caption = r.text('caption') ?? (freeText.length > 0 ? freeText.join('\n') : undefined);

  return {
    type: 'media_asset',
    kind,
    blobRef,
    contentHash,
    fileName: r.text('file_name') ?? (blobRef ? fileNameOf(blobRef) : undefined),
    mimeType: r.text('mime_type'),
    caption,
    relatedEntityRef: r.ref(),
  };
}

const LAT_LON_TEXT = /^(-?\d+(?:\.\d+)?)\s*[,\s]\s*(-?\d+(?:\.\d+)?)$/;

function buildLocation(r: FieldReader, freeText: string[]): Record<string, unknown> {
  let lat = r.number('lat', { min: -90, max: 90 });
  let lon = r.number('lon', { min: -180, max: 180 });

  if (lat === undefined && lon === undefined && r.problems.length === 0) {
    const match = freeText.map((line) => LAT_LON_TEXT.exec(line)).find((m) => m !== null);
    if (match) {
      const [, latText, lonText] = match;
      const parsedLat = Number(latText);
      const parsedLon = Number(lonText);
      if (parsedLat < -90 || parsedLat > 90) r.problems.push('lat must be between -90 and 90');
      else lat = parsedLat;
      if (parsedLon < -180 || parsedLon > 180) r.problems.push('lon must be between -180 and 180');
      else lon = parsedLon;
    }
  }
  if ((lat === undefined || lon === undefined) && r.problems.length === 0) {
    r.problems.push('lat and lon are required');
  }

  return {
    type: 'location_pin',
    lat,
    lon,
    accuracy: r.number('accuracy', { min: 0 }) ?? null,
    contentHash: lat !== undefined && lon !== undefined ? locationContentHash(lat, lon) : undefined,
    relatedEntityRef: r.ref(),
  };
}

function buildDiveLog(r: FieldReader): Record<string, unknown> {
  return {
    type: 'dive_log',
    siteRef: r.code('site', true),
    diveNumber: r.code('dive', true),
    diveDate: r.date('date'),
    diveStart: r.text('start'),
    diveEnd: r.text('end'),
    maxDepth: r.number('max_depth', { min: 0 }),
    objectives: r.text('objectives'),
    workCompleted: r.text('work'),
    teamMembers: r.list('team'),
  };
}

// ─── Entry point ────────────────────────────────────────────────────────────

/**
 * Turns one transport message into exactly one record. Pure: the only
 * derived data is the content hash attached to media and pins.
 */
export function normalizeMessage(message: InboundMessage): NormalizedRecord {
  const parsed = typeof message.payload === 'string' ? parseText(message.payload) : parseObject(message.payload);
  const reader = new FieldReader(parsed.fields);

  let candidate: Record<string, unknown>;
  switch (message.kind) {
    case 'find':
      candidate = buildFind(reader, message);
      break;
    case 'photo':
    case 'video':
    case 'signature':
      candidate = buildMedia(reader, message, message.kind, parsed.freeText);
      break;
    case 'location':
      candidate = buildLocation(reader, parsed.freeText);
      break;
    case 'dive_log':
      candidate = buildDiveLog(reader);
      break;
  }

  if (reader.problems.length > 0) throw new MalformedInputError(reader.problems);

  const result = normalizedRecordSchema.safeParse(candidate);
  if (!result.success) {
    throw new MalformedInputError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`),
    );
  }
  return result.data;
}
