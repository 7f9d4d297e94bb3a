import type {
  DiveLog,
  DiveLogInput,
  Find,
  FindInput,
  Media,
  MediaInput,
  MediaKey,
  Site,
  SiteInput,
  SiteKey,
  SiteScopedKey,
  Worker,
  WorkerInput,
  WorkerKey,
} from './types.js';
import type { LocationPin } from '../sync/records.js';

export type SqlValue = string | number | null;

/** What each backend plugs into the shared statement builders. */
export interface Dialect {
  /** Placeholder for a named column value; `index` is its 1-based position. */
  param(column: string, index: number): string;
  now: string;
  geomIn(placeholder: string): string;
  geomOut(column: string): string;
  /** Types an expression as a calendar date where the backend needs it spelled out. */
  asDate(expr: string): string;
}

/**
 * Dialect-neutral description of a canonical table keyed by a natural key.
 * Upserts only ever write the incoming non-null values: every update is
 * `col = COALESCE(new, col)`.
 */
export interface EntityTable<TRow, TInput, TKey> {
  table: string;
  keyColumns: readonly string[];
  dataColumns: readonly string[];
  /** Columns read back, geometry excluded. */
  readColumns: readonly string[];
  geometry: boolean;
  /** Insert-only expressions for columns the input may omit. */
  insertFallback?: Readonly<Record<string, (p: (column: string) => string, d: Dialect) => string>>;
  /** Parameters read only by `insertFallback`; the update clause never sees them. */
  insertDefaults?: readonly string[];
  localKeyColumn?: string;
  toValues(input: TInput): Record<string, SqlValue>;
  keyValues(key: TKey): Record<string, SqlValue>;
  naturalKeySql: string;
  cascade(idParam: string): string[];
  describe(row: TRow): string;
}

export interface BuiltStatement {
  text: string;
  /** Value names in placeholder order. */
  columns: string[];
}

function opt<T>(value: T | undefined): T | null {
  return value === undefined ? null : value;
}

export function toWkt(pin: LocationPin | undefined): string | null {
  return pin ? `POINT(${pin.lon} ${pin.lat})` : null;
}

export function selectList<TRow, TInput, TKey>(t: EntityTable<TRow, TInput, TKey>, d: Dialect, alias?: string): string {
  const prefix = alias ? `${alias}.` : '';
  const cols = t.readColumns.map((c) => `${prefix}${c}`);
  if (t.geometry) cols.push(`${d.geomOut(`${prefix}geom`)} AS geom_wkt`);
  return cols.join(', ');
}

export function buildUpsert<TRow, TInput, TKey>(t: EntityTable<TRow, TInput, TKey>, d: Dialect): BuiltStatement {
  const columns = [...t.keyColumns, ...t.dataColumns, ...(t.geometry ? ['geom'] : [])];
  const params = [...columns, ...(t.insertDefaults ?? [])];
  const p = (column: string): string => {
    const index = params.indexOf(column);
    if (index < 0) throw new Error(`unknown column ${t.table}.${column}`);
    return d.param(column, index + 1);
  };
  const valueOf = (column: string): string => (column === 'geom' ? d.geomIn(p(column)) : p(column));

  const inserts = columns.map((c) => t.insertFallback?.[c]?.(p, d) ?? valueOf(c));
  const updates = [...t.dataColumns, ...(t.geometry ? ['geom'] : [])].map(
    (c) => `${c} = COALESCE(${valueOf(c)}, ${t.table}.${c})`,
  );
  updates.push(`updated_at = ${d.now}`);

  const text = [
    `INSERT INTO ${t.table} (${columns.join(', ')})`,
    `VALUES (${inserts.join(', ')})`,
    `ON CONFLICT (${t.keyColumns.join(', ')}) DO UPDATE SET ${updates.join(', ')}`,
    `RETURNING ${selectList(t, d)}`,
  ].join('\n');
  return { text, columns: params };
}

export function buildKeyLookup<TRow, TInput, TKey>(t: EntityTable<TRow, TInput, TKey>, d: Dialect): BuiltStatement {
  const columns = [...t.keyColumns];
  const where = columns.map((c, i) => `${c} = ${d.param(c, i + 1)}`).join(' AND ');
  return { text: `SELECT ${selectList(t, d)} FROM ${t.table} WHERE ${where}`, columns };
}

// ─── Table descriptors ──────────────────────────────────────────────────────

export const siteTable: EntityTable<Site, SiteInput, SiteKey> = {
  table: 'sites',
  keyColumns: ['site_code'],
  dataColumns: ['site_name', 'status', 'description'],
  readColumns: ['id', 'site_code', 'site_name', 'status', 'description'],
  geometry: true,
  insertFallback: {
    site_name: (p) => `COALESCE(${p('site_name')}, ${p('site_code')})`,
    status: (p) => `COALESCE(${p('status')}, 'active')`,
  },
  toValues: (input) => ({
    site_code: input.siteCode,
    site_name: opt(input.siteName),
    status: opt(input.status),
    description: opt(input.description),
    geom: null,
  }),
  keyValues: (key) => ({ site_code: key.siteCode }),
  naturalKeySql: 'SELECT site_code AS natural_key FROM sites',
  cascade: (id) => [
    `DELETE FROM media_relations WHERE related_type = 'find' AND related_id IN (SELECT id FROM finds WHERE site_id = ${id})`,
    `DELETE FROM media_relations WHERE related_type = 'dive_log' AND related_id IN (SELECT id FROM dive_logs WHERE site_id = ${id})`,
    `DELETE FROM media_relations WHERE related_type = 'site' AND related_id = ${id}`,
    `DELETE FROM dive_team_members WHERE dive_log_id IN (SELECT id FROM dive_logs WHERE site_id = ${id})`,
    `DELETE FROM dive_logs WHERE site_id = ${id}`,
    `DELETE FROM finds WHERE site_id = ${id}`,
    `DELETE FROM expenses WHERE site_id = ${id}`,
    `DELETE FROM sites WHERE id = ${id}`,
  ],
  describe: (row) => row.site_code,
};

export const findTable: EntityTable<Find, FindInput, SiteScopedKey> = {
  table: 'finds',
  keyColumns: ['site_id', 'find_number'],
  dataColumns: [
    'material_type',
    'object_type',
    'description',
    'condition',
    'quantity',
    'depth',
    'find_date',
    'finder_name',
  ],
  readColumns: [
    'id',
    'site_id',
    'find_number',
    'material_type',
    'object_type',
    'description',
    'condition',
    'quantity',
    'depth',
    'find_date',
    'finder_name',
  ],
  geometry: true,
  insertFallback: {
    quantity: (p) => `COALESCE(${p('quantity')}, 1)`,
    find_date: (p) => `COALESCE(${p('find_date')}, ${p('default_find_date')})`,
    finder_name: (p) => `COALESCE(${p('finder_name')}, ${p('default_finder_name')})`,
  },
  insertDefaults: ['default_find_date', 'default_finder_name'],
  localKeyColumn: 'find_number',
  toValues: (input) => ({
    site_id: input.siteId,
    find_number: input.findNumber,
    material_type: opt(input.materialType),
    object_type: opt(input.objectType),
    description: opt(input.description),
    condition: opt(input.condition),
    quantity: opt(input.quantity),
    depth: opt(input.depth),
    find_date: opt(input.findDate),
    finder_name: opt(input.finderName),
    geom: toWkt(input.geometry),
    default_find_date: opt(input.defaultFindDate),
    default_finder_name: opt(input.defaultFinderName),
  }),
  keyValues: (key) => ({ site_id: key.siteId, find_number: key.localKey }),
  naturalKeySql:
    "SELECT s.site_code || '/' || f.find_number AS natural_key FROM finds f JOIN sites s ON s.id = f.site_id",
  cascade: (id) => [
    `DELETE FROM media_relations WHERE related_type = 'find' AND related_id = ${id}`,
    `DELETE FROM finds WHERE id = ${id}`,
  ],
  describe: (row) => row.find_number,
};

export const diveLogTable: EntityTable<DiveLog, DiveLogInput, SiteScopedKey> = {
  table: 'dive_logs',
  keyColumns: ['site_id', 'dive_number'],
  dataColumns: ['dive_date', 'dive_start', 'dive_end', 'max_depth', 'dive_objectives', 'work_completed'],
  readColumns: [
    'id',
    'site_id',
    'dive_number',
    'dive_date',
    'dive_start',
    'dive_end',
    'max_depth',
    'dive_objectives',
    'work_completed',
  ],
  geometry: false,
  insertFallback: {
    dive_date: (p, d) => d.asDate(`COALESCE(${p('dive_date')}, ${p('default_dive_date')})`),
  },
  insertDefaults: ['default_dive_date'],
  localKeyColumn: 'dive_number',
  toValues: (input) => ({
    site_id: input.siteId,
    dive_number: input.diveNumber,
    dive_date: opt(input.diveDate),
    dive_start: opt(input.diveStart),
    dive_end: opt(input.diveEnd),
    max_depth: opt(input.maxDepth),
    dive_objectives: opt(input.objectives),
    work_completed: opt(input.workCompleted),
    default_dive_date: opt(input.defaultDiveDate),
  }),
  keyValues: (key) => ({ site_id: key.siteId, dive_number: key.localKey }),
  naturalKeySql:
    "SELECT s.site_code || '/' || d.dive_number AS natural_key FROM dive_logs d JOIN sites s ON s.id = d.site_id",
  cascade: (id) => [
    `DELETE FROM media_relations WHERE related_type = 'dive_log' AND related_id = ${id}`,
    `DELETE FROM dive_team_members WHERE dive_log_id = ${id}`,
    `DELETE FROM dive_logs WHERE id = ${id}`,
  ],
  describe: (row) => row.dive_number,
};

export const mediaTable: EntityTable<Media, MediaInput, MediaKey> = {
  table: 'media',
  keyColumns: ['content_hash'],
  dataColumns: ['media_type', 'file_name', 'file_path', 'mime_type', 'description', 'photographer'],
  readColumns: [
    'id',
    'media_type',
    'file_name',
    'file_path',
    'content_hash',
    'mime_type',
    'description',
    'photographer',
  ],
  geometry: false,
  insertFallback: {
    photographer: (p) => `COALESCE(${p('photographer')}, ${p('default_photographer')})`,
  },
  insertDefaults: ['default_photographer'],
  toValues: (input) => ({
    content_hash: input.contentHash,
    media_type: input.mediaType,
    file_name: input.fileName,
    file_path: input.filePath,
    mime_type: opt(input.mimeType),
    description: opt(input.description),
    photographer: opt(input.photographer),
    default_photographer: opt(input.defaultPhotographer),
  }),
  keyValues: (key) => ({ content_hash: key.contentHash }),
  naturalKeySql: 'SELECT content_hash AS natural_key FROM media',
  cascade: (id) => [
    `DELETE FROM media_relations WHERE media_id = ${id}`,
    `DELETE FROM pending_links WHERE media_id = ${id}`,
    `DELETE FROM media WHERE id = ${id}`,
  ],
  describe: (row) => row.file_name,
};

export const workerTable: EntityTable<Worker, WorkerInput, WorkerKey> = {
  table: 'workers',
  keyColumns: ['worker_code'],
  dataColumns: ['full_name', 'role', 'telegram_username'],
  readColumns: ['id', 'worker_code', 'full_name', 'role', 'telegram_username'],
  geometry: false,
  insertFallback: {
    full_name: (p) => `COALESCE(${p('full_name')}, ${p('worker_code')})`,
  },
  toValues: (input) => ({
    worker_code: input.workerCode,
    full_name: opt(input.fullName),
    role: opt(input.role),
    telegram_username: opt(input.telegramUsername),
  }),
  keyValues: (key) => ({ worker_code: key.workerCode }),
  naturalKeySql: 'SELECT worker_code AS natural_key FROM workers',
  cascade: (id) => [`DELETE FROM workers WHERE id = ${id}`],
  describe: (row) => row.worker_code,
};

export const RELATION_COLUMNS = 'id, media_id, related_type, related_id, relation_type';

export const PENDING_LINK_COLUMNS = 'id, media_id, ref_kind, ref_site_code, ref_key, relation_type';

export const RELATION_NATURAL_KEY_SQL = `
SELECT m.content_hash || '->' || r.related_type || ':' || COALESCE(
  CASE r.related_type
    WHEN 'site' THEN (SELECT s.site_code FROM sites s WHERE s.id = r.related_id)
    WHEN 'find' THEN (SELECT s.site_code || '/' || f.find_number FROM finds f JOIN sites s ON s.id = f.site_id WHERE f.id = r.related_id)
    WHEN 'dive_log' THEN (SELECT s.site_code || '/' || d.dive_number FROM dive_logs d JOIN sites s ON s.id = d.site_id WHERE d.id = r.related_id)
  END, '#' || r.related_id) AS natural_key
FROM media_relations r JOIN media m ON m.id = r.media_id`;
