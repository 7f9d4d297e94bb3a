import type { QueryResultRow } from 'pg';
import {
  buildKeyLookup,
  buildUpsert,
  diveLogTable,
  findTable,
  mediaTable,
  PENDING_LINK_COLUMNS,
  RELATION_COLUMNS,
  RELATION_NATURAL_KEY_SQL,
  selectList,
  siteTable,
  toWkt,
  workerTable,
  type BuiltStatement,
  type Dialect,
  type EntityTable,
  type SqlValue,
} from '../sql.js';
import type {
  CanonicalStore,
  EntityRepository,
  GeometryCapable,
  MediaLinkInput,
  MediaRelation,
  PendingLink,
  PendingLinkInput,
  PendingRefQuery,
  Worker,
} from '../types.js';
import type { LocationPin, RelatedKind } from '../../sync/records.js';
import type { PgExecutor } from './executor.js';
import { postgresSchema } from './schema.js';

export function postgresDialect(postgis: boolean): Dialect {
  return {
    param: (_column, index) => `$${index}`,
    now: 'now()',
    geomIn: (placeholder) => (postgis ? `ST_GeomFromText(${placeholder}, 4326)` : placeholder),
    geomOut: (column) => (postgis ? `ST_AsText(${column})` : column),
    asDate: (expr) => `CAST(${expr} AS date)`,
  };
}

function ordered(values: Record<string, SqlValue>, columns: string[]): SqlValue[] {
  return columns.map((c) => values[c] ?? null);
}

function first<R>(rows: R[], what: string): R {
  const [row] = rows;
  if (row === undefined) throw new Error(`${what} returned no row`);
  return row;
}

class PgRepository<TRow extends QueryResultRow, TInput, TKey>
  implements EntityRepository<TRow, TInput, TKey>, GeometryCapable
{
  private readonly upsertSql: BuiltStatement;
  private readonly lookupSql: BuiltStatement;

  constructor(
    private readonly db: PgExecutor,
    private readonly t: EntityTable<TRow, TInput, TKey>,
    private readonly dialect: Dialect,
  ) {
    this.upsertSql = buildUpsert(t, dialect);
    this.lookupSql = buildKeyLookup(t, dialect);
  }

  async upsertByNaturalKey(input: TInput): Promise<TRow> {
    const { rows } = await this.db.query<TRow>(
      this.upsertSql.text,
      ordered(this.t.toValues(input), this.upsertSql.columns),
    );
    return first(rows, `upsert into ${this.t.table}`);
  }

  async fetchById(id: number): Promise<TRow | null> {
    const { rows } = await this.db.query<TRow>(
      `SELECT ${selectList(this.t, this.dialect)} FROM ${this.t.table} WHERE id = $1`,
      [id],
    );
    return rows[0] ?? null;
  }

  async fetchByNaturalKey(key: TKey): Promise<TRow | null> {
    const { rows } = await this.db.query<TRow>(
      this.lookupSql.text,
      ordered(this.t.keyValues(key), this.lookupSql.columns),
    );
    return rows[0] ?? null;
  }

  async listByLocalKey(localKey: string): Promise<TRow[]> {
    const column = this.t.localKeyColumn;
    if (!column) throw new Error(`${this.t.table} has no site-local key`);
    const { rows } = await this.db.query<TRow>(
      `SELECT ${selectList(this.t, this.dialect)} FROM ${this.t.table} WHERE ${column} = $1 ORDER BY id`,
      [localKey],
    );
    return rows;
  }

  async setGeometry(id: number, pin: LocationPin): Promise<void> {
    if (!this.t.geometry) throw new Error(`${this.t.table} has no geometry`);
    await this.db.query(
      `UPDATE ${this.t.table} SET geom = ${this.dialect.geomIn('$2')}, updated_at = now() WHERE id = $1`,
      [id, toWkt(pin)],
    );
  }

  async deleteCascade(id: number): Promise<void> {
    const statements = this.t.cascade('$1');
    await this.db.transaction(async (tx) => {
      for (const sql of statements) await tx.query(sql, [id]);
    });
  }

  async count(): Promise<number> {
    const { rows } = await this.db.query<{ n: number }>(`SELECT COUNT(*)::int AS n FROM ${this.t.table}`);
    return rows[0]?.n ?? 0;
  }

  async listNaturalKeys(): Promise<string[]> {
    const { rows } = await this.db.query<{ natural_key: string }>(
      `SELECT natural_key FROM (${this.t.naturalKeySql}) k ORDER BY natural_key`,
    );
    return rows.map((r) => r.natural_key);
  }
}

/** Cloud backend over `pg`, optionally PostGIS. Each method is one statement or one transaction. */
export class PgCanonicalStore implements CanonicalStore {
  readonly backend = 'postgres' as const;
  readonly sites: CanonicalStore['sites'];
  readonly finds: CanonicalStore['finds'];
  readonly diveLogs: CanonicalStore['diveLogs'];
  readonly media: CanonicalStore['media'];
  readonly workers: CanonicalStore['workers'];

  constructor(
    private readonly db: PgExecutor,
    private readonly options: { postgis: boolean },
  ) {
    const dialect = postgresDialect(options.postgis);
    this.sites = new PgRepository(db, siteTable, dialect);
    this.finds = new PgRepository(db, findTable, dialect);
    this.diveLogs = new PgRepository(db, diveLogTable, dialect);
    this.media = new PgRepository(db, mediaTable, dialect);
    this.workers = new PgRepository(db, workerTable, dialect);
  }

  async migrate(): Promise<void> {
    await this.db.query(postgresSchema(this.options));
  }

  async close(): Promise<void> {
    await this.db.end();
  }

  async linkMedia(link: MediaLinkInput): Promise<MediaRelation> {
    // DO UPDATE with a no-op assignment so RETURNING also yields an existing row.
    const { rows } = await this.db.query<MediaRelation>(
      `INSERT INTO media_relations (media_id, related_type, related_id, relation_type)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (media_id, related_type, related_id)
       DO UPDATE SET relation_type = media_relations.relation_type
       RETURNING ${RELATION_COLUMNS}`,
      [link.mediaId, link.relatedType, link.relatedId, link.relationType ?? 'documentation'],
    );
    return first(rows, 'media relation insert');
  }

  async mediaRelations(relatedType: RelatedKind, relatedId: number): Promise<MediaRelation[]> {
    const { rows } = await this.db.query<MediaRelation>(
      `SELECT ${RELATION_COLUMNS} FROM media_relations
       WHERE related_type = $1 AND related_id = $2 ORDER BY sort_order, id`,
      [relatedType, relatedId],
    );
    return rows;
  }

  async relationNaturalKeys(): Promise<string[]> {
    const { rows } = await this.db.query<{ natural_key: string }>(
      `SELECT natural_key FROM (${RELATION_NATURAL_KEY_SQL}) k ORDER BY natural_key`,
    );
    return rows.map((r) => r.natural_key);
  }

  async countRelations(): Promise<number> {
    const { rows } = await this.db.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM media_relations');
    return rows[0]?.n ?? 0;
  }

  async workerByTelegram(handle: string): Promise<Worker | null> {
    const { rows } = await this.db.query<Worker>(
      `SELECT id, worker_code, full_name, role, telegram_username FROM workers
       WHERE lower(ltrim(telegram_username, '@')) = lower($1) ORDER BY id LIMIT 1`,
      [handle.replace(/^@/, '')],
    );
    return rows[0] ?? null;
  }

  async addDiveTeamMembers(diveLogId: number, names: string[]): Promise<void> {
    if (names.length === 0) return;
    await this.db.query(
      `INSERT INTO dive_team_members (dive_log_id, member_name)
       SELECT $1, name FROM unnest($2::text[]) AS name
       ON CONFLICT (dive_log_id, member_name) DO NOTHING`,
      [diveLogId, names],
    );
  }

  async diveTeamMembers(diveLogId: number): Promise<string[]> {
    const { rows } = await this.db.query<{ member_name: string }>(
      'SELECT member_name FROM dive_team_members WHERE dive_log_id = $1 ORDER BY id',
      [diveLogId],
    );
    return rows.map((r) => r.member_name);
  }

  async addPendingLink(marker: PendingLinkInput): Promise<void> {
    await this.db.query(
      `INSERT INTO pending_links (media_id, ref_kind, ref_site_code, ref_key, relation_type)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (media_id, ref_kind, ref_site_code, ref_key) DO NOTHING`,
      [
        marker.mediaId,
        marker.refKind,
        marker.refSiteCode ?? '',
        marker.refKey,
        marker.relationType ?? 'documentation',
      ],
    );
  }

  async resolvePendingLinks(ref: PendingRefQuery, relatedId: number): Promise<MediaRelation[]> {
    const { rows } = await this.db.query<MediaRelation>(
      `WITH claimed AS (
         DELETE FROM pending_links
         WHERE ref_kind = $1 AND ref_key = $2 AND (ref_site_code = '' OR ref_site_code = $3)
         RETURNING media_id, relation_type
       )
       INSERT INTO media_relations (media_id, related_type, related_id, relation_type)
       SELECT media_id, $1, $4, relation_type FROM claimed
       ON CONFLICT (media_id, related_type, related_id)
       DO UPDATE SET relation_type = media_relations.relation_type
       RETURNING ${RELATION_COLUMNS}`,
      [ref.kind, ref.key, ref.siteCode, relatedId],
    );
    return rows;
  }

  async pendingLinks(): Promise<PendingLink[]> {
    const { rows } = await this.db.query<PendingLink>(`SELECT ${PENDING_LINK_COLUMNS} FROM pending_links ORDER BY id`);
    return rows;
  }
}
