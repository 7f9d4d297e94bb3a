import type Database from 'better-sqlite3';
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
import { SQLITE_SCHEMA } from './schema.js';
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

type Params = Record<string, SqlValue>;

export const sqliteDialect: Dialect = {
  param: (column) => `@${column}`,
  now: 'CURRENT_TIMESTAMP',
  geomIn: (placeholder) => placeholder,
  geomOut: (column) => column,
  asDate: (expr) => expr,
};

function pick(values: Params, columns: string[]): Params {
  const out: Params = {};
  for (const c of columns) out[c] = values[c] ?? null;
  return out;
}

class SqliteRepository<TRow, TInput, TKey> implements EntityRepository<TRow, TInput, TKey>, GeometryCapable {
  private readonly upsertSql: BuiltStatement;
  private readonly lookupSql: BuiltStatement;

  constructor(
    private readonly db: Database.Database,
    private readonly t: EntityTable<TRow, TInput, TKey>,
  ) {
    this.upsertSql = buildUpsert(t, sqliteDialect);
    this.lookupSql = buildKeyLookup(t, sqliteDialect);
  }

  async upsertByNaturalKey(input: TInput): Promise<TRow> {
    const values = pick(this.t.toValues(input), this.upsertSql.columns);
    const row = this.db.prepare<[Params], TRow>(this.upsertSql.text).get(values);
    if (!row) throw new Error(`upsert into ${this.t.table} returned no row`);
    return row;
  }

  async fetchById(id: number): Promise<TRow | null> {
    const row = this.db
      .prepare<[Params], TRow>(`SELECT ${selectList(this.t, sqliteDialect)} FROM ${this.t.table} WHERE id = @id`)
      .get({ id });
    return row ?? null;
  }

  async fetchByNaturalKey(key: TKey): Promise<TRow | null> {
    const values = pick(this.t.keyValues(key), this.lookupSql.columns);
    return this.db.prepare<[Params], TRow>(this.lookupSql.text).get(values) ?? null;
  }

  async listByLocalKey(localKey: string): Promise<TRow[]> {
    const column = this.t.localKeyColumn;
    if (!column) throw new Error(`${this.t.table} has no site-local key`);
    return this.db
      .prepare<[Params], TRow>(
        `SELECT ${selectList(this.t, sqliteDialect)} FROM ${this.t.table} WHERE ${column} = @key ORDER BY id`,
      )
      .all({ key: localKey });
  }

  async setGeometry(id: number, pin: LocationPin): Promise<void> {
    if (!this.t.geometry) throw new Error(`${this.t.table} has no geometry`);
    this.db
      .prepare<[Params]>(`UPDATE ${this.t.table} SET geom = @geom, updated_at = CURRENT_TIMESTAMP WHERE id = @id`)
      .run({ id, geom: toWkt(pin) });
  }

  async deleteCascade(id: number): Promise<void> {
    const statements = this.t.cascade('@id').map((sql) => this.db.prepare<[Params]>(sql));
    this.db.transaction(() => {
      for (const stmt of statements) stmt.run({ id });
    })();
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.t.table}`).get();
    return row?.n ?? 0;
  }

  async listNaturalKeys(): Promise<string[]> {
    return this.db
      .prepare<[], { natural_key: string }>(
        `SELECT natural_key FROM (${this.t.naturalKeySql}) k ORDER BY natural_key`,
      )
      .all()
      .map((r) => r.natural_key);
  }
}

/** Embedded single-file backend (better-sqlite3). Every statement is synchronous and atomic. */
export class SqliteCanonicalStore implements CanonicalStore {
  readonly backend = 'sqlite' as const;
  readonly sites: CanonicalStore['sites'];
  readonly finds: CanonicalStore['finds'];
  readonly diveLogs: CanonicalStore['diveLogs'];
  readonly media: CanonicalStore['media'];
  readonly workers: CanonicalStore['workers'];

  constructor(private readonly db: Database.Database) {
    this.sites = new SqliteRepository(db, siteTable);
    this.finds = new SqliteRepository(db, findTable);
    this.diveLogs = new SqliteRepository(db, diveLogTable);
    this.media = new SqliteRepository(db, mediaTable);
    this.workers = new SqliteRepository(db, workerTable);
  }

  async migrate(): Promise<void> {
    this.db.exec(SQLITE_SCHEMA);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  async linkMedia(link: MediaLinkInput): Promise<MediaRelation> {
    return this.insertRelation(link.mediaId, link.relatedType, link.relatedId, link.relationType ?? 'documentation');
  }

  private insertRelation(
    mediaId: number,
    relatedType: RelatedKind,
    relatedId: number,
    relationType: string,
  ): MediaRelation {
    const key = { media_id: mediaId, related_type: relatedType, related_id: relatedId };
    this.db
      .prepare<[Params]>(
        `INSERT INTO media_relations (media_id, related_type, related_id, relation_type)
         VALUES (@media_id, @related_type, @related_id, @relation_type)
         ON CONFLICT (media_id, related_type, related_id) DO NOTHING`,
      )
      .run({ ...key, relation_type: relationType });
    const row = this.db
      .prepare<[Params], MediaRelation>(
        `SELECT ${RELATION_COLUMNS} FROM media_relations
         WHERE media_id = @media_id AND related_type = @related_type AND related_id = @related_id`,
      )
      .get(key);
    if (!row) throw new Error('media relation vanished after insert');
    return row;
  }

  async mediaRelations(relatedType: RelatedKind, relatedId: number): Promise<MediaRelation[]> {
    return this.db
      .prepare<[Params], MediaRelation>(
        `SELECT ${RELATION_COLUMNS} FROM media_relations
         WHERE related_type = @related_type AND related_id = @related_id ORDER BY sort_order, id`,
      )
      .all({ related_type: relatedType, related_id: relatedId });
  }

  async relationNaturalKeys(): Promise<string[]> {
    return this.db
      .prepare<[], { natural_key: string }>(
        `SELECT natural_key FROM (${RELATION_NATURAL_KEY_SQL}) k ORDER BY natural_key`,
      )
      .all()
      .map((r) => r.natural_key);
  }

  async countRelations(): Promise<number> {
    return this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM media_relations').get()?.n ?? 0;
  }

  async workerByTelegram(handle: string): Promise<Worker | null> {
    const row = this.db
      .prepare<[Params], Worker>(
        `SELECT id, worker_code, full_name, role, telegram_username FROM workers
         WHERE lower(ltrim(telegram_username, '@')) = lower(@handle) ORDER BY id LIMIT 1`,
      )
      .get({ handle: handle.replace(/^@/, '') });
    return row ?? null;
  }

  async addDiveTeamMembers(diveLogId: number, names: string[]): Promise<void> {
    const insert = this.db.prepare<[Params]>(
      `INSERT INTO dive_team_members (dive_log_id, member_name) VALUES (@dive_log_id, @member_name)
       ON CONFLICT (dive_log_id, member_name) DO NOTHING`,
    );
    this.db.transaction(() => {
      for (const name of names) insert.run({ dive_log_id: diveLogId, member_name: name });
    })();
  }

  async diveTeamMembers(diveLogId: number): Promise<string[]> {
    return this.db
      .prepare<[Params], { member_name: string }>(
        'SELECT member_name FROM dive_team_members WHERE dive_log_id = @id ORDER BY id',
      )
      .all({ id: diveLogId })
      .map((r) => r.member_name);
  }

  async addPendingLink(marker: PendingLinkInput): Promise<void> {
    this.db
      .prepare<[Params]>(
        `INSERT INTO pending_links (media_id, ref_kind, ref_site_code, ref_key, relation_type)
         VALUES (@media_id, @ref_kind, @ref_site_code, @ref_key, @relation_type)
         ON CONFLICT (media_id, ref_kind, ref_site_code, ref_key) DO NOTHING`,
      )
      .run({
        media_id: marker.mediaId,
        ref_kind: marker.refKind,
        ref_site_code: marker.refSiteCode ?? '',
        ref_key: marker.refKey,
        relation_type: marker.relationType ?? 'documentation',
      });
  }

  async resolvePendingLinks(ref: PendingRefQuery, relatedId: number): Promise<MediaRelation[]> {
    const claim = this.db.prepare<[Params], { media_id: number; relation_type: string }>(
      `DELETE FROM pending_links
       WHERE ref_kind = @ref_kind AND ref_key = @ref_key AND (ref_site_code = '' OR ref_site_code = @ref_site_code)
       RETURNING media_id, relation_type`,
    );
    return this.db.transaction(() => {
      const claimed = claim.all({ ref_kind: ref.kind, ref_key: ref.key, ref_site_code: ref.siteCode });
      return claimed.map((c) => this.insertRelation(c.media_id, ref.kind, relatedId, c.relation_type));
    })();
  }

  async pendingLinks(): Promise<PendingLink[]> {
    return this.db
      .prepare<[], PendingLink>(`SELECT ${PENDING_LINK_COLUMNS} FROM pending_links ORDER BY id`)
      .all();
  }
}
