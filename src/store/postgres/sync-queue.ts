import { ConflictError, NotFoundError } from '../../shared/errors.js';
import type { DivergenceKind, DivergenceRecord, EnqueueResult, MessageKind, Origin, QueueEntry, QueueStats } from '../../shared/types.js';
import type { NormalizedRecord } from '../../sync/records.js';
import {
  DIVERGENCE_COLUMNS,
  emptyStats,
  QUEUE_COLUMNS,
  readClaimedRow,
  toDivergenceRecord,
  toQueueEntry,
} from '../queue-row.js';
import type { DivergenceLog, SyncQueueStore } from '../types.js';
import type { PgExecutor } from './executor.js';

type Row = Record<string, unknown>;

/**
 * Queue table inside PostgreSQL. Claims lock the chosen row with
 * `FOR UPDATE SKIP LOCKED`, so concurrent consumers never share an entry.
 */
export class PgSyncQueue implements SyncQueueStore, DivergenceLog {
  constructor(
    private readonly db: PgExecutor,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async enqueue(
    origin: Origin & { username?: string },
    kind: MessageKind,
    payload: NormalizedRecord,
    receivedAt?: Date,
  ): Promise<EnqueueResult> {
    const now = this.clock();
    const received = receivedAt ?? now;
    const inserted = await this.db.query<{ id: number }>(
      `INSERT INTO sync_queue
         (chat_id, message_id, user_id, username, message_kind, payload, state, received_at, available_at)
       VALUES ($1, $2, $3, $4, $5, $6::jsonb, 'pending', $7, $8)
       ON CONFLICT (chat_id, message_id) DO NOTHING
       RETURNING id`,
      [
        origin.externalChatId,
        origin.externalMessageId,
        origin.externalUserId,
        origin.username ?? null,
        kind,
        JSON.stringify(payload),
        received,
        received < now ? received : now,
      ],
    );
    const [row] = inserted.rows;
    if (row) return { id: row.id, duplicate: false };

    const existing = await this.db.query<{ id: number }>(
      'SELECT id FROM sync_queue WHERE chat_id = $1 AND message_id = $2',
      [origin.externalChatId, origin.externalMessageId],
    );
    const [found] = existing.rows;
    if (!found) throw new Error('sync_queue conflict without an existing row');
    return { id: found.id, duplicate: true };
  }

  async claimNext(now: Date = this.clock()): Promise<QueueEntry | null> {
    const { rows } = await this.db.query<Row>(
      `UPDATE sync_queue SET state = 'processing', claimed_at = $1, heartbeat_at = $1
       WHERE state = 'pending' AND id = (
         SELECT q.id FROM sync_queue q
         WHERE q.state = 'pending' AND q.available_at <= $1
           AND NOT EXISTS (
             SELECT 1 FROM sync_queue e
             WHERE e.chat_id = q.chat_id
               AND e.state IN ('pending', 'processing')
               AND (e.received_at < q.received_at OR (e.received_at = q.received_at AND e.id < q.id))
           )
         ORDER BY q.received_at, q.id
         LIMIT 1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING ${QUEUE_COLUMNS}`,
      [now],
    );
    if (!rows[0]) return null;

    const claimed = readClaimedRow(rows[0]);
    if ('entry' in claimed) return claimed.entry;
    await this.markFailed(claimed.id, claimed.detail);
    return this.claimNext(now);
  }

  async heartbeat(id: number, now: Date = this.clock()): Promise<void> {
    await this.db.query(`UPDATE sync_queue SET heartbeat_at = $2 WHERE id = $1 AND state = 'processing'`, [id, now]);
  }

  async markApplied(id: number, now: Date = this.clock()): Promise<void> {
    await this.db.query(
      `UPDATE sync_queue SET state = 'applied', processed_at = $2, error_detail = NULL
       WHERE id = $1 AND state = 'processing'`,
      [id, now],
    );
  }

  async markFailed(id: number, detail: string, retry?: { retryAt: Date }): Promise<void> {
    if (retry) {
      await this.db.query(
        `UPDATE sync_queue
         SET state = 'pending', retry_count = retry_count + 1, last_error = $2,
             available_at = $3, claimed_at = NULL, heartbeat_at = NULL
         WHERE id = $1 AND state = 'processing'`,
        [id, detail, retry.retryAt],
      );
      return;
    }
    await this.db.query(
      `UPDATE sync_queue SET state = 'failed', error_detail = $2, processed_at = $3
       WHERE id = $1 AND state = 'processing'`,
      [id, detail, this.clock()],
    );
  }

  async listFailed(limit = 50): Promise<QueueEntry[]> {
    const { rows } = await this.db.query<Row>(
      `SELECT ${QUEUE_COLUMNS} FROM sync_queue WHERE state = 'failed' ORDER BY id DESC LIMIT $1`,
      [limit],
    );
    return rows.map(toQueueEntry);
  }

  async requeue(id: number, now: Date = this.clock()): Promise<QueueEntry> {
    const { rows } = await this.db.query<Row>(
      `UPDATE sync_queue
       SET state = 'pending', retry_count = retry_count + 1, error_detail = NULL,
           available_at = $2, processed_at = NULL
       WHERE id = $1 AND state = 'failed'
       RETURNING ${QUEUE_COLUMNS}`,
      [id, now],
    );
    if (rows[0]) return toQueueEntry(rows[0]);

    const current = await this.db.query<{ state: string }>('SELECT state FROM sync_queue WHERE id = $1', [id]);
    const [row] = current.rows;
    if (!row) throw new NotFoundError(`Queue entry ${id}`);
    throw new ConflictError(`Queue entry ${id} is ${row.state}, only failed entries can be requeued`);
  }

  async get(id: number): Promise<QueueEntry | null> {
    const { rows } = await this.db.query<Row>(`SELECT ${QUEUE_COLUMNS} FROM sync_queue WHERE id = $1`, [id]);
    return rows[0] ? toQueueEntry(rows[0]) : null;
  }

  async recoverStale(cutoff: Date): Promise<number> {
    const { rowCount } = await this.db.query(
      `UPDATE sync_queue SET state = 'pending', claimed_at = NULL, heartbeat_at = NULL
       WHERE state = 'processing' AND COALESCE(heartbeat_at, claimed_at) < $1`,
      [cutoff],
    );
    return rowCount ?? 0;
  }

  async stats(): Promise<QueueStats> {
    const stats = emptyStats();
    const { rows } = await this.db.query<{ state: keyof QueueStats; n: number }>(
      'SELECT state, COUNT(*)::int AS n FROM sync_queue GROUP BY state',
    );
    for (const row of rows) stats[row.state] = row.n;
    return stats;
  }

  async recordDivergence(entry: {
    entryId: number | null;
    backend: string;
    kind: DivergenceKind;
    detail: string;
  }): Promise<void> {
    await this.db.query(
      'INSERT INTO mirror_divergences (entry_id, backend, kind, detail, created_at) VALUES ($1, $2, $3, $4, $5)',
      [entry.entryId, entry.backend, entry.kind, entry.detail, this.clock()],
    );
  }

  async listDivergences(limit = 100): Promise<DivergenceRecord[]> {
    const { rows } = await this.db.query<Row>(
      `SELECT ${DIVERGENCE_COLUMNS} FROM mirror_divergences ORDER BY id DESC LIMIT $1`,
      [limit],
    );
    return rows.map(toDivergenceRecord);
  }
}
