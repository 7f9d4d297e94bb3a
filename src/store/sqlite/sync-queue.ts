import type Database from 'better-sqlite3';
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

type Params = Record<string, string | number | null>;

// Timestamps are ISO-8601 UTC text, so string comparison is chronological.
const iso = (d: Date): string => d.toISOString();

/**
 * Queue table inside the SQLite file. Claims run in a `BEGIN IMMEDIATE`
 * transaction, which takes the write lock before the eligibility read.
 */
export class SqliteSyncQueue implements SyncQueueStore, DivergenceLog {
  constructor(
    private readonly db: Database.Database,
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
    const inserted = this.db
      .prepare<[Params], { id: number }>(
        `INSERT INTO sync_queue
           (chat_id, message_id, user_id, username, message_kind, payload, state, received_at, available_at)
         VALUES (@chat_id, @message_id, @user_id, @username, @message_kind, @payload, 'pending', @received_at, @available_at)
         ON CONFLICT (chat_id, message_id) DO NOTHING
         RETURNING id`,
      )
      .get({
        chat_id: origin.externalChatId,
        message_id: origin.externalMessageId,
        user_id: origin.externalUserId,
        username: origin.username ?? null,
        message_kind: kind,
        payload: JSON.stringify(payload),
        received_at: iso(received),
        available_at: iso(received < now ? received : now),
      });
    if (inserted) return { id: inserted.id, duplicate: false };

    const existing = this.db
      .prepare<[Params], { id: number }>('SELECT id FROM sync_queue WHERE chat_id = @chat_id AND message_id = @message_id')
      .get({ chat_id: origin.externalChatId, message_id: origin.externalMessageId });
    if (!existing) throw new Error('sync_queue conflict without an existing row');
    return { id: existing.id, duplicate: true };
  }

  async claimNext(now: Date = this.clock()): Promise<QueueEntry | null> {
    const pick = this.db.prepare<[Params], { id: number }>(
      `SELECT q.id FROM sync_queue q
       WHERE q.state = 'pending' AND q.available_at <= @now
         AND NOT EXISTS (
           SELECT 1 FROM sync_queue e
           WHERE e.chat_id = q.chat_id
             AND e.state IN ('pending', 'processing')
             AND (e.received_at < q.received_at OR (e.received_at = q.received_at AND e.id < q.id))
         )
       ORDER BY q.received_at, q.id
       LIMIT 1`,
    );
    const claim = this.db.prepare<[Params], unknown>(
      `UPDATE sync_queue SET state = 'processing', claimed_at = @now, heartbeat_at = @now
       WHERE id = @id AND state = 'pending'
       RETURNING ${QUEUE_COLUMNS}`,
    );
    const row = this.db
      .transaction((at: string) => {
        const next = pick.get({ now: at });
        return next ? claim.get({ id: next.id, now: at }) : undefined;
      })
      .immediate(iso(now));
    if (!row) return null;

    const claimed = readClaimedRow(row);
    if ('entry' in claimed) return claimed.entry;
    await this.markFailed(claimed.id, claimed.detail);
    return this.claimNext(now);
  }

  async heartbeat(id: number, now: Date = this.clock()): Promise<void> {
    this.db
      .prepare<[Params]>(`UPDATE sync_queue SET heartbeat_at = @now WHERE id = @id AND state = 'processing'`)
      .run({ id, now: iso(now) });
  }

  async markApplied(id: number, now: Date = this.clock()): Promise<void> {
    this.db
      .prepare<[Params]>(
        `UPDATE sync_queue SET state = 'applied', processed_at = @now, error_detail = NULL
         WHERE id = @id AND state = 'processing'`,
      )
      .run({ id, now: iso(now) });
  }

  async markFailed(id: number, detail: string, retry?: { retryAt: Date }): Promise<void> {
    if (retry) {
      this.db
        .prepare<[Params]>(
          `UPDATE sync_queue
           SET state = 'pending', retry_count = retry_count + 1, last_error = @detail,
               available_at = @retry_at, claimed_at = NULL, heartbeat_at = NULL
           WHERE id = @id AND state = 'processing'`,
        )
        .run({ id, detail, retry_at: iso(retry.retryAt) });
      return;
    }
    this.db
      .prepare<[Params]>(
        `UPDATE sync_queue SET state = 'failed', error_detail = @detail, processed_at = @now
         WHERE id = @id AND state = 'processing'`,
      )
      .run({ id, detail, now: iso(this.clock()) });
  }

  async listFailed(limit = 50): Promise<QueueEntry[]> {
    return this.db
      .prepare<[Params], unknown>(
        `SELECT ${QUEUE_COLUMNS} FROM sync_queue WHERE state = 'failed' ORDER BY id DESC LIMIT @limit`,
      )
      .all({ limit })
      .map(toQueueEntry);
  }

  async requeue(id: number, now: Date = this.clock()): Promise<QueueEntry> {
    const row = this.db.transaction(() => {
      const current = this.db
        .prepare<[Params], { state: string }>('SELECT state FROM sync_queue WHERE id = @id')
        .get({ id });
      if (!current) throw new NotFoundError(`Queue entry ${id}`);
      if (current.state !== 'failed') {
        throw new ConflictError(`Queue entry ${id} is ${current.state}, only failed entries can be requeued`);
      }
      return this.db
        .prepare<[Params], unknown>(
          `UPDATE sync_queue
           SET state = 'pending', retry_count = retry_count + 1, error_detail = NULL,
               available_at = @now, processed_at = NULL
           WHERE id = @id
           RETURNING ${QUEUE_COLUMNS}`,
        )
        .get({ id, now: iso(now) });
    })();
    return toQueueEntry(row);
  }

  async get(id: number): Promise<QueueEntry | null> {
    const row = this.db.prepare<[Params], unknown>(`SELECT ${QUEUE_COLUMNS} FROM sync_queue WHERE id = @id`).get({ id });
    return row ? toQueueEntry(row) : null;
  }

  async recoverStale(cutoff: Date): Promise<number> {
    const result = this.db
      .prepare<[Params]>(
        `UPDATE sync_queue SET state = 'pending', claimed_at = NULL, heartbeat_at = NULL
         WHERE state = 'processing' AND COALESCE(heartbeat_at, claimed_at) < @cutoff`,
      )
      .run({ cutoff: iso(cutoff) });
    return result.changes;
  }

  async stats(): Promise<QueueStats> {
    const stats = emptyStats();
    const rows = this.db
      .prepare<[], { state: keyof QueueStats; n: number }>('SELECT state, COUNT(*) AS n FROM sync_queue GROUP BY state')
      .all();
    for (const row of rows) stats[row.state] = row.n;
    return stats;
  }

  async recordDivergence(entry: {
    entryId: number | null;
    backend: string;
    kind: DivergenceKind;
    detail: string;
  }): Promise<void> {
    this.db
      .prepare<[Params]>(
        `INSERT INTO mirror_divergences (entry_id, backend, kind, detail, created_at)
         VALUES (@entry_id, @backend, @kind, @detail, @created_at)`,
      )
      .run({
        entry_id: entry.entryId,
        backend: entry.backend,
        kind: entry.kind,
        detail: entry.detail,
        created_at: iso(this.clock()),
      });
  }

  async listDivergences(limit = 100): Promise<DivergenceRecord[]> {
    return this.db
      .prepare<[Params], unknown>(
        `SELECT ${DIVERGENCE_COLUMNS} FROM mirror_divergences ORDER BY id DESC LIMIT @limit`,
      )
      .all({ limit })
      .map(toDivergenceRecord);
  }
}
