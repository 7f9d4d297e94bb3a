import { createChildLogger } from '../shared/logger.js';
import { withTimeout } from '../shared/timeout.js';
import type { ApplyContext, QueueEntry } from '../shared/types.js';
import type { CanonicalStore, SyncQueueStore } from '../store/types.js';
import { applyRecord, resolveSubmitter } from './apply.js';
import type { MirrorPublisher } from './mirror.js';
import { classifyStoreError, computeNextRetry, describeError } from './retry-policy.js';

const log = createChildLogger('reconciler');

export interface ReconcilerOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  storeTimeoutMs: number;
  heartbeatIntervalMs: number;
  clock?: () => Date;
}

export type ProcessOutcome =
  | { entryId: number; state: 'applied' }
  | { entryId: number; state: 'retry'; retryAt: Date; detail: string }
  | { entryId: number; state: 'failed'; detail: string };

/**
 * Applies claimed queue entries to the primary store. The queue row is the
 * only record of progress: an entry is `applied` only after every write
 * succeeded, and a crash mid-apply leaves it `processing` for stale recovery.
 */
export class Reconciler {
  private readonly clock: () => Date;

  constructor(
    private readonly store: CanonicalStore,
    private readonly queue: SyncQueueStore,
    private readonly mirror: MirrorPublisher | null,
    private readonly options: ReconcilerOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Claims and applies one entry; null when nothing is eligible. */
  async processNext(): Promise<ProcessOutcome | null> {
    const entry = await this.queue.claimNext(this.clock());
    if (!entry) return null;
    return this.processEntry(entry);
  }

  async processEntry(entry: QueueEntry): Promise<ProcessOutcome> {
    const heartbeat = setInterval(() => {
      this.queue.heartbeat(entry.id, this.clock()).catch((err: unknown) => {
        log.warn({ entryId: entry.id, err }, 'Heartbeat failed');
      });
    }, this.options.heartbeatIntervalMs);

    const applied = await this.apply(entry)
      .then(
        (context) => ({ ok: true as const, context }),
        (err: unknown) => ({ ok: false as const, err }),
      )
      .finally(() => clearInterval(heartbeat));
    if (!applied.ok) return this.fail(entry, applied.err);

    await this.queue.markApplied(entry.id, this.clock());
    log.info({ entryId: entry.id, kind: entry.messageKind, retries: entry.retryCount }, 'Entry applied');
    this.mirror?.publish({ entryId: entry.id, record: entry.payload, context: applied.context });
    return { entryId: entry.id, state: 'applied' };
  }

  private async apply(entry: QueueEntry): Promise<ApplyContext> {
    const work = async (): Promise<ApplyContext> => {
      const context: ApplyContext = {
        entryId: entry.id,
        submittedBy: await resolveSubmitter(this.store, entry.username),
        reportedOn: entry.receivedAt.toISOString().slice(0, 10),
      };
      const result = await applyRecord(this.store, entry.payload, context);
      log.debug({ entryId: entry.id, ...result }, 'Record written');
      return context;
    };
    return withTimeout(work(), this.options.storeTimeoutMs, `apply entry ${entry.id}`);
  }

  private async fail(entry: QueueEntry, err: unknown): Promise<ProcessOutcome> {
    const detail = describeError(err);
    const failures = entry.retryCount + 1;

    if (classifyStoreError(err) === 'transient' && failures < this.options.maxRetries) {
      const retryAt = computeNextRetry(entry.retryCount, this.clock(), this.options);
      await this.queue.markFailed(entry.id, detail, { retryAt });
      log.warn(
        { entryId: entry.id, retries: failures, retryAt: retryAt.toISOString(), err: detail },
        'Apply failed – will retry',
      );
      return { entryId: entry.id, state: 'retry', retryAt, detail };
    }

    const finalDetail =
      classifyStoreError(err) === 'transient' ? `${detail} (gave up after ${failures} attempts)` : detail;
    await this.queue.markFailed(entry.id, finalDetail);
    log.error({ entryId: entry.id, err: finalDetail }, 'Entry failed – needs operator requeue');
    return { entryId: entry.id, state: 'failed', detail: finalDetail };
  }
}
