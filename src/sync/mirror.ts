import type { Queue } from 'bullmq';
import { z } from 'zod';
import type { BackendKind } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { withTimeout } from '../shared/timeout.js';
import type { MirrorJob } from '../shared/types.js';
import type { Backend, CanonicalStore, DivergenceLog } from '../store/types.js';
import { applyRecord } from './apply.js';
import { isoDateSchema, normalizedRecordSchema } from './records.js';
import { describeError } from './retry-policy.js';

const log = createChildLogger('mirror');

export const mirrorJobSchema = z.object({
  entryId: z.number().int(),
  record: normalizedRecordSchema,
  context: z.object({
    entryId: z.number().int(),
    submittedBy: z.string().nullable(),
    reportedOn: isoDateSchema,
  }),
});

/** Hands applied records to the secondary backend. Never throws, never blocks the caller. */
export interface MirrorPublisher {
  publish(job: MirrorJob): void;
  close(): Promise<void>;
}

/**
 * Replays an applied record against the secondary store. A failure is
 * recorded as a divergence on the primary and not retried.
 */
export class MirrorReplicator {
  constructor(
    private readonly secondary: CanonicalStore,
    private readonly divergences: DivergenceLog,
    private readonly timeoutMs: number,
  ) {}

  async replicate(job: MirrorJob): Promise<boolean> {
    try {
      await withTimeout(
        applyRecord(this.secondary, job.record, job.context),
        this.timeoutMs,
        `mirror entry ${job.entryId}`,
      );
      log.debug({ entryId: job.entryId, backend: this.secondary.backend }, 'Mirrored');
      return true;
    } catch (err) {
      const detail = describeError(err);
      log.warn({ entryId: job.entryId, backend: this.secondary.backend, err: detail }, 'Mirror write failed');
      await this.record(job.entryId, detail);
      return false;
    }
  }

  private async record(entryId: number, detail: string): Promise<void> {
    try {
      await this.divergences.recordDivergence({
        entryId,
        backend: this.secondary.backend,
        kind: 'write_failed',
        detail,
      });
    } catch (err) {
      log.error({ entryId, err }, 'Could not record mirror divergence');
    }
  }
}

/** Replays in-process, one job at a time, in publish order. */
export class InlineMirrorPublisher implements MirrorPublisher {
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly replicator: MirrorReplicator) {}

  publish(job: MirrorJob): void {
    this.chain = this.chain
      .then(() => this.replicator.replicate(job))
      .then(
        () => undefined,
        (err: unknown) => {
          log.error({ entryId: job.entryId, err }, 'Inline mirror crashed');
        },
      );
  }

  /** Resolves once every job published so far has been replayed. */
  drain(): Promise<void> {
    return this.chain;
  }

  close(): Promise<void> {
    return this.drain();
  }
}

/** Publishes to the BullMQ mirror queue; the mirror worker replays. */
export class QueuedMirrorPublisher implements MirrorPublisher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly queue: Pick<Queue, 'add' | 'close'>,
    private readonly divergences: DivergenceLog,
    private readonly secondaryBackend: string,
  ) {}

  publish(job: MirrorJob): void {
    const added: Promise<void> = this.queue
      .add('mirror', job, { jobId: `mirror-${job.entryId}` })
      .then(
        () => undefined,
        (err: unknown) => this.enqueueFailed(job.entryId, err),
      )
      .finally(() => this.pending.delete(added));
    this.pending.add(added);
  }

  private async enqueueFailed(entryId: number, err: unknown): Promise<void> {
    const detail = describeError(err);
    log.warn({ entryId, err: detail }, 'Could not enqueue mirror job');
    try {
      await this.divergences.recordDivergence({
        entryId,
        backend: this.secondaryBackend,
        kind: 'enqueue_failed',
        detail,
      });
    } catch (recordErr) {
      log.error({ entryId, err: recordErr }, 'Could not record mirror divergence');
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.pending);
    await this.queue.close();
  }
}

// ─── Wiring ─────────────────────────────────────────────────────────────────

export interface MirrorSettings {
  backend: BackendKind | 'none';
  transport: 'inline' | 'bullmq';
  timeoutMs: number;
}

export interface MirrorWiring {
  publisher: MirrorPublisher | null;
  /** Secondary opened by this process. Only the inline transport writes to it from here. */
  secondary: Backend | null;
}

/**
 * Picks the publisher for the sync worker. With the bullmq transport the
 * mirror worker owns the secondary, so it is not opened here.
 */
export async function wireMirror(
  settings: MirrorSettings,
  primary: Backend,
  deps: {
    openSecondary: () => Promise<Backend | null>;
    createQueue: () => Pick<Queue, 'add' | 'close'>;
  },
): Promise<MirrorWiring> {
  if (settings.backend === 'none') return { publisher: null, secondary: null };
  if (settings.transport === 'bullmq') {
    return {
      publisher: new QueuedMirrorPublisher(deps.createQueue(), primary.queue, settings.backend),
      secondary: null,
    };
  }

  const secondary = await deps.openSecondary();
  if (!secondary) return { publisher: null, secondary: null };
  const replicator = new MirrorReplicator(secondary.store, primary.queue, settings.timeoutMs);
  return { publisher: new InlineMirrorPublisher(replicator), secondary };
}
