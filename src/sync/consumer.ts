import { Cron } from 'croner';
import { createChildLogger } from '../shared/logger.js';
import type { ProcessOutcome, Reconciler } from './reconciler.js';

const log = createChildLogger('sync-consumer');

export interface SyncConsumerOptions {
  /** Six-field croner pattern; each tick drains whatever is eligible. */
  cron: string;
  concurrency: number;
}

/**
 * Drives the reconciler from a cron tick. Each tick runs `concurrency` lanes
 * that claim until the queue has nothing eligible, then goes idle until the
 * next tick.
 */
export class SyncConsumer {
  private job: Cron | null = null;
  private stopping = false;
  private readonly inFlight = new Set<Promise<ProcessOutcome | null>>();

  constructor(
    private readonly reconciler: Reconciler,
    private readonly options: SyncConsumerOptions,
  ) {}

  start(): void {
    this.stopping = false;
    this.job = new Cron(this.options.cron, { protect: true }, async () => {
      try {
        await this.tick();
      } catch (err) {
        log.error({ err }, 'Sync tick failed');
      }
    });
    log.info({ cron: this.options.cron, concurrency: this.options.concurrency }, 'Sync consumer running');
  }

  /** Drains the queue once. Returns the number of entries processed. */
  async tick(): Promise<number> {
    if (this.stopping) return 0;
    const lanes = Array.from({ length: this.options.concurrency }, (_, lane) => this.drainLane(lane));
    const results = await Promise.allSettled(lanes);

    let processed = 0;
    for (const result of results) {
      if (result.status === 'fulfilled') processed += result.value;
      else log.error({ err: result.reason }, 'Sync lane failed');
    }
    if (processed > 0) log.debug({ processed }, 'Tick drained queue');
    return processed;
  }

  private async drainLane(lane: number): Promise<number> {
    let processed = 0;
    while (!this.stopping) {
      const next = this.reconciler.processNext();
      this.inFlight.add(next);
      try {
        const outcome = await next;
        if (!outcome) break;
        processed += 1;
        log.debug({ lane, ...outcome }, 'Entry processed');
      } finally {
        this.inFlight.delete(next);
      }
    }
    return processed;
  }

  /** Stops claiming and waits for entries already being applied. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.job?.stop();
    this.job = null;
    await Promise.allSettled([...this.inFlight]);
    log.info('Sync consumer stopped');
  }
}
