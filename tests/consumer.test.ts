import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/shared/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn() },
  createChildLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import type { Backend } from '../src/store/types.js';
import { SyncConsumer } from '../src/sync/consumer.js';
import { Reconciler } from '../src/sync/reconciler.js';
import { T0, TestClock, findRecord, openMemoryBackend, origin, sha256 } from './helpers.js';

/**
 * Sync consumer tests: a tick drains every eligible entry across lanes,
 * a failing lane does not sink the tick and a stopped consumer stops claiming.
 */

describe('SyncConsumer', () => {
  let backend: Backend;
  let reconciler: Reconciler;

  beforeEach(async () => {
    const clock = new TestClock();
    backend = await openMemoryBackend(clock);
    reconciler = new Reconciler(backend.store, backend.queue, null, {
      maxRetries: 3,
      baseDelayMs: 1000,
      maxDelayMs: 8000,
      storeTimeoutMs: 1000,
      heartbeatIntervalMs: 60_000,
      clock: clock.now,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await backend.close();
  });

  it('drains every eligible entry in one tick', async () => {
    await backend.queue.enqueue(origin('42', '1'), 'find', findRecord('F-1'), T0);
    await backend.queue.enqueue(origin('43', '1'), 'find', findRecord('F-2'), T0);
    await backend.queue.enqueue(origin('42', '2'), 'find', findRecord('F-3'), T0);
    const consumer = new SyncConsumer(reconciler, { cron: '*/2 * * * * *', concurrency: 2 });

    expect(await consumer.tick()).toBe(3);
    expect(await consumer.tick()).toBe(0);
    expect(await backend.queue.stats()).toEqual({ pending: 0, processing: 0, applied: 3, failed: 0 });
    expect(await backend.store.finds.listNaturalKeys()).toEqual(['WRK01/F-1', 'WRK01/F-2', 'WRK01/F-3']);
  });

  it('links a photo and its find that arrive on different chats in the same tick', async () => {
    await backend.queue.enqueue(
      origin('42', '1'),
      'photo',
      {
        type: 'media_asset',
        kind: 'photo',
        blobRef: 'tg://file/P1',
        contentHash: sha256('photo:tg://file/P1'),
        fileName: 'P1',
        relatedEntityRef: { kind: 'find', siteCode: 'WRK01', key: 'F-102', raw: 'WRK01/F-102' },
      },
      T0,
    );
    await backend.queue.enqueue(origin('43', '1'), 'find', findRecord('F-102'), T0);
    const consumer = new SyncConsumer(reconciler, { cron: '*/2 * * * * *', concurrency: 2 });

    expect(await consumer.tick()).toBe(2);
    expect(await backend.queue.stats()).toEqual({ pending: 0, processing: 0, applied: 2, failed: 0 });
    expect(await backend.store.countRelations()).toBe(1);
    expect(await backend.store.pendingLinks()).toEqual([]);
  });

  it('survives a lane whose claim throws', async () => {
    await backend.queue.enqueue(origin('42', '1'), 'find', findRecord('F-1'), T0);
    vi.spyOn(reconciler, 'processNext').mockRejectedValueOnce(new Error('database is closed'));
    const consumer = new SyncConsumer(reconciler, { cron: '*/2 * * * * *', concurrency: 1 });

    expect(await consumer.tick()).toBe(0);
    expect(await consumer.tick()).toBe(1);
  });

  it('stops claiming once stopped', async () => {
    await backend.queue.enqueue(origin('42', '1'), 'find', findRecord('F-1'), T0);
    const consumer = new SyncConsumer(reconciler, { cron: '*/2 * * * * *', concurrency: 1 });

    consumer.start();
    await consumer.stop();

    expect(await consumer.tick()).toBe(0);
    expect(await backend.queue.stats()).toMatchObject({ applied: 0 });
  });
});
