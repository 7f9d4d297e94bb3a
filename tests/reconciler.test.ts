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

import { submitFieldMessage } from '../src/services/field-intake.js';
import type { InboundMessage } from '../src/shared/types.js';
import type { Backend, Find } from '../src/store/types.js';
import { Reconciler, type ReconcilerOptions } from '../src/sync/reconciler.js';
import { T0, TestClock, at, fieldMessage, openMemoryBackend, sha256 } from './helpers.js';

/**
 * Reconciler tests: queued field messages end up as canonical rows exactly
 * once, whatever the arrival order, retries or crashes in between.
 */

const FIND_F102 = '#find\nsite: WRK01\nfind: F-102\nmaterial: ceramic\nqty: 2';

function connectionReset(): Error {
  return Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
}

describe('Reconciler', () => {
  let clock: TestClock;
  let backend: Backend;
  let reconciler: Reconciler;

  function createReconciler(overrides: Partial<ReconcilerOptions> = {}): Reconciler {
    return new Reconciler(backend.store, backend.queue, null, {
      maxRetries: 3,
      baseDelayMs: 1000,
      maxDelayMs: 8000,
      storeTimeoutMs: 1000,
      heartbeatIntervalMs: 60_000,
      clock: clock.now,
      ...overrides,
    });
  }

  async function submit(message: InboundMessage): Promise<void> {
    const result = await submitFieldMessage(backend.queue, message);
    expect(result.status).toBe('accepted');
  }

  async function findByNumber(findNumber: string): Promise<Find> {
    const [find] = await backend.store.finds.listByLocalKey(findNumber);
    if (!find) throw new Error(`find ${findNumber} missing`);
    return find;
  }

  beforeEach(async () => {
    clock = new TestClock();
    backend = await openMemoryBackend(clock);
    reconciler = createReconciler();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await backend.close();
  });

  // ─── Field scenarios ──────────────────────────────────────────────────

  it('applies a find and a photo that references it', async () => {
    await submit(fieldMessage({ kind: 'find', externalMessageId: '1', payload: FIND_F102 }));
    await submit(
      fieldMessage({
        kind: 'photo',
        externalMessageId: '2',
        payload: 'ref: F-102',
        mediaBlobRef: 'tg://file/P1',
        sentAt: at(1),
      }),
    );

    expect(await reconciler.processNext()).toEqual({ entryId: 1, state: 'applied' });
    expect(await reconciler.processNext()).toEqual({ entryId: 2, state: 'applied' });
    expect(await reconciler.processNext()).toBeNull();

    const find = await findByNumber('F-102');
    expect(find).toMatchObject({ material_type: 'ceramic', quantity: 2, find_date: '2024-03-05' });
    const media = await backend.store.media.fetchByNaturalKey({ contentHash: sha256('photo:tg://file/P1') });
    expect(media).toMatchObject({ media_type: 'photo', file_name: 'P1', file_path: 'tg://file/P1' });
    expect(await backend.store.mediaRelations('find', find.id)).toMatchObject([
      { media_id: media?.id, related_type: 'find', relation_type: 'documentation' },
    ]);
    expect(await backend.store.finds.count()).toBe(1);
    expect(await backend.store.media.count()).toBe(1);
    expect(await backend.store.countRelations()).toBe(1);
    expect(await backend.queue.stats()).toEqual({ pending: 0, processing: 0, applied: 2, failed: 0 });
  });

  it('links a photo that arrives before its find once the find is applied', async () => {
    await submit(
      fieldMessage({ kind: 'photo', externalMessageId: '1', payload: 'ref: WRK01/F-102', mediaBlobRef: 'tg://file/P1' }),
    );
    await submit(fieldMessage({ kind: 'find', externalMessageId: '2', payload: FIND_F102, sentAt: at(1) }));

    await reconciler.processNext();
    expect(await backend.store.countRelations()).toBe(0);
    expect(await backend.store.pendingLinks()).toMatchObject([
      { ref_kind: 'find', ref_site_code: 'WRK01', ref_key: 'F-102' },
    ]);

    await reconciler.processNext();
    const find = await findByNumber('F-102');
    expect(await backend.store.mediaRelations('find', find.id)).toHaveLength(1);
    expect(await backend.store.pendingLinks()).toEqual([]);
  });

  it('replays an applied entry without duplicating rows or quantities', async () => {
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102, mediaBlobRef: 'tg://file/P9' }));
    await reconciler.processNext();

    const entry = await backend.queue.get(1);
    if (!entry) throw new Error('entry missing');
    expect(await reconciler.processEntry(entry)).toEqual({ entryId: 1, state: 'applied' });

    expect(await backend.store.finds.count()).toBe(1);
    expect(await backend.store.media.count()).toBe(1);
    expect(await backend.store.countRelations()).toBe(1);
    expect((await findByNumber('F-102')).quantity).toBe(2);
  });

  it('applies an entry once after a crash left it processing', async () => {
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102 }));
    await backend.queue.claimNext(T0);

    expect(await reconciler.processNext()).toBeNull();
    expect(await backend.queue.recoverStale(at(1))).toBe(1);
    expect(await reconciler.processNext()).toEqual({ entryId: 1, state: 'applied' });
    expect(await backend.store.finds.count()).toBe(1);
  });

  it('merges a location pin into the referenced find', async () => {
    await submit(fieldMessage({ kind: 'find', externalMessageId: '1', payload: FIND_F102 }));
    await submit(
      fieldMessage({
        kind: 'location',
        externalMessageId: '2',
        payload: { lat: -6.2, lon: 106.8, ref: 'WRK01/F-102' },
        sentAt: at(1),
      }),
    );

    await reconciler.processNext();
    await reconciler.processNext();

    expect((await findByNumber('F-102')).geom_wkt).toBe('POINT(106.8 -6.2)');
    expect(await backend.store.media.count()).toBe(0);
  });

  it('keeps an unattached location pin as a media row', async () => {
    await submit(fieldMessage({ kind: 'location', payload: { lat: -6.2, lon: 106.8, accuracy: 5 } }));
    await reconciler.processNext();

    const media = await backend.store.media.fetchByNaturalKey({
      contentHash: sha256('location:-6.200000,106.800000'),
    });
    expect(media).toMatchObject({
      media_type: 'location',
      file_name: 'location--6.200000,106.800000',
      file_path: 'geo:-6.200000,106.800000',
      description: 'accuracy 5 m',
    });
  });

  it('applies a dive log with its team', async () => {
    await submit(
      fieldMessage({ kind: 'dive_log', payload: '#dive\nsite: WRK01\ndive: D-07\nteam: Ana, Budi\nmax_depth: 18' }),
    );
    await reconciler.processNext();

    const [dive] = await backend.store.diveLogs.listByLocalKey('D-07');
    expect(dive).toMatchObject({ dive_date: '2024-03-05', max_depth: 18 });
    if (!dive) return;
    expect(await backend.store.diveTeamMembers(dive.id)).toEqual(['Ana', 'Budi']);
  });

  it('credits the registered worker behind a Telegram handle', async () => {
    await backend.store.workers.upsertByNaturalKey({
      workerCode: 'W-001',
      fullName: 'Demo Diver',
      telegramUsername: 'demo_diver',
    });
    await submit(fieldMessage({ kind: 'find', externalMessageId: '1', payload: FIND_F102, username: 'demo_diver' }));
    await submit(
      fieldMessage({
        kind: 'photo',
        externalMessageId: '2',
        payload: 'Seabed overview',
        mediaBlobRef: 'tg://file/P2',
        username: 'visiting_diver',
        sentAt: at(1),
      }),
    );

    await reconciler.processNext();
    await reconciler.processNext();

    expect((await findByNumber('F-102')).finder_name).toBe('Demo Diver');
    const media = await backend.store.media.fetchByNaturalKey({ contentHash: sha256('photo:tg://file/P2') });
    expect(media).toMatchObject({ photographer: 'visiting_diver', description: 'Seabed overview' });
  });

  it('keeps stated find fields when a correction omits them', async () => {
    await submit(
      fieldMessage({
        kind: 'find',
        externalMessageId: '1',
        payload: '#find\nsite: WRK01\nfind: F-102\ndate: 2024-01-10\nfinder: Dr Smith',
      }),
    );
    await submit(
      fieldMessage({
        kind: 'find',
        externalMessageId: '2',
        payload: '#find\nsite: WRK01\nfind: F-102\nmaterial: glass',
        username: 'bob',
        sentAt: at(30 * 86_400),
      }),
    );

    await reconciler.processNext();
    await reconciler.processNext();

    expect(await findByNumber('F-102')).toMatchObject({
      find_date: '2024-01-10',
      finder_name: 'Dr Smith',
      material_type: 'glass',
      quantity: 1,
    });
  });

  it('fills an unstated date and finder only when the find is created', async () => {
    await submit(fieldMessage({ kind: 'find', externalMessageId: '1', payload: FIND_F102, username: 'alice' }));
    await submit(
      fieldMessage({
        kind: 'find',
        externalMessageId: '2',
        payload: '#find\nsite: WRK01\nfind: F-102\ncondition: fragile',
        username: 'bob',
        sentAt: at(86_400),
      }),
    );

    await reconciler.processNext();
    await reconciler.processNext();

    expect(await findByNumber('F-102')).toMatchObject({
      find_date: '2024-03-05',
      finder_name: 'alice',
      condition: 'fragile',
    });
  });

  it('keeps the dive date when a later dive report omits it', async () => {
    await submit(fieldMessage({ kind: 'dive_log', externalMessageId: '1', payload: 'site: WRK01\ndive: D-07' }));
    await submit(
      fieldMessage({
        kind: 'dive_log',
        externalMessageId: '2',
        payload: 'site: WRK01\ndive: D-07\nmax_depth: 21',
        sentAt: at(2 * 86_400),
      }),
    );

    await reconciler.processNext();
    await reconciler.processNext();

    expect(await backend.store.diveLogs.listByLocalKey('D-07')).toMatchObject([
      { dive_date: '2024-03-05', max_depth: 21 },
    ]);
  });

  it('claims its own marker when the find lands between lookup and deferral', async () => {
    await submit(fieldMessage({ kind: 'find', externalMessageId: '1', payload: FIND_F102 }));
    await reconciler.processNext();
    // The first lookup misses, as if the find were still being written by another lane.
    vi.spyOn(backend.store.finds, 'fetchByNaturalKey').mockResolvedValueOnce(null);
    await submit(
      fieldMessage({
        kind: 'photo',
        externalMessageId: '2',
        payload: 'ref: WRK01/F-102',
        mediaBlobRef: 'tg://file/P1',
        sentAt: at(1),
      }),
    );

    expect(await reconciler.processNext()).toEqual({ entryId: 2, state: 'applied' });

    const find = await findByNumber('F-102');
    expect(await backend.store.mediaRelations('find', find.id)).toMatchObject([
      { related_type: 'find', relation_type: 'documentation' },
    ]);
    expect(await backend.store.pendingLinks()).toEqual([]);
  });

  // ─── Failures ─────────────────────────────────────────────────────────

  it('retries a transient failure after the backoff delay', async () => {
    vi.spyOn(backend.store.finds, 'upsertByNaturalKey').mockRejectedValueOnce(connectionReset());
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102 }));

    expect(await reconciler.processNext()).toEqual({
      entryId: 1,
      state: 'retry',
      retryAt: at(1),
      detail: 'Error [ECONNRESET]: read ECONNRESET',
    });
    expect(await backend.queue.get(1)).toMatchObject({
      state: 'pending',
      retryCount: 1,
      lastError: 'Error [ECONNRESET]: read ECONNRESET',
      errorDetail: null,
      availableAt: at(1),
    });
    expect(await reconciler.processNext()).toBeNull();

    clock.advance(1000);
    expect(await reconciler.processNext()).toEqual({ entryId: 1, state: 'applied' });
    expect(await backend.store.finds.count()).toBe(1);
  });

  it('treats a store call that exceeds the timeout as transient', async () => {
    const patient = createReconciler({ storeTimeoutMs: 20 });
    vi.spyOn(backend.store.finds, 'upsertByNaturalKey').mockImplementationOnce(() => new Promise<Find>(() => undefined));
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102 }));

    expect(await patient.processNext()).toEqual({
      entryId: 1,
      state: 'retry',
      retryAt: at(1),
      detail: 'TransientStoreError [TRANSIENT_STORE_ERROR]: apply entry 1 timed out after 20ms',
    });
  });

  it('gives up on a transient failure after the retry limit', async () => {
    vi.spyOn(backend.store.finds, 'upsertByNaturalKey').mockRejectedValue(connectionReset());
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102 }));

    expect(await reconciler.processNext()).toMatchObject({ state: 'retry', retryAt: at(1) });
    clock.advance(1000);
    expect(await reconciler.processNext()).toMatchObject({ state: 'retry', retryAt: at(3) });
    clock.advance(2000);
    expect(await reconciler.processNext()).toEqual({
      entryId: 1,
      state: 'failed',
      detail: 'Error [ECONNRESET]: read ECONNRESET (gave up after 3 attempts)',
    });
    expect(await backend.queue.get(1)).toMatchObject({ state: 'failed', retryCount: 2 });
  });

  it('fails a constraint violation at once and applies it after a requeue', async () => {
    const violation = Object.assign(new Error('UNIQUE constraint failed: finds.site_id, finds.find_number'), {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });
    vi.spyOn(backend.store.finds, 'upsertByNaturalKey').mockRejectedValueOnce(violation);
    await submit(fieldMessage({ kind: 'find', payload: FIND_F102 }));

    expect(await reconciler.processNext()).toEqual({
      entryId: 1,
      state: 'failed',
      detail: 'Error [SQLITE_CONSTRAINT_UNIQUE]: UNIQUE constraint failed: finds.site_id, finds.find_number',
    });
    clock.advance(3_600_000);
    expect(await reconciler.processNext()).toBeNull();

    await backend.queue.requeue(1);
    expect(await reconciler.processNext()).toEqual({ entryId: 1, state: 'applied' });
    expect(await backend.queue.get(1)).toMatchObject({ state: 'applied', retryCount: 1, errorDetail: null });
  });

  it('fails a site-less reference that matches finds on several sites', async () => {
    const a = await backend.store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const b = await backend.store.sites.upsertByNaturalKey({ siteCode: 'WRK02' });
    await backend.store.finds.upsertByNaturalKey({ siteId: a.id, findNumber: 'F-1' });
    await backend.store.finds.upsertByNaturalKey({ siteId: b.id, findNumber: 'F-1' });
    await submit(fieldMessage({ kind: 'photo', payload: 'ref: F-1', mediaBlobRef: 'tg://file/P1' }));

    expect(await reconciler.processNext()).toEqual({
      entryId: 1,
      state: 'failed',
      detail:
        "PermanentStoreError [PERMANENT_STORE_ERROR]: reference 'F-1' matches 2 rows, qualify it with a site code",
    });
  });
});
