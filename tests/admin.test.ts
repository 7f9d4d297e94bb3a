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

import type { FastifyInstance } from 'fastify';
import { buildAdminApp } from '../src/admin/app.js';
import type { Backend } from '../src/store/types.js';
import { T0, TestClock, findRecord, openMemoryBackend, origin } from './helpers.js';

/**
 * Admin API tests: failed-entry listing, operator requeue, queue stats and
 * the mirror divergence endpoints.
 */

describe('Admin API', () => {
  let primary: Backend;
  let secondary: Backend;

  beforeEach(async () => {
    const clock = new TestClock();
    primary = await openMemoryBackend(clock);
    secondary = await openMemoryBackend(clock);
    await primary.queue.enqueue(origin('42', '1'), 'find', findRecord(), T0);
    await primary.queue.claimNext(T0);
    await primary.queue.markFailed(1, 'PermanentStoreError: bad reference');
  });

  afterEach(async () => {
    await secondary.close();
    await primary.close();
  });

  // ─── Queue ────────────────────────────────────────────────────────────

  describe('queue endpoints', () => {
    let app: FastifyInstance;

    beforeEach(async () => {
      app = await buildAdminApp({ queue: primary.queue, primary: primary.store, secondary: null });
    });

    afterEach(async () => {
      await app.close();
    });

    it('lists failed entries with their error detail', async () => {
      const res = await app.inject({ method: 'GET', url: '/admin/queue/failed' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.count).toBe(1);
      expect(body.entries[0]).toMatchObject({
        id: 1,
        state: 'failed',
        errorDetail: 'PermanentStoreError: bad reference',
        payload: findRecord(),
      });
    });

    it('validates the limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/admin/queue/failed?limit=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('MALFORMED_INPUT');
    });

    it('requeues a failed entry exactly once', async () => {
      const res = await app.inject({ method: 'POST', url: '/admin/queue/1/requeue' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: 'requeued',
        entry: { id: 1, state: 'pending', retryCount: 1, errorDetail: null },
      });

      const again = await app.inject({ method: 'POST', url: '/admin/queue/1/requeue' });
      expect(again.statusCode).toBe(409);
      expect(again.json()).toEqual({
        error: 'CONFLICT',
        message: 'Queue entry 1 is pending, only failed entries can be requeued',
      });

      const stats = await app.inject({ method: 'GET', url: '/admin/queue/stats' });
      expect(stats.json()).toEqual({ pending: 1, processing: 0, applied: 0, failed: 0 });
    });

    it('answers 404 for unknown entries and 400 for bad ids', async () => {
      const missing = await app.inject({ method: 'POST', url: '/admin/queue/999/requeue' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({ error: 'NOT_FOUND', message: 'Queue entry 999 not found' });

      const bad = await app.inject({ method: 'POST', url: '/admin/queue/abc/requeue' });
      expect(bad.statusCode).toBe(400);
      expect(bad.json().error).toBe('MALFORMED_INPUT');
    });

    it('refuses a sweep when no mirror is configured', async () => {
      const res = await app.inject({ method: 'POST', url: '/admin/mirror/sweep' });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'CONFLICT', message: 'Mirroring is disabled (MIRROR_BACKEND=none)' });
    });
  });

  // ─── Mirror ───────────────────────────────────────────────────────────

  describe('mirror endpoints', () => {
    let app: FastifyInstance;

    beforeEach(async () => {
      app = await buildAdminApp({ queue: primary.queue, primary: primary.store, secondary: secondary.store });
    });

    afterEach(async () => {
      await app.close();
    });

    it('runs a sweep on demand and lists the divergence it found', async () => {
      await primary.store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });

      const res = await app.inject({ method: 'POST', url: '/admin/mirror/sweep' });
      expect(res.statusCode).toBe(200);
      const report = res.json();
      expect(report).toMatchObject({ primary: 'sqlite', secondary: 'sqlite', diverged: true });
      expect(report.entities[0]).toEqual({
        entity: 'sites',
        primaryCount: 1,
        secondaryCount: 0,
        missingFromSecondary: ['WRK01'],
        missingFromPrimary: [],
      });

      const list = await app.inject({ method: 'GET', url: '/admin/mirror/divergences' });
      expect(list.json()).toMatchObject({
        count: 1,
        divergences: [
          {
            entryId: null,
            backend: 'sqlite',
            kind: 'sweep',
            detail: 'sites: 1 vs 0 (1 missing from sqlite, 0 missing from sqlite)',
          },
        ],
      });
    });
  });
});
