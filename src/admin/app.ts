import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ConflictError, MalformedInputError } from '../shared/errors.js';
import { registerErrorHandler } from '../shared/http.js';
import { createChildLogger } from '../shared/logger.js';
import type { CanonicalStore, DivergenceLog, SyncQueueStore } from '../store/types.js';
import { runDivergenceSweep } from '../sync/divergence-sweep.js';

const log = createChildLogger('admin');

export interface AdminDeps {
  queue: SyncQueueStore & DivergenceLog;
  primary: CanonicalStore;
  /** Null when no mirror backend is configured. */
  secondary: CanonicalStore | null;
}

const idParams = z.object({ id: z.coerce.number().int().positive() });
const limitQuery = z.object({ limit: z.coerce.number().int().min(1).max(500).default(50) });

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

export async function buildAdminApp(deps: AdminDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  registerErrorHandler(app, log);

  // ─── Health ───────────────────────────────────────────────────────
  app.get('/health', async () => ({ status: 'ok' }));

  // ─── Failed queue entries ─────────────────────────────────────────
  app.get('/admin/queue/failed', async (req, reply) => {
    const { limit } = parse(limitQuery, req.query);
    const entries = await deps.queue.listFailed(limit);
    return reply.send({ count: entries.length, entries });
  });

  // ─── Queue counts by state ────────────────────────────────────────
  app.get('/admin/queue/stats', async (_req, reply) => {
    return reply.send(await deps.queue.stats());
  });

  // ─── Requeue a failed entry ───────────────────────────────────────
  app.post('/admin/queue/:id/requeue', async (req, reply) => {
    const { id } = parse(idParams, req.params);
    const entry = await deps.queue.requeue(id);
    log.info({ entryId: id, retries: entry.retryCount }, 'Entry requeued via admin');
    return reply.send({ status: 'requeued', entry });
  });

  // ─── Mirror divergence log ────────────────────────────────────────
  app.get('/admin/mirror/divergences', async (req, reply) => {
    const { limit } = parse(limitQuery, req.query);
    const divergences = await deps.queue.listDivergences(limit);
    return reply.send({ count: divergences.length, divergences });
  });

  // ─── On-demand divergence sweep ───────────────────────────────────
  app.post('/admin/mirror/sweep', async (_req, reply) => {
    if (!deps.secondary) throw new ConflictError('Mirroring is disabled (MIRROR_BACKEND=none)');
    const report = await runDivergenceSweep(deps.primary, deps.secondary, deps.queue);
    return reply.send(report);
  });

  return app;
}
