import { config } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { createWorker, QUEUE_NAMES } from '../shared/queue.js';
import { openMirrorBackend, openPrimaryBackend } from '../store/factory.js';
import { MirrorReplicator, mirrorJobSchema } from '../sync/mirror.js';

const log = createChildLogger('mirror-worker');

async function main() {
  const mirror = await openMirrorBackend(config);
  if (!mirror) {
    log.warn('MIRROR_BACKEND=none – nothing to mirror, exiting');
    process.exit(0);
  }
  const primary = await openPrimaryBackend(config);
  const replicator = new MirrorReplicator(mirror.store, primary.queue, config.STORE_TIMEOUT_MS);

  // One job at a time keeps the secondary in primary apply order.
  const worker = createWorker<unknown>(QUEUE_NAMES.MIRROR, async (job) => {
    const parsed = mirrorJobSchema.safeParse(job.data);
    if (!parsed.success) {
      log.error({ jobId: job.id, issues: parsed.error.issues.length }, 'Malformed mirror job dropped');
      return;
    }
    await replicator.replicate(parsed.data);
  });

  log.info({ mirror: mirror.kind }, 'Mirror worker running');

  // ─── Graceful shutdown ────────────────────────────────────────────
  const shutdown = async () => {
    log.info('Shutting down mirror worker…');
    await worker.close();
    await mirror.close();
    await primary.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start mirror worker');
  process.exit(1);
});
