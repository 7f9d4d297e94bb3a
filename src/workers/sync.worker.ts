import { config } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { createQueue, QUEUE_NAMES } from '../shared/queue.js';
import { openMirrorBackend, openPrimaryBackend } from '../store/factory.js';
import { SyncConsumer } from '../sync/consumer.js';
import { wireMirror } from '../sync/mirror.js';
import { Reconciler } from '../sync/reconciler.js';

const log = createChildLogger('sync-worker');

async function main() {
  const primary = await openPrimaryBackend(config);
  const { publisher, secondary } = await wireMirror(
    { backend: config.MIRROR_BACKEND, transport: config.MIRROR_TRANSPORT, timeoutMs: config.STORE_TIMEOUT_MS },
    primary,
    {
      openSecondary: () => openMirrorBackend(config),
      createQueue: () => createQueue(QUEUE_NAMES.MIRROR),
    },
  );

  // Entries left in `processing` by a crash go back to the queue before the first claim.
  const recovered = await primary.queue.recoverStale(new Date(Date.now() - config.STALE_PROCESSING_MS));
  if (recovered > 0) log.warn({ recovered }, 'Recovered stale processing entries');

  const reconciler = new Reconciler(primary.store, primary.queue, publisher, {
    maxRetries: config.SYNC_MAX_RETRIES,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    storeTimeoutMs: config.STORE_TIMEOUT_MS,
    heartbeatIntervalMs: config.HEARTBEAT_INTERVAL_MS,
  });
  const consumer = new SyncConsumer(reconciler, {
    cron: config.SYNC_POLL_CRON,
    concurrency: config.SYNC_CONCURRENCY,
  });
  consumer.start();

  log.info(
    { backend: primary.kind, mirror: config.MIRROR_BACKEND, transport: config.MIRROR_TRANSPORT },
    'Sync worker running',
  );

  // ─── Graceful shutdown ────────────────────────────────────────────
  const shutdown = async () => {
    log.info('Shutting down sync worker…');
    await consumer.stop();
    await publisher?.close();
    await secondary?.close();
    await primary.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start sync worker');
  process.exit(1);
});
