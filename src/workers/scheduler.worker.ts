import { Cron } from 'croner';
import { config } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { openMirrorBackend, openPrimaryBackend } from '../store/factory.js';
import { runDivergenceSweep } from '../sync/divergence-sweep.js';

const log = createChildLogger('scheduler');

const STALE_RECOVERY_CRON = '0 * * * * *'; // every minute (6-field cron)

async function main() {
  const primary = await openPrimaryBackend(config);
  const mirror = await openMirrorBackend(config);

  const jobs: Cron[] = [];

  // ─── Stale processing recovery ──────────────────────────────────
  jobs.push(
    new Cron(STALE_RECOVERY_CRON, { protect: true }, async () => {
      try {
        const cutoff = new Date(Date.now() - config.STALE_PROCESSING_MS);
        const recovered = await primary.queue.recoverStale(cutoff);
        if (recovered > 0) log.warn({ recovered, cutoff: cutoff.toISOString() }, 'Stale entries returned to pending');
      } catch (err) {
        log.error({ err }, 'Stale recovery failed');
      }
    }),
  );

  // ─── Divergence sweep ───────────────────────────────────────────
  if (mirror) {
    jobs.push(
      new Cron(config.MIRROR_SWEEP_CRON, { protect: true }, async () => {
        try {
          await runDivergenceSweep(primary.store, mirror.store, primary.queue);
        } catch (err) {
          log.error({ err }, 'Divergence sweep failed');
        }
      }),
    );
  }

  log.info({ sweep: mirror ? config.MIRROR_SWEEP_CRON : 'off' }, 'Scheduler worker running');

  // ─── Graceful shutdown ──────────────────────────────────────────
  const shutdown = async () => {
    log.info('Shutting down scheduler…');
    for (const job of jobs) job.stop();
    await mirror?.close();
    await primary.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start scheduler');
  process.exit(1);
});
