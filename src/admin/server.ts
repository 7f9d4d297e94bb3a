import { config } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { openMirrorBackend, openPrimaryBackend } from '../store/factory.js';
import { buildAdminApp } from './app.js';

const log = createChildLogger('admin');

async function main() {
  const primary = await openPrimaryBackend(config);
  const mirror = await openMirrorBackend(config);
  const app = await buildAdminApp({
    queue: primary.queue,
    primary: primary.store,
    secondary: mirror?.store ?? null,
  });

  // ─── Start ────────────────────────────────────────────────────────
  await app.listen({ port: config.ADMIN_PORT, host: '0.0.0.0' });
  log.info({ port: config.ADMIN_PORT }, 'Admin server started');

  const shutdown = async () => {
    log.info('Shutting down admin server…');
    await app.close();
    await mirror?.close();
    await primary.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start admin server');
  process.exit(1);
});
