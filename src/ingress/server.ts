import { config } from '../shared/config.js';
import { createChildLogger } from '../shared/logger.js';
import { openPrimaryBackend } from '../store/factory.js';
import { createTelegramNotifier } from '../services/telegram-notifier.js';
import { buildIngressApp } from './app.js';

const log = createChildLogger('ingress');

async function main() {
  const backend = await openPrimaryBackend(config);
  const app = await buildIngressApp({
    queue: backend.queue,
    webhookSecret: config.TELEGRAM_WEBHOOK_SECRET,
    reply: config.TELEGRAM_BOT_TOKEN ? createTelegramNotifier(config.TELEGRAM_BOT_TOKEN) : undefined,
  });

  // ─── Start ────────────────────────────────────────────────────────
  await app.listen({ port: config.INGRESS_PORT, host: '0.0.0.0' });
  log.info({ port: config.INGRESS_PORT, backend: backend.kind }, 'Ingress server started');

  // ─── Graceful shutdown ────────────────────────────────────────────
  const shutdown = async () => {
    log.info('Shutting down ingress server…');
    await app.close();
    await backend.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start ingress server');
  process.exit(1);
});
