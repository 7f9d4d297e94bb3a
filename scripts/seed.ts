import { config } from '../src/shared/config.js';
import { openPrimaryBackend } from '../src/store/factory.js';

async function main() {
  const backend = await openPrimaryBackend(config);

  try {
    // Demo site
    const site = await backend.store.sites.upsertByNaturalKey({
      siteCode: 'DEMO01',
      siteName: 'Demo Wreck Site',
      status: 'active',
      description: 'Seed site for local testing',
    });

    // Demo diver, matched to Telegram submissions by handle
    const worker = await backend.store.workers.upsertByNaturalKey({
      workerCode: 'W-001',
      fullName: 'Demo Diver',
      role: 'diver',
      telegramUsername: 'demo_diver',
    });

    console.log(`Seeded site ${site.site_code} (${site.id}) and worker ${worker.full_name} (${worker.id})`);
  } finally {
    await backend.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
