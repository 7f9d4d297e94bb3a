import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Backend, CanonicalStore } from '../src/store/types.js';
import { TestClock, openMemoryBackend } from './helpers.js';

/**
 * Canonical store tests (SQLite backend): natural-key upserts that never
 * blank stored values, idempotent media links and pending-link resolution.
 */

const HASH_A = 'a'.repeat(64);
const HASH_B = 'b'.repeat(64);

describe('SqliteCanonicalStore', () => {
  let backend: Backend;
  let store: CanonicalStore;

  beforeEach(async () => {
    backend = await openMemoryBackend(new TestClock());
    store = backend.store;
  });

  afterEach(async () => {
    await backend.close();
  });

  async function photo(contentHash: string) {
    return store.media.upsertByNaturalKey({
      contentHash,
      mediaType: 'photo',
      fileName: 'P1',
      filePath: 'tg://file/P1',
    });
  }

  // ─── Upserts ──────────────────────────────────────────────────────────

  it('registers a site by code and only overwrites with supplied values', async () => {
    const created = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    expect(created).toEqual({
      id: 1,
      site_code: 'WRK01',
      site_name: 'WRK01',
      status: 'active',
      description: null,
      geom_wkt: null,
    });

    await store.sites.upsertByNaturalKey({ siteCode: 'WRK01', siteName: 'Batavia wreck' });
    const updated = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01', description: 'Reef edge' });

    expect(updated).toMatchObject({ id: 1, site_name: 'Batavia wreck', description: 'Reef edge' });
    expect(await store.sites.count()).toBe(1);
  });

  it('upserts finds per site and keeps earlier fields and geometry', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const find = await store.finds.upsertByNaturalKey({
      siteId: site.id,
      findNumber: 'F-102',
      materialType: 'ceramic',
      quantity: 2,
      geometry: { lat: -6.2, lon: 106.8, accuracy: null },
    });
    expect(find).toMatchObject({ find_number: 'F-102', quantity: 2, geom_wkt: 'POINT(106.8 -6.2)' });

    const again = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-102', description: 'rim' });
    expect(again).toMatchObject({
      id: find.id,
      material_type: 'ceramic',
      description: 'rim',
      quantity: 2,
      geom_wkt: 'POINT(106.8 -6.2)',
    });

    const bare = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-103' });
    expect(bare.quantity).toBe(1);

    expect((await store.finds.fetchByNaturalKey({ siteId: site.id, localKey: 'F-102' }))?.id).toBe(find.id);
    expect(await store.finds.fetchById(999)).toBeNull();
  });

  it('applies insert defaults only when the row is created', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const created = await store.finds.upsertByNaturalKey({
      siteId: site.id,
      findNumber: 'F-102',
      defaultFindDate: '2024-03-05',
      defaultFinderName: 'alice',
    });
    expect(created).toMatchObject({ find_date: '2024-03-05', finder_name: 'alice' });

    const corrected = await store.finds.upsertByNaturalKey({
      siteId: site.id,
      findNumber: 'F-102',
      materialType: 'glass',
      defaultFindDate: '2024-04-04',
      defaultFinderName: 'bob',
    });
    expect(corrected).toMatchObject({ find_date: '2024-03-05', finder_name: 'alice', material_type: 'glass' });

    const explicit = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-102', findDate: '2024-01-10' });
    expect(explicit.find_date).toBe('2024-01-10');

    await store.media.upsertByNaturalKey({
      contentHash: HASH_A,
      mediaType: 'photo',
      fileName: 'P1',
      filePath: 'tg://file/P1',
      defaultPhotographer: 'alice',
    });
    const media = await store.media.upsertByNaturalKey({
      contentHash: HASH_A,
      mediaType: 'photo',
      fileName: 'P1',
      filePath: 'tg://file/P1',
      defaultPhotographer: 'bob',
    });
    expect(media.photographer).toBe('alice');
  });

  it('lists site-local keys across sites and exposes portable natural keys', async () => {
    const a = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const b = await store.sites.upsertByNaturalKey({ siteCode: 'WRK02' });
    await store.finds.upsertByNaturalKey({ siteId: b.id, findNumber: 'F-1' });
    await store.finds.upsertByNaturalKey({ siteId: a.id, findNumber: 'F-1' });

    expect(await store.finds.listByLocalKey('F-1')).toHaveLength(2);
    expect(await store.finds.listNaturalKeys()).toEqual(['WRK01/F-1', 'WRK02/F-1']);
  });

  it('sets geometry on an existing site', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    await store.sites.setGeometry(site.id, { lat: -5.5, lon: 110.25, accuracy: 3 });

    expect((await store.sites.fetchById(site.id))?.geom_wkt).toBe('POINT(110.25 -5.5)');
  });

  // ─── Media relations ──────────────────────────────────────────────────

  it('links media idempotently', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const find = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-102' });
    const media = await photo(HASH_A);

    const first = await store.linkMedia({ mediaId: media.id, relatedType: 'find', relatedId: find.id });
    const second = await store.linkMedia({ mediaId: media.id, relatedType: 'find', relatedId: find.id });

    expect(second).toEqual(first);
    expect(first).toMatchObject({ media_id: media.id, related_type: 'find', relation_type: 'documentation' });
    expect(await store.countRelations()).toBe(1);
    expect(await store.relationNaturalKeys()).toEqual([`${HASH_A}->find:WRK01/F-102`]);
  });

  it('turns pending markers into relations when the entity arrives', async () => {
    const media = await photo(HASH_A);
    await store.addPendingLink({ mediaId: media.id, refKind: 'find', refKey: 'F-200' });
    await store.addPendingLink({ mediaId: media.id, refKind: 'find', refKey: 'F-200' });
    expect(await store.pendingLinks()).toEqual([
      {
        id: 1,
        media_id: media.id,
        ref_kind: 'find',
        ref_site_code: '',
        ref_key: 'F-200',
        relation_type: 'documentation',
      },
    ]);

    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const find = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-200' });
    const created = await store.resolvePendingLinks({ kind: 'find', siteCode: 'WRK01', key: 'F-200' }, find.id);

    expect(created).toEqual([
      { id: 1, media_id: media.id, related_type: 'find', related_id: find.id, relation_type: 'documentation' },
    ]);
    expect(await store.pendingLinks()).toEqual([]);
    expect(await store.resolvePendingLinks({ kind: 'find', siteCode: 'WRK01', key: 'F-200' }, find.id)).toEqual([]);
  });

  it('only resolves a site-qualified marker for that site', async () => {
    const media = await photo(HASH_A);
    await store.addPendingLink({
      mediaId: media.id,
      refKind: 'find',
      refSiteCode: 'WRK02',
      refKey: 'F-1',
      relationType: 'signature',
    });

    expect(await store.resolvePendingLinks({ kind: 'find', siteCode: 'WRK01', key: 'F-1' }, 10)).toEqual([]);
    expect(await store.pendingLinks()).toHaveLength(1);

    const created = await store.resolvePendingLinks({ kind: 'find', siteCode: 'WRK02', key: 'F-1' }, 11);
    expect(created).toMatchObject([{ related_id: 11, relation_type: 'signature' }]);
  });

  // ─── Deletes ──────────────────────────────────────────────────────────

  it('deletes a site with its finds, dive logs and relations but keeps media', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const find = await store.finds.upsertByNaturalKey({ siteId: site.id, findNumber: 'F-102' });
    const dive = await store.diveLogs.upsertByNaturalKey({ siteId: site.id, diveNumber: 'D-07', diveDate: '2024-03-05' });
    await store.addDiveTeamMembers(dive.id, ['Ana']);
    const a = await photo(HASH_A);
    const b = await photo(HASH_B);
    await store.linkMedia({ mediaId: a.id, relatedType: 'find', relatedId: find.id });
    await store.linkMedia({ mediaId: b.id, relatedType: 'dive_log', relatedId: dive.id });

    await store.sites.deleteCascade(site.id);

    expect(await store.sites.count()).toBe(0);
    expect(await store.finds.count()).toBe(0);
    expect(await store.diveLogs.count()).toBe(0);
    expect(await store.countRelations()).toBe(0);
    expect(await store.media.count()).toBe(2);
    await expect(store.sites.deleteCascade(999)).resolves.toBeUndefined();
  });

  // ─── Workers and dive teams ───────────────────────────────────────────

  it('finds a worker by Telegram handle regardless of case and @', async () => {
    await store.workers.upsertByNaturalKey({
      workerCode: 'W-001',
      fullName: 'Demo Diver',
      telegramUsername: '@demo_diver',
    });

    expect((await store.workerByTelegram('Demo_Diver'))?.full_name).toBe('Demo Diver');
    expect((await store.workerByTelegram('@demo_diver'))?.worker_code).toBe('W-001');
    expect(await store.workerByTelegram('someone_else')).toBeNull();
  });

  it('adds dive team members without duplicates', async () => {
    const site = await store.sites.upsertByNaturalKey({ siteCode: 'WRK01' });
    const dive = await store.diveLogs.upsertByNaturalKey({ siteId: site.id, diveNumber: 'D-07', diveDate: '2024-03-05' });

    await store.addDiveTeamMembers(dive.id, ['Ana', 'Budi']);
    await store.addDiveTeamMembers(dive.id, ['Budi', 'Citra']);

    expect(await store.diveTeamMembers(dive.id)).toEqual(['Ana', 'Budi', 'Citra']);
  });
});
