import type { ApplyContext } from '../shared/types.js';
import type { CanonicalStore, Site } from '../store/types.js';
import { relatedEntities } from './entity-registry.js';
import type {
  DiveLogReport,
  EntityRef,
  FindReport,
  LocationRecord,
  MediaAsset,
  NormalizedRecord,
} from './records.js';

/** What a successful apply touched, for logs and tests. */
export interface ApplyResult {
  entity: 'find' | 'media' | 'location' | 'dive_log';
  id: number;
  /** Media relations created or confirmed by this apply. */
  linked: number;
  /** True when a reference could not be resolved and a pending-link marker was left. */
  deferred: boolean;
}

// Sites are registered on first mention; the name falls back to the code.
async function ensureSite(store: CanonicalStore, siteCode: string): Promise<Site> {
  const site = await store.sites.upsertByNaturalKey({ siteCode });
  await store.resolvePendingLinks({ kind: 'site', siteCode, key: siteCode }, site.id);
  return site;
}

async function applyFind(store: CanonicalStore, record: FindReport, ctx: ApplyContext): Promise<ApplyResult> {
  const site = await ensureSite(store, record.siteRef);
  // Fields the report leaves out only fill a new row; a correction never clears them.
  const defaultName = ctx.submittedBy ?? undefined;

  const find = await store.finds.upsertByNaturalKey({
    siteId: site.id,
    findNumber: record.findNumber,
    materialType: record.materialType,
    objectType: record.objectType,
    description: record.description,
    condition: record.condition,
    quantity: record.quantity,
    depth: record.depth,
    findDate: record.findDate,
    finderName: record.finderName,
    geometry: record.locationPin,
    defaultFindDate: ctx.reportedOn,
    defaultFinderName: defaultName,
  });

  let linked = 0;
  for (const photo of record.photoRefs) {
    const media = await store.media.upsertByNaturalKey({
      contentHash: photo.contentHash,
      mediaType: 'photo',
      fileName: photo.fileName,
      filePath: photo.blobRef,
      description: photo.caption,
      photographer: record.finderName,
      defaultPhotographer: defaultName,
    });
    await store.linkMedia({ mediaId: media.id, relatedType: 'find', relatedId: find.id });
    linked += 1;
  }

  const claimed = await store.resolvePendingLinks(
    { kind: 'find', siteCode: site.site_code, key: find.find_number },
    find.id,
  );
  return { entity: 'find', id: find.id, linked: linked + claimed.length, deferred: false };
}

/** Links `mediaId` to the referenced entity, or parks a marker until it arrives. */
async function linkOrDefer(
  store: CanonicalStore,
  mediaId: number,
  ref: EntityRef,
  relationType: string,
): Promise<{ linked: number; deferred: boolean }> {
  const relatedId = await relatedEntities[ref.kind].resolve(store, ref);
  if (relatedId !== null) {
    await store.linkMedia({ mediaId, relatedType: ref.kind, relatedId, relationType });
    return { linked: 1, deferred: false };
  }
  await store.addPendingLink({
    mediaId,
    refKind: ref.kind,
    refSiteCode: ref.siteCode,
    refKey: ref.key,
    relationType,
  });

  // The target may have been applied by another lane after the first lookup
  // but before its own marker sweep; look again and claim the marker ourselves.
  const lateId = await relatedEntities[ref.kind].resolve(store, ref);
  if (lateId === null) return { linked: 0, deferred: true };
  await store.resolvePendingLinks({ kind: ref.kind, siteCode: ref.siteCode ?? '', key: ref.key }, lateId);
  return { linked: 1, deferred: false };
}

async function applyMedia(store: CanonicalStore, record: MediaAsset, ctx: ApplyContext): Promise<ApplyResult> {
  const media = await store.media.upsertByNaturalKey({
    contentHash: record.contentHash,
    mediaType: record.kind,
    fileName: record.fileName,
    filePath: record.blobRef,
    mimeType: record.mimeType,
    description: record.caption,
    defaultPhotographer: ctx.submittedBy ?? undefined,
  });
  if (!record.relatedEntityRef) return { entity: 'media', id: media.id, linked: 0, deferred: false };

  const relationType = record.kind === 'signature' ? 'signature' : 'documentation';
  const outcome = await linkOrDefer(store, media.id, record.relatedEntityRef, relationType);
  return { entity: 'media', id: media.id, ...outcome };
}

async function applyLocation(store: CanonicalStore, record: LocationRecord, ctx: ApplyContext): Promise<ApplyResult> {
  const pin = { lat: record.lat, lon: record.lon, accuracy: record.accuracy };
  const ref = record.relatedEntityRef;

  if (ref) {
    const handler = relatedEntities[ref.kind];
    const setGeometry = handler.setGeometry;
    if (setGeometry) {
      const id = await handler.resolve(store, ref);
      if (id !== null) {
        await setGeometry(store, id, pin);
        return { entity: 'location', id, linked: 0, deferred: false };
      }
    }
  }

  // Nothing to merge into: keep the pin as a media row.
  const coords = `${record.lat.toFixed(6)},${record.lon.toFixed(6)}`;
  const media = await store.media.upsertByNaturalKey({
    contentHash: record.contentHash,
    mediaType: 'location',
    fileName: `location-${coords}`,
    filePath: `geo:${coords}`,
    description: record.accuracy === null ? undefined : `accuracy ${record.accuracy} m`,
    defaultPhotographer: ctx.submittedBy ?? undefined,
  });
  if (!ref) return { entity: 'location', id: media.id, linked: 0, deferred: false };

  const outcome = await linkOrDefer(store, media.id, ref, 'location');
  return { entity: 'location', id: media.id, ...outcome };
}

async function applyDiveLog(store: CanonicalStore, record: DiveLogReport, ctx: ApplyContext): Promise<ApplyResult> {
  const site = await ensureSite(store, record.siteRef);
  const dive = await store.diveLogs.upsertByNaturalKey({
    siteId: site.id,
    diveNumber: record.diveNumber,
    diveDate: record.diveDate,
    defaultDiveDate: ctx.reportedOn,
    diveStart: record.diveStart,
    diveEnd: record.diveEnd,
    maxDepth: record.maxDepth,
    objectives: record.objectives,
    workCompleted: record.workCompleted,
  });
  await store.addDiveTeamMembers(dive.id, record.teamMembers);

  const claimed = await store.resolvePendingLinks(
    { kind: 'dive_log', siteCode: site.site_code, key: dive.dive_number },
    dive.id,
  );
  return { entity: 'dive_log', id: dive.id, linked: claimed.length, deferred: false };
}

/**
 * Writes one record through the canonical store. Every step is an upsert or an
 * idempotent link, so replaying the same record converges to the same rows.
 */
export async function applyRecord(
  store: CanonicalStore,
  record: NormalizedRecord,
  ctx: ApplyContext,
): Promise<ApplyResult> {
  switch (record.type) {
    case 'find_report':
      return applyFind(store, record, ctx);
    case 'media_asset':
      return applyMedia(store, record, ctx);
    case 'location_pin':
      return applyLocation(store, record, ctx);
    case 'dive_log':
      return applyDiveLog(store, record, ctx);
  }
}

/**
 * Name credited for a submission: the registered worker whose Telegram handle
 * matches, else the handle itself.
 */
export async function resolveSubmitter(store: CanonicalStore, username: string | null): Promise<string | null> {
  if (!username) return null;
  const worker = await store.workerByTelegram(username);
  return worker?.full_name ?? username;
}
