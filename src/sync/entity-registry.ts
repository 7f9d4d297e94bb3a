import { PermanentStoreError } from '../shared/errors.js';
import type { CanonicalStore } from '../store/types.js';
import type { EntityRef, LocationPin, RelatedKind } from './records.js';

/** How the engine finds, and optionally geolocates, one kind of media target. */
export interface RelatedEntityHandler {
  /** Store id for the reference, or null when the entity has not arrived yet. */
  resolve(store: CanonicalStore, ref: EntityRef): Promise<number | null>;
  setGeometry?(store: CanonicalStore, id: number, pin: LocationPin): Promise<void>;
}

async function siteIdFor(store: CanonicalStore, siteCode: string): Promise<number | null> {
  const site = await store.sites.fetchByNaturalKey({ siteCode });
  return site?.id ?? null;
}

// A site-less key must match exactly one row across all sites.
function single(rows: Array<{ id: number }>, ref: EntityRef): number | null {
  if (rows.length > 1) {
    throw new PermanentStoreError(`reference '${ref.raw}' matches ${rows.length} rows, qualify it with a site code`);
  }
  return rows[0]?.id ?? null;
}

export const relatedEntities: Record<RelatedKind, RelatedEntityHandler> = {
  site: {
    resolve: (store, ref) => siteIdFor(store, ref.key),
    setGeometry: (store, id, pin) => store.sites.setGeometry(id, pin),
  },

  find: {
    async resolve(store, ref) {
      if (!ref.siteCode) return single(await store.finds.listByLocalKey(ref.key), ref);
      const siteId = await siteIdFor(store, ref.siteCode);
      if (siteId === null) return null;
      const find = await store.finds.fetchByNaturalKey({ siteId, localKey: ref.key });
      return find?.id ?? null;
    },
    setGeometry: (store, id, pin) => store.finds.setGeometry(id, pin),
  },

  dive_log: {
    async resolve(store, ref) {
      if (!ref.siteCode) return single(await store.diveLogs.listByLocalKey(ref.key), ref);
      const siteId = await siteIdFor(store, ref.siteCode);
      if (siteId === null) return null;
      const dive = await store.diveLogs.fetchByNaturalKey({ siteId, localKey: ref.key });
      return dive?.id ?? null;
    },
  },
};
