import { createChildLogger } from '../shared/logger.js';
import type { CanonicalStore, DivergenceLog } from '../store/types.js';

const log = createChildLogger('divergence-sweep');

export interface EntityDivergence {
  entity: string;
  primaryCount: number;
  secondaryCount: number;
  missingFromSecondary: string[];
  missingFromPrimary: string[];
}

export interface DivergenceReport {
  checkedAt: Date;
  primary: string;
  secondary: string;
  diverged: boolean;
  entities: EntityDivergence[];
}

interface Probe {
  entity: string;
  count(store: CanonicalStore): Promise<number>;
  keys(store: CanonicalStore): Promise<string[]>;
}

const PROBES: Probe[] = [
  { entity: 'sites', count: (s) => s.sites.count(), keys: (s) => s.sites.listNaturalKeys() },
  { entity: 'finds', count: (s) => s.finds.count(), keys: (s) => s.finds.listNaturalKeys() },
  { entity: 'dive_logs', count: (s) => s.diveLogs.count(), keys: (s) => s.diveLogs.listNaturalKeys() },
  { entity: 'media', count: (s) => s.media.count(), keys: (s) => s.media.listNaturalKeys() },
  { entity: 'workers', count: (s) => s.workers.count(), keys: (s) => s.workers.listNaturalKeys() },
  { entity: 'media_relations', count: (s) => s.countRelations(), keys: (s) => s.relationNaturalKeys() },
];

function difference(a: string[], b: string[]): string[] {
  const other = new Set(b);
  return a.filter((k) => !other.has(k));
}

/**
 * Compares row counts and natural keys entity by entity. Reports only:
 * nothing is copied or deleted in either store.
 */
export async function sweepBackends(
  primary: CanonicalStore,
  secondary: CanonicalStore,
  now: Date = new Date(),
): Promise<DivergenceReport> {
  const entities: EntityDivergence[] = [];
  for (const probe of PROBES) {
    const [primaryCount, secondaryCount, primaryKeys, secondaryKeys] = await Promise.all([
      probe.count(primary),
      probe.count(secondary),
      probe.keys(primary),
      probe.keys(secondary),
    ]);
    entities.push({
      entity: probe.entity,
      primaryCount,
      secondaryCount,
      missingFromSecondary: difference(primaryKeys, secondaryKeys),
      missingFromPrimary: difference(secondaryKeys, primaryKeys),
    });
  }

  const diverged = entities.some(
    (e) => e.primaryCount !== e.secondaryCount || e.missingFromSecondary.length > 0 || e.missingFromPrimary.length > 0,
  );
  return { checkedAt: now, primary: primary.backend, secondary: secondary.backend, diverged, entities };
}

export function summarizeReport(report: DivergenceReport): string {
  return report.entities
    .filter((e) => e.primaryCount !== e.secondaryCount || e.missingFromSecondary.length + e.missingFromPrimary.length > 0)
    .map(
      (e) =>
        `${e.entity}: ${e.primaryCount} vs ${e.secondaryCount}` +
        ` (${e.missingFromSecondary.length} missing from ${report.secondary},` +
        ` ${e.missingFromPrimary.length} missing from ${report.primary})`,
    )
    .join('; ');
}

/** Runs a sweep and writes one `sweep` divergence record when the stores disagree. */
export async function runDivergenceSweep(
  primary: CanonicalStore,
  secondary: CanonicalStore,
  divergences: DivergenceLog,
): Promise<DivergenceReport> {
  const report = await sweepBackends(primary, secondary);
  if (report.diverged) {
    const detail = summarizeReport(report);
    await divergences.recordDivergence({ entryId: null, backend: secondary.backend, kind: 'sweep', detail });
    log.warn({ detail }, 'Backends diverged');
  } else {
    log.info('Backends consistent');
  }
  return report;
}
