import { TIER_ORDER, type Provenance } from '@/services/providers/retrieval-types';

/** Upper bound on confidence per provenance. Generated stays below catalog. */
export const CONFIDENCE_CEILING: Record<Provenance, number> = {
  'live-api': 95,
  catalog: 85,
  generated: 60,
};

export function computeConfidence(provenance: Provenance, completeness: number): number {
  const c = Math.min(1, Math.max(0, Number.isFinite(completeness) ? completeness : 0));
  return Math.round(CONFIDENCE_CEILING[provenance] * c);
}

/** Least trusted of `provenances`; 'catalog' when there is nothing to compare. */
export function weakestProvenance(provenances: readonly Provenance[]): Provenance {
  let weakest: Provenance | null = null;
  for (const p of provenances) {
    if (weakest === null || TIER_ORDER.indexOf(p) > TIER_ORDER.indexOf(weakest)) weakest = p;
  }
  return weakest ?? 'catalog';
}
