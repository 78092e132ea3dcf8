import type { CandidateFilter, SnapshotHandle } from '../dataset/store.js';
import { logger } from '../lib/logger.js';
import type { CandidateSet, NormalizedAttributes, RelaxationStep } from './types.js';

/** Words too common in Dubai project and area names to narrow a query on their own. */
export const NOISE_TOKENS: ReadonlySet<string> = new Set([
  'the', 'and', 'for', 'of', 'in', 'at', 'by', 'on', 'al', 'el',
  'dubai', 'uae', 'villa', 'villas', 'apartment', 'apartments', 'tower', 'building',
  'residence', 'phase', 'block', 'cluster', 'plot', 'community',
]);

/** Drops noise words, unless that would leave nothing to query on. */
export function significantTokens(tokens: readonly string[]): string[] {
  const distinct = Array.from(new Set(tokens));
  const kept = distinct.filter((t) => !NOISE_TOKENS.has(t) && t.length > 1);
  return kept.length ? kept : distinct;
}

type Relaxation = {
  readonly step: RelaxationStep;
  readonly apply: (filter: CandidateFilter) => CandidateFilter;
};

/** Applied cumulatively, in order, while a stage returns no candidates. */
export const RELAXATION_STEPS: readonly Relaxation[] = [
  { step: 'none', apply: (f) => f },
  { step: 'drop-rooms', apply: (f) => ({ ...f, rooms: null }) },
  // Only meaningful while something else still names the place.
  { step: 'drop-area', apply: (f) => (f.projectTokens.length ? { ...f, areaTokens: [], rankAreaTokens: [] } : f) },
];

/** Filters on the significant tokens and ranks on all of them, so "Marina Tower" outranks "Marina Gate". */
export function baseFilter(attrs: NormalizedAttributes, limit: number): CandidateFilter {
  return {
    projectTokens: significantTokens(attrs.projectTokens),
    areaTokens: significantTokens(attrs.areaTokens),
    rankProjectTokens: Array.from(new Set(attrs.projectTokens)),
    rankAreaTokens: Array.from(new Set(attrs.areaTokens)),
    rooms: attrs.bedrooms,
    limit,
  };
}

function sameFilter(a: CandidateFilter, b: CandidateFilter): boolean {
  return a.rooms === b.rooms
    && a.projectTokens.join(' ') === b.projectTokens.join(' ')
    && a.areaTokens.join(' ') === b.areaTokens.join(' ');
}

/** The distinct filters tried for a listing, most restrictive first. */
export function relaxationPlan(attrs: NormalizedAttributes, limit: number): Array<{ step: RelaxationStep; filter: CandidateFilter }> {
  const plan: Array<{ step: RelaxationStep; filter: CandidateFilter }> = [];
  let filter = baseFilter(attrs, limit);
  for (const { step, apply } of RELAXATION_STEPS) {
    filter = apply(filter);
    const previous = plan[plan.length - 1];
    if (previous && sameFilter(previous.filter, filter)) continue;
    plan.push({ step, filter });
  }
  return plan;
}

export async function select(attrs: NormalizedAttributes, snapshot: SnapshotHandle, limit: number): Promise<CandidateSet> {
  const plan = relaxationPlan(attrs, limit);
  for (const { step, filter } of plan) {
    const records = await snapshot.query(filter);
    logger.debug({ step, filter, candidates: records.length }, 'Candidate stage');
    if (records.length) return { records, stage: step };
  }
  return { records: [], stage: plan[plan.length - 1]?.step ?? 'none' };
}
