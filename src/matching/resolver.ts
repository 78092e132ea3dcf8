import type { ResolverConfig } from '../lib/config.js';
import { compareMatches } from './scorer.js';
import type { MatchResult, ScoredMatch } from './types.js';

// Scores are sums of float products; a gap that is the margin on paper may
// land a hair under it.
const EPSILON = 1e-9;

/**
 * Turns ranked matches into a decision:
 * - nothing at or above `minScore` -> NONE
 * - a single qualifying match, or a lead of at least `margin` -> UNIQUE
 * - otherwise AMBIGUOUS, with every qualifying match within `margin` of the top
 */
export function resolve(ranked: readonly ScoredMatch[], cfg: ResolverConfig): MatchResult {
  const accepted = ranked.filter((m) => m.score >= cfg.minScore).sort(compareMatches);
  if (!accepted.length) return { status: 'NONE', matches: [] };

  const [top, second] = accepted;
  if (!second || top.score - second.score >= cfg.margin - EPSILON) {
    return { status: 'UNIQUE', matches: [top] };
  }

  const contenders = accepted
    .filter((m) => top.score - m.score < cfg.margin - EPSILON)
    .slice(0, cfg.maxResults);
  return { status: 'AMBIGUOUS', matches: contenders };
}
