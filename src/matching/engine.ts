import pLimit from 'p-limit';
import type { DatasetStore, SnapshotMetadata } from '../dataset/store.js';
import { config as defaultConfig, type ResolverConfig, type ScoringConfig } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { type AliasTable, defaultAliasTable } from './aliases.js';
import { normalize } from './normalize.js';
import { resolve } from './resolver.js';
import { score } from './scorer.js';
import { select } from './selector.js';
import type { ListingAttributes, MatchResult, NormalizedAttributes, RelaxationStep } from './types.js';

export type ListingFetcher = (url: string) => Promise<ListingAttributes>;

export type MatcherOptions = {
  store: DatasetStore;
  fetchListing: ListingFetcher;
  aliases?: AliasTable;
  scoring?: ScoringConfig;
  resolver?: ResolverConfig;
  candidateLimit?: number;
};

/** A match result with the context a caller needs to explain it. */
export type MatchReport = MatchResult & {
  readonly listing: NormalizedAttributes;
  readonly snapshot: SnapshotMetadata;
  readonly stage: RelaxationStep;
  readonly candidates: number;
};

export type BatchOutcome =
  | { url: string; ok: true; report: MatchReport }
  | { url: string; ok: false; error: Error };

export type Matcher = {
  findMatch(url: string): Promise<MatchReport>;
  matchListing(attrs: ListingAttributes): Promise<MatchReport>;
  matchMany(urls: readonly string[], concurrency?: number): Promise<BatchOutcome[]>;
};

export function createMatcher(opts: MatcherOptions): Matcher {
  const aliases = opts.aliases ?? defaultAliasTable();
  const scoring = opts.scoring ?? defaultConfig.scoring;
  const resolverCfg = opts.resolver ?? defaultConfig.resolver;
  const candidateLimit = opts.candidateLimit ?? defaultConfig.candidateLimit;
  const log = logger.child({ module: 'matcher' });

  async function matchListing(attrs: ListingAttributes): Promise<MatchReport> {
    const listing = normalize(attrs, aliases);
    const snapshot = await opts.store.acquire();
    const candidates = await select(listing, snapshot, candidateLimit);
    const ranked = score(listing, candidates, scoring, aliases);
    const result = resolve(ranked, resolverCfg);

    log.info(
      {
        url: listing.sourceUrl,
        snapshotId: snapshot.metadata().snapshotId,
        stage: candidates.stage,
        candidates: candidates.records.length,
        status: result.status,
        topScore: result.matches[0]?.score,
      },
      'Listing matched',
    );

    return {
      ...result,
      listing,
      snapshot: snapshot.metadata(),
      stage: candidates.stage,
      candidates: candidates.records.length,
    };
  }

  async function findMatch(url: string): Promise<MatchReport> {
    const attrs = await opts.fetchListing(url);
    return matchListing(attrs);
  }

  async function matchMany(urls: readonly string[], concurrency = 4): Promise<BatchOutcome[]> {
    const limit = pLimit(Math.max(1, concurrency));
    return Promise.all(
      urls.map((url) =>
        limit(async (): Promise<BatchOutcome> => {
          try {
            return { url, ok: true, report: await findMatch(url) };
          } catch (err) {
            log.warn({ url, err }, 'Lookup failed');
            return { url, ok: false, error: err instanceof Error ? err : new Error(String(err)) };
          }
        }),
      ),
    );
  }

  return { findMatch, matchListing, matchMany };
}
