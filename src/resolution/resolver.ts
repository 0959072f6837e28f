/**
 * Ticker resolution orchestrator.
 *
 * Runs the stages in priority order (direct match, knowledge-graph
 * ownership walk, generative guess, best-effort fallback) and stops at the
 * first that resolves. Provider failures are not caught here; they reach the
 * caller unchanged.
 */

import { createChildLogger } from '@/utils/logger';
import type { FuzzyMatcher } from './fuzzy_matcher';
import type { NameRegistry } from './name_registry';
import type { ResolutionStage, StageContext } from './stages';
import {
  unresolvedResult,
  type LookupMethod,
  type LookupResult,
  type SearchResult,
} from './types';

const logger = createChildLogger('resolver');

export interface TickerResolverOptions {
  defaultSearchLimit: number;
  maxSearchLimit: number;
}

export const DEFAULT_RESOLVER_OPTIONS: TickerResolverOptions = {
  defaultSearchLimit: 10,
  maxSearchLimit: 50,
};

export class TickerResolver {
  private readonly options: TickerResolverOptions;

  constructor(
    private readonly registry: NameRegistry,
    private readonly matcher: FuzzyMatcher,
    private readonly stages: readonly ResolutionStage[],
    options: Partial<TickerResolverOptions> = {}
  ) {
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
  }

  /** Stage methods in the order they are tried */
  stageMethods(): LookupMethod[] {
    return this.stages.map((stage) => stage.method);
  }

  async lookup(rawQuery: string): Promise<LookupResult> {
    const query = rawQuery.trim();
    if (!query) {
      return unresolvedResult(query);
    }

    const startedAt = Date.now();
    const context: StageContext = { query, directCandidates: [] };

    for (const stage of this.stages) {
      const outcome = await stage.attempt(context);
      if (outcome.kind === 'resolved') {
        logger.info(
          {
            query,
            ticker: outcome.result.ticker,
            method: outcome.result.method,
            confidence: outcome.result.confidence,
            durationMs: Date.now() - startedAt,
          },
          'Query resolved'
        );
        return outcome.result;
      }
      logger.debug({ query, stage: stage.method }, 'Stage missed');
    }

    logger.info({ query, durationMs: Date.now() - startedAt }, 'Query unresolved');
    return unresolvedResult(query);
  }

  /**
   * Ranked candidates for a query. A graph- or model-verified resolution is
   * listed first, followed by direct registry matches, including those below
   * the direct-acceptance threshold.
   */
  async search(rawQuery: string, limit: number = this.options.defaultSearchLimit): Promise<SearchResult[]> {
    const query = rawQuery.trim();
    if (!query) {
      return [];
    }
    const cappedLimit = this.clampLimit(limit);

    const results: SearchResult[] = [];
    const seen = new Set<string>();

    const resolved = await this.lookup(query);
    if (
      resolved.ticker !== null &&
      resolved.companyName !== null &&
      (resolved.method === 'knowledge_graph' || resolved.method === 'generative')
    ) {
      results.push(
        Object.freeze({
          ticker: resolved.ticker,
          companyName: resolved.companyName,
          identifier: await this.registry.identifierFor(resolved.ticker),
          method: resolved.method,
          score: resolved.confidence,
          chain: resolved.chain,
        })
      );
      seen.add(resolved.ticker);
    }

    const candidates = await this.matcher.match(query, cappedLimit, { exactTicker: true });
    for (const candidate of candidates) {
      if (results.length >= cappedLimit) break;
      if (seen.has(candidate.ticker)) continue;
      seen.add(candidate.ticker);
      results.push(
        Object.freeze({
          ticker: candidate.ticker,
          companyName: candidate.legalName,
          identifier: candidate.identifier,
          method: 'direct',
          score: candidate.score,
          chain: null,
        })
      );
    }

    return results;
  }

  /** Independent resolutions sharing the loaded registry */
  lookupMany(queries: readonly string[]): Promise<LookupResult[]> {
    return Promise.all(queries.map((query) => this.lookup(query)));
  }

  private clampLimit(limit: number): number {
    if (!Number.isFinite(limit)) {
      return this.options.defaultSearchLimit;
    }
    return Math.min(Math.max(Math.trunc(limit), 1), this.options.maxSearchLimit);
  }
}
