/**
 * Fuzzy matching of free-text queries against the name registry
 */

import { createChildLogger } from '@/utils/logger';
import type { NameRegistry, RegistryIndex } from './name_registry';
import { normalizeName, tokenSetSimilarity } from './similarity';
import type { MatchCandidate, RegistryEntry } from './types';

const logger = createChildLogger('fuzzy_matcher');

interface ScoredName {
  name: string;
  score: number;
  order: number;
}

function toCandidate(entry: RegistryEntry, score: number): MatchCandidate {
  return Object.freeze({
    ticker: entry.ticker,
    legalName: entry.legalName,
    identifier: entry.identifier,
    score,
  });
}

/**
 * A query typed as a ticker ("nvda", "BRK.B"). Any single word equal to a
 * listed symbol counts, so a plain word that is also a ticker ("Block",
 * "Shop") resolves to that symbol at score 1 rather than by name.
 */
function exactTickerEntry(index: RegistryIndex, query: string): RegistryEntry | null {
  const key = query.trim().toUpperCase();
  if (!key || /\s/.test(key)) return null;
  return index.resolveTicker(key) ?? index.resolveTicker(key.replace(/\./g, '-'));
}

export interface MatchOptions {
  /** Check the query against the ticker index before names */
  exactTicker?: boolean;
}

export class FuzzyMatcher {
  constructor(private readonly registry: NameRegistry) {}

  /**
   * Candidates in descending score order. The best `limit` names are kept
   * and each expands to every ticker filed under it (share classes), all
   * sharing the name's score. Ties keep directory order. Names only, unless
   * `exactTicker` is set.
   */
  async match(query: string, limit: number, options: MatchOptions = {}): Promise<MatchCandidate[]> {
    const normalized = normalizeName(query);
    if (!normalized || limit < 1) {
      return [];
    }

    const index = await this.registry.ready();
    const candidates: MatchCandidate[] = [];
    const emitted = new Set<string>();

    const exact = options.exactTicker ? exactTickerEntry(index, query) : null;
    if (exact) {
      candidates.push(toCandidate(exact, 1));
      emitted.add(exact.ticker);
    }

    const scored: ScoredName[] = [];
    let order = 0;
    for (const name of index.allNames()) {
      const score = tokenSetSimilarity(normalized, name);
      if (score > 0) {
        scored.push({ name, score, order });
      }
      order++;
    }
    scored.sort((left, right) => right.score - left.score || left.order - right.order);

    for (const { name, score } of scored.slice(0, limit)) {
      for (const entry of index.entriesForName(name)) {
        if (emitted.has(entry.ticker)) continue;
        emitted.add(entry.ticker);
        candidates.push(toCandidate(entry, score));
      }
    }

    logger.debug(
      {
        query,
        candidates: candidates.length,
        top: candidates[0] ? { ticker: candidates[0].ticker, score: candidates[0].score } : null,
      },
      'Fuzzy match complete'
    );
    return candidates;
  }

  async best(query: string, limit: number, options: MatchOptions = {}): Promise<MatchCandidate | null> {
    const [top] = await this.match(query, limit, options);
    return top ?? null;
  }
}
