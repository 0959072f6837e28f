/**
 * Resolution stages, tried in priority order until one resolves.
 */

import { createChildLogger } from '@/utils/logger';
import type { FuzzyMatcher } from './fuzzy_matcher';
import type { GenerativeFallback } from './generative_fallback';
import type { KnowledgeGraphClient } from './knowledge_graph';
import type { LookupMethod, LookupResult, MatchCandidate, OwnershipChain } from './types';

const logger = createChildLogger('stages');

export interface StageContext {
  readonly query: string;
  /** Filled by the direct stage; later stages fall back on it */
  directCandidates: readonly MatchCandidate[];
}

export type StageOutcome =
  | { kind: 'resolved'; result: LookupResult }
  | { kind: 'miss' };

export interface ResolutionStage {
  readonly method: LookupMethod;
  attempt(context: StageContext): Promise<StageOutcome>;
}

const MISS: StageOutcome = { kind: 'miss' };

function resolved(
  query: string,
  candidate: MatchCandidate,
  method: LookupMethod,
  confidence: number,
  chain: OwnershipChain | null = null
): StageOutcome {
  return {
    kind: 'resolved',
    result: Object.freeze({
      query,
      ticker: candidate.ticker,
      companyName: candidate.legalName,
      method,
      confidence,
      chain,
    }),
  };
}

export interface DirectStageOptions {
  limit: number;
  threshold: number;
}

/** Accepts the top registry match when it is close enough on its own */
export class DirectStage implements ResolutionStage {
  readonly method = 'direct';

  constructor(
    private readonly matcher: FuzzyMatcher,
    private readonly options: DirectStageOptions
  ) {}

  async attempt(context: StageContext): Promise<StageOutcome> {
    const candidates = await this.matcher.match(context.query, this.options.limit, {
      exactTicker: true,
    });
    context.directCandidates = candidates;

    const top = candidates[0];
    if (top && top.score >= this.options.threshold) {
      return resolved(context.query, top, this.method, top.score);
    }

    logger.debug(
      { query: context.query, topScore: top?.score ?? null, threshold: this.options.threshold },
      'Direct match below threshold'
    );
    return MISS;
  }
}

export interface VerifiedStageOptions {
  verificationLimit: number;
  threshold: number;
  confidence: number;
}

/** Brand or subsidiary resolved through its public parent in the knowledge graph */
export class KnowledgeGraphStage implements ResolutionStage {
  readonly method = 'knowledge_graph';

  constructor(
    private readonly graph: KnowledgeGraphClient,
    private readonly matcher: FuzzyMatcher,
    private readonly options: VerifiedStageOptions
  ) {}

  async attempt(context: StageContext): Promise<StageOutcome> {
    const subsidiary = await this.graph.lookupSubsidiary(context.query);
    if (!subsidiary) {
      return MISS;
    }

    let best = await this.matcher.best(subsidiary.publicParentLabel, this.options.verificationLimit);

    // Graph labels can drift from filing names; retry lower links of the chain
    if ((!best || best.score < this.options.threshold) && subsidiary.chain.length > 1) {
      const lowerLinks = subsidiary.chain.slice(0, -1).reverse();
      for (const label of lowerLinks) {
        const alternative = await this.matcher.best(label, 1);
        if (alternative && (!best || alternative.score > best.score)) {
          best = alternative;
        }
      }
    }

    if (best && best.score >= this.options.threshold) {
      return resolved(context.query, best, this.method, this.options.confidence, subsidiary.chain);
    }

    logger.debug(
      {
        query: context.query,
        parent: subsidiary.publicParentLabel,
        bestScore: best?.score ?? null,
      },
      'Public parent did not verify against the registry'
    );
    return MISS;
  }
}

/** Model-suggested filing name, verified against the registry */
export class GenerativeStage implements ResolutionStage {
  readonly method = 'generative';

  constructor(
    private readonly fallback: GenerativeFallback,
    private readonly matcher: FuzzyMatcher,
    private readonly options: VerifiedStageOptions
  ) {}

  async attempt(context: StageContext): Promise<StageOutcome> {
    const guess = await this.fallback.identify(context.query);
    if (!guess) {
      return MISS;
    }

    const best = await this.matcher.best(guess, this.options.verificationLimit);
    if (best && best.score >= this.options.threshold) {
      return resolved(context.query, best, this.method, this.options.confidence);
    }

    logger.debug(
      { query: context.query, guess, bestScore: best?.score ?? null },
      'Model suggestion did not verify against the registry'
    );
    return MISS;
  }
}

/** Best direct candidate, however weak */
export class FallbackStage implements ResolutionStage {
  readonly method = 'fallback';

  async attempt(context: StageContext): Promise<StageOutcome> {
    const top = context.directCandidates[0];
    if (!top) {
      return MISS;
    }
    return resolved(context.query, top, this.method, top.score);
  }
}
