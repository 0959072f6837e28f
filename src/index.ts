/**
 * Public entry point: wiring of the resolver and its providers
 */

import { DEFAULT_RESOLVER_CONFIG, getConfig, type ResolverConfig } from '@/core/config';
import { getEnvConfig } from '@/core/env';
import { createProviders, type ProviderSet } from '@/providers/registry';
import { FuzzyMatcher } from '@/resolution/fuzzy_matcher';
import { GenerativeFallback } from '@/resolution/generative_fallback';
import { KnowledgeGraphClient } from '@/resolution/knowledge_graph';
import { NameRegistry } from '@/resolution/name_registry';
import { TickerResolver } from '@/resolution/resolver';
import {
  DirectStage,
  FallbackStage,
  GenerativeStage,
  KnowledgeGraphStage,
  type ResolutionStage,
} from '@/resolution/stages';

/** Assembles the stage pipeline over an explicit provider set */
export function buildTickerResolver(
  providers: ProviderSet,
  config: ResolverConfig = DEFAULT_RESOLVER_CONFIG
): TickerResolver {
  const { thresholds, confidence, limits, sources } = config;
  const registry = new NameRegistry(providers.directory);
  const matcher = new FuzzyMatcher(registry);
  const graph = new KnowledgeGraphClient(providers.knowledgeGraph, {
    maxDepth: limits.maxTraversalDepth,
    searchCandidates: limits.graphSearch,
  });

  const stages: ResolutionStage[] = [
    new DirectStage(matcher, { limit: limits.direct, threshold: thresholds.direct }),
    new KnowledgeGraphStage(graph, matcher, {
      verificationLimit: limits.verification,
      threshold: thresholds.graph,
      confidence: confidence.knowledgeGraph,
    }),
  ];
  if (providers.completion) {
    stages.push(
      new GenerativeStage(
        new GenerativeFallback(providers.completion, { maxTokens: sources.llmMaxTokens }),
        matcher,
        {
          verificationLimit: limits.verification,
          threshold: thresholds.graph,
          confidence: confidence.generative,
        }
      )
    );
  }
  stages.push(new FallbackStage());

  return new TickerResolver(registry, matcher, stages, {
    defaultSearchLimit: limits.defaultSearch,
    maxSearchLimit: limits.maxSearch,
  });
}

export interface CreateTickerResolverOptions {
  /** Replaces individual default providers */
  providers?: Partial<ProviderSet>;
}

/** Resolver wired from environment and config/ files */
export function createTickerResolver(options: CreateTickerResolverOptions = {}): TickerResolver {
  const config = getConfig();
  const defaults = createProviders(getEnvConfig(), config);
  return buildTickerResolver({ ...defaults, ...options.providers }, config.resolver);
}

export { TickerResolver } from '@/resolution/resolver';
export { NameRegistry, RegistryIndex } from '@/resolution/name_registry';
export { FuzzyMatcher } from '@/resolution/fuzzy_matcher';
export { KnowledgeGraphClient } from '@/resolution/knowledge_graph';
export { GenerativeFallback } from '@/resolution/generative_fallback';
export { normalizeName, tokenSetSimilarity } from '@/resolution/similarity';
export type {
  LookupMethod,
  LookupResult,
  MatchCandidate,
  OwnershipChain,
  RegistryEntry,
  SearchResult,
  SubsidiaryMatch,
} from '@/resolution/types';
export type {
  CompletionProvider,
  DirectoryRecord,
  GraphEntity,
  GraphSearchHit,
  KnowledgeGraphProvider,
  TickerDirectoryProvider,
} from '@/providers/types';
export {
  ProviderError,
  ProviderPayloadError,
  ProviderUnavailableError,
} from '@/providers/types';
export type { ProviderSet } from '@/providers/registry';
