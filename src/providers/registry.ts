import type { AppConfig } from '@/core/config';
import type { EnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';
import { RateLimiter } from './http/rate_limiter';
import { OpenAICompletionProvider } from './openai/client';
import { SecTickerDirectory } from './sec/client';
import type {
  CompletionProvider,
  KnowledgeGraphProvider,
  TickerDirectoryProvider,
} from './types';
import { WikidataClient } from './wikidata/client';

const logger = createChildLogger('providers');

export interface ProviderSet {
  directory: TickerDirectoryProvider;
  knowledgeGraph: KnowledgeGraphProvider;
  /** null when generative lookups are disabled */
  completion: CompletionProvider | null;
}

/**
 * Create the outbound providers from environment and file configuration.
 *
 * ENV:
 * - SEC_USER_AGENT: sent to SEC and Wikidata
 * - ENABLE_LLM: 'true' wires the completion provider (needs OPENAI_API_KEY)
 *
 * SEC and Wikidata share one rate limiter.
 */
export function createProviders(env: EnvConfig, config: AppConfig): ProviderSet {
  const { sources } = config.resolver;
  const limiter = new RateLimiter({
    maxRequestsPerMinute: sources.requestsPerMinute,
    maxConcurrent: sources.maxConcurrentRequests,
  });

  const directory = new SecTickerDirectory({
    userAgent: env.secUserAgent,
    url: sources.secTickersUrl,
    snapshotTtlSeconds: config.cacheTtl.ticker_directory_ttl_hours * 3600,
    limiter,
  });

  const knowledgeGraph = new WikidataClient({
    apiUrl: sources.wikidataApiUrl,
    entityUrl: sources.wikidataEntityUrl,
    language: sources.wikidataLanguage,
    userAgent: env.secUserAgent,
    limiter,
  });

  let completion: CompletionProvider | null = null;
  if (env.enableLlm && env.openaiApiKey) {
    completion = new OpenAICompletionProvider({
      apiKey: env.openaiApiKey,
      baseUrl: env.llmBaseUrl,
      model: env.llmModel,
      defaultMaxTokens: sources.llmMaxTokens,
    });
  }

  logger.debug(
    { generative: completion !== null, model: completion ? env.llmModel : null },
    'Providers created'
  );
  return { directory, knowledgeGraph, completion };
}
