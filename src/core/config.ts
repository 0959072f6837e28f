/**
 * Application configuration loaded from JSON files under config/
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError } from './errors';

export interface ThresholdConfig {
  direct: number;
  graph: number;
}

export interface ConfidenceConfig {
  knowledgeGraph: number;
  generative: number;
}

export interface LimitConfig {
  direct: number;
  verification: number;
  graphSearch: number;
  maxTraversalDepth: number;
  defaultSearch: number;
  maxSearch: number;
}

export interface SourceConfig {
  secTickersUrl: string;
  wikidataApiUrl: string;
  wikidataEntityUrl: string;
  wikidataLanguage: string;
  llmMaxTokens: number;
  requestsPerMinute: number;
  maxConcurrentRequests: number;
}

export interface ResolverConfig {
  thresholds: ThresholdConfig;
  confidence: ConfidenceConfig;
  limits: LimitConfig;
  sources: SourceConfig;
}

export interface CacheTtlConfig {
  ticker_directory_ttl_hours: number;
}

export interface AppConfig {
  resolver: ResolverConfig;
  cacheTtl: CacheTtlConfig;
  projectRoot: string;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  thresholds: { direct: 0.85, graph: 0.7 },
  confidence: { knowledgeGraph: 0.9, generative: 0.85 },
  limits: {
    direct: 5,
    verification: 3,
    graphSearch: 3,
    maxTraversalDepth: 5,
    defaultSearch: 10,
    maxSearch: 50,
  },
  sources: {
    secTickersUrl: 'https://www.sec.gov/files/company_tickers.json',
    wikidataApiUrl: 'https://www.wikidata.org/w/api.php',
    wikidataEntityUrl: 'https://www.wikidata.org/wiki/Special:EntityData',
    wikidataLanguage: 'en',
    llmMaxTokens: 50,
    requestsPerMinute: 300,
    maxConcurrentRequests: 4,
  },
};

const DEFAULT_CACHE_TTL: CacheTtlConfig = {
  ticker_directory_ttl_hours: 24,
};

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return undefined;
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Malformed configuration file: ${path}`,
      path,
      error instanceof Error ? error : undefined
    );
  }
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function pickNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function pickFraction(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  source: string
): number {
  const value = pickNumber(raw, key, fallback);
  if (value < 0 || value > 1) {
    throw new ConfigError(`${key} must be between 0 and 1, got ${value}`, source);
  }
  return value;
}

function pickPositiveInt(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  source: string
): number {
  const value = pickNumber(raw, key, fallback);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${key} must be a positive integer, got ${value}`, source);
  }
  return value;
}

function normalizeResolver(raw: unknown, source: string): ResolverConfig {
  const parsed = isRecord(raw) ? raw : {};
  const defaults = DEFAULT_RESOLVER_CONFIG;
  const thresholds = section(parsed, 'thresholds');
  const confidence = section(parsed, 'confidence');
  const limits = section(parsed, 'limits');
  const sources = section(parsed, 'sources');

  return {
    thresholds: {
      direct: pickFraction(thresholds, 'direct', defaults.thresholds.direct, source),
      graph: pickFraction(thresholds, 'graph', defaults.thresholds.graph, source),
    },
    confidence: {
      knowledgeGraph: pickFraction(
        confidence,
        'knowledge_graph',
        defaults.confidence.knowledgeGraph,
        source
      ),
      generative: pickFraction(confidence, 'generative', defaults.confidence.generative, source),
    },
    limits: {
      direct: pickPositiveInt(limits, 'direct', defaults.limits.direct, source),
      verification: pickPositiveInt(limits, 'verification', defaults.limits.verification, source),
      graphSearch: pickPositiveInt(limits, 'graph_search', defaults.limits.graphSearch, source),
      maxTraversalDepth: pickPositiveInt(
        limits,
        'max_traversal_depth',
        defaults.limits.maxTraversalDepth,
        source
      ),
      defaultSearch: pickPositiveInt(limits, 'default_search', defaults.limits.defaultSearch, source),
      maxSearch: pickPositiveInt(limits, 'max_search', defaults.limits.maxSearch, source),
    },
    sources: {
      secTickersUrl: pickString(sources, 'sec_tickers_url', defaults.sources.secTickersUrl),
      wikidataApiUrl: pickString(sources, 'wikidata_api_url', defaults.sources.wikidataApiUrl),
      wikidataEntityUrl: pickString(
        sources,
        'wikidata_entity_url',
        defaults.sources.wikidataEntityUrl
      ),
      wikidataLanguage: pickString(sources, 'wikidata_language', defaults.sources.wikidataLanguage),
      llmMaxTokens: pickPositiveInt(sources, 'llm_max_tokens', defaults.sources.llmMaxTokens, source),
      requestsPerMinute: pickPositiveInt(
        sources,
        'requests_per_minute',
        defaults.sources.requestsPerMinute,
        source
      ),
      maxConcurrentRequests: pickPositiveInt(
        sources,
        'max_concurrent_requests',
        defaults.sources.maxConcurrentRequests,
        source
      ),
    },
  };
}

function normalizeCacheTtl(raw: unknown): CacheTtlConfig {
  const parsed = isRecord(raw) ? raw : {};
  return {
    ticker_directory_ttl_hours: pickNumber(
      parsed,
      'ticker_directory_ttl_hours',
      DEFAULT_CACHE_TTL.ticker_directory_ttl_hours
    ),
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const configPath = join(projectRoot, 'config');

  const resolverPath = join(configPath, 'resolver.json');
  const resolver = normalizeResolver(readJsonFile(resolverPath), resolverPath);
  const cacheTtl = normalizeCacheTtl(readJsonFile(join(configPath, 'cache_ttl.json')));

  return {
    resolver,
    cacheTtl,
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
