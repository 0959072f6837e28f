/**
 * Wikidata client for company ownership lookups
 */

import { createChildLogger } from '@/utils/logger';
import { validateWikidataEntity, validateWikidataSearch } from '@/validation/ajv_instance';
import { fetchJson, type FetchLike } from '../http/fetch_json';
import type { RateLimiter } from '../http/rate_limiter';
import {
  ProviderPayloadError,
  type GraphEntity,
  type GraphSearchHit,
  type KnowledgeGraphProvider,
} from '../types';
import { toGraphEntity } from './claims';

const logger = createChildLogger('wikidata');

export interface WikidataClientOptions {
  apiUrl: string;
  entityUrl: string;
  language: string;
  userAgent: string;
  limiter?: RateLimiter;
  fetchImpl?: FetchLike;
}

export class WikidataClient implements KnowledgeGraphProvider {
  private readonly options: WikidataClientOptions;
  private requestCount = 0;

  constructor(options: WikidataClientOptions) {
    this.options = options;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async search(query: string, limit: number): Promise<GraphSearchHit[]> {
    const url = new URL(this.options.apiUrl);
    url.searchParams.set('action', 'wbsearchentities');
    url.searchParams.set('search', query);
    url.searchParams.set('language', this.options.language);
    url.searchParams.set('type', 'item');
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', String(limit));

    this.requestCount++;
    const payload = await fetchJson(
      {
        provider: 'wikidata',
        operation: 'search',
        url,
        headers: { 'User-Agent': this.options.userAgent },
        limiter: this.options.limiter,
      },
      this.options.fetchImpl
    );

    const validation = validateWikidataSearch(payload);
    if (!validation.valid) {
      throw new ProviderPayloadError(
        'Wikidata search response did not match the expected shape',
        'wikidata',
        'search',
        validation.errors
      );
    }

    const hits = validation.data.search.slice(0, limit).map((item) => ({
      id: item.id,
      label: item.label ?? '',
      description: item.description ?? '',
    }));
    logger.debug({ query, hits: hits.length }, 'Wikidata search complete');
    return hits;
  }

  async getEntity(id: string): Promise<GraphEntity | null> {
    const url = new URL(`${this.options.entityUrl}/${encodeURIComponent(id)}.json`);

    this.requestCount++;
    const payload = await fetchJson(
      {
        provider: 'wikidata',
        operation: 'entity',
        url,
        headers: { 'User-Agent': this.options.userAgent },
        limiter: this.options.limiter,
        allowNotFound: true,
      },
      this.options.fetchImpl
    );
    if (payload === null) {
      return null;
    }

    const validation = validateWikidataEntity(payload);
    if (!validation.valid) {
      throw new ProviderPayloadError(
        `Wikidata entity ${id} did not match the expected shape`,
        'wikidata',
        'entity',
        validation.errors
      );
    }

    // Redirected ids come back keyed by their target
    const entities = validation.data.entities;
    const raw = entities[id] ?? Object.values(entities)[0];
    if (!raw) {
      return null;
    }

    return toGraphEntity(id, raw, this.options.language);
  }
}
