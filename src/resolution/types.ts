/**
 * Value types produced by the resolution pipeline
 */

import type { GraphEntity, GraphSearchHit } from '@/providers/types';

export interface RegistryEntry {
  readonly ticker: string;
  readonly legalName: string;
  readonly identifier: string;
}

export interface MatchCandidate extends RegistryEntry {
  /** Token-set similarity in [0, 1] */
  readonly score: number;
}

/** Labels from the queried node up to the public parent, inclusive */
export type OwnershipChain = readonly string[];

export interface PublicParent {
  readonly entity: GraphEntity;
  readonly chain: OwnershipChain;
}

export interface SubsidiaryMatch {
  readonly matchedEntity: GraphSearchHit;
  readonly publicParentLabel: string;
  readonly ticker: string | null;
  readonly securityId: string | null;
  readonly chain: OwnershipChain;
}

export type LookupMethod = 'direct' | 'knowledge_graph' | 'generative' | 'fallback';

export interface LookupResult {
  readonly query: string;
  readonly ticker: string | null;
  readonly companyName: string | null;
  readonly method: LookupMethod;
  readonly confidence: number;
  readonly chain: OwnershipChain | null;
}

export interface SearchResult {
  readonly ticker: string;
  readonly companyName: string;
  readonly identifier: string | null;
  readonly method: LookupMethod;
  readonly score: number;
  readonly chain: OwnershipChain | null;
}

export function unresolvedResult(query: string): LookupResult {
  return Object.freeze({
    query,
    ticker: null,
    companyName: null,
    method: 'fallback',
    confidence: 0,
    chain: null,
  });
}
