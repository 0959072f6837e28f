/**
 * Claim parsing for Wikidata entity documents
 */

import type { GraphEntity } from '../types';
import type { WikidataClaim, WikidataRawEntity, WikidataSnak } from '@/validation/payloads';

export const P_OWNED_BY = 'P127';
export const P_PARENT_ORG = 'P749';
export const P_STOCK_EXCHANGE = 'P414';
export const P_TICKER = 'P249';
export const P_ISIN = 'P946';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function activeClaims(entity: WikidataRawEntity, prop: string): WikidataClaim[] {
  return (entity.claims?.[prop] ?? []).filter((claim) => claim.rank !== 'deprecated');
}

function snakEntityId(snak: WikidataSnak | undefined): string | null {
  const value = snak?.datavalue?.value;
  if (isRecord(value) && typeof value.id === 'string' && value.id) {
    return value.id;
  }
  return null;
}

function snakString(snak: WikidataSnak | undefined): string | null {
  const value = snak?.datavalue?.value;
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/** Entity ids referenced by a property's claims, in document order */
export function claimEntityIds(entity: WikidataRawEntity, prop: string): string[] {
  const ids: string[] = [];
  for (const claim of activeClaims(entity, prop)) {
    const id = snakEntityId(claim.mainsnak);
    if (id) ids.push(id);
  }
  return ids;
}

/** First string value of a property's claims */
export function claimStringValue(entity: WikidataRawEntity, prop: string): string | undefined {
  for (const claim of activeClaims(entity, prop)) {
    const value = snakString(claim.mainsnak);
    if (value) return value;
  }
  return undefined;
}

/** Ticker recorded as a qualifier on a stock-exchange claim */
function exchangeQualifierTicker(entity: WikidataRawEntity): string | undefined {
  for (const claim of activeClaims(entity, P_STOCK_EXCHANGE)) {
    for (const snak of claim.qualifiers?.[P_TICKER] ?? []) {
      const value = snakString(snak);
      if (value) return value;
    }
  }
  return undefined;
}

export function entityLabel(entity: WikidataRawEntity, language: string, fallback: string): string {
  const labels = entity.labels ?? {};
  return labels[language]?.value ?? labels.en?.value ?? fallback;
}

export function toGraphEntity(
  id: string,
  entity: WikidataRawEntity,
  language: string
): GraphEntity {
  const owners = claimEntityIds(entity, P_OWNED_BY);
  const parents = claimEntityIds(entity, P_PARENT_ORG);
  const exchanges = claimEntityIds(entity, P_STOCK_EXCHANGE);
  const ticker = claimStringValue(entity, P_TICKER) ?? exchangeQualifierTicker(entity);
  const securityId = claimStringValue(entity, P_ISIN);

  const graphEntity: GraphEntity = {
    id: entity.id ?? id,
    label: entityLabel(entity, language, id),
    ownershipEdges: [...owners, ...parents],
    isPubliclyTraded: exchanges.length > 0,
  };
  if (ticker) graphEntity.ticker = ticker;
  if (securityId) graphEntity.securityId = securityId;
  return graphEntity;
}
