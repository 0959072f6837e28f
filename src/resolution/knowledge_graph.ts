/**
 * Knowledge-graph lookups: text search plus a bounded walk up ownership
 * edges to the first publicly traded organization.
 */

import { createChildLogger } from '@/utils/logger';
import type { GraphSearchHit, KnowledgeGraphProvider } from '@/providers/types';
import type { PublicParent, SubsidiaryMatch } from './types';

const logger = createChildLogger('knowledge_graph');

export const DEFAULT_MAX_DEPTH = 5;
export const DEFAULT_SEARCH_CANDIDATES = 3;

export interface KnowledgeGraphClientOptions {
  maxDepth?: number;
  searchCandidates?: number;
}

export class KnowledgeGraphClient {
  private readonly maxDepth: number;
  private readonly searchCandidates: number;

  constructor(
    private readonly provider: KnowledgeGraphProvider,
    options: KnowledgeGraphClientOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.searchCandidates = options.searchCandidates ?? DEFAULT_SEARCH_CANDIDATES;
  }

  search(query: string, limit: number): Promise<GraphSearchHit[]> {
    return this.provider.search(query, limit);
  }

  /**
   * Follows the first ownership edge of each node ("owned by" before
   * "parent organization") until a publicly traded node is reached.
   * Gives up after maxDepth fetched nodes, on a revisited id, on a missing
   * entity, or on a node without ownership edges.
   */
  async findPublicParent(
    startId: string,
    maxDepth: number = this.maxDepth
  ): Promise<PublicParent | null> {
    const visited = new Set<string>();
    const chain: string[] = [];
    let currentId: string | undefined = startId;

    for (let step = 0; step < maxDepth && currentId !== undefined; step++) {
      if (visited.has(currentId)) {
        logger.debug({ startId, currentId, chain }, 'Ownership cycle detected');
        return null;
      }
      visited.add(currentId);

      const entity = await this.provider.getEntity(currentId);
      if (!entity) {
        return null;
      }

      chain.push(entity.label);

      if (entity.isPubliclyTraded) {
        logger.debug({ startId, parent: entity.id, chain }, 'Public parent found');
        return Object.freeze({ entity, chain: Object.freeze([...chain]) });
      }

      currentId = entity.ownershipEdges[0];
    }

    logger.debug({ startId, chain, maxDepth }, 'No public parent within traversal bounds');
    return null;
  }

  /**
   * Searches the graph and walks each of the top hits in rank order,
   * returning the first one that reaches a public parent.
   */
  async lookupSubsidiary(query: string): Promise<SubsidiaryMatch | null> {
    const hits = await this.search(query, this.searchCandidates);
    if (hits.length === 0) {
      logger.debug({ query }, 'No knowledge-graph hits');
      return null;
    }

    for (const hit of hits.slice(0, this.searchCandidates)) {
      const parent = await this.findPublicParent(hit.id);
      if (parent) {
        logger.info(
          { query, matched: hit.id, parent: parent.entity.label, chain: parent.chain },
          'Resolved public parent'
        );
        return Object.freeze({
          matchedEntity: hit,
          publicParentLabel: parent.entity.label,
          ticker: parent.entity.ticker ?? null,
          securityId: parent.entity.securityId ?? null,
          chain: parent.chain,
        });
      }
    }

    return null;
  }
}
