/**
 * Shared types and interfaces for the external data sources.
 *
 * The resolver only sees these contracts; the SEC directory, Wikidata and the
 * chat-completion API sit behind them so tests can swap in in-process fakes.
 */

export interface DirectoryRecord {
  ticker: string;
  legalName: string;
  /** SEC CIK, zero-padded to 10 digits */
  identifier: string;
}

export interface TickerDirectoryProvider {
  listEntries(): Promise<DirectoryRecord[]>;
}

export interface GraphSearchHit {
  id: string;
  label: string;
  description: string;
}

export interface GraphEntity {
  id: string;
  label: string;
  /** "owned-by" targets first, then "parent-organization" targets */
  ownershipEdges: string[];
  isPubliclyTraded: boolean;
  ticker?: string;
  /** ISIN, when the graph records one */
  securityId?: string;
}

export interface KnowledgeGraphProvider {
  search(query: string, limit: number): Promise<GraphSearchHit[]>;
  /** Resolves to null when the graph has no entity with this id */
  getEntity(id: string): Promise<GraphEntity | null>;
}

export interface CompletionOptions {
  maxTokens?: number;
  metadata?: Record<string, string>;
}

export interface CompletionProvider {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type ProviderName = 'sec' | 'wikidata' | 'llm';

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: ProviderName,
    public operation: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Network or HTTP failure of an external source. Never recovered inside the
 * resolution pipeline.
 */
export class ProviderUnavailableError extends ProviderError {
  constructor(
    message: string,
    provider: ProviderName,
    operation: string,
    public status?: number,
    cause?: Error
  ) {
    super(message, provider, operation, cause);
    this.name = 'ProviderUnavailableError';
  }
}

/** Payload received but not in the expected shape */
export class ProviderPayloadError extends ProviderError {
  constructor(
    message: string,
    provider: ProviderName,
    operation: string,
    public errors: string[]
  ) {
    super(message, provider, operation);
    this.name = 'ProviderPayloadError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
