/**
 * Name registry: the authoritative ticker directory, indexed for lookup.
 *
 * Loaded once per registry instance on first use. Concurrent first callers
 * share a single load; nobody observes a partially built index.
 */

import { createChildLogger } from '@/utils/logger';
import type { DirectoryRecord, TickerDirectoryProvider } from '@/providers/types';
import { normalizeName } from './similarity';
import type { RegistryEntry } from './types';

const logger = createChildLogger('name_registry');

/** Immutable index over a loaded directory */
export class RegistryIndex {
  private readonly byTicker = new Map<string, RegistryEntry>();
  private readonly byName = new Map<string, RegistryEntry[]>();

  constructor(records: readonly DirectoryRecord[]) {
    for (const record of records) {
      const ticker = record.ticker.trim().toUpperCase();
      if (!ticker || this.byTicker.has(ticker)) {
        continue;
      }
      const entry: RegistryEntry = Object.freeze({
        ticker,
        legalName: record.legalName,
        identifier: record.identifier,
      });
      this.byTicker.set(ticker, entry);

      const name = normalizeName(record.legalName);
      if (!name) continue;
      const entries = this.byName.get(name);
      if (entries) {
        entries.push(entry);
      } else {
        this.byName.set(name, [entry]);
      }
    }
  }

  get size(): number {
    return this.byTicker.size;
  }

  resolveTicker(ticker: string): RegistryEntry | null {
    return this.byTicker.get(ticker.trim().toUpperCase()) ?? null;
  }

  /** Entries sharing a normalized legal name, in directory order */
  entriesForName(normalizedName: string): readonly RegistryEntry[] {
    return this.byName.get(normalizedName) ?? [];
  }

  /** Normalized names in order of first appearance; every iteration starts over */
  allNames(): Iterable<string> {
    const names = this.byName;
    return {
      [Symbol.iterator]: () => names.keys(),
    };
  }
}

export class NameRegistry {
  private index: RegistryIndex | null = null;
  private loading: Promise<RegistryIndex> | null = null;
  private loadCount = 0;

  constructor(private readonly provider: TickerDirectoryProvider) {}

  /**
   * Resolves once the directory is indexed. A failed load rejects every
   * waiting caller and leaves the registry unloaded.
   */
  async ready(): Promise<RegistryIndex> {
    if (this.index) {
      return this.index;
    }
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<RegistryIndex> {
    this.loadCount++;
    const startedAt = Date.now();
    try {
      const records = await this.provider.listEntries();
      const index = new RegistryIndex(records);
      this.index = index;
      logger.info(
        { tickers: index.size, durationMs: Date.now() - startedAt },
        'Name registry loaded'
      );
      return index;
    } catch (error) {
      logger.error({ error }, 'Name registry load failed');
      throw error;
    }
  }

  isLoaded(): boolean {
    return this.index !== null;
  }

  /** Number of directory loads started, for diagnostics */
  getLoadCount(): number {
    return this.loadCount;
  }

  async resolveTicker(ticker: string): Promise<RegistryEntry | null> {
    const index = await this.ready();
    return index.resolveTicker(ticker);
  }

  async identifierFor(ticker: string): Promise<string | null> {
    const entry = await this.resolveTicker(ticker);
    return entry?.identifier ?? null;
  }

  async allNames(): Promise<Iterable<string>> {
    const index = await this.ready();
    return index.allNames();
  }
}
