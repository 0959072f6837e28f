import { describe, expect, it, vi } from 'vitest';
import { NameRegistry, RegistryIndex } from '@/resolution/name_registry';
import type { DirectoryRecord, TickerDirectoryProvider } from '@/providers/types';
import { fakeDirectory, SAMPLE_DIRECTORY } from '../helpers/fake_providers';

describe('RegistryIndex', () => {
  it('indexes tickers and normalized names in directory order', () => {
    const index = new RegistryIndex(SAMPLE_DIRECTORY);

    expect(index.size).toBe(6);
    expect([...index.allNames()]).toEqual([
      'APPLE INC',
      'MICROSOFT CORP',
      'NVIDIA CORP',
      'ALPHABET INC',
      'META PLATFORMS INC',
    ]);
    expect(index.entriesForName('ALPHABET INC').map((e) => e.ticker)).toEqual(['GOOGL', 'GOOG']);
    expect(index.entriesForName('UNKNOWN CO')).toEqual([]);
  });

  it('restarts name iteration on every pass', () => {
    const index = new RegistryIndex(SAMPLE_DIRECTORY);
    const names = index.allNames();

    expect([...names]).toHaveLength(5);
    expect([...names]).toHaveLength(5);
  });

  it('keeps the first record for a duplicated ticker', () => {
    const index = new RegistryIndex([
      { ticker: 'DUP', legalName: 'First Holder Co', identifier: '0000000001' },
      { ticker: 'dup', legalName: 'Second Holder Co', identifier: '0000000002' },
    ]);

    expect(index.size).toBe(1);
    expect(index.resolveTicker(' dup ')?.legalName).toBe('First Holder Co');
    expect([...index.allNames()]).toEqual(['FIRST HOLDER CO']);
  });
});

describe('NameRegistry', () => {
  it('loads the directory once for concurrent first callers', async () => {
    const { provider, listEntries } = fakeDirectory();
    const registry = new NameRegistry(provider);

    const [a, b, c] = await Promise.all([registry.ready(), registry.ready(), registry.ready()]);

    expect(listEntries).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(registry.isLoaded()).toBe(true);
    expect(registry.getLoadCount()).toBe(1);

    await registry.ready();
    expect(listEntries).toHaveBeenCalledTimes(1);
  });

  it('rejects every waiter on a failed load and retries on the next call', async () => {
    const listEntries = vi
      .fn<() => Promise<DirectoryRecord[]>>()
      .mockRejectedValueOnce(new Error('directory down'))
      .mockResolvedValueOnce(SAMPLE_DIRECTORY);
    const provider: TickerDirectoryProvider = { listEntries };
    const registry = new NameRegistry(provider);

    const results = await Promise.allSettled([registry.ready(), registry.ready()]);
    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
    expect(listEntries).toHaveBeenCalledTimes(1);
    expect(registry.isLoaded()).toBe(false);

    const index = await registry.ready();
    expect(index.size).toBe(6);
    expect(registry.getLoadCount()).toBe(2);
  });

  it('resolves tickers and identifiers case-insensitively', async () => {
    const { provider } = fakeDirectory();
    const registry = new NameRegistry(provider);

    expect((await registry.resolveTicker('googl'))?.legalName).toBe('Alphabet Inc.');
    expect(await registry.identifierFor('meta')).toBe('0001326801');
    expect(await registry.identifierFor('ZZZZ')).toBeNull();
  });
});
