import { vi } from 'vitest';
import type {
  CompletionOptions,
  CompletionProvider,
  DirectoryRecord,
  GraphEntity,
  GraphSearchHit,
  KnowledgeGraphProvider,
  TickerDirectoryProvider,
} from '@/providers/types';

export const SAMPLE_DIRECTORY: DirectoryRecord[] = [
  { ticker: 'AAPL', legalName: 'Apple Inc.', identifier: '0000320193' },
  { ticker: 'MSFT', legalName: 'MICROSOFT CORP', identifier: '0000789019' },
  { ticker: 'NVDA', legalName: 'NVIDIA CORP', identifier: '0001045810' },
  { ticker: 'GOOGL', legalName: 'Alphabet Inc.', identifier: '0001652044' },
  { ticker: 'GOOG', legalName: 'Alphabet Inc.', identifier: '0001652044' },
  { ticker: 'META', legalName: 'Meta Platforms, Inc.', identifier: '0001326801' },
];

export function fakeDirectory(records: DirectoryRecord[] = SAMPLE_DIRECTORY) {
  const listEntries = vi.fn(async () => records.map((record) => ({ ...record })));
  const provider: TickerDirectoryProvider = { listEntries };
  return { provider, listEntries };
}

export function entity(
  id: string,
  label: string,
  ownershipEdges: string[] = [],
  extra: Partial<GraphEntity> = {}
): GraphEntity {
  return { id, label, ownershipEdges, isPubliclyTraded: false, ...extra };
}

/** In-memory knowledge graph keyed by query text and entity id */
export function fakeGraph(
  searchResults: Record<string, GraphSearchHit[]> = {},
  entities: GraphEntity[] = []
) {
  const byId = new Map(entities.map((item) => [item.id, item]));
  const search = vi.fn(async (query: string, limit: number) =>
    (searchResults[query] ?? []).slice(0, limit)
  );
  const getEntity = vi.fn(async (id: string) => byId.get(id) ?? null);
  const provider: KnowledgeGraphProvider = { search, getEntity };
  return { provider, search, getEntity };
}

export function fakeCompletion(answer: string) {
  const complete = vi.fn(async (_prompt: string, _options?: CompletionOptions) => answer);
  const provider: CompletionProvider = { complete };
  return { provider, complete };
}

/** WhatsApp owned by Meta Platforms, which is listed */
export function whatsappGraph() {
  return fakeGraph(
    {
      WhatsApp: [{ id: 'Q1049511', label: 'WhatsApp', description: 'messaging app' }],
    },
    [
      entity('Q1049511', 'WhatsApp', ['Q380']),
      entity('Q380', 'Meta Platforms', [], { isPubliclyTraded: true, ticker: 'META' }),
    ]
  );
}

/** fetch stand-in answering every request with the same status and body */
export function fakeFetch(body: unknown, status = 200) {
  return vi.fn(async (_input: string, _init?: { headers?: Record<string, string> }) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    })
  );
}
