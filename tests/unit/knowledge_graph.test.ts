import { describe, expect, it } from 'vitest';
import { KnowledgeGraphClient } from '@/resolution/knowledge_graph';
import { entity, fakeGraph, whatsappGraph } from '../helpers/fake_providers';

function privateChain(length: number, publicTail: boolean) {
  const nodes = Array.from({ length }, (_, i) =>
    entity(`Q${i + 1}`, `Holding ${i + 1}`, i + 1 < length ? [`Q${i + 2}`] : [])
  );
  if (publicTail) {
    nodes[length - 1] = { ...nodes[length - 1], isPubliclyTraded: true };
  }
  return nodes;
}

describe('KnowledgeGraphClient.findPublicParent', () => {
  it('walks ownership edges up to the listed parent', async () => {
    const { provider } = whatsappGraph();
    const client = new KnowledgeGraphClient(provider);

    const parent = await client.findPublicParent('Q1049511');

    expect(parent?.entity.id).toBe('Q380');
    expect(parent?.entity.ticker).toBe('META');
    expect(parent?.chain).toEqual(['WhatsApp', 'Meta Platforms']);
  });

  it('returns the start node itself when it is listed', async () => {
    const { provider } = whatsappGraph();
    const client = new KnowledgeGraphClient(provider);

    const parent = await client.findPublicParent('Q380');

    expect(parent?.chain).toEqual(['Meta Platforms']);
  });

  it('prefers owned-by over parent-organization edges', async () => {
    const { provider } = fakeGraph({}, [
      entity('Q1', 'Brand', ['Q2', 'Q3']),
      entity('Q2', 'Owner', [], { isPubliclyTraded: true }),
      entity('Q3', 'Parent Org', [], { isPubliclyTraded: true }),
    ]);
    const client = new KnowledgeGraphClient(provider);

    expect((await client.findPublicParent('Q1'))?.entity.label).toBe('Owner');
  });

  it('terminates on a two-node ownership cycle', async () => {
    const { provider, getEntity } = fakeGraph({}, [
      entity('QA', 'Alpha', ['QB']),
      entity('QB', 'Beta', ['QA']),
    ]);
    const client = new KnowledgeGraphClient(provider);

    expect(await client.findPublicParent('QA')).toBeNull();
    expect(getEntity).toHaveBeenCalledTimes(2);
  });

  it('never fetches more than maxDepth nodes', async () => {
    const { provider, getEntity } = fakeGraph({}, privateChain(10, false));
    const client = new KnowledgeGraphClient(provider);

    expect(await client.findPublicParent('Q1', 5)).toBeNull();
    expect(getEntity).toHaveBeenCalledTimes(5);
  });

  it('finds a parent exactly at the depth bound but not beyond it', async () => {
    const { provider } = fakeGraph({}, privateChain(6, true));
    const client = new KnowledgeGraphClient(provider);

    expect(await client.findPublicParent('Q1', 5)).toBeNull();
    expect((await client.findPublicParent('Q1', 6))?.chain).toHaveLength(6);
  });

  it('returns null for a missing entity or a node without edges', async () => {
    const { provider } = fakeGraph({}, [entity('Q1', 'Orphan')]);
    const client = new KnowledgeGraphClient(provider);

    expect(await client.findPublicParent('Q404')).toBeNull();
    expect(await client.findPublicParent('Q1')).toBeNull();
  });

  it('gives the same answer on repeated walks', async () => {
    const { provider } = whatsappGraph();
    const client = new KnowledgeGraphClient(provider);

    const first = await client.findPublicParent('Q1049511');
    const second = await client.findPublicParent('Q1049511');

    expect(second).toEqual(first);
  });
});

describe('KnowledgeGraphClient.lookupSubsidiary', () => {
  it('reports the matched entity, parent label, ticker and chain', async () => {
    const { provider } = whatsappGraph();
    const client = new KnowledgeGraphClient(provider);

    const match = await client.lookupSubsidiary('WhatsApp');

    expect(match).toEqual({
      matchedEntity: { id: 'Q1049511', label: 'WhatsApp', description: 'messaging app' },
      publicParentLabel: 'Meta Platforms',
      ticker: 'META',
      securityId: null,
      chain: ['WhatsApp', 'Meta Platforms'],
    });
  });

  it('moves on to the next hit when a walk dead-ends', async () => {
    const { provider } = fakeGraph(
      {
        Acme: [
          { id: 'Q10', label: 'Acme (cartoon)', description: '' },
          { id: 'Q20', label: 'Acme Corp', description: '' },
        ],
      },
      [
        entity('Q10', 'Acme (cartoon)'),
        entity('Q20', 'Acme Corp', [], { isPubliclyTraded: true, securityId: 'US0000000001' }),
      ]
    );
    const client = new KnowledgeGraphClient(provider);

    const match = await client.lookupSubsidiary('Acme');

    expect(match?.matchedEntity.id).toBe('Q20');
    expect(match?.securityId).toBe('US0000000001');
    expect(match?.ticker).toBeNull();
  });

  it('only considers the configured number of search hits', async () => {
    const { provider, search, getEntity } = fakeGraph(
      {
        Acme: [
          { id: 'Q10', label: 'Acme (cartoon)', description: '' },
          { id: 'Q20', label: 'Acme Corp', description: '' },
        ],
      },
      [entity('Q10', 'Acme (cartoon)'), entity('Q20', 'Acme Corp', [], { isPubliclyTraded: true })]
    );
    const client = new KnowledgeGraphClient(provider, { searchCandidates: 1 });

    expect(await client.lookupSubsidiary('Acme')).toBeNull();
    expect(search).toHaveBeenCalledWith('Acme', 1);
    expect(getEntity).toHaveBeenCalledTimes(1);
  });

  it('returns null when the search finds nothing', async () => {
    const { provider, getEntity } = fakeGraph();
    const client = new KnowledgeGraphClient(provider);

    expect(await client.lookupSubsidiary('Nothing Here')).toBeNull();
    expect(getEntity).not.toHaveBeenCalled();
  });
});
