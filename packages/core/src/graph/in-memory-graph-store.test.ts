import { describe, it, expect } from 'vitest';
import { createInMemoryGraphStore } from './in-memory-graph-store.js';
import { conceptNodeId, withGraphStore } from './graph-store.js';
import type { ConceptDetails } from '@medgraph/shared/src/types/concept.types.js';
import {
  ConnectionClosedError,
  OperationCancelledError,
} from '@medgraph/shared/src/utils/errors.js';

const hypertension: ConceptDetails = {
  conceptId: 'C0020538',
  canonicalName: 'Hypertensive disease',
  semanticCategories: ['Disease or Syndrome'],
  definitions: ['Persistently high arterial blood pressure.'],
};

const document = {
  name: 'Blood pressure study',
  content: 'Hypertension was observed in most patients.',
  sourceDescription: 'Journal of Testing, 2021',
  referenceTime: new Date(Date.UTC(2021, 0, 1)),
};

describe('InMemoryGraphStore', () => {
  it('should create a new document node on every upsert', async () => {
    const store = createInMemoryGraphStore();

    const first = await store.upsertDocument(document);
    const second = await store.upsertDocument(document);

    expect(first).not.toBe(second);
    const node = await store.getNode(first);
    expect(node?.labels).toEqual(['Episodic']);
    expect(node?.properties['source_description']).toBe('Journal of Testing, 2021');
  });

  it('should merge concepts on their identifier and overwrite attributes', async () => {
    const store = createInMemoryGraphStore();

    const first = await store.upsertConcept('C0020538', hypertension);
    const second = await store.upsertConcept('C0020538', {
      ...hypertension,
      semanticCategories: ['Finding'],
    });

    expect(first).toBe(second);
    expect(first).toBe(conceptNodeId('C0020538'));
    expect(store.nodeCount()).toBe(1);
    const node = await store.getNode(first);
    expect(node?.name).toBe('UMLS_C0020538');
    expect(node?.properties['semantic_types']).toEqual(['Finding']);
  });

  it('should merge concept links and update their similarity', async () => {
    const store = createInMemoryGraphStore();
    const nodeId = await store.upsertDocument(document);
    await store.upsertConcept('C0020538', hypertension);

    expect(await store.linkConceptToNode(nodeId, 'C0020538', { similarity: 0.8 })).toBe(true);
    expect(await store.linkConceptToNode(nodeId, 'C0020538', { similarity: 0.95 })).toBe(true);

    const links = store.relationships('HAS_CONCEPT');
    expect(links).toHaveLength(1);
    expect(links[0]?.properties['similarity']).toBe(0.95);
  });

  it('should not link when an endpoint is missing', async () => {
    const store = createInMemoryGraphStore();
    const nodeId = await store.upsertDocument(document);

    expect(await store.linkConceptToNode(nodeId, 'C0020538')).toBe(false);
    expect(await store.linkConceptHierarchy('C0020538', 'C0020540')).toBe(false);
  });

  it('should keep one hierarchy edge per parent and child', async () => {
    const store = createInMemoryGraphStore();
    await store.upsertConcept('C0020538', hypertension);
    await store.upsertConcept('C0020540', { ...hypertension, conceptId: 'C0020540' });

    await store.linkConceptHierarchy('C0020538', 'C0020540');
    await store.linkConceptHierarchy('C0020538', 'C0020540');

    const edges = store.relationships('BROADER_THAN');
    expect(edges).toHaveLength(1);
    expect(edges[0]?.sourceId).toBe(conceptNodeId('C0020538'));
    expect(edges[0]?.targetId).toBe(conceptNodeId('C0020540'));
  });

  it('should rank facts by matching terms and apply the limit after ranking', async () => {
    const store = createInMemoryGraphStore();
    const drug = store.addEntity({ name: 'Lisinopril', summary: 'An ACE inhibitor.' });
    const disease = store.addEntity({ name: 'Hypertension', summary: 'High blood pressure.' });
    const weak = store.addFact({ sourceId: drug, targetId: disease, fact: 'Lisinopril is widely prescribed' });
    const strong = store.addFact({ sourceId: drug, targetId: disease, fact: 'Lisinopril lowers blood pressure in hypertension' });
    store.addFact({ sourceId: drug, targetId: disease, fact: 'Unrelated statement' });

    const result = await store.searchFacts('lisinopril hypertension pressure', 2);

    expect(result.degraded).toBe(false);
    expect(result.items.map((f) => f.uuid)).toEqual([strong, weak]);
    expect(result.items[0]?.sourceName).toBe('Lisinopril');
    expect(result.items[0]?.targetName).toBe('Hypertension');
  });

  it('should search entity names and summaries', async () => {
    const store = createInMemoryGraphStore();
    store.addEntity({ name: 'Lisinopril', summary: 'An ACE inhibitor.', attributes: { dose: '10mg' } });

    const result = await store.searchEntities('ace inhibitor', 5);

    expect(result.items).toHaveLength(1);
    expect(result.items[0]?.summary).toBe('An ACE inhibitor.');
    expect(result.items[0]?.attributes).toEqual({ dose: '10mg' });
  });

  it('should throw on a cancelled search', async () => {
    const store = createInMemoryGraphStore();
    const controller = new AbortController();
    controller.abort();

    await expect(
      store.searchFacts('hypertension', 5, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should list nodes by label', async () => {
    const store = createInMemoryGraphStore();
    await store.upsertDocument(document);
    await store.upsertDocument(document);
    await store.upsertConcept('C0020538', hypertension);

    expect(await store.listNodes({ label: 'Episodic' })).toHaveLength(2);
    expect(await store.listNodes({ label: 'Episodic', limit: 1 })).toHaveLength(1);
    expect(await store.listNodes()).toHaveLength(3);
  });

  it('should report statistics', async () => {
    const store = createInMemoryGraphStore();
    const nodeId = await store.upsertDocument(document);
    await store.upsertConcept('C0020538', hypertension);
    await store.linkConceptToNode(nodeId, 'C0020538');

    const stats = await store.getStats();

    expect(stats).toEqual({
      totalNodes: 2,
      totalRelationships: 1,
      labelDistribution: { Episodic: 1, Concept: 1, Entity: 1 },
      relationshipTypes: { HAS_CONCEPT: 1 },
      conceptNodes: 1,
      conceptLinks: 1,
      hierarchyLinks: 0,
      nodesWithConcepts: 1,
      averageDegree: 1,
      isolatedNodes: 0,
      mostConnected: [
        { uuid: nodeId, name: 'Blood pressure study', degree: 1 },
        { uuid: conceptNodeId('C0020538'), name: 'UMLS_C0020538', degree: 1 },
      ],
      topSemanticTypes: [{ semanticType: 'Disease or Syndrome', count: 1 }],
    });
  });

  it('should count each linked node once and report structure', async () => {
    const store = createInMemoryGraphStore();
    const linkedId = await store.upsertDocument(document);
    await store.upsertDocument({ ...document, name: 'Unlinked study' });
    await store.upsertConcept('C0020538', hypertension);
    await store.upsertConcept('C0011849', {
      conceptId: 'C0011849',
      canonicalName: 'Diabetes Mellitus',
      semanticCategories: ['Disease or Syndrome', 'Finding'],
      definitions: [],
    });
    await store.linkConceptToNode(linkedId, 'C0020538');
    await store.linkConceptToNode(linkedId, 'C0011849');

    const stats = await store.getStats();

    expect(stats.conceptLinks).toBe(2);
    expect(stats.nodesWithConcepts).toBe(1);
    expect(stats.averageDegree).toBe(1);
    expect(stats.isolatedNodes).toBe(1);
    expect(stats.mostConnected[0]).toEqual({
      uuid: linkedId,
      name: 'Blood pressure study',
      degree: 2,
    });
    expect(stats.mostConnected).toHaveLength(3);
    expect(stats.topSemanticTypes).toEqual([
      { semanticType: 'Disease or Syndrome', count: 2 },
      { semanticType: 'Finding', count: 1 },
    ]);
  });

  it('should report empty structure for an empty graph', async () => {
    const stats = await createInMemoryGraphStore().getStats();

    expect(stats.averageDegree).toBe(0);
    expect(stats.isolatedNodes).toBe(0);
    expect(stats.mostConnected).toEqual([]);
    expect(stats.topSemanticTypes).toEqual([]);
  });

  it('should reject every call after close', async () => {
    const store = createInMemoryGraphStore();
    await store.close();

    expect(store.closed).toBe(true);
    await expect(store.upsertDocument(document)).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(store.searchEntities('x', 1)).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});

describe('withGraphStore', () => {
  it('should close the store after the callback resolves', async () => {
    const store = createInMemoryGraphStore();
    const stats = await withGraphStore(() => Promise.resolve(store), (s) => s.getStats());
    expect(stats.totalNodes).toBe(0);
    expect(store.closed).toBe(true);
  });

  it('should close the store when the callback throws', async () => {
    const store = createInMemoryGraphStore();
    await expect(
      withGraphStore(() => Promise.resolve(store), () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');
    expect(store.closed).toBe(true);
  });
});
