import { describe, it, expect } from 'vitest';
import type { GraphStats } from '@medgraph/shared/src/types/graph.types.js';
import { createInMemoryGraphStore } from '../../graph/in-memory-graph-store.js';
import { collectGraphStats, conceptCoverage, formatGraphStats } from './graph-stats.js';

const emptyStructure = {
  averageDegree: 0,
  isolatedNodes: 0,
  mostConnected: [],
  topSemanticTypes: [],
};

const details = {
  conceptId: 'C0020538',
  canonicalName: 'Hypertensive disease',
  semanticCategories: ['Disease or Syndrome'],
  definitions: [],
};

describe('conceptCoverage', () => {
  it('should return 0 when every node is a concept', () => {
    const stats: GraphStats = {
      totalNodes: 2,
      totalRelationships: 0,
      labelDistribution: {},
      relationshipTypes: {},
      conceptNodes: 2,
      conceptLinks: 0,
      hierarchyLinks: 0,
      nodesWithConcepts: 0,
      ...emptyStructure,
    };
    expect(conceptCoverage(stats)).toBe(0);
  });

  it('should divide linked nodes, not links, by the non-concept nodes', () => {
    const stats: GraphStats = {
      totalNodes: 6,
      totalRelationships: 5,
      labelDistribution: {},
      relationshipTypes: {},
      conceptNodes: 2,
      conceptLinks: 5,
      hierarchyLinks: 0,
      nodesWithConcepts: 1,
      ...emptyStructure,
    };
    expect(conceptCoverage(stats)).toBe(0.25);
  });
});

describe('collectGraphStats', () => {
  it('should report counts from the store', async () => {
    const store = createInMemoryGraphStore();
    const doc = await store.upsertDocument({
      name: 'Paper',
      content: 'Hypertension study',
      sourceDescription: 'Journal, 2020',
      referenceTime: new Date('2020-01-01T00:00:00Z'),
    });
    await store.upsertConcept('C0020538', details);
    await store.linkConceptToNode(doc, 'C0020538', { similarity: 1 });

    const report = await collectGraphStats(store);

    expect(report.stats.totalNodes).toBe(2);
    expect(report.stats.conceptNodes).toBe(1);
    expect(report.stats.conceptLinks).toBe(1);
    expect(report.conceptCoverage).toBe(1);
  });
});

describe('collectGraphStats with several links per node', () => {
  it('should count a node linked to two concepts once', async () => {
    const store = createInMemoryGraphStore();
    const input = {
      name: 'Paper',
      content: 'Hypertension and diabetes study',
      sourceDescription: 'Journal, 2020',
      referenceTime: new Date('2020-01-01T00:00:00Z'),
    };
    const linked = await store.upsertDocument(input);
    await store.upsertDocument({ ...input, name: 'Second paper' });
    await store.upsertConcept('C0000001', { ...details, conceptId: 'C0000001' });
    await store.upsertConcept('C0000002', { ...details, conceptId: 'C0000002' });
    await store.linkConceptToNode(linked, 'C0000001');
    await store.linkConceptToNode(linked, 'C0000002');

    const report = await collectGraphStats(store);

    expect(report.stats.conceptLinks).toBe(2);
    expect(report.stats.nodesWithConcepts).toBe(1);
    expect(report.conceptCoverage).toBe(0.5);
  });
});

describe('formatGraphStats', () => {
  it('should render totals, distributions, structure, and coverage', () => {
    const text = formatGraphStats({
      stats: {
        totalNodes: 5,
        totalRelationships: 3,
        labelDistribution: { Entity: 3, Concept: 1, Episodic: 1 },
        relationshipTypes: { HAS_CONCEPT: 2, BROADER_THAN: 1 },
        conceptNodes: 1,
        conceptLinks: 2,
        hierarchyLinks: 1,
        nodesWithConcepts: 2,
        averageDegree: 1.2,
        isolatedNodes: 1,
        mostConnected: [
          { uuid: 'node-1', name: 'UMLS_C0020538', degree: 3 },
          { uuid: 'node-2', name: '', degree: 1 },
        ],
        topSemanticTypes: [{ semanticType: 'Disease or Syndrome', count: 1 }],
      },
      conceptCoverage: 0.5,
    });

    const lines = text.split('\n');
    expect(lines).toContain('Total nodes: 5');
    expect(lines).toContain('Total relationships: 3');
    expect(lines.indexOf('  Entity: 3')).toBeLessThan(lines.indexOf('  Concept: 1'));
    expect(lines.indexOf('  Concept: 1')).toBeLessThan(lines.indexOf('  Episodic: 1'));
    expect(lines).toContain('  HAS_CONCEPT: 2');
    expect(lines).toContain('  Hierarchy links: 1');
    expect(lines).toContain('  Nodes with concepts: 2');
    expect(lines).toContain('  Coverage: 50.0%');
    expect(lines).toContain('  Average degree: 1.20');
    expect(lines).toContain('  Isolated nodes: 1');
    expect(lines.slice(lines.indexOf('  Most connected:') + 1, lines.indexOf('  Most connected:') + 3)).toEqual([
      '    UMLS_C0020538: 3',
      '    node-2: 1',
    ]);
    expect(lines[lines.indexOf('  Top semantic types:') + 1]).toBe('    Disease or Syndrome: 1');
  });

  it('should mark empty distributions', () => {
    const text = formatGraphStats({
      stats: {
        totalNodes: 0,
        totalRelationships: 0,
        labelDistribution: {},
        relationshipTypes: {},
        conceptNodes: 0,
        conceptLinks: 0,
        hierarchyLinks: 0,
        nodesWithConcepts: 0,
        ...emptyStructure,
      },
      conceptCoverage: 0,
    });

    const lines = text.split('\n');
    expect(lines.filter((line) => line === '  (none)')).toHaveLength(2);
    expect(lines.filter((line) => line === '    (none)')).toHaveLength(2);
    expect(lines).toContain('  Average degree: 0.00');
  });
});
