import { describe, it, expect } from 'vitest';
import neo4j from 'neo4j-driver';
import { createNeo4jGraphStore } from './neo4j-graph-store.js';
import type { CypherExecutor, CypherParams, CypherRow } from './neo4j-client.js';
import { escapeLucene, toPlainProperties } from './neo4j-values.js';
import { conceptNodeId } from '../graph/graph-store.js';
import {
  AuthenticationError,
  ConnectionClosedError,
  OperationCancelledError,
  PersistenceError,
} from '@medgraph/shared/src/utils/errors.js';

interface RecordedQuery {
  readonly query: string;
  readonly params: CypherParams;
}

type Responder = (query: string, params: CypherParams) => readonly CypherRow[];

function createFakeExecutor(respond: Responder = () => []) {
  const queries: RecordedQuery[] = [];
  let closeCount = 0;
  const executor: CypherExecutor = {
    run(query, params = {}) {
      queries.push({ query, params });
      try {
        return Promise.resolve(respond(query, params));
      } catch (error) {
        return Promise.reject(error instanceof Error ? error : new Error(String(error)));
      }
    },
    close() {
      closeCount++;
      return Promise.resolve();
    },
  };
  return { executor, queries, closeCount: () => closeCount };
}

const indexes = { factIndex: 'edge_name_and_fact', entityIndex: 'node_name_and_summary' };

const hypertension = {
  conceptId: 'C0020538',
  canonicalName: 'Hypertensive disease',
  semanticCategories: ['Disease or Syndrome'],
  definitions: ['Persistently high arterial blood pressure.'],
};

describe('escapeLucene', () => {
  it('should escape special characters and neutralize boolean operators', () => {
    expect(escapeLucene('heart (attack) AND stroke?')).toBe('heart \\(attack\\) and stroke\\?');
  });

  it('should collapse whitespace', () => {
    expect(escapeLucene('  blood   pressure ')).toBe('blood pressure');
  });
});

describe('toPlainProperties', () => {
  it('should convert driver integers and drop embeddings and omitted keys', () => {
    const properties = toPlainProperties(
      { uuid: 'u-1', dose: neo4j.int(10), name_embedding: [0.1, 0.2], tags: ['a'] },
      new Set(['uuid']),
    );
    expect(properties).toEqual({ dose: 10, tags: ['a'] });
  });
});

describe('Neo4jGraphStore', () => {
  it('should merge concepts on concept_id with the deterministic uuid', async () => {
    const fake = createFakeExecutor((query, params) =>
      query.includes('MERGE (c:Concept') ? [{ uuid: params['uuid'] }] : [],
    );
    const store = createNeo4jGraphStore(fake.executor, indexes);

    const nodeId = await store.upsertConcept('C0020538', hypertension);

    expect(nodeId).toBe(conceptNodeId('C0020538'));
    const [recorded] = fake.queries;
    expect(recorded?.query).toContain('MERGE (c:Concept {concept_id: $conceptId})');
    expect(recorded?.params['name']).toBe('UMLS_C0020538');
    expect(recorded?.params['semanticTypes']).toEqual(['Disease or Syndrome']);
  });

  it('should link concepts by concept_id and set similarity after the merge', async () => {
    const fake = createFakeExecutor(() => [{ linked: neo4j.int(1) }]);
    const store = createNeo4jGraphStore(fake.executor, indexes);

    expect(await store.linkConceptToNode('node-1', 'C0020538', { similarity: 0.9 })).toBe(true);

    const [recorded] = fake.queries;
    expect(recorded?.query).toContain('MATCH (c:Concept {concept_id: $conceptId})');
    expect(recorded?.query).toContain('MERGE (n)-[r:HAS_CONCEPT]->(c)');
    expect(recorded?.params).toEqual({ nodeId: 'node-1', conceptId: 'C0020538', similarity: 0.9 });
  });

  it('should report a missing endpoint as an unlinked result', async () => {
    const fake = createFakeExecutor(() => [{ linked: neo4j.int(0) }]);
    const store = createNeo4jGraphStore(fake.executor, indexes);

    expect(await store.linkConceptHierarchy('C0020538', 'C0020540')).toBe(false);
    expect(fake.queries[0]?.query).toContain('MERGE (p)-[r:BROADER_THAN]->(c)');
  });

  it('should query the fact index with an escaped query and integer limit', async () => {
    const fake = createFakeExecutor(() => [
      {
        uuid: 'f-1',
        fact: 'Lisinopril lowers blood pressure',
        sourceUuid: 'aaaaaaaa-1111',
        targetUuid: 'bbbbbbbb-2222',
        sourceName: 'Lisinopril',
        targetName: null,
        validAt: null,
        invalidAt: null,
      },
    ]);
    const store = createNeo4jGraphStore(fake.executor, indexes);

    const result = await store.searchFacts('lisinopril: dose?', 2);

    expect(result).toEqual({
      degraded: false,
      items: [
        {
          uuid: 'f-1',
          text: 'Lisinopril lowers blood pressure',
          sourceNodeId: 'aaaaaaaa-1111',
          targetNodeId: 'bbbbbbbb-2222',
          sourceName: 'Lisinopril',
          targetName: undefined,
          validFrom: undefined,
          validUntil: undefined,
        },
      ],
    });
    const params = fake.queries[0]?.params ?? {};
    expect(params['index']).toBe('edge_name_and_fact');
    expect(params['query']).toBe('lisinopril\\: dose\\?');
    expect(String(params['limit'])).toBe('2');
  });

  it('should map entity rows with named defaults', async () => {
    const fake = createFakeExecutor(() => [
      {
        uuid: 'e-1',
        name: null,
        summary: 'An ACE inhibitor.',
        labels: ['Entity'],
        createdAt: null,
        properties: { uuid: 'e-1', summary: 'An ACE inhibitor.', mentions: neo4j.int(3) },
      },
    ]);
    const store = createNeo4jGraphStore(fake.executor, indexes);

    const result = await store.searchEntities('ace inhibitor', 5);

    expect(result.items[0]).toEqual({
      uuid: 'e-1',
      name: '',
      summary: 'An ACE inhibitor.',
      labels: ['Entity'],
      createdAt: new Date(0),
      attributes: { mentions: 3 },
    });
    expect(fake.queries[0]?.params['index']).toBe('node_name_and_summary');
  });

  it('should degrade a failing search to an empty result', async () => {
    const fake = createFakeExecutor(() => {
      throw new PersistenceError('index missing');
    });
    const store = createNeo4jGraphStore(fake.executor, indexes);

    expect(await store.searchEntities('ace inhibitor', 5)).toEqual({ items: [], degraded: true });
  });

  it('should propagate authentication failures from search', async () => {
    const fake = createFakeExecutor(() => {
      throw new AuthenticationError('rejected');
    });
    const store = createNeo4jGraphStore(fake.executor, indexes);

    await expect(store.searchFacts('pressure', 5)).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('should not query when the search is already cancelled', async () => {
    const fake = createFakeExecutor();
    const store = createNeo4jGraphStore(fake.executor, indexes);
    const controller = new AbortController();
    controller.abort();

    await expect(
      store.searchFacts('pressure', 5, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(fake.queries).toHaveLength(0);
  });

  it('should skip the query for blank search text', async () => {
    const fake = createFakeExecutor();
    const store = createNeo4jGraphStore(fake.executor, indexes);

    expect(await store.searchFacts('   ', 5)).toEqual({ items: [], degraded: false });
    expect(fake.queries).toHaveLength(0);
  });

  it('should pass the label as a parameter when listing nodes', async () => {
    const fake = createFakeExecutor();
    const store = createNeo4jGraphStore(fake.executor, indexes);

    await store.listNodes({ label: 'Episodic', limit: 10 });

    const [recorded] = fake.queries;
    expect(recorded?.query).toContain('$label IN labels(n)');
    expect(recorded?.query).toContain('LIMIT $limit');
    expect(recorded?.params['label']).toBe('Episodic');
  });

  it('should aggregate statistics from count queries', async () => {
    const fake = createFakeExecutor((query) => {
      if (query.includes('UNWIND labels(n)')) {
        return [
          { label: 'Entity', count: neo4j.int(5) },
          { label: 'Concept', count: neo4j.int(2) },
        ];
      }
      if (query.includes('type(r)')) {
        return [
          { type: 'HAS_CONCEPT', count: neo4j.int(3) },
          { type: 'BROADER_THAN', count: neo4j.int(1) },
        ];
      }
      if (query.includes('count(DISTINCT n)')) return [{ count: neo4j.int(2) }];
      if (query.includes('avg(degree)')) {
        return [{ averageDegree: 8 / 7, isolated: neo4j.int(1) }];
      }
      if (query.includes('ORDER BY degree DESC')) {
        return [
          { uuid: 'node-1', name: 'Blood pressure study', degree: neo4j.int(3) },
          { uuid: 'node-2', name: 'UMLS_C0020538', degree: neo4j.int(2) },
        ];
      }
      if (query.includes('semantic_types')) {
        return [
          { semanticType: 'Disease or Syndrome', count: neo4j.int(2) },
          { semanticType: null, count: neo4j.int(1) },
        ];
      }
      if (query.includes('count(n)')) return [{ count: neo4j.int(7) }];
      return [{ count: neo4j.int(4) }];
    });
    const store = createNeo4jGraphStore(fake.executor, indexes);

    expect(await store.getStats()).toEqual({
      totalNodes: 7,
      totalRelationships: 4,
      labelDistribution: { Entity: 5, Concept: 2 },
      relationshipTypes: { HAS_CONCEPT: 3, BROADER_THAN: 1 },
      conceptNodes: 2,
      conceptLinks: 3,
      hierarchyLinks: 1,
      nodesWithConcepts: 2,
      averageDegree: 8 / 7,
      isolatedNodes: 1,
      mostConnected: [
        { uuid: 'node-1', name: 'Blood pressure study', degree: 3 },
        { uuid: 'node-2', name: 'UMLS_C0020538', degree: 2 },
      ],
      topSemanticTypes: [{ semanticType: 'Disease or Syndrome', count: 2 }],
    });

    const connected = fake.queries.find((q) => q.query.includes('ORDER BY degree DESC'));
    expect(connected?.params['limit']).toEqual(neo4j.int(5));
    const semanticTypes = fake.queries.find((q) => q.query.includes('semantic_types'));
    expect(semanticTypes?.params['limit']).toEqual(neo4j.int(10));
  });

  it('should report zero structure for an empty graph', async () => {
    const fake = createFakeExecutor((query) => {
      if (query.includes('avg(degree)')) return [{ averageDegree: null, isolated: neo4j.int(0) }];
      if (query.includes('count(')) return [{ count: neo4j.int(0) }];
      return [];
    });
    const store = createNeo4jGraphStore(fake.executor, indexes);

    const stats = await store.getStats();

    expect(stats.totalNodes).toBe(0);
    expect(stats.nodesWithConcepts).toBe(0);
    expect(stats.averageDegree).toBe(0);
    expect(stats.mostConnected).toEqual([]);
    expect(stats.topSemanticTypes).toEqual([]);
  });

  it('should create indexes with the configured names', async () => {
    const fake = createFakeExecutor();
    const store = createNeo4jGraphStore(fake.executor, indexes);

    await store.initialize();

    const statements = fake.queries.map((q) => q.query);
    expect(statements).toContain(
      'CREATE FULLTEXT INDEX `edge_name_and_fact` IF NOT EXISTS FOR ()-[e:RELATES_TO]-() ON EACH [e.name, e.fact]',
    );
  });

  it('should close the executor once and reject later calls', async () => {
    const fake = createFakeExecutor();
    const store = createNeo4jGraphStore(fake.executor, indexes);

    await store.close();
    await store.close();

    expect(fake.closeCount()).toBe(1);
    await expect(store.getNode('node-1')).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(store.searchFacts('pressure', 5)).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});
