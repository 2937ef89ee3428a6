import neo4j from 'neo4j-driver';
import { randomUUID } from 'node:crypto';
import type { GraphConfig } from '@medgraph/schemas/src/app-config.schema.js';
import type { ConceptDetails } from '@medgraph/shared/src/types/concept.types.js';
import type {
  ConceptLinkProps,
  GraphNodeRecord,
  GraphStats,
  RetrievedEntity,
  RetrievedFact,
  SearchResult,
} from '@medgraph/shared/src/types/graph.types.js';
import type { DocumentInput } from '@medgraph/shared/src/types/ingestion.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import {
  ConfigurationError,
  ConnectionClosedError,
  OperationCancelledError,
  SearchDegradedError,
  isScopeTerminatingError,
  toError,
} from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import {
  CONCEPT_LABEL,
  CONCEPT_LINK_TYPE,
  FACT_LINK_TYPE,
  HIERARCHY_LINK_TYPE,
  MOST_CONNECTED_LIMIT,
  TOP_SEMANTIC_TYPES_LIMIT,
  conceptNodeId,
  conceptNodeName,
  describeConcept,
} from '../graph/graph-store.js';
import type { GraphStore, ListNodesParams, SearchOptions } from '../graph/graph-store.js';
import { connectNeo4j } from './neo4j-client.js';
import type { CypherExecutor, CypherRow } from './neo4j-client.js';
import {
  escapeLucene,
  isPlainIdentifier,
  toDate,
  toNumber,
  toOptionalDate,
  toOptionalString,
  toPlainProperties,
  toStringList,
  toStringValue,
} from './neo4j-values.js';

const log = createChildLogger('infrastructure:neo4j-graph-store');

const NODE_FIELDS = new Set(['uuid', 'name', 'created_at']);
const ENTITY_FIELDS = new Set(['uuid', 'name', 'summary', 'created_at']);

const CREATE_DOCUMENT = `
CREATE (e:Episodic {
  uuid: $uuid,
  name: $name,
  content: $content,
  source: 'text',
  source_description: $sourceDescription,
  valid_at: datetime($referenceTime),
  created_at: datetime()
})
RETURN e.uuid AS uuid`;

const MERGE_CONCEPT = `
MERGE (c:${CONCEPT_LABEL} {concept_id: $conceptId})
ON CREATE SET c.uuid = $uuid, c.created_at = datetime(), c:Entity
SET c.name = $name,
    c.canonical_name = $canonicalName,
    c.semantic_types = $semanticTypes,
    c.definitions = $definitions,
    c.summary = $summary,
    c.updated_at = datetime()
RETURN c.uuid AS uuid`;

const MERGE_CONCEPT_LINK = `
MATCH (n {uuid: $nodeId})
MATCH (c:${CONCEPT_LABEL} {concept_id: $conceptId})
MERGE (n)-[r:${CONCEPT_LINK_TYPE}]->(c)
ON CREATE SET r.created_at = datetime()
SET r.similarity = coalesce($similarity, r.similarity)
RETURN count(r) AS linked`;

const MERGE_HIERARCHY_LINK = `
MATCH (p:${CONCEPT_LABEL} {concept_id: $parentConceptId})
MATCH (c:${CONCEPT_LABEL} {concept_id: $childConceptId})
MERGE (p)-[r:${HIERARCHY_LINK_TYPE}]->(c)
ON CREATE SET r.created_at = datetime()
RETURN count(r) AS linked`;

const SEARCH_FACTS = `
CALL db.index.fulltext.queryRelationships($index, $query, {limit: $limit})
YIELD relationship AS r, score
MATCH (s)-[r]->(t)
RETURN r.uuid AS uuid,
       r.fact AS fact,
       s.uuid AS sourceUuid,
       t.uuid AS targetUuid,
       s.name AS sourceName,
       t.name AS targetName,
       r.valid_at AS validAt,
       r.invalid_at AS invalidAt
ORDER BY score DESC
LIMIT $limit`;

const SEARCH_ENTITIES = `
CALL db.index.fulltext.queryNodes($index, $query, {limit: $limit})
YIELD node AS n, score
RETURN n.uuid AS uuid,
       n.name AS name,
       n.summary AS summary,
       labels(n) AS labels,
       n.created_at AS createdAt,
       properties(n) AS properties
ORDER BY score DESC
LIMIT $limit`;

const NODE_PROJECTION = `
RETURN n.uuid AS uuid,
       n.name AS name,
       labels(n) AS labels,
       n.created_at AS createdAt,
       properties(n) AS properties`;

const GET_NODE = `MATCH (n {uuid: $uuid})${NODE_PROJECTION}
LIMIT 1`;

const LIST_NODES = `
MATCH (n)
WHERE $label IS NULL OR $label IN labels(n)${NODE_PROJECTION}
ORDER BY n.created_at, n.uuid`;

const COUNT_NODES = 'MATCH (n) RETURN count(n) AS count';
const COUNT_RELATIONSHIPS = 'MATCH ()-[r]->() RETURN count(r) AS count';
const LABEL_DISTRIBUTION = `
MATCH (n)
UNWIND labels(n) AS label
RETURN label, count(*) AS count
ORDER BY count DESC`;
const RELATIONSHIP_TYPES = `
MATCH ()-[r]->()
RETURN type(r) AS type, count(*) AS count
ORDER BY count DESC`;
const NODES_WITH_CONCEPTS = `
MATCH (n)-[:${CONCEPT_LINK_TYPE}]->(:${CONCEPT_LABEL})
RETURN count(DISTINCT n) AS count`;
const DEGREE_SUMMARY = `
MATCH (n)
WITH COUNT { (n)--() } AS degree
RETURN avg(degree) AS averageDegree, sum(CASE WHEN degree = 0 THEN 1 ELSE 0 END) AS isolated`;
const MOST_CONNECTED = `
MATCH (n)
WITH n, COUNT { (n)--() } AS degree
WHERE degree > 0
RETURN n.uuid AS uuid, n.name AS name, degree
ORDER BY degree DESC, name
LIMIT $limit`;
const TOP_SEMANTIC_TYPES = `
MATCH (c:${CONCEPT_LABEL})
UNWIND coalesce(c.semantic_types, []) AS semanticType
RETURN semanticType, count(*) AS count
ORDER BY count DESC, semanticType
LIMIT $limit`;

const CLEAR_GRAPH = 'MATCH (n) DETACH DELETE n';

type SearchKind = 'facts' | 'entities';

export type Neo4jGraphStoreConfig = Pick<GraphConfig, 'factIndex' | 'entityIndex'>;

function mapFact(row: CypherRow): RetrievedFact {
  return {
    uuid: toStringValue(row['uuid']),
    text: toStringValue(row['fact']),
    sourceNodeId: toStringValue(row['sourceUuid']),
    targetNodeId: toStringValue(row['targetUuid']),
    sourceName: toOptionalString(row['sourceName']),
    targetName: toOptionalString(row['targetName']),
    validFrom: toOptionalDate(row['validAt']),
    validUntil: toOptionalDate(row['invalidAt']),
  };
}

function mapEntity(row: CypherRow): RetrievedEntity {
  return {
    uuid: toStringValue(row['uuid']),
    name: toStringValue(row['name']),
    summary: toStringValue(row['summary']),
    labels: toStringList(row['labels']),
    createdAt: toDate(row['createdAt']),
    attributes: toPlainProperties(row['properties'], ENTITY_FIELDS),
  };
}

function mapNode(row: CypherRow): GraphNodeRecord {
  return {
    uuid: toStringValue(row['uuid']),
    name: toStringValue(row['name']),
    labels: toStringList(row['labels']),
    createdAt: toDate(row['createdAt']),
    properties: toPlainProperties(row['properties'], NODE_FIELDS),
  };
}

function toCounts(rows: readonly CypherRow[], key: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    const name = toStringValue(row[key]);
    if (name) counts[name] = toNumber(row['count']);
  }
  return counts;
}

function quoteIdentifier(name: string): string {
  if (!isPlainIdentifier(name)) {
    throw new ConfigurationError(`Invalid fulltext index name: ${name}`);
  }
  return `\`${name}\``;
}

export function createNeo4jGraphStore(
  executor: CypherExecutor,
  config: Neo4jGraphStoreConfig,
): GraphStore {
  let closed = false;

  function ensureOpen(): void {
    if (closed) throw new ConnectionClosedError();
  }

  async function search<T>(
    kind: SearchKind,
    statement: string,
    index: string,
    query: string,
    limit: number,
    mapRow: (row: CypherRow) => T,
    signal: AbortSignal | undefined,
  ): Promise<SearchResult<T>> {
    ensureOpen();
    throwIfCancelled(signal);

    const escaped = escapeLucene(query);
    if (escaped.length === 0 || limit <= 0) {
      return { items: [], degraded: false };
    }

    try {
      const rows = await executor.run(statement, { index, query: escaped, limit: neo4j.int(limit) });
      throwIfCancelled(signal);
      return { items: rows.slice(0, limit).map(mapRow), degraded: false };
    } catch (error) {
      if (isScopeTerminatingError(error)) throw error;
      if (signal?.aborted) {
        throw new OperationCancelledError('Graph search cancelled', toError(error));
      }
      const degraded = new SearchDegradedError(`${kind} search failed`, kind, toError(error));
      log.warn(
        { searchKind: kind, index, error: degraded.cause?.message },
        'Graph search degraded, continuing with empty results',
      );
      return { items: [], degraded: true };
    }
  }

  return {
    get closed(): boolean {
      return closed;
    },

    async upsertDocument(input: DocumentInput): Promise<string> {
      ensureOpen();
      const uuid = randomUUID();
      const rows = await executor.run(CREATE_DOCUMENT, {
        uuid,
        name: input.name,
        content: input.content,
        sourceDescription: input.sourceDescription,
        referenceTime: input.referenceTime.toISOString(),
      });
      log.debug({ uuid, name: input.name }, 'Created document node');
      return toStringValue(rows[0]?.['uuid'], uuid);
    },

    async upsertConcept(conceptId: string, details: ConceptDetails): Promise<string> {
      ensureOpen();
      const uuid = conceptNodeId(conceptId);
      const rows = await executor.run(MERGE_CONCEPT, {
        conceptId,
        uuid,
        name: conceptNodeName(conceptId),
        canonicalName: details.canonicalName,
        semanticTypes: [...details.semanticCategories],
        definitions: [...details.definitions],
        summary: describeConcept(details),
      });
      return toStringValue(rows[0]?.['uuid'], uuid);
    },

    async linkConceptToNode(
      nodeId: string,
      conceptId: string,
      props?: ConceptLinkProps,
    ): Promise<boolean> {
      ensureOpen();
      const rows = await executor.run(MERGE_CONCEPT_LINK, {
        nodeId,
        conceptId,
        similarity: props?.similarity ?? null,
      });
      return toNumber(rows[0]?.['linked']) > 0;
    },

    async linkConceptHierarchy(parentConceptId: string, childConceptId: string): Promise<boolean> {
      ensureOpen();
      const rows = await executor.run(MERGE_HIERARCHY_LINK, { parentConceptId, childConceptId });
      return toNumber(rows[0]?.['linked']) > 0;
    },

    searchFacts(
      query: string,
      limit: number,
      options?: SearchOptions,
    ): Promise<SearchResult<RetrievedFact>> {
      return search('facts', SEARCH_FACTS, config.factIndex, query, limit, mapFact, options?.signal);
    },

    searchEntities(
      query: string,
      limit: number,
      options?: SearchOptions,
    ): Promise<SearchResult<RetrievedEntity>> {
      return search(
        'entities',
        SEARCH_ENTITIES,
        config.entityIndex,
        query,
        limit,
        mapEntity,
        options?.signal,
      );
    },

    async getNode(uuid: string): Promise<GraphNodeRecord | null> {
      ensureOpen();
      const rows = await executor.run(GET_NODE, { uuid });
      const row = rows[0];
      return row ? mapNode(row) : null;
    },

    async listNodes(params: ListNodesParams = {}): Promise<readonly GraphNodeRecord[]> {
      ensureOpen();
      const statement = params.limit === undefined ? LIST_NODES : `${LIST_NODES}\nLIMIT $limit`;
      const rows = await executor.run(statement, {
        label: params.label ?? null,
        ...(params.limit === undefined ? {} : { limit: neo4j.int(params.limit) }),
      });
      return rows.map(mapNode);
    },

    async initialize(): Promise<void> {
      ensureOpen();
      const statements = [
        `CREATE CONSTRAINT concept_id_unique IF NOT EXISTS FOR (c:${CONCEPT_LABEL}) REQUIRE c.concept_id IS UNIQUE`,
        'CREATE INDEX node_uuid IF NOT EXISTS FOR (n:Entity) ON (n.uuid)',
        'CREATE INDEX episode_uuid IF NOT EXISTS FOR (n:Episodic) ON (n.uuid)',
        `CREATE FULLTEXT INDEX ${quoteIdentifier(config.entityIndex)} IF NOT EXISTS FOR (n:Entity) ON EACH [n.name, n.summary]`,
        `CREATE FULLTEXT INDEX ${quoteIdentifier(config.factIndex)} IF NOT EXISTS FOR ()-[e:${FACT_LINK_TYPE}]-() ON EACH [e.name, e.fact]`,
      ];
      for (const statement of statements) {
        await executor.run(statement);
      }
      log.info({ statements: statements.length }, 'Graph constraints and indexes ensured');
    },

    async clear(): Promise<void> {
      ensureOpen();
      await executor.run(CLEAR_GRAPH);
      log.warn('Graph cleared');
    },

    async getStats(): Promise<GraphStats> {
      ensureOpen();
      const [
        nodeRows,
        relationshipRows,
        labelRows,
        typeRows,
        linkedRows,
        degreeRows,
        connectedRows,
        semanticTypeRows,
      ] = await Promise.all([
        executor.run(COUNT_NODES),
        executor.run(COUNT_RELATIONSHIPS),
        executor.run(LABEL_DISTRIBUTION),
        executor.run(RELATIONSHIP_TYPES),
        executor.run(NODES_WITH_CONCEPTS),
        executor.run(DEGREE_SUMMARY),
        executor.run(MOST_CONNECTED, { limit: neo4j.int(MOST_CONNECTED_LIMIT) }),
        executor.run(TOP_SEMANTIC_TYPES, { limit: neo4j.int(TOP_SEMANTIC_TYPES_LIMIT) }),
      ]);
      const labelDistribution = toCounts(labelRows, 'label');
      const relationshipTypes = toCounts(typeRows, 'type');

      return {
        totalNodes: toNumber(nodeRows[0]?.['count']),
        totalRelationships: toNumber(relationshipRows[0]?.['count']),
        labelDistribution,
        relationshipTypes,
        conceptNodes: labelDistribution[CONCEPT_LABEL] ?? 0,
        conceptLinks: relationshipTypes[CONCEPT_LINK_TYPE] ?? 0,
        hierarchyLinks: relationshipTypes[HIERARCHY_LINK_TYPE] ?? 0,
        nodesWithConcepts: toNumber(linkedRows[0]?.['count']),
        averageDegree: toNumber(degreeRows[0]?.['averageDegree']),
        isolatedNodes: toNumber(degreeRows[0]?.['isolated']),
        mostConnected: connectedRows.map((row) => ({
          uuid: toStringValue(row['uuid']),
          name: toStringValue(row['name']),
          degree: toNumber(row['degree']),
        })),
        topSemanticTypes: semanticTypeRows
          .map((row) => ({
            semanticType: toStringValue(row['semanticType']),
            count: toNumber(row['count']),
          }))
          .filter((entry) => entry.semanticType.length > 0),
      };
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await executor.close();
    },
  };
}

export async function openNeo4jGraphStore(config: GraphConfig): Promise<GraphStore> {
  const executor = await connectNeo4j(config);
  return createNeo4jGraphStore(executor, config);
}
