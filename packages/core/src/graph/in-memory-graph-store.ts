import { randomUUID } from 'node:crypto';
import type { ConceptDetails } from '@medgraph/shared/src/types/concept.types.js';
import type {
  ConceptLinkProps,
  GraphNodeRecord,
  GraphStats,
  NodeDegree,
  RetrievedEntity,
  RetrievedFact,
  SearchResult,
} from '@medgraph/shared/src/types/graph.types.js';
import type { DocumentInput } from '@medgraph/shared/src/types/ingestion.types.js';
import { ConnectionClosedError } from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import {
  CONCEPT_LABEL,
  CONCEPT_LINK_TYPE,
  DOCUMENT_LABEL,
  FACT_LINK_TYPE,
  HIERARCHY_LINK_TYPE,
  MOST_CONNECTED_LIMIT,
  TOP_SEMANTIC_TYPES_LIMIT,
  conceptNodeId,
  conceptNodeName,
  describeConcept,
} from './graph-store.js';
import type {
  GraphRelationshipType,
  GraphStore,
  ListNodesParams,
  SearchOptions,
} from './graph-store.js';

const ENTITY_LABEL = 'Entity';
const TERM_PATTERN = /[\p{L}\p{N}]+/gu;

interface StoredNode {
  readonly uuid: string;
  name: string;
  readonly labels: string[];
  readonly createdAt: Date;
  properties: Record<string, unknown>;
}

export interface StoredRelationship {
  readonly uuid: string;
  readonly type: GraphRelationshipType;
  readonly sourceId: string;
  readonly targetId: string;
  readonly createdAt: Date;
  properties: Record<string, unknown>;
}

export interface EntitySeed {
  readonly name: string;
  readonly summary: string;
  readonly labels?: readonly string[];
  readonly attributes?: Readonly<Record<string, unknown>>;
}

export interface FactSeed {
  readonly sourceId: string;
  readonly targetId: string;
  readonly fact: string;
  readonly name?: string;
  readonly validFrom?: Date;
  readonly validUntil?: Date;
}

/**
 * Process-local graph with the same merge semantics as the Neo4j store. Fulltext search is
 * approximated by counting query terms that occur in the indexed text.
 */
export interface InMemoryGraphStore extends GraphStore {
  addEntity(seed: EntitySeed): string;
  addFact(seed: FactSeed): string;
  relationships(type?: GraphRelationshipType): readonly StoredRelationship[];
  nodeCount(): number;
}

function terms(text: string): Set<string> {
  return new Set((text.toLowerCase().match(TERM_PATTERN) ?? []).filter((t) => t.length > 1));
}

function score(queryTerms: ReadonlySet<string>, text: string): number {
  const candidateTerms = terms(text);
  let hits = 0;
  for (const term of queryTerms) {
    if (candidateTerms.has(term)) hits++;
  }
  return hits;
}

function rank<T>(items: readonly T[], queryTerms: ReadonlySet<string>, textOf: (item: T) => string, limit: number): T[] {
  return items
    .map((item, position) => ({ item, position, score: score(queryTerms, textOf(item)) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, Math.max(0, limit))
    .map((entry) => entry.item);
}

function toRecord(node: StoredNode): GraphNodeRecord {
  return {
    uuid: node.uuid,
    name: node.name,
    labels: [...node.labels],
    createdAt: node.createdAt,
    properties: { ...node.properties },
  };
}

function stringProperty(properties: Record<string, unknown>, key: string): string {
  const value = properties[key];
  return typeof value === 'string' ? value : '';
}

export function createInMemoryGraphStore(): InMemoryGraphStore {
  const nodes = new Map<string, StoredNode>();
  const edges = new Map<string, StoredRelationship>();
  let closed = false;

  function ensureOpen(): void {
    if (closed) throw new ConnectionClosedError();
  }

  function findConcept(conceptId: string): StoredNode | undefined {
    return nodes.get(conceptNodeId(conceptId));
  }

  function mergeRelationship(
    type: GraphRelationshipType,
    sourceId: string,
    targetId: string,
  ): StoredRelationship {
    const key = `${sourceId}|${type}|${targetId}`;
    let edge = edges.get(key);
    if (!edge) {
      edge = { uuid: randomUUID(), type, sourceId, targetId, createdAt: new Date(), properties: {} };
      edges.set(key, edge);
    }
    return edge;
  }

  function countBy(values: readonly string[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const value of values) {
      counts[value] = (counts[value] ?? 0) + 1;
    }
    return counts;
  }

  function degrees(): NodeDegree[] {
    const byNode = new Map<string, number>();
    for (const edge of edges.values()) {
      byNode.set(edge.sourceId, (byNode.get(edge.sourceId) ?? 0) + 1);
      byNode.set(edge.targetId, (byNode.get(edge.targetId) ?? 0) + 1);
    }
    return [...nodes.values()].map((node) => ({
      uuid: node.uuid,
      name: node.name,
      degree: byNode.get(node.uuid) ?? 0,
    }));
  }

  function semanticTypeCounts(): Record<string, number> {
    const values: string[] = [];
    for (const node of nodes.values()) {
      if (!node.labels.includes(CONCEPT_LABEL)) continue;
      const types = node.properties['semantic_types'];
      if (!Array.isArray(types)) continue;
      for (const type of types) {
        if (typeof type === 'string') values.push(type);
      }
    }
    return countBy(values);
  }

  return {
    get closed(): boolean {
      return closed;
    },

    async upsertDocument(input: DocumentInput): Promise<string> {
      ensureOpen();
      const uuid = randomUUID();
      nodes.set(uuid, {
        uuid,
        name: input.name,
        labels: [DOCUMENT_LABEL],
        createdAt: new Date(),
        properties: {
          content: input.content,
          source: 'text',
          source_description: input.sourceDescription,
          valid_at: input.referenceTime,
        },
      });
      return uuid;
    },

    async upsertConcept(conceptId: string, details: ConceptDetails): Promise<string> {
      ensureOpen();
      const uuid = conceptNodeId(conceptId);
      const properties = {
        concept_id: conceptId,
        canonical_name: details.canonicalName,
        semantic_types: [...details.semanticCategories],
        definitions: [...details.definitions],
        summary: describeConcept(details),
      };
      const existing = nodes.get(uuid);
      if (existing) {
        existing.name = conceptNodeName(conceptId);
        existing.properties = { ...existing.properties, ...properties };
      } else {
        nodes.set(uuid, {
          uuid,
          name: conceptNodeName(conceptId),
          labels: [CONCEPT_LABEL, ENTITY_LABEL],
          createdAt: new Date(),
          properties,
        });
      }
      return uuid;
    },

    async linkConceptToNode(nodeId: string, conceptId: string, props?: ConceptLinkProps): Promise<boolean> {
      ensureOpen();
      const concept = findConcept(conceptId);
      if (!nodes.has(nodeId) || !concept) return false;

      const edge = mergeRelationship(CONCEPT_LINK_TYPE, nodeId, concept.uuid);
      if (props?.similarity !== undefined) {
        edge.properties = { ...edge.properties, similarity: props.similarity };
      }
      return true;
    },

    async linkConceptHierarchy(parentConceptId: string, childConceptId: string): Promise<boolean> {
      ensureOpen();
      const parent = findConcept(parentConceptId);
      const child = findConcept(childConceptId);
      if (!parent || !child) return false;

      mergeRelationship(HIERARCHY_LINK_TYPE, parent.uuid, child.uuid);
      return true;
    },

    async searchFacts(query: string, limit: number, options?: SearchOptions): Promise<SearchResult<RetrievedFact>> {
      ensureOpen();
      throwIfCancelled(options?.signal);

      const facts = [...edges.values()].filter((edge) => edge.type === FACT_LINK_TYPE);
      const ranked = rank(
        facts,
        terms(query),
        (edge) => `${stringProperty(edge.properties, 'name')} ${stringProperty(edge.properties, 'fact')}`,
        limit,
      );

      const items = ranked.map((edge): RetrievedFact => {
        const validFrom = edge.properties['valid_at'];
        const validUntil = edge.properties['invalid_at'];
        return {
          uuid: edge.uuid,
          text: stringProperty(edge.properties, 'fact'),
          sourceNodeId: edge.sourceId,
          targetNodeId: edge.targetId,
          sourceName: nodes.get(edge.sourceId)?.name,
          targetName: nodes.get(edge.targetId)?.name,
          validFrom: validFrom instanceof Date ? validFrom : undefined,
          validUntil: validUntil instanceof Date ? validUntil : undefined,
        };
      });
      return { items, degraded: false };
    },

    async searchEntities(query: string, limit: number, options?: SearchOptions): Promise<SearchResult<RetrievedEntity>> {
      ensureOpen();
      throwIfCancelled(options?.signal);

      const entities = [...nodes.values()].filter((node) => node.labels.includes(ENTITY_LABEL));
      const ranked = rank(
        entities,
        terms(query),
        (node) => `${node.name} ${stringProperty(node.properties, 'summary')}`,
        limit,
      );

      const items = ranked.map((node): RetrievedEntity => {
        const { summary: _summary, ...attributes } = node.properties;
        return {
          uuid: node.uuid,
          name: node.name,
          summary: stringProperty(node.properties, 'summary'),
          labels: [...node.labels],
          createdAt: node.createdAt,
          attributes,
        };
      });
      return { items, degraded: false };
    },

    async getNode(uuid: string): Promise<GraphNodeRecord | null> {
      ensureOpen();
      const node = nodes.get(uuid);
      return node ? toRecord(node) : null;
    },

    async listNodes(params: ListNodesParams = {}): Promise<readonly GraphNodeRecord[]> {
      ensureOpen();
      const matching = [...nodes.values()].filter(
        (node) => params.label === undefined || node.labels.includes(params.label),
      );
      const limited = params.limit === undefined ? matching : matching.slice(0, params.limit);
      return limited.map(toRecord);
    },

    async initialize(): Promise<void> {
      ensureOpen();
    },

    async clear(): Promise<void> {
      ensureOpen();
      nodes.clear();
      edges.clear();
    },

    async getStats(): Promise<GraphStats> {
      ensureOpen();
      const labelDistribution = countBy([...nodes.values()].flatMap((node) => node.labels));
      const relationshipTypes = countBy([...edges.values()].map((edge) => edge.type));
      const linkedSources = new Set(
        [...edges.values()].filter((edge) => edge.type === CONCEPT_LINK_TYPE).map((edge) => edge.sourceId),
      );
      const nodeDegrees = degrees();
      const degreeSum = nodeDegrees.reduce((sum, node) => sum + node.degree, 0);

      return {
        totalNodes: nodes.size,
        totalRelationships: edges.size,
        labelDistribution,
        relationshipTypes,
        conceptNodes: labelDistribution[CONCEPT_LABEL] ?? 0,
        conceptLinks: relationshipTypes[CONCEPT_LINK_TYPE] ?? 0,
        hierarchyLinks: relationshipTypes[HIERARCHY_LINK_TYPE] ?? 0,
        nodesWithConcepts: linkedSources.size,
        averageDegree: nodes.size > 0 ? degreeSum / nodes.size : 0,
        isolatedNodes: nodeDegrees.filter((node) => node.degree === 0).length,
        // Array.prototype.sort is stable, so ties keep insertion order.
        mostConnected: nodeDegrees
          .filter((node) => node.degree > 0)
          .sort((a, b) => b.degree - a.degree)
          .slice(0, MOST_CONNECTED_LIMIT),
        topSemanticTypes: Object.entries(semanticTypeCounts())
          .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
          .slice(0, TOP_SEMANTIC_TYPES_LIMIT)
          .map(([semanticType, count]) => ({ semanticType, count })),
      };
    },

    async close(): Promise<void> {
      closed = true;
    },

    addEntity(seed: EntitySeed): string {
      ensureOpen();
      const uuid = randomUUID();
      nodes.set(uuid, {
        uuid,
        name: seed.name,
        labels: [ENTITY_LABEL, ...(seed.labels ?? []).filter((label) => label !== ENTITY_LABEL)],
        createdAt: new Date(),
        properties: { ...seed.attributes, summary: seed.summary },
      });
      return uuid;
    },

    addFact(seed: FactSeed): string {
      ensureOpen();
      const edge: StoredRelationship = {
        uuid: randomUUID(),
        type: FACT_LINK_TYPE,
        sourceId: seed.sourceId,
        targetId: seed.targetId,
        createdAt: new Date(),
        properties: {
          name: seed.name ?? '',
          fact: seed.fact,
          ...(seed.validFrom ? { valid_at: seed.validFrom } : {}),
          ...(seed.validUntil ? { invalid_at: seed.validUntil } : {}),
        },
      };
      edges.set(`${edge.uuid}|${FACT_LINK_TYPE}`, edge);
      return edge.uuid;
    },

    relationships(type?: GraphRelationshipType): readonly StoredRelationship[] {
      return [...edges.values()].filter((edge) => type === undefined || edge.type === type);
    },

    nodeCount(): number {
      return nodes.size;
    },
  };
}
