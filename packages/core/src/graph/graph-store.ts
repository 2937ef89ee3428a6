import { v5 as uuidv5 } from 'uuid';
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

const log = createChildLogger('graph:store');

const CONCEPT_NAMESPACE = '6f1c2f8e-3b0a-4d7e-9c41-2a8b7e4d1f03';

export const CONCEPT_LABEL = 'Concept';
export const DOCUMENT_LABEL = 'Episodic';
export const CONCEPT_LINK_TYPE = 'HAS_CONCEPT';
export const HIERARCHY_LINK_TYPE = 'BROADER_THAN';
export const FACT_LINK_TYPE = 'RELATES_TO';

export const MOST_CONNECTED_LIMIT = 5;
export const TOP_SEMANTIC_TYPES_LIMIT = 10;

export type GraphRelationshipType =
  | typeof CONCEPT_LINK_TYPE
  | typeof HIERARCHY_LINK_TYPE
  | typeof FACT_LINK_TYPE;

export interface SearchOptions {
  readonly signal?: AbortSignal;
}

export interface ListNodesParams {
  readonly label?: string;
  readonly limit?: number;
}

export interface GraphStore {
  readonly closed: boolean;
  upsertDocument(input: DocumentInput): Promise<string>;
  upsertConcept(conceptId: string, details: ConceptDetails): Promise<string>;
  linkConceptToNode(nodeId: string, conceptId: string, props?: ConceptLinkProps): Promise<boolean>;
  linkConceptHierarchy(parentConceptId: string, childConceptId: string): Promise<boolean>;
  searchFacts(
    query: string,
    limit: number,
    options?: SearchOptions,
  ): Promise<SearchResult<RetrievedFact>>;
  searchEntities(
    query: string,
    limit: number,
    options?: SearchOptions,
  ): Promise<SearchResult<RetrievedEntity>>;
  getNode(uuid: string): Promise<GraphNodeRecord | null>;
  listNodes(params?: ListNodesParams): Promise<readonly GraphNodeRecord[]>;
  initialize(): Promise<void>;
  clear(): Promise<void>;
  getStats(): Promise<GraphStats>;
  close(): Promise<void>;
}

/** Concept node identity is a pure function of the concept identifier. */
export function conceptNodeId(conceptId: string): string {
  return uuidv5(conceptId, CONCEPT_NAMESPACE);
}

export function conceptNodeName(conceptId: string): string {
  return `UMLS_${conceptId}`;
}

export function describeConcept(details: ConceptDetails): string {
  return [
    `UMLS Concept: ${details.canonicalName}`,
    `CUI: ${details.conceptId}`,
    `Semantic Types: ${details.semanticCategories.join(', ')}`,
    `Definitions: ${details.definitions.join('\n')}`,
  ].join('\n');
}

/**
 * Opens a store for one session and releases it on every exit path.
 */
export async function withGraphStore<T>(
  open: () => Promise<GraphStore>,
  fn: (store: GraphStore) => Promise<T>,
): Promise<T> {
  const store = await open();
  try {
    return await fn(store);
  } finally {
    try {
      await store.close();
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to close graph store',
      );
    }
  }
}
