import type {
  EnrichmentSummary,
  GraphEnrichmentSummary,
  HierarchyExpansionSummary,
} from '@medgraph/shared/src/types/enrichment.types.js';
import type { ConceptMatcher } from '../../concepts/concept-matcher.js';
import type { ConceptResolver } from '../../concepts/concept-resolver.js';
import type { GraphStore } from '../../graph/graph-store.js';

export interface EnrichmentDeps {
  readonly conceptMatcher: ConceptMatcher;
  readonly conceptResolver: ConceptResolver;
  readonly graphStore: GraphStore;
}

export interface EnrichmentConfig {
  readonly minConfidence: number;
}

export interface EnrichOptions {
  readonly signal?: AbortSignal;
}

export interface EnrichmentEngine {
  enrich(nodeId: string, text: string, options?: EnrichOptions): Promise<EnrichmentSummary>;
  expandHierarchy(
    conceptId: string,
    depth?: number,
    options?: EnrichOptions,
  ): Promise<HierarchyExpansionSummary>;
}

export interface EnrichGraphParams {
  readonly label?: string;
  readonly limit?: number;
  readonly signal?: AbortSignal;
}

export interface GraphEnricher {
  enrichNode(uuid: string, options?: EnrichOptions): Promise<EnrichmentSummary | null>;
  enrichGraph(params?: EnrichGraphParams): Promise<GraphEnrichmentSummary>;
}
