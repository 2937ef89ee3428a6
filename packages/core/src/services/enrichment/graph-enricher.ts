import type { GraphNodeRecord } from '@medgraph/shared/src/types/graph.types.js';
import type {
  EnrichmentSummary,
  GraphEnrichmentSummary,
} from '@medgraph/shared/src/types/enrichment.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { isScopeTerminatingError, toError } from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import { CONCEPT_LABEL } from '../../graph/graph-store.js';
import { createEnrichmentEngine } from './enrichment-engine.js';
import type {
  EnrichGraphParams,
  EnrichOptions,
  EnrichmentConfig,
  EnrichmentDeps,
  GraphEnricher,
} from './types.js';

const log = createChildLogger('enrichment:graph');

const TEXT_FIELDS = ['summary', 'content', 'episode_body', 'description', 'text'] as const;
const MIN_FALLBACK_VALUE_LENGTH = 50;

/**
 * Picks the first populated text field; otherwise joins the node name with any long
 * string attributes.
 */
export function extractNodeText(node: GraphNodeRecord): string {
  for (const field of TEXT_FIELDS) {
    const value = node.properties[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }

  const parts = node.name ? [node.name] : [];
  for (const value of Object.values(node.properties)) {
    if (typeof value === 'string' && value.length > MIN_FALLBACK_VALUE_LENGTH) {
      parts.push(value);
    }
  }
  return parts.join(' ');
}

/**
 * Enriches stored nodes in batch. One instance shares its concept resolver across every
 * node it touches, so lookups are deduplicated for the whole run.
 */
export function createGraphEnricher(deps: EnrichmentDeps, config: EnrichmentConfig): GraphEnricher {
  const engine = createEnrichmentEngine(deps, config);

  async function enrichRecord(node: GraphNodeRecord, options?: EnrichOptions): Promise<EnrichmentSummary> {
    const text = extractNodeText(node);
    if (text.length === 0) {
      log.debug({ nodeId: node.uuid }, 'Node has no text to enrich');
      return { nodeId: node.uuid, linked: 0, skipped: 0, failed: 0, conceptIds: [] };
    }
    return engine.enrich(node.uuid, text, options);
  }

  return {
    async enrichNode(uuid: string, options?: EnrichOptions): Promise<EnrichmentSummary | null> {
      const node = await deps.graphStore.getNode(uuid);
      if (!node) {
        log.warn({ nodeId: uuid }, 'Node not found, nothing to enrich');
        return null;
      }
      return enrichRecord(node, options);
    },

    async enrichGraph(params: EnrichGraphParams = {}): Promise<GraphEnrichmentSummary> {
      const { label, limit, signal } = params;
      const nodes = await deps.graphStore.listNodes({ label, limit });
      log.info({ label, limit, nodes: nodes.length }, 'Starting graph enrichment');

      let processed = 0;
      let enriched = 0;
      let linked = 0;
      let skipped = 0;
      let failed = 0;

      for (const node of nodes) {
        throwIfCancelled(signal);
        if (node.labels.includes(CONCEPT_LABEL)) continue;

        processed++;
        try {
          const summary = await enrichRecord(node, { signal });
          if (summary.linked > 0) enriched++;
          linked += summary.linked;
          skipped += summary.skipped;
          failed += summary.failed;
        } catch (error) {
          if (isScopeTerminatingError(error)) {
            throw error;
          }
          log.error({ nodeId: node.uuid, error: toError(error).message }, 'Failed to enrich node');
          failed++;
        }
      }

      log.info({ processed, enriched, linked, skipped, failed }, 'Graph enrichment complete');
      return { processed, enriched, linked, skipped, failed };
    },
  };
}
