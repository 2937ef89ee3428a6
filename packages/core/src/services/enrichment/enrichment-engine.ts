import type { ConceptRelation, Mention } from '@medgraph/shared/src/types/concept.types.js';
import type {
  EnrichmentSummary,
  HierarchyExpansionSummary,
} from '@medgraph/shared/src/types/enrichment.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { isScopeTerminatingError, toError } from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import type {
  EnrichOptions,
  EnrichmentConfig,
  EnrichmentDeps,
  EnrichmentEngine,
} from './types.js';

const log = createChildLogger('enrichment:engine');

const DEFAULT_HIERARCHY_DEPTH = 1;

/**
 * Keeps the first-seen order of concepts but the highest-confidence mention for each.
 */
function collapseByConcept(mentions: readonly Mention[]): Mention[] {
  const byConcept = new Map<string, Mention>();
  for (const mention of mentions) {
    const existing = byConcept.get(mention.conceptId);
    if (!existing || mention.confidence > existing.confidence) {
      byConcept.set(mention.conceptId, mention);
    }
  }
  return [...byConcept.values()];
}

export function createEnrichmentEngine(
  deps: EnrichmentDeps,
  config: EnrichmentConfig,
): EnrichmentEngine {
  const { conceptMatcher, conceptResolver, graphStore } = deps;

  return {
    async enrich(nodeId: string, text: string, options?: EnrichOptions): Promise<EnrichmentSummary> {
      const signal = options?.signal;
      throwIfCancelled(signal);

      const mentions = await conceptMatcher.match(text);
      if (mentions.length === 0) {
        log.debug({ nodeId }, 'No concept mentions found');
        return { nodeId, linked: 0, skipped: 0, failed: 0, conceptIds: [] };
      }

      const confident = mentions.filter((m) => m.confidence >= config.minConfidence);
      let skipped = mentions.length - confident.length;
      let linked = 0;
      let failed = 0;
      const conceptIds: string[] = [];

      for (const mention of collapseByConcept(confident)) {
        throwIfCancelled(signal);
        const { conceptId } = mention;

        try {
          const details = await conceptResolver.getDetails(conceptId, signal);
          if (!details) {
            log.debug({ nodeId, conceptId }, 'Concept details unavailable, skipping mention');
            skipped++;
            continue;
          }

          await graphStore.upsertConcept(conceptId, details);
          const isLinked = await graphStore.linkConceptToNode(nodeId, conceptId, {
            similarity: mention.confidence,
          });

          if (isLinked) {
            linked++;
            conceptIds.push(conceptId);
          } else {
            log.warn({ nodeId, conceptId }, 'Concept link was not created, node may be missing');
            failed++;
          }
        } catch (error) {
          if (isScopeTerminatingError(error)) {
            throw error;
          }
          log.error({ nodeId, conceptId, error: toError(error).message }, 'Failed to enrich mention');
          failed++;
        }
      }

      log.info({ nodeId, mentions: mentions.length, linked, skipped, failed }, 'Node enriched');
      return { nodeId, linked, skipped, failed, conceptIds };
    },

    async expandHierarchy(
      conceptId: string,
      depth: number = DEFAULT_HIERARCHY_DEPTH,
      options?: EnrichOptions,
    ): Promise<HierarchyExpansionSummary> {
      const signal = options?.signal;
      throwIfCancelled(signal);

      const visited = new Set<string>([conceptId]);
      let linked = 0;
      let skipped = 0;
      let failed = 0;

      const rootDetails = await conceptResolver.getDetails(conceptId, signal);
      if (rootDetails) {
        await graphStore.upsertConcept(conceptId, rootDetails);
      } else {
        log.debug({ conceptId }, 'Root concept details unavailable');
      }

      let frontier = [conceptId];
      for (let level = 0; level < depth && frontier.length > 0; level++) {
        const next: string[] = [];

        for (const current of frontier) {
          throwIfCancelled(signal);
          let relations: readonly ConceptRelation[];
          try {
            relations = await conceptResolver.getRelations(current, signal);
          } catch (error) {
            if (isScopeTerminatingError(error)) {
              throw error;
            }
            log.error(
              { conceptId: current, error: toError(error).message },
              'Failed to load concept relations',
            );
            failed++;
            continue;
          }

          for (const relation of relations) {
            const relatedId = relation.targetConceptId;
            try {
              const relatedDetails = await conceptResolver.getDetails(relatedId, signal);
              if (!relatedDetails) {
                skipped++;
                continue;
              }

              if (!visited.has(relatedId)) {
                visited.add(relatedId);
                await graphStore.upsertConcept(relatedId, relatedDetails);
                next.push(relatedId);
              }

              const [parent, child] =
                relation.kind === 'BROADER' ? [relatedId, current] : [current, relatedId];
              if (await graphStore.linkConceptHierarchy(parent, child)) {
                linked++;
              } else {
                skipped++;
              }
            } catch (error) {
              if (isScopeTerminatingError(error)) {
                throw error;
              }
              log.error(
                { conceptId: current, relatedId, error: toError(error).message },
                'Failed to link related concept',
              );
              failed++;
            }
          }
        }

        frontier = next;
      }

      log.info(
        { conceptId, depth, visited: visited.size, linked, skipped, failed },
        'Concept hierarchy expanded',
      );
      return { rootConceptId: conceptId, visited: [...visited], linked, skipped, failed };
    },
  };
}
