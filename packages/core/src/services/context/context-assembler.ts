import type { EnrichedConcept, Mention } from '@medgraph/shared/src/types/concept.types.js';
import type { ContextDegradation, RAGContext } from '@medgraph/shared/src/types/context.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import {
  AuthenticationError,
  isScopeTerminatingError,
  toError,
} from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import type { ConceptMatcher } from '../../concepts/concept-matcher.js';
import type { ConceptKnowledgeClient } from '../../concepts/concept-knowledge-client.js';
import { createConceptResolver } from '../../concepts/concept-resolver.js';
import type { ConceptCacheRepository } from '../../repositories/concept-cache.repository.js';
import type { GraphStore } from '../../graph/graph-store.js';
import { formatEntity, formatFact, renderContext } from './formatters.js';

const log = createChildLogger('context:assembler');

export interface ContextAssemblerDeps {
  readonly graphStore: GraphStore;
  readonly conceptMatcher: ConceptMatcher;
  readonly knowledgeClient: ConceptKnowledgeClient;
  readonly conceptCache?: ConceptCacheRepository;
}

export interface ContextAssemblerConfig {
  readonly minConfidence: number;
  readonly maxFacts: number;
  readonly maxEntities: number;
}

export interface BuildContextOptions {
  readonly includeConcepts?: boolean;
  readonly maxFacts?: number;
  readonly maxEntities?: number;
  readonly signal?: AbortSignal;
}

export interface ContextAssembler {
  buildContext(query: string, options?: BuildContextOptions): Promise<RAGContext>;
}

interface ConceptAnnotation {
  readonly concepts: EnrichedConcept[];
  readonly authFailed: boolean;
}

function firstRejection(results: readonly PromiseSettledResult<unknown>[]): unknown {
  for (const result of results) {
    if (result.status === 'rejected') return result.reason;
  }
  return undefined;
}

export function createContextAssembler(
  deps: ContextAssemblerDeps,
  config: ContextAssemblerConfig,
): ContextAssembler {
  async function annotateConcepts(query: string, signal: AbortSignal | undefined): Promise<ConceptAnnotation> {
    const resolver = createConceptResolver({
      knowledgeClient: deps.knowledgeClient,
      conceptCache: deps.conceptCache,
    });
    const mentions = await deps.conceptMatcher.match(query);

    const seen = new Set<string>();
    const candidates: Mention[] = [];
    for (const mention of mentions) {
      if (mention.confidence < config.minConfidence || seen.has(mention.conceptId)) continue;
      seen.add(mention.conceptId);
      candidates.push(mention);
    }

    const concepts: EnrichedConcept[] = [];
    for (const mention of candidates) {
      throwIfCancelled(signal);
      try {
        const details = await resolver.getDetails(mention.conceptId, signal);
        if (details) {
          concepts.push({ mention, details });
        }
      } catch (error) {
        if (error instanceof AuthenticationError) {
          log.error(
            { conceptId: mention.conceptId, error: error.message },
            'Concept annotation stopped after authentication failure',
          );
          return { concepts, authFailed: true };
        }
        if (isScopeTerminatingError(error)) {
          throw error;
        }
        log.warn(
          { conceptId: mention.conceptId, error: toError(error).message },
          'Concept annotation failed for mention',
        );
      }
    }

    return { concepts, authFailed: false };
  }

  return {
    async buildContext(query: string, options: BuildContextOptions = {}): Promise<RAGContext> {
      const { signal } = options;
      const includeConcepts = options.includeConcepts ?? true;
      const maxFacts = options.maxFacts ?? config.maxFacts;
      const maxEntities = options.maxEntities ?? config.maxEntities;
      throwIfCancelled(signal);

      log.info({ queryLength: query.length, maxFacts, maxEntities, includeConcepts }, 'Building context');

      const [factsResult, entitiesResult] = await Promise.allSettled([
        deps.graphStore.searchFacts(query, maxFacts, { signal }),
        deps.graphStore.searchEntities(query, maxEntities, { signal }),
      ]);
      if (factsResult.status === 'rejected' || entitiesResult.status === 'rejected') {
        throw toError(firstRejection([factsResult, entitiesResult]));
      }

      const degradations: ContextDegradation[] = [];
      if (factsResult.value.degraded) degradations.push('facts_search');
      if (entitiesResult.value.degraded) degradations.push('entities_search');

      const facts = factsResult.value.items.map(formatFact);
      const entitySummaries = entitiesResult.value.items.map(formatEntity);

      let concepts: EnrichedConcept[] = [];
      if (includeConcepts) {
        const annotation = await annotateConcepts(query, signal);
        concepts = annotation.concepts;
        if (annotation.authFailed) degradations.push('concepts_auth');
      }

      throwIfCancelled(signal);

      const context: RAGContext = Object.freeze({
        query,
        facts: Object.freeze(facts),
        entitySummaries: Object.freeze(entitySummaries),
        concepts: Object.freeze(concepts),
        renderedText: renderContext({ facts, entitySummaries, concepts }),
        degradations: Object.freeze(degradations),
      });

      log.info(
        {
          facts: facts.length,
          entities: entitySummaries.length,
          concepts: concepts.length,
          degradations,
        },
        'Context assembled',
      );
      return context;
    },
  };
}
