import type {
  ConceptDetails,
  ConceptRelation,
} from '@medgraph/shared/src/types/concept.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { AuthenticationError, toError } from '@medgraph/shared/src/utils/errors.js';
import type { ConceptKnowledgeClient } from './concept-knowledge-client.js';
import type { ConceptCacheRepository } from '../repositories/concept-cache.repository.js';

const log = createChildLogger('concepts:resolver');

export interface ConceptResolverDeps {
  readonly knowledgeClient: ConceptKnowledgeClient;
  readonly conceptCache?: ConceptCacheRepository;
}

/**
 * Batch-scoped view of the knowledge service. Each conceptId is fetched at most once per
 * resolver, and the first authentication failure short-circuits every later call.
 */
export interface ConceptResolver {
  getDetails(conceptId: string, signal?: AbortSignal): Promise<ConceptDetails | null>;
  getRelations(conceptId: string, signal?: AbortSignal): Promise<readonly ConceptRelation[]>;
}

export function createConceptResolver(deps: ConceptResolverDeps): ConceptResolver {
  const details = new Map<string, Promise<ConceptDetails | null>>();
  const relations = new Map<string, Promise<readonly ConceptRelation[]>>();
  let authFailure: AuthenticationError | undefined;

  function latch<T>(pending: Promise<T>): Promise<T> {
    return pending.catch((error: unknown) => {
      if (error instanceof AuthenticationError && !authFailure) {
        authFailure = error;
        log.error('Authentication failed, no further concept lookups in this batch');
      }
      throw error;
    });
  }

  async function readCache(conceptId: string): Promise<ConceptDetails | null> {
    if (!deps.conceptCache) return null;
    try {
      const cached = await deps.conceptCache.get(conceptId);
      return cached?.details ?? null;
    } catch (error) {
      log.warn({ conceptId, error: toError(error).message }, 'Concept cache read failed');
      return null;
    }
  }

  async function writeCache(value: ConceptDetails): Promise<void> {
    if (!deps.conceptCache) return;
    try {
      await deps.conceptCache.set(value);
    } catch (error) {
      log.warn({ conceptId: value.conceptId, error: toError(error).message }, 'Concept cache write failed');
    }
  }

  async function loadDetails(conceptId: string, signal?: AbortSignal): Promise<ConceptDetails | null> {
    const cached = await readCache(conceptId);
    if (cached) {
      log.debug({ conceptId }, 'Concept cache hit');
      return cached;
    }

    const fetched = await deps.knowledgeClient.getDetails(conceptId, { signal });
    if (fetched) {
      await writeCache(fetched);
    }
    return fetched;
  }

  return {
    getDetails(conceptId: string, signal?: AbortSignal): Promise<ConceptDetails | null> {
      if (authFailure) return Promise.reject(authFailure);

      let pending = details.get(conceptId);
      if (!pending) {
        pending = latch(loadDetails(conceptId, signal));
        details.set(conceptId, pending);
      }
      return pending;
    },

    getRelations(conceptId: string, signal?: AbortSignal): Promise<readonly ConceptRelation[]> {
      if (authFailure) return Promise.reject(authFailure);

      let pending = relations.get(conceptId);
      if (!pending) {
        pending = latch(deps.knowledgeClient.getRelations(conceptId, { signal }));
        relations.set(conceptId, pending);
      }
      return pending;
    },
  };
}
