import type {
  CachedConceptDetails,
  ConceptDetails,
} from '@medgraph/shared/src/types/concept.types.js';
import { CONCEPT_CACHE_TTL_MS } from './concept-cache.repository.js';
import type { ConceptCacheRepository } from './concept-cache.repository.js';

export function createInMemoryConceptCacheRepository(
  ttlMs: number = CONCEPT_CACHE_TTL_MS,
): ConceptCacheRepository {
  const cache = new Map<string, CachedConceptDetails>();

  return {
    get(conceptId: string): Promise<CachedConceptDetails | null> {
      const entry = cache.get(conceptId);

      if (!entry) {
        return Promise.resolve(null);
      }

      if (entry.expiresAt.getTime() < Date.now()) {
        cache.delete(conceptId);
        return Promise.resolve(null);
      }

      return Promise.resolve(entry);
    },

    set(details: ConceptDetails): Promise<void> {
      const now = new Date();
      cache.set(details.conceptId, {
        details,
        cachedAt: now,
        expiresAt: new Date(now.getTime() + ttlMs),
      });
      return Promise.resolve();
    },
  };
}
