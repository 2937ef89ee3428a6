import type {
  CachedConceptDetails,
  ConceptDetails,
} from '@medgraph/shared/src/types/concept.types.js';

export const CONCEPT_CACHE_TTL_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

export interface ConceptCacheRepository {
  get(conceptId: string): Promise<CachedConceptDetails | null>;
  set(details: ConceptDetails): Promise<void>;
}
