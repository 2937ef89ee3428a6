import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type {
  CachedConceptDetails,
  ConceptDetails,
} from '@medgraph/shared/src/types/concept.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { CONCEPT_CACHE_TTL_MS } from '../repositories/concept-cache.repository.js';
import type { ConceptCacheRepository } from '../repositories/concept-cache.repository.js';

const log = createChildLogger('firestore:concept-cache');

const COLLECTION = 'concept-cache';

interface ConceptCacheDocument {
  conceptId: string;
  canonicalName: string;
  semanticCategories: string[];
  definitions: string[];
  cachedAt: Timestamp;
  expiresAt: Timestamp;
}

function fromDoc(data: ConceptCacheDocument): CachedConceptDetails {
  return {
    details: {
      conceptId: data.conceptId,
      canonicalName: data.canonicalName,
      semanticCategories: data.semanticCategories,
      definitions: data.definitions,
    },
    cachedAt: data.cachedAt.toDate(),
    expiresAt: data.expiresAt.toDate(),
  };
}

export function createFirestoreConceptCacheRepository(
  db: Firestore,
  ttlMs: number = CONCEPT_CACHE_TTL_MS,
): ConceptCacheRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async get(conceptId: string): Promise<CachedConceptDetails | null> {
      const doc = await collectionRef.doc(conceptId).get();

      if (!doc.exists) {
        return null;
      }

      const result = fromDoc(doc.data() as ConceptCacheDocument);

      if (result.expiresAt.getTime() < Date.now()) {
        log.debug({ conceptId }, 'Concept cache entry expired');
        return null;
      }

      return result;
    },

    async set(details: ConceptDetails): Promise<void> {
      const now = Timestamp.now();

      const docData: ConceptCacheDocument = {
        conceptId: details.conceptId,
        canonicalName: details.canonicalName,
        semanticCategories: [...details.semanticCategories],
        definitions: [...details.definitions],
        cachedAt: now,
        expiresAt: Timestamp.fromMillis(now.toMillis() + ttlMs),
      };

      await collectionRef.doc(details.conceptId).set(docData);
    },
  };
}
