import { describe, it, expect, vi } from 'vitest';
import { createConceptResolver } from './concept-resolver.js';
import type { ConceptKnowledgeClient } from './concept-knowledge-client.js';
import { createInMemoryConceptCacheRepository } from '../repositories/in-memory-concept-cache.repository.js';
import type { ConceptDetails } from '@medgraph/shared/src/types/concept.types.js';
import { AuthenticationError } from '@medgraph/shared/src/utils/errors.js';

const hypertension: ConceptDetails = {
  conceptId: 'C0020538',
  canonicalName: 'Hypertensive disease',
  semanticCategories: ['Disease or Syndrome'],
  definitions: [],
};

function createClient(overrides: Partial<ConceptKnowledgeClient> = {}): ConceptKnowledgeClient {
  return {
    available: true,
    getDetails: vi.fn().mockResolvedValue(hypertension),
    getRelations: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}

describe('ConceptResolver', () => {
  it('should fetch each concept at most once, including concurrent requests', async () => {
    const knowledgeClient = createClient();
    const resolver = createConceptResolver({ knowledgeClient });

    const [first, second] = await Promise.all([
      resolver.getDetails('C0020538'),
      resolver.getDetails('C0020538'),
    ]);
    const third = await resolver.getDetails('C0020538');

    expect(first).toEqual(hypertension);
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(knowledgeClient.getDetails).toHaveBeenCalledTimes(1);
  });

  it('should memoize relations separately from details', async () => {
    const knowledgeClient = createClient();
    const resolver = createConceptResolver({ knowledgeClient });

    await resolver.getRelations('C0020538');
    await resolver.getRelations('C0020538');
    await resolver.getDetails('C0020538');

    expect(knowledgeClient.getRelations).toHaveBeenCalledTimes(1);
    expect(knowledgeClient.getDetails).toHaveBeenCalledTimes(1);
  });

  it('should serve cached details without a remote call', async () => {
    const conceptCache = createInMemoryConceptCacheRepository();
    await conceptCache.set(hypertension);
    const knowledgeClient = createClient();
    const resolver = createConceptResolver({ knowledgeClient, conceptCache });

    expect(await resolver.getDetails('C0020538')).toEqual(hypertension);
    expect(knowledgeClient.getDetails).not.toHaveBeenCalled();
  });

  it('should write fetched details to the cache', async () => {
    const conceptCache = createInMemoryConceptCacheRepository();
    const resolver = createConceptResolver({ knowledgeClient: createClient(), conceptCache });

    await resolver.getDetails('C0020538');

    expect((await conceptCache.get('C0020538'))?.details).toEqual(hypertension);
  });

  it('should keep resolving when the cache fails', async () => {
    const knowledgeClient = createClient();
    const resolver = createConceptResolver({
      knowledgeClient,
      conceptCache: {
        get: vi.fn().mockRejectedValue(new Error('cache offline')),
        set: vi.fn().mockRejectedValue(new Error('cache offline')),
      },
    });

    expect(await resolver.getDetails('C0020538')).toEqual(hypertension);
  });

  it('should stop all lookups after an authentication failure', async () => {
    const knowledgeClient = createClient({
      getDetails: vi.fn().mockRejectedValue(new AuthenticationError('rejected')),
    });
    const resolver = createConceptResolver({ knowledgeClient });

    await expect(resolver.getDetails('C0020538')).rejects.toBeInstanceOf(AuthenticationError);
    await expect(resolver.getDetails('C0011849')).rejects.toBeInstanceOf(AuthenticationError);
    await expect(resolver.getRelations('C0011849')).rejects.toBeInstanceOf(AuthenticationError);

    expect(knowledgeClient.getDetails).toHaveBeenCalledTimes(1);
    expect(knowledgeClient.getRelations).not.toHaveBeenCalled();
  });
});
