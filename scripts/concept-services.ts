import type { AppConfig } from '@medgraph/schemas';
import {
  createConceptKnowledgeClient,
  createConceptMatcher,
  createFirestoreClient,
  createFirestoreConceptCacheRepository,
  createInMemoryConceptCacheRepository,
  loadLexiconMatchEngine,
} from '@medgraph/core';
import type { ConceptCacheRepository, ConceptKnowledgeClient, ConceptMatcher } from '@medgraph/core';

export interface ConceptServices {
  readonly conceptMatcher: ConceptMatcher;
  readonly knowledgeClient: ConceptKnowledgeClient;
  readonly conceptCache?: ConceptCacheRepository;
}

function createConceptCache(config: AppConfig): ConceptCacheRepository | undefined {
  switch (config.conceptCache) {
    case 'firestore':
      return createFirestoreConceptCacheRepository(createFirestoreClient(config.generation.projectId));
    case 'memory':
      return createInMemoryConceptCacheRepository();
    case 'none':
      return undefined;
  }
}

export async function createConceptServices(config: AppConfig): Promise<ConceptServices> {
  const engine = config.concepts.lexiconPath
    ? await loadLexiconMatchEngine(config.concepts.lexiconPath, {
        minSimilarity: config.concepts.matcherSimilarity,
        maxNgramTokens: config.concepts.maxNgramTokens,
      })
    : undefined;

  return {
    conceptMatcher: createConceptMatcher(engine),
    knowledgeClient: createConceptKnowledgeClient(config.knowledge),
    conceptCache: createConceptCache(config),
  };
}

export function describeConceptServices(config: AppConfig, services: ConceptServices): string[] {
  return [
    `Concept lexicon: ${config.concepts.lexiconPath ?? 'not configured (concept matching disabled)'}`,
    `Knowledge service: ${services.knowledgeClient.available ? config.knowledge.baseUrl : 'no API key (lookups disabled)'}`,
    `Concept cache: ${config.conceptCache}`,
  ];
}
