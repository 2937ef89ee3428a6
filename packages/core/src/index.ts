export * from './concepts/lexicon-match-engine.js';
export * from './concepts/concept-matcher.js';
export * from './concepts/concept-knowledge-client.js';
export * from './concepts/concept-resolver.js';
export * from './repositories/concept-cache.repository.js';
export * from './repositories/in-memory-concept-cache.repository.js';
export * from './graph/graph-store.js';
export * from './graph/in-memory-graph-store.js';
export * from './infrastructure/neo4j-client.js';
export * from './infrastructure/neo4j-graph-store.js';
export * from './infrastructure/firestore-client.js';
export * from './infrastructure/firestore-concept-cache.repository.js';
export * from './services/enrichment/enrichment-engine.js';
export * from './services/enrichment/graph-enricher.js';
export type * from './services/enrichment/types.js';
export * from './services/context/formatters.js';
export * from './services/context/context-assembler.js';
export * from './services/graph-stats/graph-stats.js';
export * from './llm/text-llm-client.js';
export * from './orchestration/answer-prompt.js';
export * from './orchestration/answer-pipeline.js';
export * from './orchestration/question-session.js';
