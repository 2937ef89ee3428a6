import type { EnrichedConcept } from './concept.types.js';

export type ContextDegradation = 'facts_search' | 'entities_search' | 'concepts_auth';

export interface RAGContext {
  readonly query: string;
  readonly facts: readonly string[];
  readonly entitySummaries: readonly string[];
  readonly concepts: readonly EnrichedConcept[];
  readonly renderedText: string;
  readonly degradations: readonly ContextDegradation[];
}

export interface AnswerMetadata {
  readonly numFacts: number;
  readonly numEntities: number;
  readonly numConcepts: number;
  readonly model: string;
  readonly fallback: boolean;
}

export interface AnswerResult {
  readonly answer: string;
  readonly query: string;
  readonly metadata: AnswerMetadata;
  readonly context: {
    readonly facts: readonly string[];
    readonly concepts: readonly string[];
  };
}
