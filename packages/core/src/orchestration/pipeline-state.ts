import { Annotation } from '@langchain/langgraph';
import type { RAGContext } from '@medgraph/shared/src/types/context.types.js';

export const AnswerGraphAnnotation = Annotation.Root({
  query: Annotation<string>,
  includeConcepts: Annotation<boolean>,
  maxFacts: Annotation<number | undefined>,
  maxEntities: Annotation<number | undefined>,
  signal: Annotation<AbortSignal | undefined>,
  context: Annotation<RAGContext | undefined>,
  answer: Annotation<string | undefined>,
  fallback: Annotation<boolean>,
});

export type AnswerGraphState = typeof AnswerGraphAnnotation.State;
