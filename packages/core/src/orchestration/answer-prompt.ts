import type { RAGContext } from '@medgraph/shared/src/types/context.types.js';

export const ANSWER_SYSTEM_PROMPT = 'You are a helpful biomedical expert assistant.';

export const FALLBACK_ANSWER =
  'I apologize, but I encountered an error while generating the answer. Please try again.';

export function buildAnswerPrompt(context: Pick<RAGContext, 'query' | 'renderedText'>): string {
  return `You are answering a medical question based on a knowledge graph of PubMed literature and UMLS medical terminology.

Use the provided facts, entity summaries, and medical term definitions as the primary evidence for your answer.
Cite specific facts when possible and ensure medical accuracy.

User Question:
${context.query}

${context.renderedText}

Please provide a comprehensive answer that:
1. Directly addresses the user's question
2. Uses the provided facts as supporting evidence
3. Incorporates relevant medical terminology accurately
4. Is clear and accessible to medical professionals

Answer:`;
}
