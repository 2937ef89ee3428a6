import { StateGraph, START, END } from '@langchain/langgraph';
import type { AnswerResult, RAGContext } from '@medgraph/shared/src/types/context.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { toError } from '@medgraph/shared/src/utils/errors.js';
import type { ContextAssembler } from '../services/context/context-assembler.js';
import type { TextLlmClient } from '../llm/text-llm-client.js';
import { AnswerGraphAnnotation, type AnswerGraphState } from './pipeline-state.js';
import { ANSWER_SYSTEM_PROMPT, FALLBACK_ANSWER, buildAnswerPrompt } from './answer-prompt.js';

const log = createChildLogger('orchestration:answer-pipeline');

const SAMPLE_SIZE = 3;

export interface AnswerPipelineDeps {
  readonly contextAssembler: ContextAssembler;
  readonly textLlmClient: TextLlmClient;
}

export interface AnswerOptions {
  readonly includeConcepts?: boolean;
  readonly maxFacts?: number;
  readonly maxEntities?: number;
  readonly signal?: AbortSignal;
}

export interface AnswerPipeline {
  answer(query: string, options?: AnswerOptions): Promise<AnswerResult>;
}

function routeAfterRetrieve(state: AnswerGraphState): string {
  return state.context ? 'generate' : '__end__';
}

export function createAnswerPipeline(deps: AnswerPipelineDeps): AnswerPipeline {
  const { contextAssembler, textLlmClient } = deps;

  function fallbackResult(query: string): AnswerResult {
    return {
      answer: FALLBACK_ANSWER,
      query,
      metadata: { numFacts: 0, numEntities: 0, numConcepts: 0, model: textLlmClient.model, fallback: true },
      context: { facts: [], concepts: [] },
    };
  }

  function toResult(query: string, context: RAGContext, answer: string, fallback: boolean): AnswerResult {
    return {
      answer,
      query,
      metadata: {
        numFacts: context.facts.length,
        numEntities: context.entitySummaries.length,
        numConcepts: context.concepts.length,
        model: textLlmClient.model,
        fallback,
      },
      context: {
        facts: context.facts.slice(0, SAMPLE_SIZE),
        concepts: context.concepts.slice(0, SAMPLE_SIZE).map((c) => c.mention.surfaceForm),
      },
    };
  }

  async function retrieveNode(state: AnswerGraphState): Promise<Partial<AnswerGraphState>> {
    try {
      const context = await contextAssembler.buildContext(state.query, {
        includeConcepts: state.includeConcepts,
        maxFacts: state.maxFacts,
        maxEntities: state.maxEntities,
        signal: state.signal,
      });
      return { context };
    } catch (error) {
      log.error({ error: toError(error).message }, 'Context retrieval failed');
      return { context: undefined, fallback: true };
    }
  }

  async function generateNode(state: AnswerGraphState): Promise<Partial<AnswerGraphState>> {
    if (!state.context) {
      return { answer: FALLBACK_ANSWER, fallback: true };
    }

    log.info({ facts: state.context.facts.length }, 'Generating answer');
    try {
      const response = await textLlmClient.invoke({
        systemPrompt: ANSWER_SYSTEM_PROMPT,
        userMessage: buildAnswerPrompt(state.context),
        signal: state.signal,
      });
      return { answer: response.content, fallback: false };
    } catch (error) {
      log.error({ error: toError(error).message }, 'Answer generation failed');
      return { answer: FALLBACK_ANSWER, fallback: true };
    }
  }

  const graph = new StateGraph(AnswerGraphAnnotation)
    .addNode('retrieve', retrieveNode)
    .addNode('generate', generateNode)
    .addEdge(START, 'retrieve')
    .addConditionalEdges('retrieve', routeAfterRetrieve, {
      generate: 'generate',
      __end__: END,
    })
    .addEdge('generate', END)
    .compile();

  return {
    async answer(query: string, options: AnswerOptions = {}): Promise<AnswerResult> {
      log.info({ query: query.slice(0, 100) }, 'Processing question');

      try {
        const result = await graph.invoke({
          query,
          includeConcepts: options.includeConcepts ?? true,
          maxFacts: options.maxFacts,
          maxEntities: options.maxEntities,
          signal: options.signal,
          context: undefined,
          answer: undefined,
          fallback: false,
        });

        if (!result.context || result.answer === undefined) {
          return fallbackResult(query);
        }

        log.info({ fallback: result.fallback }, 'Answer pipeline complete');
        return toResult(query, result.context, result.answer, result.fallback);
      } catch (error) {
        log.error({ error: toError(error).message }, 'Answer pipeline failed');
        return fallbackResult(query);
      }
    },
  };
}
