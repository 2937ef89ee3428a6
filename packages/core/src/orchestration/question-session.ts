import type { AnswerResult } from '@medgraph/shared/src/types/context.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { isScopeTerminatingError, toError } from '@medgraph/shared/src/utils/errors.js';
import type { AnswerPipeline } from './answer-pipeline.js';

const log = createChildLogger('orchestration:question-session');

const EXIT_KEYWORDS = ['quit', 'exit'];
const YES_ANSWERS = ['y', 'yes'];

export const QUESTION_PROMPT = 'Enter your medical question: ';
export const METADATA_PROMPT = 'Show metadata? (y/n): ';

/**
 * Reads one line of user input. Resolves `undefined` once the input is closed.
 */
export interface LinePrompter {
  ask(prompt: string): Promise<string | undefined>;
}

export interface QuestionSessionDeps {
  readonly pipeline: AnswerPipeline;
  readonly prompter: LinePrompter;
  readonly write: (line: string) => void;
}

export interface QuestionSessionOptions {
  readonly includeConcepts?: boolean;
}

export interface QuestionSessionSummary {
  readonly answered: number;
  readonly failed: number;
}

export function formatAnswer(result: AnswerResult): string[] {
  const lines = ['--- Answer ---', result.answer];
  if (result.context.facts.length > 0) {
    lines.push('', '--- Sample facts ---', ...result.context.facts.map((fact) => `  - ${fact}`));
  }
  if (result.context.concepts.length > 0) {
    lines.push('', `  Concepts: ${result.context.concepts.join(', ')}`);
  }
  return lines;
}

export function formatAnswerMetadata(result: AnswerResult): string[] {
  const { metadata } = result;
  return [
    '--- Metadata ---',
    `  Model: ${metadata.model}`,
    `  Facts: ${String(metadata.numFacts)}`,
    `  Entities: ${String(metadata.numEntities)}`,
    `  Concepts: ${String(metadata.numConcepts)}`,
    `  Fallback: ${metadata.fallback ? 'yes' : 'no'}`,
  ];
}

export async function runQuestionSession(
  deps: QuestionSessionDeps,
  options: QuestionSessionOptions = {},
): Promise<QuestionSessionSummary> {
  const { pipeline, prompter, write } = deps;
  let answered = 0;
  let failed = 0;

  for (;;) {
    const input = await prompter.ask(QUESTION_PROMPT);
    if (input === undefined) break;

    const question = input.trim();
    if (EXIT_KEYWORDS.includes(question.toLowerCase())) break;
    if (question.length === 0) {
      write('Please enter a valid question.');
      continue;
    }

    write('Processing your question...');
    try {
      const result = await pipeline.answer(question, { includeConcepts: options.includeConcepts });
      answered++;
      write('');
      for (const line of formatAnswer(result)) write(line);

      const showMetadata = await prompter.ask(METADATA_PROMPT);
      if (showMetadata === undefined) break;
      if (YES_ANSWERS.includes(showMetadata.trim().toLowerCase())) {
        for (const line of formatAnswerMetadata(result)) write(line);
      }
    } catch (error) {
      if (isScopeTerminatingError(error)) {
        throw error;
      }
      failed++;
      const message = toError(error).message;
      log.error({ question: question.slice(0, 100), error: message }, 'Question failed');
      write(`Error: ${message}`);
    }
  }

  log.info({ answered, failed }, 'Question session ended');
  return { answered, failed };
}
