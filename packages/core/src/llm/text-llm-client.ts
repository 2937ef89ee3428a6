import { setTimeout as sleep } from 'node:timers/promises';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { AIMessageChunk, BaseMessage, MessageContent } from '@langchain/core/messages';
import type { GenerationConfig } from '@medgraph/schemas/src/app-config.schema.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import {
  ConfigurationError,
  LlmError,
  OperationCancelledError,
  toError,
} from '@medgraph/shared/src/utils/errors.js';

const log = createChildLogger('llm:text-client');

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_MESSAGE = /rate limit|too many requests|unavailable|bad gateway|timed? ?out|econnreset|econnrefused|socket hang up|network/i;

export const MOCK_MODEL_NAME = 'mock-text-model';

export interface TextLlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly signal?: AbortSignal;
}

export interface TextLlmResponse {
  readonly content: string;
  readonly usage?: {
    readonly inputTokens: number;
    readonly outputTokens: number;
  };
}

export interface TextLlmClient {
  readonly model: string;
  invoke(request: TextLlmRequest): Promise<TextLlmResponse>;
}

/** The slice of a LangChain chat model the client drives. */
export interface ChatInvoker {
  invoke(messages: BaseMessage[], options: { signal?: AbortSignal }): Promise<AIMessageChunk>;
}

export interface TextClientRetryOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
}

export function createMockTextClient(): TextLlmClient {
  log.info('Using mock text LLM client');

  return {
    model: MOCK_MODEL_NAME,

    invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      const question = /User Question:\n(.*)\n/.exec(request.userMessage)?.[1]?.trim();
      return Promise.resolve({
        content: question
          ? `Mock answer to "${question}" based on the supplied medical context.`
          : 'Mock answer based on the supplied medical context.',
        usage: { inputTokens: request.userMessage.length, outputTokens: 0 },
      });
    },
  };
}

function statusOf(error: Error): number | undefined {
  for (const key of ['status', 'statusCode']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') return value;
  }
  return undefined;
}

export function isRetryableLlmError(error: Error): boolean {
  const status = statusOf(error);
  if (status !== undefined) return RETRYABLE_STATUS.has(status);
  return RETRYABLE_MESSAGE.test(error.message);
}

function textOf(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

async function backoff(attempt: number, baseDelayMs: number, signal?: AbortSignal): Promise<void> {
  const delayMs = baseDelayMs * 2 ** attempt + Math.random() * baseDelayMs;
  try {
    await sleep(delayMs, undefined, { signal });
  } catch (error) {
    throw new OperationCancelledError('Text generation cancelled', toError(error));
  }
}

export function createChatTextClient(
  chat: ChatInvoker,
  model: string,
  retry: TextClientRetryOptions = {},
): TextLlmClient {
  const maxAttempts = retry.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = retry.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;

  return {
    model,

    async invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      const messages = [new SystemMessage(request.systemPrompt), new HumanMessage(request.userMessage)];
      let lastError: Error | undefined;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        if (request.signal?.aborted) {
          throw new OperationCancelledError('Text generation cancelled', lastError);
        }
        if (attempt > 0) {
          await backoff(attempt - 1, baseDelayMs, request.signal);
        }

        try {
          const response = await chat.invoke(messages, { signal: request.signal });
          const usage = response.usage_metadata;
          return {
            content: textOf(response.content).trim(),
            usage: usage ? { inputTokens: usage.input_tokens, outputTokens: usage.output_tokens } : undefined,
          };
        } catch (error) {
          lastError = toError(error);
          if (request.signal?.aborted) {
            throw new OperationCancelledError('Text generation cancelled', lastError);
          }
          if (!isRetryableLlmError(lastError)) {
            throw new LlmError(`Text generation failed: ${lastError.message}`, false, lastError);
          }
          log.warn(
            { model, attempt: attempt + 1, maxAttempts, error: lastError.message },
            'Transient text generation error',
          );
        }
      }

      throw new LlmError(
        `Text generation failed after ${String(maxAttempts)} attempts: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

async function createVertexTextClient(config: GenerationConfig): Promise<TextLlmClient> {
  if (!config.projectId) {
    throw new ConfigurationError('MEDGRAPH_GCP_PROJECT_ID is required for Vertex AI text generation');
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');
  const chat = new ChatVertexAI({
    model: config.model,
    location: config.location,
    temperature: config.temperature,
    maxOutputTokens: config.maxTokens,
    authOptions: { projectId: config.projectId },
  });

  log.info({ projectId: config.projectId, location: config.location, model: config.model }, 'Using Vertex AI text generation');
  return createChatTextClient(chat, config.model);
}

export async function createTextLlmClient(
  config: GenerationConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TextLlmClient> {
  if (env['MEDGRAPH_MOCK_LLM'] === 'true') {
    return createMockTextClient();
  }
  return createVertexTextClient(config);
}
