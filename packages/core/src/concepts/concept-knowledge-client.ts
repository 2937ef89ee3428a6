import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type {
  ConceptDetails,
  ConceptRelation,
  ConceptRelationKind,
} from '@medgraph/shared/src/types/concept.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import {
  AuthenticationError,
  CapabilityUnavailableError,
  OperationCancelledError,
  TransientRemoteError,
  toError,
} from '@medgraph/shared/src/utils/errors.js';
import { withTimeout } from '@medgraph/shared/src/utils/cancellation.js';

const log = createChildLogger('concepts:knowledge-client');

const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_BASE_DELAY_MS = 500;
const CONCEPT_ID_PATTERN = /^C\d{7}$/;
const RELATED_CUI_PATTERN = /\/CUI\/(C\d{7})$/;

const HIERARCHY_RELATION_CODES: Readonly<Record<string, ConceptRelationKind>> = {
  RB: 'BROADER',
  RN: 'NARROWER',
};

const ConceptPayloadSchema = z.object({
  result: z.object({
    ui: z.string().optional(),
    name: z.string().optional(),
    semanticTypes: z.array(z.object({ name: z.string() })).optional(),
    definitions: z.string().optional(),
  }),
});

const DefinitionsPayloadSchema = z.object({
  result: z.array(z.object({ value: z.string().optional(), rootSource: z.string().optional() })),
});

const RelationsPayloadSchema = z.object({
  result: z.array(
    z.object({
      relationLabel: z.string().optional(),
      relatedId: z.string().optional(),
      relatedIdName: z.string().optional(),
    }),
  ),
});

export interface ConceptKnowledgeClientConfig {
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly version: string;
  readonly timeoutMs: number;
  readonly pageSize: number;
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
}

export interface ConceptKnowledgeClientDeps {
  readonly fetchFn?: typeof fetch;
}

export interface ConceptCallOptions {
  readonly signal?: AbortSignal;
}

export interface ConceptKnowledgeClient {
  readonly available: boolean;
  getDetails(conceptId: string, options?: ConceptCallOptions): Promise<ConceptDetails | null>;
  getRelations(conceptId: string, options?: ConceptCallOptions): Promise<readonly ConceptRelation[]>;
}

type FetchOutcome = { readonly found: true; readonly body: unknown } | { readonly found: false };

async function backoff(ms: number, signal: AbortSignal | undefined): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    throw new OperationCancelledError('Knowledge service request cancelled', toError(error));
  }
}

function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))];
}

export function parseRelatedConceptId(relatedId: string): string | undefined {
  if (CONCEPT_ID_PATTERN.test(relatedId)) return relatedId;
  return RELATED_CUI_PATTERN.exec(relatedId)?.[1];
}

export function createConceptKnowledgeClient(
  config: ConceptKnowledgeClientConfig,
  deps: ConceptKnowledgeClientDeps = {},
): ConceptKnowledgeClient {
  const fetchFn = deps.fetchFn ?? fetch;
  const maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const apiKey = config.apiKey;
  let credentialsRejected = false;

  if (!apiKey) {
    const unavailable = new CapabilityUnavailableError(
      'Knowledge service API key not configured',
      'concept-knowledge-service',
    );
    log.warn(
      { capability: unavailable.capability, code: unavailable.code },
      'Knowledge service API key not configured, concept details degraded to absent',
    );
  } else {
    log.info({ baseUrl: config.baseUrl, version: config.version }, 'Creating concept knowledge client');
  }

  function buildUrl(key: string, conceptId: string, resource?: 'definitions' | 'relations'): URL {
    const base = config.baseUrl.replace(/\/+$/, '');
    const path = [
      base,
      'content',
      encodeURIComponent(config.version),
      'CUI',
      encodeURIComponent(conceptId),
      ...(resource ? [resource] : []),
    ].join('/');
    const url = new URL(path);
    url.searchParams.set('apiKey', key);
    if (resource) {
      url.searchParams.set('pageSize', String(config.pageSize));
    }
    return url;
  }

  async function requestOnce(url: URL, signal: AbortSignal | undefined): Promise<FetchOutcome> {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { accept: 'application/json' },
        signal: withTimeout(signal, config.timeoutMs),
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Knowledge service request cancelled', toError(error));
      }
      const cause = toError(error);
      const reason = cause.name === 'TimeoutError' ? 'timed out' : `failed: ${cause.message}`;
      throw new TransientRemoteError(`Knowledge service request ${reason}`, undefined, cause);
    }

    if (response.status === 401) {
      credentialsRejected = true;
      throw new AuthenticationError('Knowledge service rejected the configured credentials');
    }
    if (response.status === 404) {
      return { found: false };
    }
    if (isTransientStatus(response.status)) {
      throw new TransientRemoteError(
        `Knowledge service responded with ${String(response.status)}`,
        response.status,
      );
    }
    if (!response.ok) {
      log.warn({ status: response.status, path: url.pathname }, 'Unexpected knowledge service response');
      return { found: false };
    }

    // The timeout signal stays armed while the body streams in.
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Knowledge service request cancelled', toError(error));
      }
      throw new TransientRemoteError(
        `Knowledge service response could not be read: ${toError(error).message}`,
        response.status,
        toError(error),
      );
    }

    try {
      const body: unknown = JSON.parse(text);
      return { found: true, body };
    } catch (error) {
      log.warn(
        { path: url.pathname, error: toError(error).message },
        'Knowledge service returned a body that is not JSON',
      );
      return { found: false };
    }
  }

  async function request(url: URL, signal: AbortSignal | undefined): Promise<FetchOutcome> {
    let lastError: TransientRemoteError | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (credentialsRejected) {
        throw new AuthenticationError('Knowledge service credentials were rejected earlier');
      }
      try {
        return await requestOnce(url, signal);
      } catch (error) {
        if (!(error instanceof TransientRemoteError)) {
          throw error;
        }
        lastError = error;
        log.warn(
          { attempt: attempt + 1, maxAttempts, error: error.message },
          'Transient knowledge service error, retrying',
        );
        if (attempt < maxAttempts - 1) {
          await backoff(computeBackoffMs(attempt, baseDelayMs), signal);
        }
      }
    }

    throw lastError ?? new TransientRemoteError('Knowledge service request failed');
  }

  function guard(conceptId: string): string | undefined {
    if (credentialsRejected) {
      throw new AuthenticationError('Knowledge service credentials were rejected earlier');
    }
    if (!apiKey) {
      return undefined;
    }
    if (!CONCEPT_ID_PATTERN.test(conceptId)) {
      log.warn({ conceptId }, 'Ignoring malformed concept identifier');
      return undefined;
    }
    return apiKey;
  }

  async function fetchDefinitions(
    key: string,
    conceptId: string,
    signal: AbortSignal | undefined,
  ): Promise<string[]> {
    try {
      const outcome = await request(buildUrl(key, conceptId, 'definitions'), signal);
      if (!outcome.found) return [];
      const parsed = DefinitionsPayloadSchema.safeParse(outcome.body);
      if (!parsed.success) return [];
      return unique(parsed.data.result.map((d) => d.value ?? ''));
    } catch (error) {
      if (error instanceof TransientRemoteError) {
        log.debug({ conceptId, error: error.message }, 'No definitions retrieved');
        return [];
      }
      throw error;
    }
  }

  return {
    available: apiKey !== undefined,

    async getDetails(conceptId: string, options?: ConceptCallOptions): Promise<ConceptDetails | null> {
      const key = guard(conceptId);
      if (!key) return null;
      const signal = options?.signal;

      try {
        const outcome = await request(buildUrl(key, conceptId), signal);
        if (!outcome.found) {
          log.debug({ conceptId }, 'Concept not found');
          return null;
        }

        const parsed = ConceptPayloadSchema.safeParse(outcome.body);
        if (!parsed.success) {
          log.warn({ conceptId }, 'Unexpected concept payload shape');
          return null;
        }

        const result = parsed.data.result;
        const hasDefinitions = result.definitions !== undefined && result.definitions !== 'NONE';
        const definitions = hasDefinitions ? await fetchDefinitions(key, conceptId, signal) : [];

        const details: ConceptDetails = {
          conceptId,
          canonicalName: result.name && result.name.length > 0 ? result.name : conceptId,
          semanticCategories: unique((result.semanticTypes ?? []).map((t) => t.name)),
          definitions,
        };
        log.debug({ conceptId, definitions: definitions.length }, 'Retrieved concept details');
        return details;
      } catch (error) {
        if (error instanceof TransientRemoteError) {
          log.warn({ conceptId, error: error.message }, 'Concept details unavailable');
          return null;
        }
        if (error instanceof AuthenticationError) {
          log.error({ conceptId }, 'Knowledge service authentication failed, check the API key');
        }
        throw error;
      }
    },

    async getRelations(
      conceptId: string,
      options?: ConceptCallOptions,
    ): Promise<readonly ConceptRelation[]> {
      const key = guard(conceptId);
      if (!key) return [];

      try {
        const outcome = await request(buildUrl(key, conceptId, 'relations'), options?.signal);
        if (!outcome.found) return [];

        const parsed = RelationsPayloadSchema.safeParse(outcome.body);
        if (!parsed.success) {
          log.warn({ conceptId }, 'Unexpected relations payload shape');
          return [];
        }

        const relations: ConceptRelation[] = [];
        const seen = new Set<string>();
        for (const item of parsed.data.result) {
          const kind = HIERARCHY_RELATION_CODES[item.relationLabel ?? ''];
          if (!kind) continue;
          const targetConceptId = parseRelatedConceptId(item.relatedId ?? '');
          if (!targetConceptId || targetConceptId === conceptId) continue;
          const dedupeKey = `${kind}:${targetConceptId}`;
          if (seen.has(dedupeKey)) continue;
          seen.add(dedupeKey);
          relations.push({ sourceConceptId: conceptId, targetConceptId, kind });
        }

        log.debug(
          { conceptId, total: parsed.data.result.length, hierarchy: relations.length },
          'Retrieved concept relations',
        );
        return relations;
      } catch (error) {
        if (error instanceof TransientRemoteError) {
          log.warn({ conceptId, error: error.message }, 'Concept relations unavailable');
          return [];
        }
        throw error;
      }
    },
  };
}
