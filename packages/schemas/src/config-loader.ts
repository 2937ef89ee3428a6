import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@medgraph/shared/src/utils/errors.js';
import { validateAppConfig } from './validators.js';
import type { AppConfig } from './app-config.schema.js';

type Env = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return validateAppConfig({
    graph: {
      uri: nonEmpty(env['NEO4J_URI']),
      user: nonEmpty(env['NEO4J_USER']),
      password: nonEmpty(env['NEO4J_PASSWORD']),
      database: nonEmpty(env['NEO4J_DATABASE']),
      factIndex: nonEmpty(env['NEO4J_FACT_INDEX']),
      entityIndex: nonEmpty(env['NEO4J_ENTITY_INDEX']),
    },
    knowledge: {
      apiKey: nonEmpty(env['UMLS_API_KEY']),
      baseUrl: nonEmpty(env['UMLS_BASE_URL']),
      version: nonEmpty(env['UMLS_VERSION']),
      timeoutMs: nonEmpty(env['UMLS_TIMEOUT_MS']),
      pageSize: nonEmpty(env['UMLS_PAGE_SIZE']),
    },
    concepts: {
      lexiconPath: nonEmpty(env['CONCEPT_LEXICON_PATH']),
      minConfidence: nonEmpty(env['CONCEPT_MIN_CONFIDENCE']),
      matcherSimilarity: nonEmpty(env['CONCEPT_MATCHER_SIMILARITY']),
      maxNgramTokens: nonEmpty(env['CONCEPT_MAX_NGRAM_TOKENS']),
    },
    retrieval: {
      maxFacts: nonEmpty(env['DEFAULT_MAX_FACTS']),
      maxEntities: nonEmpty(env['DEFAULT_MAX_ENTITIES']),
    },
    ingestion: {
      corpusPath: nonEmpty(env['CORPUS_PATH']),
      minTextLength: nonEmpty(env['CORPUS_MIN_TEXT_LENGTH']),
      maxTextLength: nonEmpty(env['CORPUS_MAX_TEXT_LENGTH']),
    },
    generation: {
      projectId: nonEmpty(env['MEDGRAPH_GCP_PROJECT_ID']) ?? nonEmpty(env['GCP_PROJECT_ID']),
      location: nonEmpty(env['VERTEX_AI_LOCATION']),
      model: nonEmpty(env['LLM_MODEL']),
      temperature: nonEmpty(env['LLM_TEMPERATURE']),
      maxTokens: nonEmpty(env['LLM_MAX_TOKENS']),
    },
    conceptCache: nonEmpty(env['MEDGRAPH_CONCEPT_CACHE']),
  });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`File not found: ${filePath}`);
    }
    throw new ConfigurationError(`Failed to read file ${filePath}: ${nodeError.message}`);
  }
}
