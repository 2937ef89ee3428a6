import type { ZodError } from 'zod';
import { SchemaValidationError } from '@medgraph/shared/src/utils/errors.js';
import { AppConfigSchema } from './app-config.schema.js';
import type { AppConfig } from './app-config.schema.js';
import { LexiconSchema } from './lexicon.schema.js';
import type { LexiconEntry } from './lexicon.schema.js';
import { CorpusSchema } from './corpus.schema.js';
import type { Corpus } from './corpus.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateAppConfig(data: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid application configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateLexicon(data: unknown): readonly LexiconEntry[] {
  const result = LexiconSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid concept lexicon', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateCorpus(data: unknown): Corpus {
  const result = CorpusSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid literature corpus', formatZodErrors(result.error));
  }

  return result.data;
}
