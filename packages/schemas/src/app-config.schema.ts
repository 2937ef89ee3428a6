import { z } from 'zod';

const IndexNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain identifier');

export const GraphConfigSchema = z.object({
  uri: z.string().min(1).default('bolt://localhost:7687'),
  user: z.string().min(1).default('neo4j'),
  password: z.string().min(1),
  database: z.string().min(1).default('neo4j'),
  factIndex: IndexNameSchema.default('edge_name_and_fact'),
  entityIndex: IndexNameSchema.default('node_name_and_summary'),
});

export const KnowledgeServiceConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://uts-ws.nlm.nih.gov/rest'),
  version: z.string().min(1).default('current'),
  timeoutMs: z.coerce.number().int().positive().default(10000),
  pageSize: z.coerce.number().int().positive().max(500).default(100),
});

export const ConceptConfigSchema = z.object({
  lexiconPath: z.string().min(1).optional(),
  minConfidence: z.coerce.number().min(0).max(1).default(0.7),
  matcherSimilarity: z.coerce.number().min(0).max(1).default(0.7),
  maxNgramTokens: z.coerce.number().int().min(1).max(10).default(5),
});

export const RetrievalConfigSchema = z.object({
  maxFacts: z.coerce.number().int().positive().default(10),
  maxEntities: z.coerce.number().int().positive().default(5),
});

export const IngestionConfigSchema = z.object({
  corpusPath: z.string().min(1).default('data/pubmed/pubmed_corpus.json'),
  minTextLength: z.coerce.number().int().nonnegative().default(100),
  maxTextLength: z.coerce.number().int().positive().default(4096),
});

export const GenerationConfigSchema = z.object({
  projectId: z.string().min(1).optional(),
  location: z.string().min(1).default('europe-west1'),
  model: z.string().min(1).default('gemini-2.0-flash'),
  temperature: z.coerce.number().min(0).max(2).default(0.2),
  maxTokens: z.coerce.number().int().positive().default(1000),
});

export const ConceptCacheModeSchema = z.enum(['memory', 'firestore', 'none']);

export const AppConfigSchema = z.object({
  graph: GraphConfigSchema,
  knowledge: KnowledgeServiceConfigSchema,
  concepts: ConceptConfigSchema,
  retrieval: RetrievalConfigSchema,
  ingestion: IngestionConfigSchema,
  generation: GenerationConfigSchema,
  conceptCache: ConceptCacheModeSchema.default('memory'),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type KnowledgeServiceConfig = z.infer<typeof KnowledgeServiceConfigSchema>;
export type ConceptConfig = z.infer<typeof ConceptConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type ConceptCacheMode = z.infer<typeof ConceptCacheModeSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
