export * from './logger.js';
export * from './utils/errors.js';
export * from './utils/cancellation.js';
export type * from './types/concept.types.js';
export type * from './types/context.types.js';
export type * from './types/enrichment.types.js';
export type * from './types/graph.types.js';
export type * from './types/ingestion.types.js';
