export * from './app-config.schema.js';
export * from './lexicon.schema.js';
export * from './corpus.schema.js';
export * from './validators.js';
export * from './config-loader.js';
