export * from './literature/corpus-importer.js';
