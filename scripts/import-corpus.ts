import { loadAppConfig } from '@medgraph/schemas';
import { openNeo4jGraphStore, withGraphStore } from '@medgraph/core';
import { createCorpusImporter } from '@medgraph/ingestion';

async function main(): Promise<void> {
  const keepExisting = process.argv.includes('--keep-existing');
  const positionalArgs = process.argv.slice(2).filter((a) => !a.startsWith('--'));

  const config = loadAppConfig();
  const corpusPath = positionalArgs[0] ?? config.ingestion.corpusPath;

  console.log('=== Literature Corpus Import ===\n');
  console.log(`Corpus: ${corpusPath}`);
  console.log(`Neo4j: ${config.graph.uri} (database: ${config.graph.database})`);
  console.log(`Clear graph first: ${keepExisting ? 'no' : 'yes'}\n`);

  const startTime = Date.now();

  const summary = await withGraphStore(
    () => openNeo4jGraphStore(config.graph),
    async (graphStore) => {
      await graphStore.initialize();
      const importer = createCorpusImporter({ graphStore }, config.ingestion);
      return importer.importFile(corpusPath, { clear: !keepExisting });
    },
  );

  console.log(`Imported: ${String(summary.imported)}`);
  console.log(`Failed: ${String(summary.failed)}`);
  console.log(`\n=== Import completed in ${String(Date.now() - startTime)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Import failed:', error);
  process.exit(1);
});
