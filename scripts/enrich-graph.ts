import { loadAppConfig } from '@medgraph/schemas';
import {
  createConceptResolver,
  createEnrichmentEngine,
  createGraphEnricher,
  openNeo4jGraphStore,
  withGraphStore,
} from '@medgraph/core';
import { createConceptServices, describeConceptServices } from './concept-services.js';

function flagValue(name: string): string | undefined {
  const flag = process.argv.find((a) => a.startsWith(`--${name}=`));
  return flag?.slice(name.length + 3);
}

async function main(): Promise<void> {
  const limitFlag = flagValue('limit');
  const limit = limitFlag ? Number.parseInt(limitFlag, 10) : undefined;
  const label = flagValue('label');
  const expandFrom = flagValue('expand');
  const depthFlag = flagValue('depth');
  const depth = depthFlag ? Number.parseInt(depthFlag, 10) : 1;

  const config = loadAppConfig();
  const services = await createConceptServices(config);

  console.log('=== Graph Concept Enrichment ===\n');
  console.log(`Neo4j: ${config.graph.uri} (database: ${config.graph.database})`);
  for (const line of describeConceptServices(config, services)) {
    console.log(line);
  }
  console.log(`Label filter: ${label ?? '(all)'}`);
  console.log(`Limit: ${limit === undefined ? '(none)' : String(limit)}\n`);

  const startTime = Date.now();

  await withGraphStore(
    () => openNeo4jGraphStore(config.graph),
    async (graphStore) => {
      await graphStore.initialize();
      const conceptResolver = createConceptResolver(services);
      const deps = { conceptMatcher: services.conceptMatcher, conceptResolver, graphStore };
      const enrichmentConfig = { minConfidence: config.concepts.minConfidence };

      const summary = await createGraphEnricher(deps, enrichmentConfig).enrichGraph({ label, limit });
      console.log('--- Nodes ---');
      console.log(`  Processed: ${String(summary.processed)}`);
      console.log(`  Enriched: ${String(summary.enriched)}`);
      console.log(`  Concept links: ${String(summary.linked)}`);
      console.log(`  Skipped mentions: ${String(summary.skipped)}`);
      console.log(`  Failed mentions: ${String(summary.failed)}`);

      if (expandFrom) {
        const expansion = await createEnrichmentEngine(deps, enrichmentConfig).expandHierarchy(expandFrom, depth);
        console.log('\n--- Hierarchy ---');
        console.log(`  Root: ${expansion.rootConceptId} (depth ${String(depth)})`);
        console.log(`  Visited: ${expansion.visited.join(', ')}`);
        console.log(`  Links: ${String(expansion.linked)}`);
        console.log(`  Skipped: ${String(expansion.skipped)}`);
        console.log(`  Failed: ${String(expansion.failed)}`);
      }
    },
  );

  console.log(`\n=== Enrichment completed in ${String(Date.now() - startTime)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Enrichment failed:', error);
  process.exit(1);
});
