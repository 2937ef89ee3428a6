import { loadAppConfig } from '@medgraph/schemas';
import { collectGraphStats, formatGraphStats, openNeo4jGraphStore, withGraphStore } from '@medgraph/core';

async function main(): Promise<void> {
  const config = loadAppConfig();

  console.log(`Neo4j: ${config.graph.uri} (database: ${config.graph.database})\n`);

  const report = await withGraphStore(() => openNeo4jGraphStore(config.graph), collectGraphStats);
  console.log(formatGraphStats(report));
}

main().catch((error: unknown) => {
  console.error('Statistics failed:', error);
  process.exit(1);
});
