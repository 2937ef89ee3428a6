import type { GraphStats } from '@medgraph/shared/src/types/graph.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import type { GraphStore } from '../../graph/graph-store.js';

const log = createChildLogger('graph:stats');

const RULE = '='.repeat(50);

export interface GraphStatsReport {
  readonly stats: GraphStats;
  /** Share of non-concept nodes that carry at least one concept link, in [0, 1]. */
  readonly conceptCoverage: number;
}

function sortedEntries(counts: Readonly<Record<string, number>>): [string, number][] {
  return Object.entries(counts).sort(([aKey, a], [bKey, b]) => b - a || aKey.localeCompare(bKey));
}

export function conceptCoverage(stats: GraphStats): number {
  const candidates = stats.totalNodes - stats.conceptNodes;
  if (candidates <= 0) return 0;
  return stats.nodesWithConcepts / candidates;
}

export async function collectGraphStats(store: GraphStore): Promise<GraphStatsReport> {
  const stats = await store.getStats();
  const report = { stats, conceptCoverage: conceptCoverage(stats) };
  log.info(
    {
      totalNodes: stats.totalNodes,
      totalRelationships: stats.totalRelationships,
      conceptNodes: stats.conceptNodes,
      conceptLinks: stats.conceptLinks,
      nodesWithConcepts: stats.nodesWithConcepts,
    },
    'Collected graph statistics',
  );
  return report;
}

export function formatGraphStats(report: GraphStatsReport): string {
  const { stats } = report;
  const lines = [
    RULE,
    'GRAPH STATISTICS',
    RULE,
    `Total nodes: ${String(stats.totalNodes)}`,
    `Total relationships: ${String(stats.totalRelationships)}`,
    '',
    'Label distribution:',
  ];

  const labels = sortedEntries(stats.labelDistribution);
  if (labels.length === 0) lines.push('  (none)');
  for (const [label, count] of labels) {
    lines.push(`  ${label}: ${String(count)}`);
  }

  lines.push('', 'Relationship types:');
  const types = sortedEntries(stats.relationshipTypes);
  if (types.length === 0) lines.push('  (none)');
  for (const [type, count] of types) {
    lines.push(`  ${type}: ${String(count)}`);
  }

  lines.push(
    '',
    'Structure:',
    `  Average degree: ${stats.averageDegree.toFixed(2)}`,
    `  Isolated nodes: ${String(stats.isolatedNodes)}`,
    '  Most connected:',
  );
  if (stats.mostConnected.length === 0) lines.push('    (none)');
  for (const node of stats.mostConnected) {
    lines.push(`    ${node.name || node.uuid}: ${String(node.degree)}`);
  }

  lines.push(
    '',
    'Concept enrichment:',
    `  Concept nodes: ${String(stats.conceptNodes)}`,
    `  Concept links: ${String(stats.conceptLinks)}`,
    `  Hierarchy links: ${String(stats.hierarchyLinks)}`,
    `  Nodes with concepts: ${String(stats.nodesWithConcepts)}`,
    `  Coverage: ${(report.conceptCoverage * 100).toFixed(1)}%`,
    '  Top semantic types:',
  );
  if (stats.topSemanticTypes.length === 0) lines.push('    (none)');
  for (const entry of stats.topSemanticTypes) {
    lines.push(`    ${entry.semanticType}: ${String(entry.count)}`);
  }

  lines.push(RULE);
  return lines.join('\n');
}
