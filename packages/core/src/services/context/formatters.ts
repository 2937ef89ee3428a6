import type { EnrichedConcept } from '@medgraph/shared/src/types/concept.types.js';
import type { RetrievedEntity, RetrievedFact } from '@medgraph/shared/src/types/graph.types.js';

export const SUMMARY_MAX_LENGTH = 200;
export const DEFINITION_MAX_LENGTH = 200;

export const FACTS_HEADER = 'Relevant Facts from Knowledge Graph:';
export const ENTITIES_HEADER = 'Relevant Entity Summaries:';
export const CONCEPTS_HEADER = 'Medical Terms and Concepts:';

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function nodeLabel(name: string | undefined, uuid: string): string {
  return name && name.length > 0 ? name : `Entity_${uuid.slice(0, 8)}`;
}

export function formatFact(fact: RetrievedFact): string {
  const source = nodeLabel(fact.sourceName, fact.sourceNodeId);
  const target = nodeLabel(fact.targetName, fact.targetNodeId);
  return `${fact.text} (Source: ${source}; Target: ${target})`;
}

export function formatEntity(entity: RetrievedEntity): string {
  return `${entity.name}: ${truncate(entity.summary, SUMMARY_MAX_LENGTH)}`;
}

export function formatConcept({ mention, details }: EnrichedConcept): string {
  const lines = [`- Term: ${mention.surfaceForm} (CUI: ${details.conceptId})`];
  if (details.semanticCategories.length > 0) {
    lines.push(`  Types: ${details.semanticCategories.join(', ')}`);
  }
  const [definition] = details.definitions;
  if (definition) {
    lines.push(`  Definition: ${truncate(definition, DEFINITION_MAX_LENGTH)}`);
  }
  return lines.join('\n');
}

function numbered(header: string, lines: readonly string[]): string {
  return [header, ...lines.map((line, i) => `${String(i + 1)}. ${line}`)].join('\n');
}

/** Sections keep a fixed order and are left out entirely when they have nothing to show. */
export function renderContext(parts: {
  readonly facts: readonly string[];
  readonly entitySummaries: readonly string[];
  readonly concepts: readonly EnrichedConcept[];
}): string {
  const sections: string[] = [];
  if (parts.facts.length > 0) {
    sections.push(numbered(FACTS_HEADER, parts.facts));
  }
  if (parts.entitySummaries.length > 0) {
    sections.push(numbered(ENTITIES_HEADER, parts.entitySummaries));
  }
  if (parts.concepts.length > 0) {
    sections.push([CONCEPTS_HEADER, ...parts.concepts.map(formatConcept)].join('\n'));
  }
  return sections.join('\n\n');
}
