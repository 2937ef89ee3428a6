export interface EnrichmentSummary {
  readonly nodeId: string;
  readonly linked: number;
  readonly skipped: number;
  readonly failed: number;
  readonly conceptIds: readonly string[];
}

export interface HierarchyExpansionSummary {
  readonly rootConceptId: string;
  readonly visited: readonly string[];
  readonly linked: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface GraphEnrichmentSummary {
  readonly processed: number;
  readonly enriched: number;
  readonly linked: number;
  readonly skipped: number;
  readonly failed: number;
}
