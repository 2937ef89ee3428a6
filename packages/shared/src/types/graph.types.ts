export interface RetrievedFact {
  readonly uuid: string;
  readonly text: string;
  readonly sourceNodeId: string;
  readonly targetNodeId: string;
  readonly sourceName?: string;
  readonly targetName?: string;
  readonly validFrom?: Date;
  readonly validUntil?: Date;
}

export interface RetrievedEntity {
  readonly uuid: string;
  readonly name: string;
  readonly summary: string;
  readonly labels: readonly string[];
  readonly createdAt: Date;
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface SearchResult<T> {
  readonly items: readonly T[];
  readonly degraded: boolean;
}

export interface GraphNodeRecord {
  readonly uuid: string;
  readonly name: string;
  readonly labels: readonly string[];
  readonly createdAt: Date;
  readonly properties: Readonly<Record<string, unknown>>;
}

export interface ConceptLinkProps {
  readonly similarity?: number;
}

export interface NodeDegree {
  readonly uuid: string;
  readonly name: string;
  readonly degree: number;
}

export interface SemanticTypeCount {
  readonly semanticType: string;
  readonly count: number;
}

export interface GraphStats {
  readonly totalNodes: number;
  readonly totalRelationships: number;
  readonly labelDistribution: Readonly<Record<string, number>>;
  readonly relationshipTypes: Readonly<Record<string, number>>;
  readonly conceptNodes: number;
  readonly conceptLinks: number;
  readonly hierarchyLinks: number;
  /** Distinct nodes with at least one outgoing concept link. */
  readonly nodesWithConcepts: number;
  /** Mean count of relationships touching a node, in either direction. */
  readonly averageDegree: number;
  readonly isolatedNodes: number;
  readonly mostConnected: readonly NodeDegree[];
  readonly topSemanticTypes: readonly SemanticTypeCount[];
}
