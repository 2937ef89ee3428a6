export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

/** A concept's surface form detected in one piece of text. */
export interface Mention {
  readonly surfaceForm: string;
  readonly conceptId: string;
  readonly confidence: number;
  readonly span: TextSpan;
}

export interface ConceptDetails {
  readonly conceptId: string;
  readonly canonicalName: string;
  readonly semanticCategories: readonly string[];
  readonly definitions: readonly string[];
}

export type ConceptRelationKind = 'BROADER' | 'NARROWER';

/**
 * BROADER: the target concept is broader than the source.
 * NARROWER: the target concept is narrower than the source.
 */
export interface ConceptRelation {
  readonly sourceConceptId: string;
  readonly targetConceptId: string;
  readonly kind: ConceptRelationKind;
}

export interface EnrichedConcept {
  readonly mention: Mention;
  readonly details: ConceptDetails;
}

export interface CachedConceptDetails {
  readonly details: ConceptDetails;
  readonly cachedAt: Date;
  readonly expiresAt: Date;
}
