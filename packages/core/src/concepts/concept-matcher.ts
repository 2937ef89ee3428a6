import type { Mention } from '@medgraph/shared/src/types/concept.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { CapabilityUnavailableError, toError } from '@medgraph/shared/src/utils/errors.js';

const log = createChildLogger('concepts:matcher');

export interface MatchCandidate {
  readonly surfaceForm: string;
  readonly conceptId: string;
  readonly similarity: number;
  readonly start: number;
  readonly end: number;
}

/**
 * Underlying dictionary / approximate-string matcher. Returns one group of candidates
 * per detected span.
 */
export interface ConceptMatchEngine {
  findCandidates(text: string): Promise<readonly (readonly MatchCandidate[])[]>;
}

export interface ConceptMatcher {
  readonly available: boolean;
  match(text: string): Promise<readonly Mention[]>;
}

function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  if (a.surfaceForm.length !== b.surfaceForm.length) {
    return b.surfaceForm.length - a.surfaceForm.length;
  }
  if (a.conceptId < b.conceptId) return -1;
  if (a.conceptId > b.conceptId) return 1;
  return 0;
}

/** Highest similarity, then longest surface form, then lowest conceptId. */
export function selectBestCandidate(group: readonly MatchCandidate[]): MatchCandidate | undefined {
  return [...group].sort(compareCandidates)[0];
}

function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function createConceptMatcher(engine: ConceptMatchEngine | undefined): ConceptMatcher {
  if (!engine) {
    const unavailable = new CapabilityUnavailableError('Concept matcher not configured', 'concept-matcher');
    log.warn(
      { capability: unavailable.capability, code: unavailable.code },
      'Concept matcher not configured, mention extraction degraded to empty results',
    );
  }

  return {
    available: engine !== undefined,

    async match(text: string): Promise<readonly Mention[]> {
      if (!engine) {
        log.debug('Concept matcher unavailable, returning no mentions');
        return [];
      }
      if (text.trim().length === 0) {
        return [];
      }

      let groups: readonly (readonly MatchCandidate[])[];
      try {
        groups = await engine.findCandidates(text);
      } catch (error) {
        log.warn(
          { capability: 'concept-matcher', error: toError(error).message },
          'Concept matcher failed, mention extraction degraded to empty results',
        );
        return [];
      }

      const mentions: Mention[] = [];
      for (const group of groups) {
        const best = selectBestCandidate(group);
        if (!best) continue;
        mentions.push({
          surfaceForm: best.surfaceForm,
          conceptId: best.conceptId,
          confidence: clampConfidence(best.similarity),
          span: { start: best.start, end: best.end },
        });
      }

      mentions.sort((a, b) => a.span.start - b.span.start);
      log.debug({ inputLength: text.length, mentions: mentions.length }, 'Extracted concept mentions');
      return mentions;
    },
  };
}
