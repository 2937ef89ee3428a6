import { describe, it, expect, vi } from 'vitest';
import { createConceptMatcher, selectBestCandidate } from './concept-matcher.js';
import type { ConceptMatchEngine, MatchCandidate } from './concept-matcher.js';

function candidate(overrides: Partial<MatchCandidate>): MatchCandidate {
  return {
    surfaceForm: 'hypertension',
    conceptId: 'C0020538',
    similarity: 1,
    start: 0,
    end: 12,
    ...overrides,
  };
}

function engineReturning(groups: MatchCandidate[][]): ConceptMatchEngine {
  return { findCandidates: vi.fn().mockResolvedValue(groups) };
}

describe('selectBestCandidate', () => {
  it('should prefer the highest similarity', () => {
    const best = selectBestCandidate([
      candidate({ conceptId: 'C0000001', similarity: 0.8 }),
      candidate({ conceptId: 'C0000002', similarity: 0.9 }),
    ]);
    expect(best?.conceptId).toBe('C0000002');
  });

  it('should break similarity ties by the longest surface form', () => {
    const best = selectBestCandidate([
      candidate({ conceptId: 'C0000001', surfaceForm: 'infarction', similarity: 0.9 }),
      candidate({ conceptId: 'C0000002', surfaceForm: 'myocardial infarction', similarity: 0.9 }),
    ]);
    expect(best?.conceptId).toBe('C0000002');
  });

  it('should break remaining ties by the lowest conceptId', () => {
    const group = [
      candidate({ conceptId: 'C0000009' }),
      candidate({ conceptId: 'C0000003' }),
      candidate({ conceptId: 'C0000005' }),
    ];
    expect(selectBestCandidate(group)?.conceptId).toBe('C0000003');
    expect(selectBestCandidate([...group].reverse())?.conceptId).toBe('C0000003');
  });

  it('should return undefined for an empty group', () => {
    expect(selectBestCandidate([])).toBeUndefined();
  });
});

describe('ConceptMatcher', () => {
  it('should produce one mention per group ordered by span start', async () => {
    const matcher = createConceptMatcher(
      engineReturning([
        [candidate({ surfaceForm: 'diabetes', conceptId: 'C0011849', start: 30, end: 38 })],
        [candidate({ surfaceForm: 'hypertension', conceptId: 'C0020538', start: 4, end: 16, similarity: 0.85 })],
      ]),
    );

    const mentions = await matcher.match('The hypertension patient with diabetes');

    expect(mentions).toEqual([
      { surfaceForm: 'hypertension', conceptId: 'C0020538', confidence: 0.85, span: { start: 4, end: 16 } },
      { surfaceForm: 'diabetes', conceptId: 'C0011849', confidence: 1, span: { start: 30, end: 38 } },
    ]);
  });

  it('should clamp confidence into the unit interval', async () => {
    const matcher = createConceptMatcher(engineReturning([[candidate({ similarity: 1.4 })]]));
    const mentions = await matcher.match('hypertension');
    expect(mentions[0]?.confidence).toBe(1);
  });

  it('should return no mentions for blank text without calling the engine', async () => {
    const engine = engineReturning([[candidate({})]]);
    const matcher = createConceptMatcher(engine);

    expect(await matcher.match('   ')).toEqual([]);
    expect(engine.findCandidates).not.toHaveBeenCalled();
  });

  it('should degrade to no mentions when no engine is configured', async () => {
    const matcher = createConceptMatcher(undefined);
    expect(matcher.available).toBe(false);
    expect(await matcher.match('hypertension')).toEqual([]);
  });

  it('should degrade to no mentions when the engine fails', async () => {
    const matcher = createConceptMatcher({
      findCandidates: vi.fn().mockRejectedValue(new Error('engine crashed')),
    });
    expect(await matcher.match('hypertension')).toEqual([]);
  });
});
