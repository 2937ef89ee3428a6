import { describe, it, expect } from 'vitest';
import {
  createLexiconMatchEngine,
  jaccardSimilarity,
  normalizeTerm,
  trigrams,
} from './lexicon-match-engine.js';
import { createConceptMatcher } from './concept-matcher.js';

const lexicon = [
  { conceptId: 'C0027051', term: 'myocardial infarction' },
  { conceptId: 'C0155626', term: 'Acute myocardial infarction' },
  { conceptId: 'C0020538', term: 'hypertension' },
  { conceptId: 'C0021308', term: 'infarction' },
];

const options = { minSimilarity: 0.7, maxNgramTokens: 5 };

describe('trigram helpers', () => {
  it('should normalize case and whitespace', () => {
    expect(normalizeTerm('  Acute   Myocardial\tInfarction ')).toBe('acute myocardial infarction');
  });

  it('should pad values before extracting trigrams', () => {
    expect([...trigrams('abc')]).toEqual(['$ab', 'abc', 'bc$']);
  });

  it('should compute jaccard similarity of trigram sets', () => {
    expect(jaccardSimilarity(trigrams('hypertension'), trigrams('hypertension'))).toBe(1);
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
  });
});

describe('LexiconMatchEngine', () => {
  it('should group overlapping n-grams into one span per concept mention', async () => {
    const engine = createLexiconMatchEngine(lexicon, options);
    const text = 'Patient presents with acute myocardial infarction and hypertension.';

    const groups = await engine.findCandidates(text);

    expect(groups).toHaveLength(2);
    const spans = groups.map((group) => group.map((c) => `${c.conceptId}@${String(c.start)}`));
    expect(spans[0]).toContain('C0155626@22');
    expect(spans[1]).toEqual(['C0020538@54']);
  });

  it('should let the matcher pick the exact longest term for each span', async () => {
    const matcher = createConceptMatcher(createLexiconMatchEngine(lexicon, options));

    const mentions = await matcher.match(
      'Patient presents with acute myocardial infarction and hypertension.',
    );

    expect(mentions).toEqual([
      {
        surfaceForm: 'acute myocardial infarction',
        conceptId: 'C0155626',
        confidence: 1,
        span: { start: 22, end: 49 },
      },
      {
        surfaceForm: 'hypertension',
        conceptId: 'C0020538',
        confidence: 1,
        span: { start: 54, end: 66 },
      },
    ]);
  });

  it('should prefer an exact shorter term over a fuzzy longer one in the same span', async () => {
    const engine = createLexiconMatchEngine(
      [
        { conceptId: 'C0020538', term: 'hypertension' },
        { conceptId: 'C0000001', term: 'hypertensive disease' },
      ],
      { minSimilarity: 0.6, maxNgramTokens: 3 },
    );
    const text = 'hypertension disease';

    const groups = await engine.findCandidates(text);
    expect(groups).toHaveLength(1);
    expect(groups[0]?.map((c) => c.conceptId).sort()).toEqual(['C0000001', 'C0020538']);

    const mentions = await createConceptMatcher(engine).match(text);
    expect(mentions).toEqual([
      {
        surfaceForm: 'hypertension',
        conceptId: 'C0020538',
        confidence: 1,
        span: { start: 0, end: 12 },
      },
    ]);
  });

  it('should not start or end an n-gram on a stopword', async () => {
    const engine = createLexiconMatchEngine([{ conceptId: 'C0020538', term: 'hypertension' }], options);
    const groups = await engine.findCandidates('history of hypertension');

    expect(groups).toHaveLength(1);
    expect(groups[0]?.map((c) => c.surfaceForm)).toEqual(['hypertension']);
  });

  it('should return no groups when nothing clears the similarity threshold', async () => {
    const engine = createLexiconMatchEngine(lexicon, options);
    expect(await engine.findCandidates('The weather was pleasant today.')).toEqual([]);
  });
});
