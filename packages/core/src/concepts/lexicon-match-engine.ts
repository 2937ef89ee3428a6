import type { LexiconEntry } from '@medgraph/schemas/src/lexicon.schema.js';
import { validateLexicon } from '@medgraph/schemas/src/validators.js';
import { readJsonFile } from '@medgraph/schemas/src/config-loader.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import type { ConceptMatchEngine, MatchCandidate } from './concept-matcher.js';

const log = createChildLogger('concepts:lexicon-engine');

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:[-'][\p{L}\p{N}]+)*/gu;

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'is', 'it',
  'of', 'on', 'or', 'that', 'the', 'to', 'was', 'were', 'with',
]);

export interface LexiconMatchEngineOptions {
  readonly minSimilarity: number;
  readonly maxNgramTokens: number;
}

interface Token {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

interface IndexedTerm {
  readonly normalized: string;
  readonly trigrams: ReadonlySet<string>;
  readonly conceptIds: readonly string[];
}

interface NgramMatch {
  readonly start: number;
  readonly end: number;
  readonly candidates: readonly MatchCandidate[];
}

export function normalizeTerm(term: string): string {
  return term.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function trigrams(value: string): Set<string> {
  const padded = `$${value}$`;
  const grams = new Set<string>();
  for (let i = 0; i + 3 <= padded.length; i++) {
    grams.add(padded.slice(i, i + 3));
  }
  return grams;
}

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const gram of a) {
    if (b.has(gram)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

function buildIndex(entries: readonly LexiconEntry[]): {
  terms: Map<string, IndexedTerm>;
  byTrigram: Map<string, Set<string>>;
} {
  const conceptIdsByTerm = new Map<string, Set<string>>();
  for (const entry of entries) {
    const normalized = normalizeTerm(entry.term);
    const ids = conceptIdsByTerm.get(normalized) ?? new Set<string>();
    ids.add(entry.conceptId);
    conceptIdsByTerm.set(normalized, ids);
  }

  const terms = new Map<string, IndexedTerm>();
  const byTrigram = new Map<string, Set<string>>();
  for (const [normalized, ids] of conceptIdsByTerm) {
    const grams = trigrams(normalized);
    terms.set(normalized, { normalized, trigrams: grams, conceptIds: [...ids].sort() });
    for (const gram of grams) {
      const bucket = byTrigram.get(gram) ?? new Set<string>();
      bucket.add(normalized);
      byTrigram.set(gram, bucket);
    }
  }

  return { terms, byTrigram };
}

/**
 * Clusters overlapping n-gram matches so that each cluster is one detected span.
 * Input must be ordered by start offset. Every candidate of a cluster is kept; the
 * matcher then picks by similarity first, so an exact shorter term outranks a fuzzy
 * longer one and span length only breaks ties.
 */
function groupOverlapping(matches: readonly NgramMatch[]): MatchCandidate[][] {
  const groups: MatchCandidate[][] = [];
  let current: MatchCandidate[] = [];
  let currentEnd = -1;

  for (const match of matches) {
    if (current.length > 0 && match.start >= currentEnd) {
      groups.push(current);
      current = [];
    }
    current.push(...match.candidates);
    currentEnd = Math.max(currentEnd, match.end);
  }
  if (current.length > 0) groups.push(current);

  return groups;
}

export function createLexiconMatchEngine(
  entries: readonly LexiconEntry[],
  options: LexiconMatchEngineOptions,
): ConceptMatchEngine {
  const { terms, byTrigram } = buildIndex(entries);

  log.info({ terms: terms.size, entries: entries.length }, 'Lexicon indexed');

  function lookup(ngram: string): Array<{ term: IndexedTerm; similarity: number }> {
    const grams = trigrams(ngram);
    const seen = new Set<string>();
    const found: Array<{ term: IndexedTerm; similarity: number }> = [];

    for (const gram of grams) {
      for (const normalized of byTrigram.get(gram) ?? []) {
        if (seen.has(normalized)) continue;
        seen.add(normalized);
        const term = terms.get(normalized);
        if (!term) continue;
        const similarity = jaccardSimilarity(grams, term.trigrams);
        if (similarity >= options.minSimilarity) {
          found.push({ term, similarity });
        }
      }
    }

    return found;
  }

  return {
    findCandidates(text: string): Promise<readonly (readonly MatchCandidate[])[]> {
      const tokens = tokenize(text);
      const matches: NgramMatch[] = [];

      for (let i = 0; i < tokens.length; i++) {
        if (STOPWORDS.has(tokens[i].text.toLowerCase())) continue;

        const maxLength = Math.min(options.maxNgramTokens, tokens.length - i);
        for (let length = 1; length <= maxLength; length++) {
          const last = tokens[i + length - 1];
          if (STOPWORDS.has(last.text.toLowerCase())) continue;

          const start = tokens[i].start;
          const surfaceForm = text.slice(start, last.end);
          const found = lookup(normalizeTerm(surfaceForm));
          if (found.length === 0) continue;

          matches.push({
            start,
            end: last.end,
            candidates: found.flatMap(({ term, similarity }) =>
              term.conceptIds.map((conceptId) => ({
                surfaceForm,
                conceptId,
                similarity,
                start,
                end: last.end,
              })),
            ),
          });
        }
      }

      return Promise.resolve(groupOverlapping(matches));
    },
  };
}

export async function loadLexiconMatchEngine(
  lexiconPath: string,
  options: LexiconMatchEngineOptions,
): Promise<ConceptMatchEngine> {
  const entries = validateLexicon(await readJsonFile(lexiconPath));
  log.info({ lexiconPath }, 'Loaded concept lexicon');
  return createLexiconMatchEngine(entries, options);
}
