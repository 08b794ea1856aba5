/**
 * Source ranking
 *
 * Bag-of-terms overlap against the objective. Weights: title x3, body x1,
 * keywords x2, and x2 per focus term found anywhere in the source.
 */

import type { SourceDocument } from '../source-corpus/types';
import { compareCorpusOrder } from '../source-corpus/SourceCorpus';
import type { RankedSource } from './types';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'had', 'her', 'was', 'one',
  'our', 'out', 'has', 'his', 'how', 'its', 'may', 'new', 'now', 'see', 'who', 'did', 'get', 'use',
  'this', 'that', 'with', 'from', 'have', 'they', 'will', 'what', 'when', 'your', 'into', 'than',
  'then', 'them', 'these', 'those', 'there', 'their', 'which', 'would', 'about', 'should', 'also',
]);

export const TITLE_WEIGHT = 3;
export const BODY_WEIGHT = 1;
export const KEYWORD_WEIGHT = 2;
export const FOCUS_WEIGHT = 2;

/**
 * Lowercased words of three or more letters/digits, minus stop words
 */
export function extractTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const word of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (word.length >= 3 && !STOP_WORDS.has(word)) terms.add(word);
  }
  return terms;
}

function overlap(query: Set<string>, terms: Set<string>): number {
  let count = 0;
  for (const term of query) {
    if (terms.has(term)) count++;
  }
  return count;
}

export function scoreSource(
  document: SourceDocument,
  queryTerms: Set<string>,
  focusTerms: Set<string>
): number {
  const titleTerms = extractTerms(document.title);
  const bodyTerms = extractTerms(document.extractedText);
  const keywordTerms = extractTerms((document.metadata.keywords ?? []).join(' '));

  let score =
    overlap(queryTerms, titleTerms) * TITLE_WEIGHT +
    overlap(queryTerms, bodyTerms) * BODY_WEIGHT +
    overlap(queryTerms, keywordTerms) * KEYWORD_WEIGHT;

  for (const term of focusTerms) {
    if (titleTerms.has(term) || bodyTerms.has(term) || keywordTerms.has(term)) {
      score += FOCUS_WEIGHT;
    }
  }

  return score;
}

/**
 * Highest score first; ties keep corpus order (addedAt, then id)
 */
export function rankSources(
  corpus: readonly SourceDocument[],
  objective: string,
  focusTerms: readonly string[] = []
): RankedSource[] {
  const queryTerms = extractTerms(objective);
  const focus = extractTerms(focusTerms.join(' '));

  return corpus
    .map(document => ({ document, score: scoreSource(document, queryTerms, focus) }))
    .sort((a, b) => b.score - a.score || compareCorpusOrder(a.document, b.document));
}
