/**
 * Boundary-aware truncation
 *
 * Cuts a document to the longest prefix that fits a token allowance and ends
 * on a paragraph boundary. When not even the first paragraph fits, falls
 * back to sentence boundaries inside that paragraph. Never cuts mid-sentence.
 */

import type { Excerpt } from './types';

const PARAGRAPH_BREAK = /\n[ \t]*\n/g;
const SENTENCE_END = /[.!?…。！？]+["'»”’)\]]*(?=\s|$)/g;

/**
 * End offsets of every paragraph (trailing whitespace excluded)
 */
export function paragraphEnds(text: string): number[] {
  const ends: number[] = [];
  for (const match of text.matchAll(PARAGRAPH_BREAK)) {
    const end = text.slice(0, match.index ?? 0).trimEnd().length;
    if (end > 0 && end !== ends[ends.length - 1]) ends.push(end);
  }
  const last = text.trimEnd().length;
  if (last > 0 && last !== ends[ends.length - 1]) ends.push(last);
  return ends;
}

/**
 * End offsets of every complete sentence in text
 */
export function sentenceEnds(text: string): number[] {
  const ends: number[] = [];
  for (const match of text.matchAll(SENTENCE_END)) {
    ends.push((match.index ?? 0) + match[0].length);
  }
  return ends;
}

/**
 * Largest end offset whose prefix fits; ends must be ascending and the
 * estimate monotonic in prefix length
 */
function largestFitting(
  text: string,
  ends: number[],
  maxTokens: number,
  estimate: (text: string) => number
): number | null {
  let lo = 0;
  let hi = ends.length - 1;
  let best: number | null = null;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (estimate(text.slice(0, ends[mid])) <= maxTokens) {
      best = ends[mid];
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return best;
}

/**
 * Longest boundary-aligned prefix within maxTokens, or null when nothing fits
 */
export function truncateToTokens(
  text: string,
  maxTokens: number,
  estimate: (text: string) => number
): Excerpt | null {
  if (maxTokens <= 0 || !text.trim()) return null;

  if (estimate(text) <= maxTokens) {
    return { text, truncated: false };
  }

  const paragraphs = paragraphEnds(text);
  const byParagraph = largestFitting(text, paragraphs, maxTokens, estimate);
  if (byParagraph !== null) {
    return { text: text.slice(0, byParagraph), truncated: true };
  }

  const firstParagraph = text.slice(0, paragraphs[0] ?? text.length);
  const bySentence = largestFitting(firstParagraph, sentenceEnds(firstParagraph), maxTokens, estimate);
  if (bySentence !== null) {
    return { text: firstParagraph.slice(0, bySentence), truncated: true };
  }

  return null;
}
