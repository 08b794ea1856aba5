/**
 * Token Estimator
 *
 * Character-class heuristic, no tokenizer dependency:
 * - Latin and everything else: ~4 characters per token
 * - Cyrillic: ~2.5 characters per token
 * - CJK: ~1.5 characters per token
 *
 * The raw figure can under-count real BPE tokenization by up to ~10% on
 * English prose, so it is scaled by (1 + safetyMargin) and rounded up.
 */

export interface TokenEstimatorOptions {
  /** Fraction added on top of the raw estimate (default 0.1) */
  safetyMargin?: number;
}

const CYRILLIC = /[\u0400-\u04ff]/g;
const CJK = /[\u4e00-\u9fff\u3040-\u309f\u30a0-\u30ff\uac00-\ud7af]/g;

// float noise guard for ceil (e.g. 100 * 1.1)
const EPSILON = 1e-9;

export class TokenEstimator {
  readonly safetyMargin: number;

  constructor(options: TokenEstimatorOptions = {}) {
    const margin = options.safetyMargin ?? 0.1;
    if (!Number.isFinite(margin) || margin < 0) {
      throw new RangeError(`safetyMargin must be a non-negative number, got ${margin}`);
    }
    this.safetyMargin = margin;
  }

  /**
   * Estimated tokens for text; 0 for empty text
   */
  estimate(text: string): number {
    if (!text) return 0;

    const cyrillicChars = (text.match(CYRILLIC) || []).length;
    const cjkChars = (text.match(CJK) || []).length;
    const otherChars = text.length - cyrillicChars - cjkChars;

    const raw = cyrillicChars / 2.5 + cjkChars / 1.5 + otherChars / 4;
    return Math.ceil(raw * (1 + this.safetyMargin) - EPSILON);
  }

  /**
   * Sum of estimates for several pieces of text
   */
  estimateAll(texts: readonly string[]): number {
    return texts.reduce((sum, text) => sum + this.estimate(text), 0);
  }
}

let defaultEstimator: TokenEstimator | null = null;

/**
 * Shared estimator with the default margin
 */
export function estimateTokens(text: string): number {
  if (!defaultEstimator) defaultEstimator = new TokenEstimator();
  return defaultEstimator.estimate(text);
}
