/**
 * Context Assembler Module
 *
 * Assembles budget-bounded prompt context from the source corpus.
 */

export type { AssembleRequest, ContextFragment, ContextPayload, Excerpt, RankedSource } from './types';

export { TokenEstimator, estimateTokens, type TokenEstimatorOptions } from './token-estimator';

export {
  extractTerms,
  rankSources,
  scoreSource,
  BODY_WEIGHT,
  FOCUS_WEIGHT,
  KEYWORD_WEIGHT,
  TITLE_WEIGHT,
} from './relevance';

export { paragraphEnds, sentenceEnds, truncateToTokens } from './truncation';

export {
  ContextAssembler,
  DEFAULT_CONFIG,
  type ContextAssemblerConfig,
} from './ContextAssembler';
