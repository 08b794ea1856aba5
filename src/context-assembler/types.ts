/**
 * Context Assembler - Type Definitions
 */

import type { SourceDocument } from '../source-corpus/types';

export interface AssembleRequest {
  /** What the section must achieve; always included verbatim */
  objective: string;
  /** Author instructions; always included verbatim */
  guidance: string;
  corpus: readonly SourceDocument[];
  maxTokens: number;
  /** Extra terms that earn a ranking bonus */
  focusTerms?: readonly string[];
  /** Tokens of text sent alongside the context (system prompt, instructions) */
  overheadTokens?: number;
}

export interface ContextFragment {
  sourceId: string;
  citationKey: string;
  title: string;
  excerpt: string;
  /** Heading and excerpt as rendered */
  tokenCost: number;
  truncated: boolean;
}

export interface ContextPayload {
  /** In inclusion order */
  includedFragments: ContextFragment[];
  /** Overhead + objective + guidance + fragments with their headings; never above budget */
  totalTokens: number;
  overheadTokens: number;
  guidanceText: string;
  objectiveText: string;
  budget: number;
  /** Sources ranked but left out for lack of room */
  excludedSourceIds: string[];
}

export interface RankedSource {
  document: SourceDocument;
  score: number;
}

export interface Excerpt {
  text: string;
  truncated: boolean;
}
