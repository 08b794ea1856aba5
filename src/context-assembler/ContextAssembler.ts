/**
 * Context Assembler
 *
 * Builds a budget-bounded prompt context from the source corpus. Objective
 * and guidance are reserved first; sources follow in relevance order until
 * the first one that does not fit, which is cut at a boundary and ends the
 * pass. Identical inputs give identical payloads.
 */

import { ContextOverflowError } from '../errors';
import { citationKeyFor } from '../citation-resolver/keys';
import { createLogger } from '../logger';
import { TokenEstimator } from './token-estimator';
import { rankSources } from './relevance';
import { truncateToTokens } from './truncation';
import type { AssembleRequest, ContextFragment, ContextPayload } from './types';

const log = createLogger('ContextAssembler');

export interface ContextAssemblerConfig {
  safetyMargin: number;
  /** Separator between sections of the rendered prompt */
  sectionSeparator: string;
}

export const DEFAULT_CONFIG: ContextAssemblerConfig = {
  safetyMargin: 0.1,
  sectionSeparator: '\n\n---\n\n',
};

export class ContextAssembler {
  private config: ContextAssemblerConfig;
  private estimator: TokenEstimator;

  constructor(config: Partial<ContextAssemblerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.estimator = new TokenEstimator({ safetyMargin: this.config.safetyMargin });
  }

  estimate(text: string): number {
    return this.estimator.estimate(text);
  }

  assemble(request: AssembleRequest): ContextPayload {
    const { objective, guidance, corpus, maxTokens } = request;
    const overheadTokens = request.overheadTokens ?? 0;

    const reserved =
      overheadTokens +
      this.estimator.estimate(this.objectiveBlock(objective)) +
      this.estimator.estimate(this.guidanceBlock(guidance));
    if (reserved > maxTokens) {
      throw new ContextOverflowError(reserved, maxTokens);
    }

    const includedFragments: ContextFragment[] = [];
    const excludedSourceIds: string[] = [];
    const headerCost = this.estimator.estimate(this.sourcesHeader());
    let totalTokens = reserved;
    let exhausted = false;

    for (const { document } of rankSources(corpus, objective, request.focusTerms)) {
      if (exhausted || !document.extractedText.trim()) {
        excludedSourceIds.push(document.id);
        continue;
      }

      const citationKey = citationKeyFor(document);
      const header = includedFragments.length === 0 ? headerCost : 0;
      const remaining = maxTokens - totalTokens - header;

      const whole = this.fragment(document.id, citationKey, document.title, document.extractedText, false);
      if (whole.tokenCost <= remaining) {
        includedFragments.push(whole);
        totalTokens += header + whole.tokenCost;
        continue;
      }

      exhausted = true;
      const heading = this.fragmentHeading(citationKey, document.title, true);
      const excerpt = truncateToTokens(document.extractedText, remaining, text =>
        this.estimator.estimate(heading + text)
      );
      if (!excerpt) {
        excludedSourceIds.push(document.id);
        continue;
      }

      const cut = this.fragment(document.id, citationKey, document.title, excerpt.text, true);
      includedFragments.push(cut);
      totalTokens += header + cut.tokenCost;
    }

    log.debug(
      `Assembled ${includedFragments.length} fragment(s), ${totalTokens}/${maxTokens} tokens, ` +
        `${excludedSourceIds.length} excluded`
    );

    return {
      includedFragments,
      totalTokens,
      overheadTokens,
      guidanceText: guidance,
      objectiveText: objective,
      budget: maxTokens,
      excludedSourceIds,
    };
  }

  /**
   * Text sent to the generative service. Built from the same pieces
   * `assemble` costs, so its estimate never exceeds `totalTokens - overheadTokens`.
   */
  renderPrompt(payload: ContextPayload): string {
    let text = this.objectiveBlock(payload.objectiveText) + this.guidanceBlock(payload.guidanceText);

    if (payload.includedFragments.length > 0) {
      text += this.sourcesHeader();
      for (const f of payload.includedFragments) {
        text += this.fragmentHeading(f.citationKey, f.title, f.truncated) + f.excerpt;
      }
    }

    return text;
  }

  private objectiveBlock(objective: string): string {
    return `## Objective\n\n${objective}`;
  }

  private guidanceBlock(guidance: string): string {
    return guidance.trim() ? `${this.config.sectionSeparator}## Guidance\n\n${guidance}` : '';
  }

  private sourcesHeader(): string {
    return `${this.config.sectionSeparator}## Sources`;
  }

  private fragmentHeading(citationKey: string, title: string, truncated: boolean): string {
    const marker = truncated ? ' (excerpt)' : '';
    return `\n\n### [CITE:${citationKey}] ${title}${marker}\n\n`;
  }

  /**
   * A fragment costs its heading plus its excerpt
   */
  private fragment(
    sourceId: string,
    citationKey: string,
    title: string,
    excerpt: string,
    truncated: boolean
  ): ContextFragment {
    const tokenCost = this.estimator.estimate(this.fragmentHeading(citationKey, title, truncated) + excerpt);
    return { sourceId, citationKey, title, excerpt, tokenCost, truncated };
  }
}
