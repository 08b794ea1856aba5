/**
 * Template Service
 *
 * Deterministic stand-in for a model: revise and polish hand back the
 * current text unchanged; a draft is scaffolded from the assembled context,
 * one paragraph per source, each ending with that source's citation marker.
 */

import { GenerationCancelledError } from '../errors';
import { sentenceEnds } from '../context-assembler/truncation';
import type { ContextPayload } from '../context-assembler/types';
import type { GenerateRequest, GenerateResult, GenerativeService } from './types';

export class TemplateService implements GenerativeService {
  readonly name = 'template';

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    if (request.signal?.aborted) {
      throw new GenerationCancelledError(this.name);
    }

    if (request.baseContent !== undefined) {
      return { text: request.baseContent, model: this.name };
    }

    const text = request.context ? scaffold(request.context) : request.prompt;
    return { text, model: this.name };
  }
}

function firstSentence(text: string): string {
  const paragraph = text.trim().split(/\n\s*\n/)[0] ?? '';
  const end = sentenceEnds(paragraph)[0];
  return (end === undefined ? paragraph : paragraph.slice(0, end)).replace(/\s+/g, ' ').trim();
}

export function scaffold(context: ContextPayload): string {
  const parts = [context.objectiveText.trim()];

  for (const fragment of context.includedFragments) {
    const lead = firstSentence(fragment.excerpt);
    if (lead) parts.push(`${lead} [CITE:${fragment.citationKey}]`);
  }

  return parts.filter(Boolean).join('\n\n');
}
