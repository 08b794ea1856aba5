/**
 * Prompt library for drafting, revision and polish
 */

import type { OutlineSection } from './outline';

export interface PromptPair {
  system: string;
  user: string;
}

export type PolishFocus = 'clarity' | 'flow' | 'citations' | 'conciseness';

export const POLISH_FOCI: readonly PolishFocus[] = ['clarity', 'flow', 'citations', 'conciseness'];

const POLISH_FEEDBACK: Record<PolishFocus, string> = {
  clarity:
    'Improve clarity and readability. Simplify complex sentences and ensure ideas are clearly expressed.',
  flow: 'Improve the logical flow and transitions between paragraphs. Ensure smooth progression of ideas.',
  citations:
    'Strengthen the use of citations. Add citations where claims need support and ensure proper attribution.',
  conciseness:
    'Make the writing more concise. Remove redundant phrases and tighten the prose without losing meaning.',
};

export const GENERAL_POLISH_FEEDBACK = 'Polish this section to improve overall quality, clarity, and academic rigor.';

export function isPolishFocus(value: string): value is PolishFocus {
  return (POLISH_FOCI as readonly string[]).includes(value);
}

export function polishFeedback(focus?: PolishFocus): string {
  return focus ? POLISH_FEEDBACK[focus] : GENERAL_POLISH_FEEDBACK;
}

/**
 * The user prompt is a fixed frame with the context inserted verbatim, so
 * its size is the frame's plus the context's.
 *
 * @param context - assembled context rendered as text (objective, guidance, sources)
 */
export function sectionDrafting(section: OutlineSection, context: string): PromptPair {
  const system = [
    `You are an expert academic writer drafting the "${section.title}" section of a research paper.`,
    '',
    'Write in a clear, academic style that:',
    '- Maintains scholarly tone and rigor',
    '- Cites sources with markers of the form [CITE:key], using the keys given with each source',
    '- Presents ideas logically and supports claims with evidence',
    '',
    `Target length: approximately ${section.wordCountTarget} words.`,
  ].join('\n');

  const user = [
    `Write the ${section.title} section of the paper.`,
    '',
    context,
    '',
    '**Instructions:**',
    '1. Cover the objective and every point it lists while maintaining logical flow',
    '2. Cite only the sources listed above, as [CITE:key]',
    `3. Target approximately ${section.wordCountTarget} words`,
    '',
    'Write the complete section in Markdown format.',
  ].join('\n');

  return { system, user };
}

export function sectionReview(sectionTitle: string, content: string): PromptPair {
  const system = [
    'You are an expert peer reviewer evaluating academic writing.',
    'Provide constructive, specific feedback focusing on:',
    '- Clarity and coherence',
    '- Logical structure and flow',
    '- Evidence and citation usage',
    '- Technical accuracy',
    '- Writing quality',
  ].join('\n');

  const user = [
    `Review the following ${sectionTitle} section and provide detailed feedback.`,
    '',
    '**Section Content:**',
    content,
    '',
    '**Provide feedback on:**',
    '1. **Strengths**: What works well (2-3 points)',
    '2. **Areas for Improvement**: Specific issues and suggestions (3-5 points)',
    '3. **Structure**: Comments on organization and flow',
    '4. **Citations**: Assessment of [CITE:key] usage',
    '5. **Clarity**: Any unclear or confusing parts',
    '',
    'Format your feedback in clear, actionable Markdown.',
  ].join('\n');

  return { system, user };
}

export function sectionRevision(content: string, feedback: string, iteration: number): PromptPair {
  const system = [
    `You are an expert academic writer revising a paper section (Revision ${iteration}).`,
    '',
    'Your task is to improve the section by:',
    '- Addressing all feedback points',
    '- Preserving good elements and every [CITE:key] marker that still applies',
    '- Ensuring coherent flow',
  ].join('\n');

  const user = [
    'Revise the following section based on the feedback provided.',
    '',
    '**Original Content:**',
    content,
    '',
    '**Feedback to Address:**',
    feedback,
    '',
    'Provide the complete revised section in Markdown format.',
  ].join('\n');

  return { system, user };
}
