/**
 * Template service tests
 */

import { TemplateService, scaffold } from '../TemplateService';
import { GenerationCancelledError } from '../../errors';
import type { ContextPayload } from '../../context-assembler/types';

const payload: ContextPayload = {
  includedFragments: [
    {
      sourceId: 'src_1',
      citationKey: 'smith2024',
      title: 'Ice',
      excerpt: 'Glaciers   shrink\nfast. More text.\n\nSecond paragraph.',
      tokenCost: 10,
      truncated: false,
    },
    { sourceId: 'src_2', citationKey: 'doe2023', title: 'Notes', excerpt: 'No sentence end here', tokenCost: 5, truncated: true },
    { sourceId: 'src_3', citationKey: 'blank', title: 'Blank', excerpt: '   ', tokenCost: 0, truncated: false },
  ],
  totalTokens: 40,
  overheadTokens: 0,
  guidanceText: '',
  objectiveText: '  Explain glacier retreat ',
  budget: 100,
  excludedSourceIds: [],
};

describe('TemplateService', () => {
  const service = new TemplateService();

  it('should scaffold a draft from the context', async () => {
    const result = await service.generate({ prompt: 'ignored', context: payload });

    expect(result).toEqual({
      text: 'Explain glacier retreat\n\nGlaciers shrink fast. [CITE:smith2024]\n\nNo sentence end here [CITE:doe2023]',
      model: 'template',
    });
    expect(scaffold(payload)).toBe(result.text);
  });

  it('should return the current text for revisions', async () => {
    const result = await service.generate({ prompt: 'revise', baseContent: 'Current [CITE:a].', context: payload });
    expect(result.text).toBe('Current [CITE:a].');
  });

  it('should echo the prompt without context', async () => {
    expect((await service.generate({ prompt: 'plain' })).text).toBe('plain');
  });

  it('should honour cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(service.generate({ prompt: 'p', signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelledError
    );
  });
});
