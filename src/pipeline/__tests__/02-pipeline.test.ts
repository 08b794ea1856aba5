/**
 * Pipeline tests over an in-memory project
 */

import { InMemoryFileSystem } from '../../storage/FileSystem';
import { ManuscriptProject } from '../../project/ManuscriptProject';
import { DEFAULT_CONFIG } from '../../config/config';
import { TemplateService } from '../../generative/TemplateService';
import type { Pipeline } from '../Pipeline';
import { parseOutline } from '../outline';
import type { GenerateRequest, GenerateResult, GenerativeService } from '../../generative/types';
import {
  SectionNotInOutlineError,
  ServiceError,
  UnresolvedCitationWarning,
  VersionNotFoundError,
} from '../../errors';

const OUTLINE = parseOutline({
  topic: 'Glaciers',
  sections: [
    {
      id: 'introduction',
      title: 'Introduction',
      objectives: ['Explain glacier retreat'],
      keyPoints: ['Rates'],
      guidance: 'Formal tone',
    },
    { id: 'methods', title: 'Methods', subsections: [{ id: 'data', title: 'Data' }] },
  ],
});

function stubService(): { service: GenerativeService; generate: jest.Mock<Promise<GenerateResult>, [GenerateRequest]> } {
  const generate = jest.fn<Promise<GenerateResult>, [GenerateRequest]>();
  return { service: { name: 'stub', generate }, generate };
}

function lastRequest(generate: jest.Mock<Promise<GenerateResult>, [GenerateRequest]>): GenerateRequest {
  const calls = generate.mock.calls;
  return calls[calls.length - 1][0];
}

describe('Pipeline', () => {
  let project: ManuscriptProject;

  beforeAll(() => {
    process.env.MANUSCRIPT_LOG_LEVEL = 'silent';
  });

  beforeEach(async () => {
    project = new ManuscriptProject('/paper', new InMemoryFileSystem());
    await project.init();
    await project.saveOutline(OUTLINE);
    await project.corpus.add({
      kind: 'pdf',
      title: 'Glacier retreat rates',
      extractedText: 'Glaciers retreat quickly. Mass loss accelerates.',
      metadata: { authors: ['Jane Smith'], year: '2024' },
    });
  });

  describe('draft', () => {
    let pipeline: Pipeline;
    let generate: jest.Mock<Promise<GenerateResult>, [GenerateRequest]>;

    beforeEach(async () => {
      const stub = stubService();
      generate = stub.generate;
      generate.mockResolvedValue({ text: 'Glaciers retreat [cite: Smith2024] and [CITE:ghost2020].', model: 'stub-model' });
      pipeline = await project.createPipeline(stub.service);
    });

    it('should draft from assembled context and record version 1', async () => {
      const { snapshot, citations } = await pipeline.draft('introduction');

      expect(snapshot.versionNumber).toBe(1);
      expect(snapshot.operation).toBe('draft');
      expect(snapshot.operationDetail).toBe('Drafted with stub-model');
      expect(snapshot.content).toBe('Glaciers retreat [CITE:smith2024] and [CITE:ghost2020].');
      expect(snapshot.citationKeys).toEqual(['ghost2020', 'smith2024']);
      expect(citations.registered).toEqual(['smith2024']);
      expect(citations.unresolved).toEqual(['ghost2020']);

      const request = lastRequest(generate);
      expect(request.context?.includedFragments.map(f => f.citationKey)).toEqual(['smith2024']);
      expect(request.context?.guidanceText).toBe('Formal tone');
      expect(request.prompt).toContain('### [CITE:smith2024] Glacier retreat rates');
      expect(request.system).toContain('"Introduction"');
      expect(request.maxTokens).toBe(4096);
      expect(request.timeoutMs).toBe(120_000);
    });

    it('should append caller guidance to the outline guidance', async () => {
      await pipeline.draft('introduction', { guidance: 'Cite widely' });
      expect(lastRequest(generate).context?.guidanceText).toBe('Formal tone\n\nCite widely');
    });

    it('should refuse sections missing from the outline', async () => {
      await expect(pipeline.draft('results')).rejects.toBeInstanceOf(SectionNotInOutlineError);
      expect(generate).not.toHaveBeenCalled();
    });

    it('should keep everything sent to the service within the context budget', async () => {
      const config = { ...DEFAULT_CONFIG, context: { ...DEFAULT_CONFIG.context, maxTokens: 400 } };
      const small = new ManuscriptProject('/small', new InMemoryFileSystem(), config);
      await small.init();
      await small.saveOutline(OUTLINE);
      for (let i = 1; i <= 5; i++) {
        await small.corpus.add({
          kind: 'note',
          title: `Field note ${i}`,
          extractedText: `Glacier retreat observed at site ${i}. `.repeat(5).trim(),
        });
      }

      const stub = stubService();
      stub.generate.mockResolvedValue({ text: 'Draft.', model: 'stub' });
      await (await small.createPipeline(stub.service)).draft('introduction');

      const request = lastRequest(stub.generate);
      const sent = small.assembler.estimate(request.prompt) + small.assembler.estimate(request.system ?? '');
      expect(request.context?.includedFragments.length).toBeGreaterThan(0);
      expect(request.context?.overheadTokens).toBeGreaterThan(0);
      expect(sent).toBeLessThanOrEqual(400);
    });

    it('should leave history untouched when generation fails', async () => {
      generate.mockReset();
      generate.mockRejectedValue(new ServiceError('stub', 'down', 503));

      await expect(pipeline.draft('introduction')).rejects.toBeInstanceOf(ServiceError);
      expect(await project.versions.currentVersion('introduction')).toBe(0);
    });
  });

  describe('revise and polish', () => {
    let pipeline: Pipeline;
    let generate: jest.Mock<Promise<GenerateResult>, [GenerateRequest]>;

    beforeEach(async () => {
      const stub = stubService();
      generate = stub.generate;
      generate.mockImplementation(async request => ({
        text: `${request.baseContent ?? 'Draft [CITE:smith2024].'} +`,
        model: 'stub',
      }));
      pipeline = await project.createPipeline(stub.service);
      await pipeline.draft('introduction');
    });

    it('should revise the current text with feedback', async () => {
      const { snapshot } = await pipeline.revise('introduction', 'Shorter please');

      expect(snapshot.versionNumber).toBe(2);
      expect(snapshot.operation).toBe('revise');
      expect(snapshot.operationDetail).toBe('Shorter please');
      expect(snapshot.content).toBe('Draft [CITE:smith2024]. + +');

      const request = lastRequest(generate);
      expect(request.baseContent).toBe('Draft [CITE:smith2024]. +');
      expect(request.context).toBeUndefined();
      expect(request.system).toContain('(Revision 1)');
      expect(request.prompt).toContain('**Feedback to Address:**\nShorter please');
    });

    it('should count revisions', async () => {
      await pipeline.revise('introduction', 'one');
      await pipeline.polish('introduction');
      await pipeline.revise('introduction', 'two');

      expect(lastRequest(generate).system).toContain('(Revision 2)');
    });

    it('should polish with focus feedback', async () => {
      const focused = await pipeline.polish('introduction', 'clarity');
      const general = await pipeline.polish('introduction');

      expect(focused.snapshot.operation).toBe('polish');
      expect(focused.snapshot.operationDetail).toBe('focus: clarity');
      expect(general.snapshot.operationDetail).toBe('general');
      expect(lastRequest(generate).prompt).toContain(
        'Polish this section to improve overall quality, clarity, and academic rigor.'
      );
    });

    it('should review the current text without recording a version', async () => {
      const review = await pipeline.review('introduction');

      expect(review).toEqual({
        sectionId: 'introduction',
        versionNumber: 1,
        review: 'Draft [CITE:smith2024]. +',
        model: 'stub',
      });
      expect(await project.versions.currentVersion('introduction')).toBe(1);

      const request = lastRequest(generate);
      expect(request.baseContent).toBeUndefined();
      expect(request.prompt).toContain('Review the following Introduction section');
      expect(request.prompt).toContain('**Section Content:**\nDraft [CITE:smith2024]. +\n');
    });

    it('should fail to revise a section that was never drafted', async () => {
      await expect(pipeline.revise('data', 'anything')).rejects.toBeInstanceOf(VersionNotFoundError);
    });

    it('should revert through the version store', async () => {
      await pipeline.revise('introduction', 'one');
      const reverted = await pipeline.revert('introduction', 1);

      expect(reverted.versionNumber).toBe(3);
      expect(reverted.content).toBe('Draft [CITE:smith2024]. +');
    });
  });

  describe('reviseAll', () => {
    it('should revise drafted sections in order, honouring skips and isolating failures', async () => {
      const { service, generate } = stubService();
      generate.mockImplementation(async request => {
        if (request.baseContent?.startsWith('Appendix')) {
          throw new ServiceError('stub', 'boom', 400);
        }
        return { text: `${request.baseContent ?? 'x'} revised`, model: 'stub' };
      });
      const pipeline = await project.createPipeline(service);

      await project.versions.append('appendix', 'Appendix text', 'manual');
      await project.versions.append('introduction', 'Intro text', 'draft');
      await project.versions.append('data', 'Data text', 'draft');

      const outcomes = await pipeline.reviseAll('Tighten', { skip: ['data'], concurrency: 2 });

      expect(outcomes.map(o => [o.sectionId, o.status])).toEqual([
        ['introduction', 'revised'],
        ['data', 'skipped'],
        ['appendix', 'failed'],
      ]);
      expect(outcomes[0].snapshot?.content).toBe('Intro text revised');
      expect(outcomes[2].error).toBe('stub error (status 400): boom');
      expect(await project.versions.currentVersion('appendix')).toBe(1);
      expect(await project.versions.currentVersion('data')).toBe(1);
    });
  });

  describe('reporting', () => {
    let pipeline: Pipeline;

    beforeEach(async () => {
      pipeline = await project.createPipeline(new TemplateService());
    });

    it('should scaffold a cited draft without a model and render it', async () => {
      await pipeline.draft('introduction');

      expect((await project.versions.get('introduction')).content).toBe(
        'Introduction\nExplain glacier retreat\nRates\n\nGlaciers retreat quickly. [CITE:smith2024]'
      );
      expect(await pipeline.currentText('introduction', 'latex')).toBe(
        'Introduction\nExplain glacier retreat\nRates\n\nGlaciers retreat quickly. \\cite{smith2024}'
      );
      expect(await pipeline.currentText('introduction', 'markdown-author-year')).toBe(
        'Introduction\nExplain glacier retreat\nRates\n\nGlaciers retreat quickly. (Smith, 2024)'
      );
    });

    it('should record imported text as a manual version', async () => {
      const { snapshot, citations } = await pipeline.recordManual(
        'introduction',
        'Edited [cite: Smith2024].',
        'Imported from intro.md'
      );

      expect(snapshot.versionNumber).toBe(1);
      expect(snapshot.operation).toBe('manual');
      expect(snapshot.operationDetail).toBe('Imported from intro.md');
      expect(snapshot.content).toBe('Edited [CITE:smith2024].');
      expect(citations.registered).toEqual(['smith2024']);
    });

    it('should summarize the manuscript', async () => {
      await project.versions.append('introduction', 'one two three', 'draft');
      await project.versions.append('data', 'four five [CITE:a]', 'draft');

      expect(await pipeline.statistics()).toEqual({
        sectionsDrafted: 2,
        totalWords: 6,
        totalCitations: 1,
        averageWordsPerSection: 3,
      });
    });

    it('should report unresolved and malformed citations per section', async () => {
      await project.citations.register('smith2024');
      await project.versions.append('introduction', 'Fine [CITE:smith2024].', 'draft');
      await project.versions.append('data', 'Missing [CITE:ghost2020] and broken [CITE:', 'draft');

      const reports = await pipeline.checkCitations();

      expect(reports.map(r => [r.sectionId, r.versionNumber, r.unresolved, r.malformed])).toEqual([
        ['introduction', 1, [], []],
        ['data', 1, ['ghost2020'], ['[CITE:']],
      ]);
      expect(reports[0].warning).toBeUndefined();
      expect(reports[1].warning).toBeInstanceOf(UnresolvedCitationWarning);
      expect(reports[1].warning?.keys).toEqual(['ghost2020']);
    });

    it('should expose the context a draft would use', async () => {
      const context = await pipeline.buildContext('introduction', { focusTerms: ['mass'] });

      expect(context.objectiveText).toBe('Introduction\nExplain glacier retreat\nRates');
      expect(context.includedFragments).toHaveLength(1);
      expect(context.budget).toBe(100_000);
    });
  });
});
