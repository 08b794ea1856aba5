/**
 * A section's full lifecycle: draft, polish, revise, revert, render
 */

import { InMemoryFileSystem } from '../../storage/FileSystem';
import { VersionStore } from '../VersionStore';
import { Bibliography } from '../../citation-resolver/Bibliography';
import { CitationResolver } from '../../citation-resolver/CitationResolver';
import { CitationInUseError } from '../../errors';

const DRAFT = 'Glaciers are retreating [CITE:smith2024].';
const POLISHED = 'Glaciers are retreating rapidly [CITE:smith2024].';
const REVISED = 'Glaciers retreat.';

describe('Section lifecycle', () => {
  let versions: VersionStore;
  let citations: CitationResolver;

  beforeAll(() => {
    process.env.MANUSCRIPT_LOG_LEVEL = 'silent';
  });

  beforeEach(async () => {
    const fs = new InMemoryFileSystem();
    versions = new VersionStore(fs, { versionsDir: '/paper/.manuscript/versions' });
    citations = new CitationResolver(new Bibliography(fs, { filePath: '/paper/.manuscript/bibliography.jsonl' }), versions);
    await versions.init();
    await citations.init();

    await versions.append('introduction', DRAFT, 'draft');
    await versions.append('introduction', POLISHED, 'polish', 'focus: clarity');
    await versions.append('introduction', REVISED, 'revise', 'shorter');
  });

  it('should record each operation in order', async () => {
    const history = await versions.history('introduction');

    expect(history.map(h => h.versionNumber)).toEqual([1, 2, 3]);
    expect(history.map(h => h.operation)).toEqual(['draft', 'polish', 'revise']);
  });

  it('should restore the draft as a fourth version', async () => {
    const reverted = await versions.revert('introduction', 1);

    expect(reverted.versionNumber).toBe(4);
    expect(reverted.content).toBe(DRAFT);
    expect(reverted.citationKeys).toEqual(['smith2024']);
    expect((await versions.history('introduction')).map(h => h.operation)).toEqual([
      'draft',
      'polish',
      'revise',
      'revert',
    ]);
  });

  it('should keep the marker while the key is unregistered', async () => {
    const current = await versions.revert('introduction', 1);

    expect(citations.render(current.content, 'latex')).toBe(DRAFT);
    expect(citations.unresolved(current.citationKeys)).toEqual(new Set(['smith2024']));
  });

  it('should render the citation once the key is registered', async () => {
    const current = await versions.revert('introduction', 1);
    await citations.register('smith2024', { authors: ['Jane Smith'], year: '2024', title: 'Ice' });

    expect(citations.render(current.content, 'latex')).toBe('Glaciers are retreating \\cite{smith2024}.');
    expect(citations.render(current.content, 'markdown-author-year')).toBe(
      'Glaciers are retreating (Smith, 2024).'
    );
    expect(citations.unresolved(current.citationKeys).size).toBe(0);
  });

  it('should refuse to drop a key that history still cites', async () => {
    await citations.register('smith2024');

    await expect(citations.remove('smith2024')).rejects.toBeInstanceOf(CitationInUseError);
  });

  it('should diff the polish against the draft', async () => {
    const records = await versions.diff('introduction', 1, 2);

    expect(records).toEqual([
      { type: 'removed', line: DRAFT, oldLine: 1 },
      { type: 'added', line: POLISHED, newLine: 1 },
    ]);
  });
});
