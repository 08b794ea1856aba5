/**
 * Inline formatters, reference lists and BibTeX
 */

import {
  AuthorYearFormatter,
  LatexFormatter,
  exportBibtex,
  formatBibliography,
  surname,
  toBibtex,
} from '../formatters';
import type { BibliographyEntry } from '../types';

function entry(overrides: Partial<BibliographyEntry> & { key: string }): BibliographyEntry {
  return { title: '', authors: [], year: '', rawMetadata: {}, ...overrides };
}

describe('Citation formatters', () => {
  describe('surname', () => {
    it('should handle both name orders', () => {
      expect(surname('Jane Smith')).toBe('Smith');
      expect(surname('Smith, Jane')).toBe('Smith');
      expect(surname('  Plato ')).toBe('Plato');
    });
  });

  describe('LatexFormatter', () => {
    it('should emit \\cite', () => {
      expect(new LatexFormatter().inline('smith2024', entry({ key: 'smith2024' }))).toBe('\\cite{smith2024}');
    });
  });

  describe('AuthorYearFormatter', () => {
    const formatter = new AuthorYearFormatter();

    it('should format one, two and many authors', () => {
      expect(formatter.inline('k', entry({ key: 'k', authors: ['Jane Smith'], year: '2024' }))).toBe('(Smith, 2024)');
      expect(formatter.inline('k', entry({ key: 'k', authors: ['Smith, Jane', 'Doe, John'], year: '2024' }))).toBe(
        '(Smith & Doe, 2024)'
      );
      expect(formatter.inline('k', entry({ key: 'k', authors: ['A Smith', 'B Doe', 'C Lee'], year: '2024' }))).toBe(
        '(Smith et al., 2024)'
      );
    });

    it('should fall back to the bracketed key when metadata is incomplete', () => {
      expect(formatter.inline('smith2024', entry({ key: 'smith2024', authors: ['Jane Smith'] }))).toBe('[smith2024]');
      expect(formatter.inline('smith2024', entry({ key: 'smith2024', year: '2024' }))).toBe('[smith2024]');
    });
  });

  describe('formatBibliography', () => {
    const glaciers = entry({
      key: 'doe2023',
      title: 'Glaciers',
      authors: ['Doe, Jane'],
      year: '2023',
      rawMetadata: { journal: 'Ice' },
    });
    const sheets = entry({ key: 'smith2024', title: 'Ice sheets', authors: ['Smith, Ann', 'Lee, Bo'], year: '2024' });

    it('should sort APA entries by first author', () => {
      expect(formatBibliography([sheets, glaciers], 'apa')).toBe(
        '# References\n\nDoe, Jane. (2023). Glaciers. *Ice*.\n\nSmith, Ann, & Lee, Bo. (2024). Ice sheets.'
      );
    });

    it('should number IEEE entries in registration order', () => {
      expect(formatBibliography([sheets, glaciers], 'ieee')).toBe(
        '# References\n\n[1] Smith, Ann, and Lee, Bo, "Ice sheets," 2024.\n\n[2] Doe, Jane, "Glaciers," *Ice*, 2023.'
      );
    });

    it('should return an empty string for no entries', () => {
      expect(formatBibliography([], 'apa')).toBe('');
    });

    it('should fall back to the key for an empty entry', () => {
      expect(formatBibliography([entry({ key: 'bare' })], 'apa')).toBe('# References\n\nbare');
    });
  });

  describe('BibTeX', () => {
    it('should write populated fields only', () => {
      const bib = toBibtex(
        entry({ key: 'doe2023', title: 'Glaciers', authors: ['Doe, Jane'], year: '2023', rawMetadata: { journal: 'Ice' } })
      );
      expect(bib).toBe('@article{doe2023,\n  title={Glaciers},\n  author={Doe, Jane},\n  year={2023},\n  journal={Ice},\n}');
    });

    it('should escape braces and honour entryType', () => {
      const bib = toBibtex(
        entry({
          key: 'site',
          title: 'The {best} page',
          authors: ['A One', 'B Two'],
          rawMetadata: { entryType: 'misc', url: 'https://example.com' },
        })
      );
      expect(bib).toBe(
        '@misc{site,\n  title={The \\{best\\} page},\n  author={A One and B Two},\n  url={https://example.com},\n}'
      );
    });

    it('should separate entries with a blank line', () => {
      expect(exportBibtex([entry({ key: 'a' }), entry({ key: 'b' })])).toBe('@article{a,\n}\n\n@article{b,\n}');
    });
  });
});
