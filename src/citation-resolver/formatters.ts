/**
 * Citation Formatters
 *
 * Inline renderers per output format, plus reference-list and BibTeX output.
 */

import type { BibliographyEntry, BibliographyStyle, CitationFormat, CitationFormatter } from './types';

/**
 * Surname from "Last, First" or "First Last"
 */
export function surname(author: string): string {
  const trimmed = author.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',')[0].trim();
  }
  const parts = trimmed.split(/\s+/);
  return parts[parts.length - 1] ?? '';
}

export class LatexFormatter implements CitationFormatter {
  readonly format = 'latex' as const;

  inline(key: string, _entry?: BibliographyEntry): string {
    return `\\cite{${key}}`;
  }
}

/**
 * `(Smith, 2024)`, `(Smith & Doe, 2024)`, `(Smith et al., 2024)`; `[key]`
 * when authors or year are missing
 */
export class AuthorYearFormatter implements CitationFormatter {
  readonly format = 'markdown-author-year' as const;

  inline(key: string, entry: BibliographyEntry): string {
    const names = entry.authors.map(surname).filter(Boolean);
    const year = entry.year.trim();

    if (names.length === 0 || !year) {
      return `[${key}]`;
    }

    let authorText = names[0];
    if (names.length === 2) {
      authorText += ` & ${names[1]}`;
    } else if (names.length > 2) {
      authorText += ' et al.';
    }

    return `(${authorText}, ${year})`;
  }
}

export const DEFAULT_FORMATTERS: Record<CitationFormat, CitationFormatter> = {
  latex: new LatexFormatter(),
  'markdown-author-year': new AuthorYearFormatter(),
};

// ============================================================================
// Reference lists
// ============================================================================

function formatApaEntry(entry: BibliographyEntry): string {
  const parts: string[] = [];
  const authors = entry.authors;

  if (authors.length === 1) {
    parts.push(`${authors[0]}.`);
  } else if (authors.length > 1 && authors.length <= 7) {
    parts.push(`${authors.slice(0, -1).join(', ')}, & ${authors[authors.length - 1]}.`);
  } else if (authors.length > 7) {
    parts.push(`${authors.slice(0, 6).join(', ')}, ... ${authors[authors.length - 1]}.`);
  }

  if (entry.year) parts.push(`(${entry.year}).`);
  if (entry.title) parts.push(`${entry.title}.`);

  const journal = entry.rawMetadata.journal;
  if (typeof journal === 'string' && journal) parts.push(`*${journal}*.`);

  const doi = entry.rawMetadata.doi;
  if (typeof doi === 'string' && doi) parts.push(`https://doi.org/${doi}`);

  return parts.length > 0 ? parts.join(' ') : entry.key;
}

function formatIeeeEntry(entry: BibliographyEntry): string {
  const parts: string[] = [];
  const authors = entry.authors;

  if (authors.length === 1) {
    parts.push(`${authors[0]},`);
  } else if (authors.length > 1) {
    parts.push(`${authors.slice(0, -1).join(', ')}, and ${authors[authors.length - 1]},`);
  }

  if (entry.title) parts.push(`"${entry.title},"`);

  const journal = entry.rawMetadata.journal;
  if (typeof journal === 'string' && journal) parts.push(`*${journal}*,`);

  if (entry.year) parts.push(`${entry.year}.`);

  return parts.length > 0 ? parts.join(' ') : entry.key;
}

/**
 * Markdown reference list. APA is sorted by first author then year; IEEE
 * keeps registration order and numbers the entries.
 */
export function formatBibliography(entries: BibliographyEntry[], style: BibliographyStyle): string {
  if (entries.length === 0) return '';

  const lines = ['# References'];

  if (style === 'ieee') {
    entries.forEach((entry, i) => lines.push(`[${i + 1}] ${formatIeeeEntry(entry)}`));
  } else {
    const sorted = [...entries].sort((a, b) => {
      const byAuthor = (a.authors[0] ?? '').localeCompare(b.authors[0] ?? '');
      if (byAuthor !== 0) return byAuthor;
      const byYear = a.year.localeCompare(b.year);
      return byYear !== 0 ? byYear : a.key.localeCompare(b.key);
    });
    sorted.forEach(entry => lines.push(formatApaEntry(entry)));
  }

  return lines.join('\n\n');
}

function escapeBibtex(value: string): string {
  return value.replace(/[{}]/g, match => `\\${match}`);
}

export function toBibtex(entry: BibliographyEntry): string {
  const entryType = typeof entry.rawMetadata.entryType === 'string' ? entry.rawMetadata.entryType : 'article';
  const lines = [`@${entryType}{${entry.key},`];

  if (entry.title) lines.push(`  title={${escapeBibtex(entry.title)}},`);
  if (entry.authors.length > 0) lines.push(`  author={${escapeBibtex(entry.authors.join(' and '))}},`);
  if (entry.year) lines.push(`  year={${entry.year}},`);

  for (const field of ['journal', 'doi', 'url'] as const) {
    const value = entry.rawMetadata[field];
    if (typeof value === 'string' && value) lines.push(`  ${field}={${escapeBibtex(value)}},`);
  }

  lines.push('}');
  return lines.join('\n');
}

export function exportBibtex(entries: BibliographyEntry[]): string {
  return entries.map(toBibtex).join('\n\n');
}
