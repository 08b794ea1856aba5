/**
 * Citation Resolver - Public API
 */

export { CitationResolver } from './CitationResolver';
export { Bibliography, mergeEntry, type BibliographyConfig } from './Bibliography';
export {
  AuthorYearFormatter,
  DEFAULT_FORMATTERS,
  LatexFormatter,
  exportBibtex,
  formatBibliography,
  surname,
  toBibtex,
} from './formatters';
export { citationKeyFor, citationMetadataFor, indexSourcesByKey } from './keys';
export {
  canonicalizeMarkers,
  extractCitationKeys,
  extractMarkers,
  findMalformedMarkers,
  isValidKey,
  normalizeKey,
  replaceMarkers,
  scanMarkers,
  type MalformedMarker,
  type MalformedReason,
  type MarkerMatch,
} from './markers';
export * from './types';
