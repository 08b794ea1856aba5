/**
 * Source Corpus - Public API
 */

export { SourceCorpus, compareCorpusOrder, type SourceCorpusConfig } from './SourceCorpus';
export { TextFileExtractor, parseMarkdownSections, type MarkdownSection } from './TextFileExtractor';
export * from './types';
