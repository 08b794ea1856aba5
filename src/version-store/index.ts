/**
 * Version Store - Public API
 */

export { VersionStore, countWords } from './VersionStore';
export { diffLines, formatDiff, invertDiff, splitLines } from './line-diff';
export * from './types';
