/**
 * Storage primitives shared by the version store, bibliography and corpus
 */

export { RealFileSystem, InMemoryFileSystem, isNotFoundError, type FileSystem, type FileStats } from './FileSystem';
export { JSONLFile, type RecordParser } from './JSONLFile';
