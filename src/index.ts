/**
 * manuscript-engine
 *
 * Versioned section history, budgeted context assembly and citation
 * management for an iterative document-authoring pipeline.
 */

// Errors
export * from './errors';

// Logging
export { createLogger, isLogLevel, type LogLevel, type Logger } from './logger';

// Storage
export { RealFileSystem, InMemoryFileSystem, JSONLFile, isNotFoundError } from './storage';
export type { FileSystem, FileStats, RecordParser } from './storage';

// Locking
export { KeyedLockManager } from './locking';
export type { KeyedLock, KeyedLockManagerConfig } from './locking';

// Source Corpus
export * from './source-corpus';

// Context Assembler
export * from './context-assembler';

// Version Store
export * from './version-store';

// Citation Resolver
export * from './citation-resolver';

// Generative Service
export * from './generative';

// Pipeline
export * from './pipeline';

// Project
export * from './project';

// Config
export { CONFIG_FILE_NAME, loadConfig, parseConfig, type LoadConfigOptions, type ManuscriptConfig } from './config';
export { DEFAULT_CONFIG as DEFAULT_MANUSCRIPT_CONFIG } from './config';
