/**
 * Version Store - Type Definitions
 */

import { z } from 'zod';

/**
 * What produced a snapshot
 */
export const SNAPSHOT_OPERATIONS = [
  'draft',   // First generation from the outline
  'revise',  // Rewrite driven by feedback
  'polish',  // Focused refinement (clarity, flow, ...)
  'revert',  // Copy of an earlier version
  'manual',  // Edited outside the pipeline
] as const;

export type SnapshotOperation = (typeof SNAPSHOT_OPERATIONS)[number];

/**
 * One immutable recorded state of a section
 */
export interface SectionSnapshot {
  sectionId: string;
  versionNumber: number;
  content: string;
  operation: SnapshotOperation;
  operationDetail?: string;
  createdAt: string; // ISO 8601
  wordCount: number;
  citationKeys: string[];
}

export interface SnapshotSummary {
  versionNumber: number;
  operation: SnapshotOperation;
  operationDetail?: string;
  createdAt: string;
  wordCount: number;
}

export type DiffChangeType = 'added' | 'removed' | 'unchanged';

/**
 * One line of a diff. Line numbers are 1-based.
 */
export interface DiffRecord {
  type: DiffChangeType;
  line: string;
  oldLine?: number;
  newLine?: number;
}

export interface VersionStoreConfig {
  /** Directory holding one `<sectionId>.jsonl` per section */
  versionsDir: string;
  /** Max wait for the per-section write lock */
  lockTimeoutMs?: number;
}

/**
 * Persisted snapshot line
 */
export const sectionSnapshotSchema = z.object({
  sectionId: z.string().min(1),
  versionNumber: z.number().int().positive(),
  content: z.string(),
  operation: z.enum(SNAPSHOT_OPERATIONS),
  operationDetail: z.string().optional(),
  createdAt: z.string(),
  wordCount: z.number().int().nonnegative(),
  citationKeys: z.array(z.string()),
});
