/**
 * Document outline (`outline.json` at the project root)
 */

import { z } from 'zod';
import type { FileSystem } from '../storage/FileSystem';
import { isNotFoundError } from '../storage/FileSystem';
import { ConfigurationError, SectionNotInOutlineError, StorageError } from '../errors';

export interface OutlineSection {
  id: string;
  title: string;
  objectives: string[];
  keyPoints: string[];
  wordCountTarget: number;
  guidance?: string;
  /** Source ids this section draws on; empty means the whole corpus */
  sources?: string[];
  subsections?: OutlineSection[];
}

export interface Outline {
  topic: string;
  sections: OutlineSection[];
}

const outlineSectionSchema: z.ZodType<OutlineSection, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    title: z.string().min(1),
    objectives: z.array(z.string()).default([]),
    keyPoints: z.array(z.string()).default([]),
    wordCountTarget: z.number().int().positive().default(1000),
    guidance: z.string().optional(),
    sources: z.array(z.string()).optional(),
    subsections: z.array(outlineSectionSchema).optional(),
  })
);

export const outlineSchema = z.object({
  topic: z.string().default(''),
  sections: z.array(outlineSectionSchema).default([]),
});

export const EMPTY_OUTLINE: Outline = { topic: '', sections: [] };

/**
 * Sections depth-first, parents before their subsections
 */
export function flattenSections(outline: Outline): OutlineSection[] {
  const flat: OutlineSection[] = [];
  const visit = (sections: OutlineSection[]) => {
    for (const section of sections) {
      flat.push(section);
      if (section.subsections) visit(section.subsections);
    }
  };
  visit(outline.sections);
  return flat;
}

export function findSection(outline: Outline, sectionId: string): OutlineSection {
  const sections = flattenSections(outline);
  const section = sections.find(s => s.id === sectionId);
  if (!section) {
    throw new SectionNotInOutlineError(sectionId, sections.map(s => s.id));
  }
  return section;
}

/**
 * Objective text handed to the context assembler
 */
export function objectiveFor(section: OutlineSection): string {
  const lines = [section.title];
  if (section.objectives.length > 0) lines.push(...section.objectives);
  if (section.keyPoints.length > 0) lines.push(...section.keyPoints);
  return lines.join('\n');
}

export function parseOutline(value: unknown): Outline {
  const result = outlineSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid outline',
      result.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

/**
 * Read the outline; a missing file is an empty outline
 */
export async function loadOutline(fs: FileSystem, filePath: string): Promise<Outline> {
  let raw: string;
  try {
    raw = await fs.read(filePath);
  } catch (error) {
    if (isNotFoundError(error)) return { ...EMPTY_OUTLINE, sections: [] };
    throw new StorageError('read', filePath, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Outline is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseOutline(data);
}

export async function saveOutline(fs: FileSystem, filePath: string, outline: Outline): Promise<void> {
  try {
    await fs.write(filePath, JSON.stringify(outline, null, 2) + '\n');
  } catch (error) {
    throw new StorageError('write', filePath, error);
  }
}
