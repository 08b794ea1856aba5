/**
 * Plain text / Markdown extractor
 */

import * as path from 'path';
import type { FileSystem } from '../storage/FileSystem';
import type { SourceExtractor, SourceInput } from './types';

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.markdown']);

export interface MarkdownSection {
  title: string;
  text: string;
}

/**
 * Split Markdown into heading-delimited sections; text before the first
 * heading is not part of any section
 */
export function parseMarkdownSections(text: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  let current: { title: string; lines: string[] } | null = null;

  for (const line of text.split('\n')) {
    if (line.startsWith('#')) {
      if (current) sections.push({ title: current.title, text: current.lines.join('\n').trim() });
      current = { title: line.replace(/^#+/, '').trim(), lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }

  if (current) sections.push({ title: current.title, text: current.lines.join('\n').trim() });
  return sections;
}

export class TextFileExtractor implements SourceExtractor {
  readonly name = 'text';

  constructor(private fs: FileSystem) {}

  supports(location: string): boolean {
    return TEXT_EXTENSIONS.has(path.extname(location).toLowerCase());
  }

  async extract(location: string): Promise<SourceInput> {
    const text = await this.fs.read(location);
    const extension = path.extname(location).toLowerCase();
    const isMarkdown = extension !== '.txt';

    const heading = isMarkdown ? parseMarkdownSections(text)[0]?.title : undefined;
    const title = heading || path.basename(location, path.extname(location));

    return {
      kind: isMarkdown ? 'note' : 'text',
      title,
      extractedText: text,
      metadata: { authors: [] },
    };
  }
}
