/**
 * JSONL (JSON Lines) Reader/Writer
 * Each line is one record; a line that fails to parse or validate is skipped
 */

import type { FileSystem } from './FileSystem';
import { isNotFoundError } from './FileSystem';
import { createLogger } from '../logger';

const log = createLogger('JSONL');

/**
 * Turns a parsed JSON value into a typed record, throwing when it does not fit
 */
export type RecordParser<T> = (value: unknown) => T;

export class JSONLFile<T> {
  private terminated = false;

  constructor(
    private fs: FileSystem,
    private filePath: string,
    private parse: RecordParser<T>
  ) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Append a record. Resolves only after the line is durable.
   */
  async append(record: T): Promise<void> {
    await this.appendMany([record]);
  }

  async appendMany(records: T[]): Promise<void> {
    if (records.length === 0) return;
    await this.ensureTerminated();
    const lines = records.map(record => JSON.stringify(record) + '\n').join('');
    try {
      await this.fs.append(this.filePath, lines);
    } catch (error) {
      // Part of the line may be on disk; check the tail again next time
      this.terminated = false;
      throw error;
    }
  }

  /**
   * Read all valid records; a missing file reads as empty
   */
  async readAll(): Promise<T[]> {
    let content: string;
    try {
      content = await this.fs.read(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
    return this.parseContent(content);
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.filePath);
  }

  /**
   * A crash can leave a torn final line without its newline. Close it off
   * before the first append so the next record starts on its own line.
   */
  private async ensureTerminated(): Promise<void> {
    if (this.terminated) return;

    let content = '';
    try {
      content = await this.fs.read(this.filePath);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }

    if (content.length > 0 && !content.endsWith('\n')) {
      log.warn(`Closing torn trailing line in ${this.filePath}`);
      await this.fs.append(this.filePath, '\n');
    }
    this.terminated = true;
  }

  private parseContent(content: string): T[] {
    const results: T[] = [];

    for (const line of content.split('\n')) {
      if (!line.trim()) continue;

      try {
        results.push(this.parse(JSON.parse(line)));
      } catch {
        log.warn(`Skipping invalid line in ${this.filePath}: ${line.slice(0, 100)}`);
      }
    }

    return results;
  }
}
