/**
 * File System Abstraction
 * Stores talk to this interface; tests use the in-memory implementation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export interface FileStats {
  size: number;
  mtime: Date;
}

export interface FileSystem {
  /**
   * Read entire file content
   */
  read(path: string): Promise<string>;

  /**
   * Replace file content atomically (temp file + rename)
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Append content and flush it to stable storage before resolving
   */
  append(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  delete(path: string): Promise<void>;

  /**
   * List entry names in a directory (empty when it does not exist)
   */
  list(dirPath: string): Promise<string[]>;

  /**
   * Create directory (recursive)
   */
  mkdir(dirPath: string): Promise<void>;

  stat(path: string): Promise<FileStats>;
}

/**
 * True when the error means "file does not exist"
 */
export function isNotFoundError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === 'ENOENT') return true;
  return 'message' in error && typeof error.message === 'string' && error.message.includes('ENOENT');
}

/**
 * Real file system implementation using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  async read(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
  }

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  }

  async append(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    const handle = await fs.open(filePath, 'a');
    try {
      await handle.appendFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async delete(filePath: string): Promise<void> {
    await fs.unlink(filePath);
  }

  async list(dirPath: string): Promise<string[]> {
    try {
      return await fs.readdir(dirPath);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  async stat(filePath: string): Promise<FileStats> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      mtime: stats.mtime,
    };
  }
}

/**
 * In-memory file system for testing
 */
export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, { content: string; mtime: Date }>();
  private directories = new Set<string>();

  async read(filePath: string): Promise<string> {
    const file = this.files.get(this.normalizePath(filePath));
    if (!file) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return file.content;
  }

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    this.files.set(this.normalizePath(filePath), { content, mtime: new Date() });
  }

  async append(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    const key = this.normalizePath(filePath);
    const existing = this.files.get(key);
    const newContent = existing ? existing.content + content : content;
    this.files.set(key, { content: newContent, mtime: new Date() });
  }

  async exists(filePath: string): Promise<boolean> {
    const key = this.normalizePath(filePath);
    return this.files.has(key) || this.directories.has(key);
  }

  async delete(filePath: string): Promise<void> {
    const key = this.normalizePath(filePath);
    if (!this.files.delete(key)) {
      throw new Error(`ENOENT: no such file or directory, unlink '${filePath}'`);
    }
  }

  async list(dirPath: string): Promise<string[]> {
    const normalized = this.normalizePath(dirPath);
    const results: string[] = [];

    for (const filePath of this.files.keys()) {
      if (path.posix.dirname(filePath) === normalized) {
        results.push(path.posix.basename(filePath));
      }
    }

    for (const dir of this.directories) {
      if (path.posix.dirname(dir) === normalized && dir !== normalized) {
        const basename = path.posix.basename(dir);
        if (!results.includes(basename)) {
          results.push(basename);
        }
      }
    }

    return results.sort();
  }

  async mkdir(dirPath: string): Promise<void> {
    let current = this.normalizePath(dirPath);

    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.posix.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }

  async stat(filePath: string): Promise<FileStats> {
    const file = this.files.get(this.normalizePath(filePath));
    if (!file) {
      throw new Error(`ENOENT: no such file or directory, stat '${filePath}'`);
    }
    return {
      size: Buffer.byteLength(file.content, 'utf-8'),
      mtime: file.mtime,
    };
  }

  /**
   * Overwrite raw content, bypassing append semantics (simulates a crash mid-write)
   */
  setRaw(filePath: string, content: string): void {
    this.files.set(this.normalizePath(filePath), { content, mtime: new Date() });
  }

  clear(): void {
    this.files.clear();
    this.directories.clear();
  }

  getAllFiles(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private normalizePath(p: string): string {
    return path.posix.normalize(p.replace(/\\/g, '/'));
  }
}
