/**
 * Tests for FileSystem abstraction
 */

import { RealFileSystem, InMemoryFileSystem, isNotFoundError } from '../FileSystem';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('InMemoryFileSystem', () => {
  let fileSystem: InMemoryFileSystem;

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
  });

  describe('write and read', () => {
    it('should write and read file', async () => {
      await fileSystem.write('/p/test.txt', 'hello world');
      expect(await fileSystem.read('/p/test.txt')).toBe('hello world');
    });

    it('should throw ENOENT on reading a missing file', async () => {
      await expect(fileSystem.read('/missing.txt')).rejects.toThrow('ENOENT');
    });
  });

  describe('append', () => {
    it('should append to existing file', async () => {
      await fileSystem.write('/test.txt', 'hello');
      await fileSystem.append('/test.txt', ' world');
      expect(await fileSystem.read('/test.txt')).toBe('hello world');
    });

    it('should create file and parent directories', async () => {
      await fileSystem.append('/a/b/test.txt', 'x');
      expect(await fileSystem.exists('/a/b')).toBe(true);
      expect(await fileSystem.read('/a/b/test.txt')).toBe('x');
    });
  });

  describe('list', () => {
    it('should list files and directories sorted', async () => {
      await fileSystem.write('/dir/b.jsonl', '');
      await fileSystem.write('/dir/a.jsonl', '');
      await fileSystem.mkdir('/dir/sub');
      expect(await fileSystem.list('/dir')).toEqual(['a.jsonl', 'b.jsonl', 'sub']);
    });

    it('should return empty list for unknown directory', async () => {
      expect(await fileSystem.list('/nowhere')).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should delete a file', async () => {
      await fileSystem.write('/x.txt', 'x');
      await fileSystem.delete('/x.txt');
      expect(await fileSystem.exists('/x.txt')).toBe(false);
    });

    it('should raise a not-found error for a missing file', async () => {
      const error = await fileSystem.delete('/x.txt').catch((e: unknown) => e);
      expect(isNotFoundError(error)).toBe(true);
    });
  });

  it('should report size in bytes', async () => {
    await fileSystem.write('/u.txt', 'é');
    expect((await fileSystem.stat('/u.txt')).size).toBe(2);
  });
});

describe('RealFileSystem', () => {
  let tmpDir: string;
  const fileSystem = new RealFileSystem();

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manuscript-fs-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write atomically and leave no temp files', async () => {
    const target = path.join(tmpDir, 'nested', 'out.json');
    await fileSystem.write(target, '{"a":1}');
    await fileSystem.write(target, '{"a":2}');

    expect(await fileSystem.read(target)).toBe('{"a":2}');
    expect(await fileSystem.list(path.join(tmpDir, 'nested'))).toEqual(['out.json']);
  });

  it('should append and flush lines', async () => {
    const target = path.join(tmpDir, 'log.jsonl');
    await fileSystem.append(target, 'one\n');
    await fileSystem.append(target, 'two\n');
    expect(await fileSystem.read(target)).toBe('one\ntwo\n');
  });

  it('should map missing files to not-found errors', async () => {
    const error = await fileSystem.read(path.join(tmpDir, 'missing')).catch((e: unknown) => e);
    expect(isNotFoundError(error)).toBe(true);
    expect(await fileSystem.list(path.join(tmpDir, 'missing-dir'))).toEqual([]);
  });

  it('should recognize not-found errors by code alone', () => {
    expect(isNotFoundError({ code: 'ENOENT', message: 'no such file' })).toBe(true);
    expect(isNotFoundError({ code: 'EACCES', message: 'permission denied' })).toBe(false);
    expect(isNotFoundError('ENOENT')).toBe(false);
  });
});
