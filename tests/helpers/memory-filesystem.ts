import * as path from 'path';
import { getDefaultConfig } from '../../src/config';
import { CheckContext, DirectoryEntry, FileStat, Filesystem } from '../../src/types';
import { fixedClock } from './pipeline-fixture';

/**
 * In-memory Filesystem for checker unit tests
 */
export class MemoryFilesystem implements Filesystem {
  private files = new Map<string, { text: string; mtimeMs: number }>();
  private dirs = new Map<string, number>();

  addFile(filePath: string, text: string, mtimeMs: number): this {
    this.files.set(filePath, { text, mtimeMs });
    return this;
  }

  addDir(dirPath: string, mtimeMs: number): this {
    this.dirs.set(dirPath, mtimeMs);
    return this;
  }

  async stat(filePath: string): Promise<FileStat | null> {
    const file = this.files.get(filePath);
    if (file) return { mtimeMs: file.mtimeMs, isDirectory: false };
    const dir = this.dirs.get(filePath);
    if (dir !== undefined) return { mtimeMs: dir, isDirectory: true };
    return null;
  }

  async readText(filePath: string): Promise<string> {
    const file = this.files.get(filePath);
    if (!file) throw new Error(`ENOENT: no such file, open '${filePath}'`);
    return file.text;
  }

  async list(dirPath: string): Promise<DirectoryEntry[]> {
    const entries: DirectoryEntry[] = [];
    for (const [p, { mtimeMs }] of this.files) {
      if (path.dirname(p) === dirPath) entries.push({ name: path.basename(p), mtimeMs, isDirectory: false });
    }
    for (const [p, mtimeMs] of this.dirs) {
      if (path.dirname(p) === dirPath) entries.push({ name: path.basename(p), mtimeMs, isDirectory: true });
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }
}

export function checkContext(fs: Filesystem, overrides: Partial<CheckContext> = {}): CheckContext {
  return {
    fs,
    now: fixedClock,
    config: { ...getDefaultConfig(), root: '/pipeline' },
    ...overrides,
  };
}
