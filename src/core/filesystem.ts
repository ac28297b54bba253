import * as fs from 'fs/promises';
import * as path from 'path';
import { DirectoryEntry, FileStat, Filesystem } from '../types';

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Filesystem backed by node's fs/promises
 */
export class NodeFilesystem implements Filesystem {
  async stat(filePath: string): Promise<FileStat | null> {
    try {
      const st = await fs.stat(filePath);
      return { mtimeMs: st.mtimeMs, isDirectory: st.isDirectory() };
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async readText(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async list(dirPath: string): Promise<DirectoryEntry[]> {
    const names = await fs.readdir(dirPath);
    const entries: DirectoryEntry[] = [];
    for (const name of names.sort()) {
      const st = await this.stat(path.join(dirPath, name));
      // entry removed between readdir and stat
      if (!st) continue;
      entries.push({ name, mtimeMs: st.mtimeMs, isDirectory: st.isDirectory });
    }
    return entries;
  }
}

export const defaultFilesystem = new NodeFilesystem();
