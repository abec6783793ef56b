import * as fs from 'fs/promises';
import * as path from 'path';
import type { Dirent } from 'fs';
import { glob } from 'glob';

export type DirEntryType = 'file' | 'directory' | 'link' | 'other';

export interface DirEntry {
  name: string;
  /** `dir + "/" + name`, exactly as scanned */
  path: string;
  type: DirEntryType;
}

function entryType(entry: Dirent): DirEntryType {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (entry.isSymbolicLink()) return 'link';
  return 'other';
}

export class FileSystemService {
  private basePath: string;

  constructor(basePath: string = process.cwd()) {
    this.basePath = basePath;
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Shallow listing of `dirPath`. A directory that cannot be opened lists as empty.
   */
  async scandir(dirPath: string): Promise<DirEntry[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.resolve(dirPath), { withFileTypes: true });
    } catch {
      return [];
    }

    return entries.map(entry => ({
      name: entry.name,
      path: `${dirPath}/${entry.name}`,
      type: entryType(entry)
    }));
  }

  /**
   * First line of a file, or null when it cannot be read
   */
  async head(filePath: string): Promise<string | null> {
    let content: string;
    try {
      content = await fs.readFile(this.resolve(filePath), 'utf-8');
    } catch {
      return null;
    }
    const newline = content.search(/\r?\n/);
    return newline === -1 ? content : content.slice(0, newline);
  }

  /**
   * Paths under `cwd` (relative to the base path) matching a glob pattern, sorted
   */
  async find(pattern: string, cwd: string = '.'): Promise<string[]> {
    const matches = await glob(pattern, {
      cwd: this.resolve(cwd),
      windowsPathsNoEscape: true,
      posix: true
    });
    return matches.sort();
  }

  private resolve(filePath: string): string {
    return path.resolve(this.basePath, filePath);
  }
}
