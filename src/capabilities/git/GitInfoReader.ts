/**
 * GitInfoReader
 *
 * Reads branch and commit straight from a repository's .git directory,
 * without running the git binary.
 */

import { FileSystemService } from '../../services/FileSystemService.js';
import type { GitInfo } from './types.js';

const HEAD_REF_PATTERN = /ref: (refs\/heads\/(.*))/;

export class GitInfoReader {
  private fs: FileSystemService;

  constructor(fs: FileSystemService = new FileSystemService()) {
    this.fs = fs;
  }

  /**
   * Branch and hash for the repository at `dir`.
   * Returns null when there is no HEAD or HEAD is detached.
   */
  async gitInfo(dir: string): Promise<GitInfo | null> {
    const line = await this.fs.head(`${dir}/.git/HEAD`);
    if (line === null) return null;

    const match = HEAD_REF_PATTERN.exec(line);
    if (!match) return null;

    const [, ref, branch] = match;
    return {
      branch,
      hash: await this.fs.head(`${dir}/.git/${ref}`)
    };
  }
}
