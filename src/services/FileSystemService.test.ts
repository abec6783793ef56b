import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileSystemService } from './FileSystemService.js';

describe('FileSystemService', () => {
  let baseDir: string;
  let fs: FileSystemService;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'plugkit-fs-'));
    fs = new FileSystemService(baseDir);
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  describe('fileExists', () => {
    it('should report files and directories that exist', async () => {
      writeFileSync(join(baseDir, 'settings.json'), '{}');
      mkdirSync(join(baseDir, 'plugins'));

      expect(await fs.fileExists('settings.json')).toBe(true);
      expect(await fs.fileExists('plugins')).toBe(true);
      expect(await fs.fileExists('missing.json')).toBe(false);
    });
  });

  describe('scandir', () => {
    it('should list entries with their type and joined path', async () => {
      mkdirSync(join(baseDir, 'pack'));
      writeFileSync(join(baseDir, 'pack', 'a.txt'), 'a');
      mkdirSync(join(baseDir, 'pack', 'nested'));
      symlinkSync(join(baseDir, 'pack', 'a.txt'), join(baseDir, 'pack', 'link'));

      const entries = await fs.scandir('pack');
      entries.sort((x, y) => x.name.localeCompare(y.name));

      expect(entries).toEqual([
        { name: 'a.txt', path: 'pack/a.txt', type: 'file' },
        { name: 'link', path: 'pack/link', type: 'link' },
        { name: 'nested', path: 'pack/nested', type: 'directory' }
      ]);
    });

    it('should list a missing directory as empty', async () => {
      expect(await fs.scandir('nowhere')).toEqual([]);
    });
  });

  describe('head', () => {
    it('should return the first line without its line ending', async () => {
      writeFileSync(join(baseDir, 'unix'), 'first\nsecond\n');
      writeFileSync(join(baseDir, 'dos'), 'first\r\nsecond\r\n');
      writeFileSync(join(baseDir, 'single'), 'only');

      expect(await fs.head('unix')).toBe('first');
      expect(await fs.head('dos')).toBe('first');
      expect(await fs.head('single')).toBe('only');
    });

    it('should return null for a file that cannot be read', async () => {
      expect(await fs.head('missing')).toBeNull();
    });
  });

  describe('find', () => {
    it('should return sorted glob matches relative to cwd', async () => {
      mkdirSync(join(baseDir, 'doc', 'api'), { recursive: true });
      writeFileSync(join(baseDir, 'doc', 'readme.md'), '');
      writeFileSync(join(baseDir, 'doc', 'api', 'index.md'), '');
      writeFileSync(join(baseDir, 'doc', 'notes.txt'), '');

      expect(await fs.find('**/*.md', 'doc')).toEqual(['api/index.md', 'readme.md']);
    });
  });
});
