/**
 * Unit tests for FileSystemManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { DirectoryError, FileError, FileSystemError, FileSystemManager } from '../../../src/utils/filesystem.js';

describe('FileSystemManager', () => {
  let fsManager: FileSystemManager;
  let testDir: string;

  beforeEach(() => {
    fsManager = new FileSystemManager();
    testDir = mkdtempSync(join(tmpdir(), 'template-packer-fs-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('createDirectory', () => {
    it('should create nested directories', () => {
      const nestedPath = join(testDir, 'level1', 'level2');

      fsManager.createDirectory(nestedPath);

      expect(fsManager.isDirectory(nestedPath)).toBe(true);
    });

    it('should throw DirectoryError on failure', () => {
      const blocker = join(testDir, 'blocker');
      writeFileSync(blocker, 'file in the way');

      expect(() => fsManager.createDirectory(join(blocker, 'child'))).toThrow(DirectoryError);
    });
  });

  describe('isDirectory / isFile', () => {
    it('should tell files and directories apart', () => {
      const filePath = join(testDir, 'a.html');
      writeFileSync(filePath, 'a');

      expect(fsManager.isFile(filePath)).toBe(true);
      expect(fsManager.isDirectory(filePath)).toBe(false);
      expect(fsManager.isDirectory(testDir)).toBe(true);
      expect(fsManager.isFile(testDir)).toBe(false);
    });

    it('should return false for missing paths', () => {
      const missing = join(testDir, 'missing');

      expect(fsManager.fileExists(missing)).toBe(false);
      expect(fsManager.isDirectory(missing)).toBe(false);
      expect(fsManager.isFile(missing)).toBe(false);
    });
  });

  describe('listDirectory', () => {
    it('should list entry names', () => {
      writeFileSync(join(testDir, 'a.html'), 'a');
      mkdirSync(join(testDir, 'sub'));

      expect(fsManager.listDirectory(testDir).sort()).toEqual(['a.html', 'sub']);
    });

    it('should throw DirectoryError for a missing directory', () => {
      expect(() => fsManager.listDirectory(join(testDir, 'missing'))).toThrow(DirectoryError);
    });
  });

  describe('readFile', () => {
    it('should decode UTF-8 text', () => {
      const filePath = join(testDir, 'utf8.html');
      writeFileSync(filePath, 'héllo ✓');

      expect(fsManager.readFile(filePath)).toBe('héllo ✓');
    });

    it('should keep a leading byte-order mark', () => {
      const filePath = join(testDir, 'bom.html');
      writeFileSync(filePath, Buffer.from([0xef, 0xbb, 0xbf, 0x68, 0x69]));

      expect(fsManager.readFile(filePath)).toBe('\uFEFFhi');
    });

    it('should throw FileError for invalid UTF-8', () => {
      const filePath = join(testDir, 'latin1.html');
      writeFileSync(filePath, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

      expect(() => fsManager.readFile(filePath)).toThrow(FileError);
    });

    it('should keep the path and cause on the error', () => {
      const filePath = join(testDir, 'missing.html');

      try {
        fsManager.readFile(filePath);
        expect.unreachable('readFile should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(FileSystemError);
        expect(error).toMatchObject({ operation: 'file', path: filePath, name: 'FileError', cause: expect.any(Error) });
      }
    });
  });

  describe('writeFile', () => {
    it('should create parent directories and overwrite existing content', () => {
      const filePath = join(testDir, 'out', 'template.mbt');

      fsManager.writeFile(filePath, 'first');
      fsManager.writeFile(filePath, 'second');

      expect(existsSync(filePath)).toBe(true);
      expect(readFileSync(filePath, 'utf-8')).toBe('second');
    });
  });
});
