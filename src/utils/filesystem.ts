/**
 * File System Manager
 *
 * Handles the file system operations of the packer: directory listing,
 * strict UTF-8 reads and overwriting writes, with typed errors.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { TextDecoder } from 'node:util';
import type { IFileSystemManager } from '../interfaces.js';

/**
 * Custom error types for file system operations
 */
export class FileSystemError extends Error {
  public operation: string;
  public path: string;
  public override cause?: Error;

  constructor(message: string, operation: string, path: string, cause?: Error) {
    super(message);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = path;
    this.cause = cause;
  }
}

export class DirectoryError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'directory', path, cause);
    this.name = 'DirectoryError';
  }
}

export class FileError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'file', path, cause);
    this.name = 'FileError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * FileSystemManager implementation backed by node:fs
 */
export class FileSystemManager implements IFileSystemManager {
  private decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

  /**
   * Creates a directory at the specified path
   * @param recursive - Whether to create parent directories (default: true)
   */
  createDirectory(path: string, recursive: boolean = true): void {
    try {
      if (!existsSync(path)) {
        mkdirSync(path, { recursive });
      }
    } catch (error) {
      throw new DirectoryError(`Failed to create directory: ${path}`, path, toError(error));
    }
  }

  fileExists(path: string): boolean {
    return existsSync(path);
  }

  isDirectory(path: string): boolean {
    try {
      return existsSync(path) && statSync(path).isDirectory();
    } catch (_error) {
      return false;
    }
  }

  isFile(path: string): boolean {
    try {
      return existsSync(path) && statSync(path).isFile();
    } catch (_error) {
      return false;
    }
  }

  /**
   * Lists the entry names of a directory
   */
  listDirectory(path: string): string[] {
    try {
      return readdirSync(path);
    } catch (error) {
      throw new DirectoryError(`Failed to list directory: ${path}`, path, toError(error));
    }
  }

  /**
   * Reads a file as UTF-8 text
   * Invalid byte sequences are rejected rather than replaced; a leading BOM is kept
   */
  readFile(path: string): string {
    try {
      return this.decoder.decode(readFileSync(path));
    } catch (error) {
      throw new FileError(`Failed to read file: ${path}`, path, toError(error));
    }
  }

  /**
   * Writes content to a file, replacing any existing content
   * Missing parent directories are created
   */
  writeFile(path: string, content: string): void {
    try {
      this.createDirectory(dirname(path));
      writeFileSync(path, content, 'utf-8');
    } catch (error) {
      throw new FileError(
        `Failed to write file: ${path}`,
        path,
        toError(error)
      );
    }
  }
}
