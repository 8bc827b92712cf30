/**
 * Core interfaces for template-packer
 * These interfaces define the contracts between the packer and its collaborators
 */

import type { EscapedEntry, OutputTarget, PackerConfig, RenderOptions } from './types.js';

// Configuration management interface
export interface IConfigManager {
  load(): PackerConfig;
  save(config: PackerConfig): void;
}

// File system operations interface
export interface IFileSystemManager {
  createDirectory(path: string, recursive?: boolean): void;
  fileExists(path: string): boolean;
  isDirectory(path: string): boolean;
  isFile(path: string): boolean;
  listDirectory(path: string): string[];
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
}

// Renders the generated lookup function for one target language
export interface IOutputRenderer {
  readonly target: OutputTarget;
  readonly defaultFunctionName: string;
  render(entries: readonly EscapedEntry[], options: RenderOptions): string;
}

// Diagnostics reporting interface
export interface IPackerReporter {
  info(message: string): void;
  warn(message: string): void;
  success(message: string): void;
  error(message: string): void;
}
