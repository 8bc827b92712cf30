/**
 * Wires the packer and its collaborators for one working directory
 */

import { ConfigManager } from './core/config.js';
import { TemplatePacker } from './core/packer.js';
import { FileSystemManager } from './utils/filesystem.js';
import { ClackReporter } from './utils/reporter.js';
import type { IFileSystemManager, IPackerReporter } from './interfaces.js';

export interface Application {
  configManager: ConfigManager;
  fileSystemManager: IFileSystemManager;
  packer: TemplatePacker;
  reporter: IPackerReporter;
}

export function createApplication(
  rootDir: string,
  overrides: Partial<Pick<Application, 'fileSystemManager' | 'reporter'>> = {}
): Application {
  const fileSystemManager = overrides.fileSystemManager ?? new FileSystemManager();
  const reporter = overrides.reporter ?? new ClackReporter();

  return {
    configManager: new ConfigManager(rootDir, fileSystemManager),
    fileSystemManager,
    packer: new TemplatePacker(fileSystemManager, reporter),
    reporter,
  };
}
