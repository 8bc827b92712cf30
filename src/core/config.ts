/**
 * Configuration management with smol-toml library
 * Handles loading, saving, and validation of template-packer.toml
 */

import { join } from 'node:path';
import { parse, stringify } from 'smol-toml';
import type { OutputTarget, PackerConfig, ReadFailurePolicy } from '../types.js';
import type { IConfigManager, IFileSystemManager } from '../interfaces.js';
import {
  CONFIG_FILE_NAME,
  DEFAULT_EXTENSION,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_READ_FAILURE_POLICY,
  DEFAULT_SOURCE_DIR,
  DEFAULT_TARGET,
  OUTPUT_TARGETS,
  READ_FAILURE_POLICIES,
} from '../constants.js';

export class ConfigError extends Error {
  public key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(item => item === value);
}

export class ConfigManager implements IConfigManager {
  private configPath: string;
  private rootDir: string;
  private fileSystemManager: IFileSystemManager;

  constructor(rootDir: string, fileSystemManager: IFileSystemManager) {
    this.rootDir = rootDir;
    this.configPath = join(rootDir, CONFIG_FILE_NAME);
    this.fileSystemManager = fileSystemManager;
  }

  /**
   * Load configuration from template-packer.toml
   * Returns the defaults if the file doesn't exist
   */
  public load(): PackerConfig {
    const defaultConfig: PackerConfig = {
      rootDir: this.rootDir,
      source: DEFAULT_SOURCE_DIR,
      output: DEFAULT_OUTPUT_FILE,
      extension: DEFAULT_EXTENSION,
      target: DEFAULT_TARGET,
      onReadError: DEFAULT_READ_FAILURE_POLICY,
    };

    if (!this.fileSystemManager.fileExists(this.configPath)) {
      return defaultConfig;
    }

    const content = this.fileSystemManager.readFile(this.configPath);
    let parsed: Record<string, unknown>;
    try {
      parsed = parse(content);
    } catch (error) {
      throw new ConfigError(
        `Could not parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.validateAndTransformConfig(parsed, defaultConfig);
  }

  /**
   * Save configuration to template-packer.toml using smol-toml
   */
  public save(config: PackerConfig): void {
    const templates: Record<string, string> = {
      source: config.source,
      output: config.output,
      extension: config.extension,
      target: config.target,
      on_read_error: config.onReadError,
    };
    if (config.functionName) {
      templates.function_name = config.functionName;
    }

    const finalContent = '# template-packer configuration\n\n' + stringify({ templates });
    this.fileSystemManager.writeFile(this.configPath, finalContent);
  }

  private validateAndTransformConfig(parsed: Record<string, unknown>, defaults: PackerConfig): PackerConfig {
    const section = parsed.templates;
    if (section === undefined) {
      return defaults;
    }
    if (!isTable(section)) {
      throw new ConfigError('[templates] must be a table', 'templates');
    }

    const readString = (key: string): string | undefined => {
      const value = section[key];
      if (value === undefined) return undefined;
      if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigError(`templates.${key} must be a non-empty string`, key);
      }
      return value;
    };

    const target = readString('target') ?? defaults.target;
    if (!isOneOf<OutputTarget>(target, OUTPUT_TARGETS)) {
      throw new ConfigError(
        `templates.target must be one of ${OUTPUT_TARGETS.join(', ')} (got "${target}")`,
        'target'
      );
    }

    const onReadError = readString('on_read_error') ?? defaults.onReadError;
    if (!isOneOf<ReadFailurePolicy>(onReadError, READ_FAILURE_POLICIES)) {
      throw new ConfigError(
        `templates.on_read_error must be one of ${READ_FAILURE_POLICIES.join(', ')} (got "${onReadError}")`,
        'on_read_error'
      );
    }

    const functionName = readString('function_name');
    if (functionName !== undefined && !/^[A-Za-z_][A-Za-z0-9_]*$/.test(functionName)) {
      throw new ConfigError(`templates.function_name is not a valid identifier: ${functionName}`, 'function_name');
    }

    return {
      rootDir: this.rootDir,
      source: readString('source') ?? defaults.source,
      output: readString('output') ?? defaults.output,
      extension: readString('extension') ?? defaults.extension,
      target,
      functionName,
      onReadError,
    };
  }
}
