/**
 * Template Packer - turns a directory of templates into a generated lookup function
 */

import { join, resolve } from 'node:path';
import type { IFileSystemManager, IPackerReporter } from '../interfaces.js';
import type { GenerationResult, PackedTemplate, PackerConfig, PackResult, SkippedTemplate } from '../types.js';
import { getRenderer } from '../templates/renderers/index.js';
import { escapeContent, normalizeLineEndings } from './escape.js';

export function resolveSourceDir(config: PackerConfig): string {
  return resolve(config.rootDir, config.source);
}

export function resolveOutputPath(config: PackerConfig): string {
  return resolve(config.rootDir, config.output);
}

export class TemplatePacker {
  constructor(
    private fileSystemManager: IFileSystemManager,
    private reporter: IPackerReporter
  ) {}

  /**
   * Read and escape every matching template without writing anything
   */
  public pack(config: PackerConfig): PackResult {
    const sourceDir = resolveSourceDir(config);
    if (!this.fileSystemManager.isDirectory(sourceDir)) {
      return { status: 'source-missing', sourceDir };
    }

    const names = this.fileSystemManager
      .listDirectory(sourceDir)
      .filter(name => name.endsWith(config.extension))
      .filter(name => this.fileSystemManager.isFile(join(sourceDir, name)))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const templates: PackedTemplate[] = [];
    const skipped: SkippedTemplate[] = [];

    for (const name of names) {
      let content: string;
      try {
        content = normalizeLineEndings(this.fileSystemManager.readFile(join(sourceDir, name)));
      } catch (error) {
        if (config.onReadError === 'fail') {
          throw error;
        }
        const reason = error instanceof Error && error.cause instanceof Error
          ? error.cause.message
          : String(error);
        this.reporter.warn(`Skipping ${name}: ${reason}`);
        skipped.push({ name, reason });
        continue;
      }

      templates.push({ name, content, escaped: escapeContent(content) });
    }

    return { status: 'packed', sourceDir, templates, skipped };
  }

  /**
   * Render the lookup function and overwrite the output file.
   * Nothing is written when the source directory is missing or a read fails under the fail policy.
   */
  public generate(config: PackerConfig): GenerationResult {
    const packed = this.pack(config);
    if (packed.status === 'source-missing') {
      return packed;
    }

    const renderer = getRenderer(config.target);
    const output = renderer.render(packed.templates, {
      functionName: config.functionName ?? renderer.defaultFunctionName,
      source: config.source,
    });

    const outputPath = resolveOutputPath(config);
    this.fileSystemManager.writeFile(outputPath, output);

    return {
      status: 'generated',
      outputPath,
      count: packed.templates.length,
      skipped: packed.skipped,
    };
  }
}
