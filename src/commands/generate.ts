import type { Application } from '../app.js';

/**
 * Generate command - write the lookup function for the configured template directory
 * @returns whether the output file was written
 */
export function generateCommand(app: Application): boolean {
  const config = app.configManager.load();
  app.reporter.info(`Packing *${config.extension} templates from ${config.source}`);
  const result = app.packer.generate(config);

  if (result.status === 'source-missing') {
    app.reporter.error(`Folder '${config.source}' not found.`);
    return false;
  }

  if (result.skipped.length > 0) {
    app.reporter.warn(`Skipped ${result.skipped.length} unreadable template(s).`);
  }
  app.reporter.success(`Generated ${config.output} with ${result.count} templates.`);
  return true;
}
