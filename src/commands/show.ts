import { TemplateRegistry } from '../templates/registry.js';
import type { Application } from '../app.js';

const log = console.log;

export interface ShowOptions {
  raw?: boolean;
}

/**
 * Show command - print the literal one template packs into
 * Throws TemplateNotFoundError for names the directory doesn't provide
 */
export function showCommand(app: Application, name: string, options: ShowOptions = {}): boolean {
  const config = app.configManager.load();
  const result = app.packer.pack(config);

  if (result.status === 'source-missing') {
    app.reporter.error(`Folder '${config.source}' not found.`);
    return false;
  }

  const template = new TemplateRegistry(result.templates).get(name);
  log(options.raw ? template.content : `"${template.escaped}"`);
  return true;
}
