import { colors } from '../utils/colors.js';
import type { Application } from '../app.js';

const log = console.log;

/**
 * List command - show the templates the next run would pack
 * @returns false when the source directory is missing
 */
export function listCommand(app: Application): boolean {
  const config = app.configManager.load();
  const result = app.packer.pack(config);

  if (result.status === 'source-missing') {
    app.reporter.error(`Folder '${config.source}' not found.`);
    return false;
  }

  log(colors.yellow(`\n📦 Templates in ${config.source} (*${config.extension}):\n`));

  if (result.templates.length === 0) {
    log(colors.gray('No templates found.'));
    return true;
  }

  for (const template of result.templates) {
    log(`${colors.cyan(template.name)} ${colors.gray(`${template.content.length} chars`)}`);
  }
  for (const skipped of result.skipped) {
    log(`${colors.red(skipped.name)} ${colors.gray(`skipped: ${skipped.reason}`)}`);
  }

  log('');
  return true;
}
