import { Command } from 'commander';
import process from 'node:process';
import { createApplication } from './app.js';
import { generateCommand } from './commands/generate.js';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { colors } from './utils/colors.js';
import { VERSION } from './constants.js';

function run(action: () => boolean): void {
  try {
    if (!action()) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(colors.red('Error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

export function setupCLI(rootDir: string = process.cwd()): Command {
  const program = new Command();

  program
    .name('template-packer')
    .description('Pack a directory of templates into a generated lookup function')
    .version(VERSION);

  // Generate command - writes the configured output file
  program
    .command('generate', { isDefault: true })
    .description('Generate the template lookup function')
    .action(() => {
      run(() => generateCommand(createApplication(rootDir)));
    });

  // List command - templates the next run would pack
  program
    .command('list')
    .description('List the templates that would be packed')
    .action(() => {
      run(() => listCommand(createApplication(rootDir)));
    });

  // Show command - packed literal of one template
  program
    .command('show')
    .description('Print the packed literal of one template')
    .argument('<name>', 'Template file name (e.g., "index.html")')
    .option('--raw', 'Print the decoded content instead of the escaped literal')
    .action((name: string, options: { raw?: boolean }) => {
      run(() => showCommand(createApplication(rootDir), name, options));
    });

  return program;
}
