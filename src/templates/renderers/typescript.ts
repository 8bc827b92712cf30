import { escapeName } from '../../core/escape.js';
import type { IOutputRenderer } from '../../interfaces.js';
import type { EscapedEntry, RenderOptions } from '../../types.js';

export class TypeScriptRenderer implements IOutputRenderer {
  readonly target = 'typescript' as const;
  readonly defaultFunctionName = 'loadTemplate';

  render(entries: readonly EscapedEntry[], options: RenderOptions): string {
    const lines: string[] = [
      `// Generated by template-packer from ${options.source}. Do not edit.`,
      '',
      'export class TemplateNotFoundError extends Error {',
      '  readonly templateName: string;',
      '',
      '  constructor(templateName: string) {',
      '    super(`Template not found: ${templateName}`);',
      "    this.name = 'TemplateNotFoundError';",
      '    this.templateName = templateName;',
      '  }',
      '}',
      '',
      `export function ${options.functionName}(name: string): string {`,
      '  switch (name) {',
    ];

    for (const entry of entries) {
      lines.push(`    case "${escapeName(entry.name)}":`);
      lines.push(`      return "${entry.escaped}";`);
    }

    lines.push('    default:');
    lines.push('      throw new TemplateNotFoundError(name);');
    lines.push('  }');
    lines.push('}');

    return lines.join('\n') + '\n';
  }
}
