import { escapeName } from '../../core/escape.js';
import type { IOutputRenderer } from '../../interfaces.js';
import type { EscapedEntry, RenderOptions } from '../../types.js';

/**
 * Emits a MoonBit `match` over the template name.
 * Unknown names raise RenderError, which belongs to JinjaError.
 */
export class MoonBitRenderer implements IOutputRenderer {
  readonly target = 'moonbit' as const;
  readonly defaultFunctionName = 'load_template';

  render(entries: readonly EscapedEntry[], options: RenderOptions): string {
    const lines: string[] = [
      `pub fn ${options.functionName}(name: String) -> String!JinjaError {`,
      '  match name {',
    ];

    for (const entry of entries) {
      lines.push(`    "${escapeName(entry.name)}" => return "${entry.escaped}"`);
    }

    lines.push('    _ => raise RenderError("Template not found: " + name)');
    lines.push('  }');
    lines.push('}');

    return lines.join('\n') + '\n';
  }
}
