/**
 * Output renderers by target language
 */

import type { IOutputRenderer } from '../../interfaces.js';
import type { OutputTarget } from '../../types.js';
import { MoonBitRenderer } from './moonbit.js';
import { TypeScriptRenderer } from './typescript.js';

export { MoonBitRenderer } from './moonbit.js';
export { TypeScriptRenderer } from './typescript.js';

export function getRenderer(target: OutputTarget): IOutputRenderer {
  switch (target) {
    case 'moonbit':
      return new MoonBitRenderer();
    case 'typescript':
      return new TypeScriptRenderer();
  }
}
