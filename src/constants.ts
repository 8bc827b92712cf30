/**
 * Defaults for template-packer configuration
 */

import type { OutputTarget, ReadFailurePolicy } from './types.js';

export const CONFIG_FILE_NAME = 'template-packer.toml';

export const DEFAULT_SOURCE_DIR = 'src/templates';
export const DEFAULT_OUTPUT_FILE = 'src/template.mbt';
export const DEFAULT_EXTENSION = '.html';
export const DEFAULT_TARGET: OutputTarget = 'moonbit';
export const DEFAULT_READ_FAILURE_POLICY: ReadFailurePolicy = 'fail';

export const OUTPUT_TARGETS: readonly OutputTarget[] = ['moonbit', 'typescript'];
export const READ_FAILURE_POLICIES: readonly ReadFailurePolicy[] = ['fail', 'skip'];

// Reported by --version
export const VERSION = '1.0.0';
