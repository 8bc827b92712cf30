/**
 * Diagnostics reporting for template-packer
 */

import * as clack from '@clack/prompts';
import type { IPackerReporter } from '../interfaces.js';

export class ClackReporter implements IPackerReporter {
  public info(message: string): void {
    clack.log.info(message);
  }

  public warn(message: string): void {
    clack.log.warn(message);
  }

  public success(message: string): void {
    clack.log.success(message);
  }

  public error(message: string): void {
    clack.log.error(message);
  }
}
