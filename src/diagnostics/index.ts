/**
 * Diagnostics sinks handed to the parser
 */

import chalk from 'chalk';
import type { Diagnostics, ParseWarning } from '../types/index.js';

export const silentDiagnostics: Diagnostics = {
  info: () => {},
  warn: () => {},
};

export interface ConsoleDiagnosticsOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createConsoleDiagnostics(options: ConsoleDiagnosticsOptions = {}): Diagnostics {
  const { verbose = false, quiet = false } = options;

  return {
    info(message) {
      if (verbose && !quiet) {
        console.log(chalk.gray(`  ${message}`));
      }
    },
    warn(warning) {
      if (!quiet) {
        console.warn(chalk.yellow(`  Warning [${warning.code}]: ${warning.message}`));
      }
    },
  };
}

export interface CollectingDiagnostics extends Diagnostics {
  readonly warnings: readonly ParseWarning[];
}

/**
 * Keeps every warning; forwards both channels to `next` when given.
 */
export function createCollectingDiagnostics(next: Diagnostics = silentDiagnostics): CollectingDiagnostics {
  const warnings: ParseWarning[] = [];

  return {
    warnings,
    info(message) {
      next.info(message);
    },
    warn(warning) {
      warnings.push(warning);
      next.warn(warning);
    },
  };
}
