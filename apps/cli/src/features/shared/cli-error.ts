import pc from 'picocolors';

import { exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Usage: currency-data -o <output-file> < currency.properties',
  CONFIG_ERROR: 'Check the CURRENCY_DATA_* environment variables.',
};

export interface ErrorStream {
  write(chunk: string): unknown;
}

/**
 * Format a CLI error for stderr: a red cross, the message, an optional tip
 * and, in development, the stack.
 */
export function formatCliError(error: Error, exitCode: ExitCode, nodeEnv: string | undefined): string {
  const lines = [`${pc.red('✗')} Error: ${error.message}`];

  const tip = ERROR_TIPS[exitCodeToErrorCode(exitCode)];
  if (tip) {
    lines.push(pc.dim(tip));
  }

  if (nodeEnv === 'development' && error.stack) {
    lines.push(pc.dim(error.stack));
  }
  return `${lines.join('\n')}\n`;
}

export function displayCliError(
  error: Error,
  exitCode: ExitCode,
  stream: ErrorStream = process.stderr,
  nodeEnv: string | undefined = process.env['NODE_ENV']
): void {
  stream.write(formatCliError(error, exitCode, nodeEnv));
}
