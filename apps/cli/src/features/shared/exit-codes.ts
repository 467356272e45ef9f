import { CurrencyDataErrorCodes, type CurrencyDataErrorCode } from '@curdata/currency-data';

/**
 * Semantic exit codes for the CLI, following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error, including failures to write the output file */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input data failed validation */
  VALIDATION_ERROR: 8,

  /** Environment configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map a pipeline failure to the exit code the process should end with.
 */
export function exitCodeForError(code: CurrencyDataErrorCode): ExitCode {
  switch (code) {
    case CurrencyDataErrorCodes.UsageError:
      return ExitCodes.INVALID_ARGS;
    case CurrencyDataErrorCodes.InputReadFailure:
    case CurrencyDataErrorCodes.OutputWriteFailure:
    case CurrencyDataErrorCodes.MalformedBinaryImage:
      return ExitCodes.GENERAL_ERROR;
    default:
      return ExitCodes.VALIDATION_ERROR;
  }
}

/**
 * Map exit code to the machine-readable name shown in diagnostics.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
