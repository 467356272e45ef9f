import { open } from 'node:fs/promises';

import { CurrencyDataError, CurrencyDataErrorCodes } from '@curdata/currency-data';
import { ResultAsync } from 'neverthrow';

/** Destination of the generated bytes, opened once and closed once. */
export interface OutputSink {
  readonly path: string;
  write(bytes: Uint8Array): ResultAsync<void, CurrencyDataError>;
  close(): ResultAsync<void, CurrencyDataError>;
}

export type OpenOutputSink = (path: string) => ResultAsync<OutputSink, CurrencyDataError>;

function writeFailure(path: string, action: string) {
  return (error: unknown): CurrencyDataError =>
    new CurrencyDataError(
      CurrencyDataErrorCodes.OutputWriteFailure,
      `failed to ${action} ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path },
      error
    );
}

/**
 * Open (create or truncate) the output file.
 */
export const openOutputFile: OpenOutputSink = (path) =>
  ResultAsync.fromPromise(open(path, 'w'), writeFailure(path, 'open')).map(
    (handle): OutputSink => ({
      path,
      write: (bytes) =>
        ResultAsync.fromPromise(handle.writeFile(bytes), writeFailure(path, 'write')),
      close: () => ResultAsync.fromPromise(handle.close(), writeFailure(path, 'close')),
    })
  );
