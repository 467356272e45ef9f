import {
  CurrencyDataError,
  CurrencyDataErrorCodes,
  generateCurrencyData,
  type GeneratedCurrencyData,
} from '@curdata/currency-data';
import { getLogger } from '@curdata/logger';
import { parse } from 'dot-properties';
import { err, ok, type Result } from 'neverthrow';

import type { OpenOutputSink, OutputSink } from './output-sink.js';

const logger = getLogger('GenerateHandler');

export interface GenerateHandlerParams {
  outputPath: string;
}

export interface GenerateResult {
  outputPath: string;
  byteLength: number;
  specialCaseCount: number;
  otherCurrencyCount: number;
}

export interface GenerateHandlerDeps {
  /** Reads the whole properties text (stdin for the CLI). */
  readInput: () => Promise<string>;
  openOutput: OpenOutputSink;
  now?: (() => number) | undefined;
}

/**
 * Parse properties text into a flat key/value mapping.
 */
export function parseCurrencyProperties(text: string): Result<Readonly<Record<string, unknown>>, CurrencyDataError> {
  try {
    return ok(parse(text));
  } catch (error) {
    return err(
      new CurrencyDataError(
        CurrencyDataErrorCodes.InputReadFailure,
        `failed to read currency properties: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error
      )
    );
  }
}

/**
 * Generate handler: open output → read input → build tables → write → close.
 * The output is opened before anything is read, so an unwritable path fails
 * without consuming input. Once opened, the output is closed exactly once.
 */
export class GenerateHandler {
  constructor(private readonly deps: GenerateHandlerDeps) {}

  async execute(params: GenerateHandlerParams): Promise<Result<GenerateResult, CurrencyDataError>> {
    const sinkResult = await this.deps.openOutput(params.outputPath);
    if (sinkResult.isErr()) {
      return err(sinkResult.error);
    }
    const sink = sinkResult.value;

    const generated = await this.generate();
    if (generated.isErr()) {
      await this.closeAfterFailure(sink);
      return err(generated.error);
    }

    const { bytes, tables } = generated.value;
    const written = await sink.write(bytes);
    if (written.isErr()) {
      await this.closeAfterFailure(sink);
      return err(written.error);
    }
    const closed = await sink.close();
    if (closed.isErr()) {
      return err(closed.error);
    }

    const result: GenerateResult = {
      outputPath: params.outputPath,
      byteLength: bytes.length,
      specialCaseCount: tables.specialCases.length,
      otherCurrencyCount: tables.otherCurrencies.records.length,
    };
    logger.info({ ...result }, 'Wrote currency data');
    return ok(result);
  }

  /** The pipeline failure is reported; a close error is only logged. */
  private async closeAfterFailure(sink: OutputSink): Promise<void> {
    const closed = await sink.close();
    if (closed.isErr()) {
      logger.warn({ error: closed.error }, 'Failed to close output after error');
    }
  }

  private async generate(): Promise<Result<GeneratedCurrencyData, CurrencyDataError>> {
    let text: string;
    try {
      text = await this.deps.readInput();
    } catch (error) {
      return err(
        new CurrencyDataError(
          CurrencyDataErrorCodes.InputReadFailure,
          `failed to read input: ${error instanceof Error ? error.message : String(error)}`,
          undefined,
          error
        )
      );
    }

    return parseCurrencyProperties(text).andThen((properties) =>
      generateCurrencyData(properties, { now: this.deps.now })
    );
  }
}
