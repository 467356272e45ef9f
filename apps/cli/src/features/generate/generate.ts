import { CurrencyDataError, CurrencyDataErrorCodes } from '@curdata/currency-data';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import { displayCliError, type ErrorStream } from '../shared/cli-error.js';
import { ExitCodes, exitCodeForError, type ExitCode } from '../shared/exit-codes.js';

import { GenerateHandler, type GenerateHandlerDeps } from './generate-handler.js';

/**
 * Generate options validated by Zod at the CLI boundary.
 * Commander stores the short-only `-o` option under `o`.
 */
export const GenerateCommandOptionsSchema = z.object({
  o: z.string().min(1, { message: 'output path must not be empty' }),
});

export type GenerateCommandOptions = z.infer<typeof GenerateCommandOptionsSchema>;

export interface GenerateCommandDeps extends GenerateHandlerDeps {
  stderr?: ErrorStream | undefined;
}

const END_OF_OPTIONS = '--';

function singleOutputPath(value: string, previous: string | undefined): string {
  if (previous !== undefined) {
    throw new InvalidArgumentError('output file given more than once');
  }
  return value;
}

/**
 * The single supported invocation: `currency-data -o <file>`, properties on stdin.
 * There is no help or version option; every other shape is a usage error.
 */
export function createProgram(): Command {
  return new Command()
    .name('currency-data')
    .description('Generate the binary currency lookup table from currency properties read on stdin')
    .helpOption(false)
    .requiredOption('-o <file>', 'output file for the binary currency data', singleOutputPath)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ outputError: () => undefined });
}

function usageError(message: string): CurrencyDataError {
  return new CurrencyDataError(CurrencyDataErrorCodes.UsageError, message);
}

/**
 * Parse arguments, run the generator and report the outcome.
 * Resolves to the exit code; the caller owns process termination.
 */
export async function runGenerateCommand(args: readonly string[], deps: GenerateCommandDeps): Promise<ExitCode> {
  const stderr = deps.stderr ?? process.stderr;
  const program = createProgram();

  if (args.includes(END_OF_OPTIONS)) {
    displayCliError(usageError(`unexpected argument '${END_OF_OPTIONS}'`), ExitCodes.INVALID_ARGS, stderr);
    return ExitCodes.INVALID_ARGS;
  }

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      displayCliError(usageError(error.message.replace(/^error: /, '')), ExitCodes.INVALID_ARGS, stderr);
      return ExitCodes.INVALID_ARGS;
    }
    throw error;
  }

  const validation = GenerateCommandOptionsSchema.safeParse(program.opts());
  if (!validation.success) {
    const firstError = validation.error.issues[0];
    displayCliError(usageError(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, stderr);
    return ExitCodes.INVALID_ARGS;
  }

  const handler = new GenerateHandler(deps);
  const result = await handler.execute({ outputPath: validation.data.o });
  if (result.isErr()) {
    const exitCode = exitCodeForError(result.error.code);
    displayCliError(result.error, exitCode, stderr);
    return exitCode;
  }
  return ExitCodes.SUCCESS;
}
