#!/usr/bin/env tsx
import { text } from 'node:stream/consumers';

import { flushLoggers, getLogger } from '@curdata/logger';

import { openOutputFile } from './features/generate/output-sink.js';
import { runGenerateCommand } from './features/generate/generate.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { setupLogging } from './features/shared/logging.js';

const logger = getLogger('CLI');

async function main(): Promise<void> {
  const logging = setupLogging();
  if (logging.isErr()) {
    displayCliError(logging.error, ExitCodes.CONFIG_ERROR);
    process.exit(ExitCodes.CONFIG_ERROR);
  }

  const exitCode = await runGenerateCommand(process.argv.slice(2), {
    readInput: () => text(process.stdin),
    openOutput: openOutputFile,
  });

  flushLoggers();
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  flushLoggers();
  displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  process.exit(ExitCodes.GENERAL_ERROR);
});
