#!/usr/bin/env node
import { flushLoggers, getLogger } from '@tallyledger/logger';

import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

const logger = getLogger('CLI');

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
  flushLoggers();
}

main().catch((error: unknown) => {
  const normalized = error instanceof Error ? error : new Error(String(error));
  logger.error({ error: normalized }, 'Unhandled CLI failure');
  displayCliError('tallyledger', normalized, ExitCodes.GENERAL_ERROR);
});
