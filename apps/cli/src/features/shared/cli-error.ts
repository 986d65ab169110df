import { flushLoggers } from '@tallyledger/logger';
import pc from 'picocolors';

import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again. Run with --help for usage information.',
  [ExitCodes.NOT_FOUND]: 'The transaction log was not found. Double-check the path and try again.',
  [ExitCodes.PERMISSION_DENIED]: 'The file could not be accessed. Check its permissions and try again.',
};

/**
 * Display a CLI error on stderr and exit.
 *
 * stdout is left untouched so it only ever carries rendered accounts.
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode): never {
  process.stderr.write(`${pc.red('✗')} ${command}: ${error.message}\n`);

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    process.stderr.write(`${pc.dim(tip)}\n`);
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
  }

  flushLoggers();
  exitWithCode(exitCode);
}
