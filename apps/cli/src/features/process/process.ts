import type { Writable } from 'node:stream';

import { flushLoggers, initLogger } from '@tallyledger/logger';
import type { Command, OptionValues } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler, type ProcessResult } from './process-handler.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command. It is the default command, so
 * `tallyledger <input>` runs it without naming it.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Replay a transaction log and print the final client accounts')
    .argument('<input>', 'Transaction log CSV (type, client, tx, amount)')
    .argument('[output]', 'Write accounts to this file instead of stdout')
    .option('--format <type>', 'Output format (csv|json)', 'csv')
    .option('--verbose', 'Log every step at debug level')
    .action(async (input: string, output: string | undefined, options: OptionValues) => {
      await executeProcessCommand({ ...options, input, output });
    });
}

/**
 * Execute the process command.
 */
export async function executeProcessCommand(rawOptions: unknown, stdout: Writable = process.stdout): Promise<void> {
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError('process', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  if (options.verbose) {
    initLogger({ level: 'debug' });
  }

  const handler = new ProcessHandler(stdout);
  const result = await handler.execute({
    inputPath: options.input,
    outputPath: options.output,
    format: options.format,
  });

  if (result.isErr()) {
    displayCliError('process', result.error, exitCodeForError(result.error));
  }

  reportProcessSuccess(result.value);
  flushLoggers();
}

/**
 * Short summary on stderr; stdout may be carrying the accounts.
 */
function reportProcessSuccess(result: ProcessResult): void {
  if (result.skippedRecords > 0) {
    process.stderr.write(`${pc.yellow('⚠')} Skipped ${result.skippedRecords} malformed record(s)\n`);
  }

  if (result.outputPath) {
    process.stderr.write(`${pc.green('✓')} Wrote ${result.summary.accounts} account(s) to ${result.outputPath}\n`);
  }
}
