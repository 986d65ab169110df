import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tallyledger')
    .description('Replay a transaction log into per-client account balances')
    .version('0.1.0')
    // Commander exits with 1 on usage errors; report them as invalid arguments
    .exitOverride((error) => {
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    });

  registerProcessCommand(program);

  return program;
}
