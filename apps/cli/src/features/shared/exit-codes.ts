/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file or directory not found */
  NOT_FOUND: 4,

  /** Permission denied */
  PERMISSION_DENIED: 13,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}

/**
 * Pick the exit code for a fatal error from the errno code found on it or on
 * any error in its cause chain.
 */
export function exitCodeForError(error: Error): ExitCode {
  let current: unknown = error;

  while (current instanceof Error) {
    const code = 'code' in current ? current.code : undefined;
    if (code === 'ENOENT') return ExitCodes.NOT_FOUND;
    if (code === 'EACCES' || code === 'EPERM') return ExitCodes.PERMISSION_DENIED;
    current = current.cause;
  }

  return ExitCodes.GENERAL_ERROR;
}
