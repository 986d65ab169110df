import type { Writable } from 'node:stream';

import type { AccountMap, AccountSink } from '@tallyledger/core';
import { getLogger } from '@tallyledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { writeFileAtomically } from '../shared/file-utils.js';

import { renderAccounts, type AccountFormat } from './account-format-utils.js';

const logger = getLogger('AccountSink');

/**
 * Writes the rendered accounts to a stream, typically stdout.
 * The stream is not ended so the caller keeps ownership.
 */
export class StreamAccountSink implements AccountSink {
  constructor(
    private readonly stream: Writable,
    private readonly format: AccountFormat
  ) {}

  write(accounts: AccountMap): Promise<Result<void, Error>> {
    const content = renderAccounts(accounts, this.format);

    return new Promise((resolve) => {
      this.stream.write(content, (error) => {
        if (error) {
          resolve(err(error));
          return;
        }
        logger.debug({ accounts: accounts.size, format: this.format }, 'Accounts written to stream');
        resolve(ok(undefined));
      });
    });
  }
}

/**
 * Writes the rendered accounts to a file, replacing it atomically.
 */
export class FileAccountSink implements AccountSink {
  constructor(
    private readonly filePath: string,
    private readonly format: AccountFormat
  ) {}

  async write(accounts: AccountMap): Promise<Result<void, Error>> {
    const result = await writeFileAtomically(this.filePath, renderAccounts(accounts, this.format));
    if (result.isErr()) {
      return err(result.error);
    }

    logger.debug({ accounts: accounts.size, format: this.format, path: this.filePath }, 'Accounts written to file');
    return ok(undefined);
  }
}
