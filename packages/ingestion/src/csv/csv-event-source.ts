import { constants } from 'node:fs';
import { access, open } from 'node:fs/promises';
import { pipeline } from 'node:stream';

import type { EventSource, TransactionEvent } from '@tallyledger/core';
import { getLogger } from '@tallyledger/logger';
import { parse, type CsvError, type Parser } from 'csv-parse';
import { err, ok, type Result } from 'neverthrow';

import { CsvTransactionRowSchema, describeIssues, REQUIRED_COLUMNS } from './schemas.js';

const logger = getLogger('CsvEventSource');

interface NumberedRecord {
  /** Last physical line of the record, 1-based */
  line: number;
  record: unknown;
}

/**
 * Streams a transaction log CSV (`type, client, tx, amount`) as events.
 *
 * Rows are validated one at a time as they are read; rows that fail
 * validation, or that csv-parse cannot split into fields, are logged at warn
 * and skipped. `read()` reports a missing or unreadable path as an err; the
 * file is opened on the first pull from the sequence and closed when it ends.
 */
export class CsvEventSource implements EventSource {
  private consumed = false;
  private skipped = 0;

  constructor(private readonly filePath: string) {}

  /** Records dropped so far */
  get skippedRecords(): number {
    return this.skipped;
  }

  async read(): Promise<Result<AsyncIterable<TransactionEvent>, Error>> {
    if (this.consumed) {
      return err(new Error(`Transaction log ${this.filePath} has already been read`));
    }
    this.consumed = true;

    // The file itself is opened lazily by events()
    try {
      await access(this.filePath, constants.R_OK);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    return ok(this.events());
  }

  private createParser(): Parser {
    const parser = parse({
      bom: true,
      columns: normalizeHeader,
      on_record: (record: unknown, context): NumberedRecord => ({ line: context.lines, record }),
      relax_column_count_less: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      trim: true,
    });

    parser.on('skip', (error: CsvError) => {
      this.skipped++;
      logger.warn({ code: error.code, reason: error.message }, 'Skipping unreadable record');
    });

    return parser;
  }

  private async *events(): AsyncGenerator<TransactionEvent> {
    const handle = await open(this.filePath, 'r');
    logger.debug({ path: this.filePath }, 'Reading transaction log');

    const parser = this.createParser();
    pipeline(handle.createReadStream({ encoding: 'utf8' }), parser, (error) => {
      if (error) {
        logger.debug({ error, path: this.filePath }, 'Transaction log stream closed with an error');
      }
    });

    const records: AsyncIterable<NumberedRecord> = parser;

    for await (const { line, record } of records) {
      const result = CsvTransactionRowSchema.safeParse(record);
      if (!result.success) {
        this.skipped++;
        logger.warn({ line, reason: describeIssues(result.error) }, 'Skipping malformed record');
        continue;
      }

      yield result.data;
    }

    logger.debug({ path: this.filePath, skipped: this.skipped }, 'Finished reading transaction log');
  }
}

function normalizeHeader(header: string[]): string[] {
  const columns = header.map((column) => column.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new Error(`Transaction log header is missing column(s): ${missing.join(', ')}`);
  }
  return columns;
}
