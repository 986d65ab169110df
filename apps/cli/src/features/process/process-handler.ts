import type { Writable } from 'node:stream';

import type { AccountSink } from '@tallyledger/core';
import { CsvEventSource } from '@tallyledger/ingestion';
import { LedgerEngine, runLedger, type LedgerRunSummary } from '@tallyledger/ledger';
import { getLogger } from '@tallyledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { AccountFormat } from './account-format-utils.js';
import { FileAccountSink, StreamAccountSink } from './account-sinks.js';

const logger = getLogger('ProcessHandler');

/**
 * Process handler parameters.
 */
export interface ProcessHandlerParams {
  /** Transaction log to replay */
  inputPath: string;

  /** Where to write accounts; stdout when absent */
  outputPath?: string | undefined;

  /** Output format */
  format: AccountFormat;
}

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  summary: LedgerRunSummary;

  /** Rows dropped by the reader as malformed */
  skippedRecords: number;

  /** Output path, or undefined when accounts went to the stream */
  outputPath?: string | undefined;
}

/**
 * Process handler - replays a transaction log and writes the final accounts.
 * Reusable by both CLI command and other contexts.
 */
export class ProcessHandler {
  constructor(private readonly stdout: Writable = process.stdout) {}

  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    logger.info({ params }, 'Starting ledger run');

    const source = new CsvEventSource(params.inputPath);
    const engine = new LedgerEngine();

    const runResult = await runLedger(source, engine);
    if (runResult.isErr()) {
      return err(new Error(`Failed to read ${params.inputPath}: ${runResult.error.message}`, { cause: runResult.error }));
    }

    const sink = this.createSink(params);
    const writeResult = await sink.write(engine.accounts());
    if (writeResult.isErr()) {
      const target = params.outputPath ?? 'stdout';
      return err(new Error(`Failed to write ${target}: ${writeResult.error.message}`, { cause: writeResult.error }));
    }

    return ok({
      summary: runResult.value,
      skippedRecords: source.skippedRecords,
      outputPath: params.outputPath,
    });
  }

  private createSink(params: ProcessHandlerParams): AccountSink {
    return params.outputPath
      ? new FileAccountSink(params.outputPath, params.format)
      : new StreamAccountSink(this.stdout, params.format);
  }
}
