import type { EventSource, TransactionEvent } from '@tallyledger/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Event source over events already in memory. Single-pass like every other
 * source.
 */
export class MemoryEventSource implements EventSource {
  private consumed = false;

  constructor(private readonly events: readonly TransactionEvent[]) {}

  read(): Promise<Result<AsyncIterable<TransactionEvent>, Error>> {
    if (this.consumed) {
      return Promise.resolve(err(new Error('Memory event source has already been read')));
    }
    this.consumed = true;

    return Promise.resolve(ok(toAsyncIterable(this.events)));
  }
}

async function* toAsyncIterable(events: readonly TransactionEvent[]): AsyncGenerator<TransactionEvent> {
  for (const event of events) {
    yield event;
  }
}
