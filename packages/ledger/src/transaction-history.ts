import type { TransactionEvent } from '@tallyledger/core';

export interface TransactionBucket {
  clientId: number;
  txId: number;
  events: readonly TransactionEvent[];
}

/**
 * Read side of the history index, handed out by the engine.
 */
export interface TransactionHistoryView {
  /** Events seen for `(clientId, txId)`, in arrival order */
  bucket(clientId: number, txId: number): readonly TransactionEvent[] | undefined;
  buckets(): IterableIterator<TransactionBucket>;
  /** Number of events recorded */
  readonly size: number;
}

/**
 * Append-only index of every event seen, grouped by client then transaction id.
 * Disputes, resolves and chargebacks look up the posting they refer to here.
 */
export class TransactionHistory implements TransactionHistoryView {
  private readonly byClient = new Map<number, Map<number, TransactionEvent[]>>();
  private eventCount = 0;

  record(event: TransactionEvent): void {
    let byTx = this.byClient.get(event.clientId);
    if (!byTx) {
      byTx = new Map();
      this.byClient.set(event.clientId, byTx);
    }

    const events = byTx.get(event.txId);
    if (events) {
      events.push(event);
    } else {
      byTx.set(event.txId, [event]);
    }
    this.eventCount++;
  }

  bucket(clientId: number, txId: number): readonly TransactionEvent[] | undefined {
    return this.byClient.get(clientId)?.get(txId);
  }

  *buckets(): IterableIterator<TransactionBucket> {
    for (const [clientId, byTx] of this.byClient) {
      for (const [txId, events] of byTx) {
        yield { clientId, txId, events };
      }
    }
  }

  get size(): number {
    return this.eventCount;
  }
}
