import type { TransactionEvent } from '@tallyledger/core';
import { Decimal } from 'decimal.js';

import { ClientAccount } from './client-account.js';
import { TransactionHistory, type TransactionHistoryView } from './transaction-history.js';
import { hasDispute, referencedAmount } from './transaction-state-utils.js';

function amountOf(event: TransactionEvent): Decimal {
  return event.amount ?? new Decimal(0);
}

/**
 * Whether an event changed any balance. Ignored events are business-rule
 * rejections (unknown reference, insufficient funds, no open dispute) and are
 * not errors.
 */
export type ApplyOutcome = 'applied' | 'ignored';

/**
 * Applies transaction events, in arrival order, to per-client accounts.
 *
 * Each event is recorded in the history index after its rule runs, whether or
 * not the rule had an effect. A locked account still accepts every later
 * event; the flag is reported, not enforced.
 */
export class LedgerEngine {
  private readonly accountMap = new Map<number, ClientAccount>();
  private readonly transactionHistory = new TransactionHistory();

  apply(event: TransactionEvent): ApplyOutcome {
    const outcome = this.applyRule(event);
    this.transactionHistory.record(event);
    return outcome;
  }

  accounts(): ReadonlyMap<number, ClientAccount> {
    return this.accountMap;
  }

  account(clientId: number): ClientAccount | undefined {
    return this.accountMap.get(clientId);
  }

  history(): TransactionHistoryView {
    return this.transactionHistory;
  }

  private applyRule(event: TransactionEvent): ApplyOutcome {
    switch (event.kind) {
      case 'deposit':
        return this.deposit(event);
      case 'withdrawal':
        return this.withdraw(event);
      case 'dispute':
        return this.dispute(event);
      case 'resolve':
        return this.resolve(event);
      case 'chargeback':
        return this.chargeBack(event);
    }
  }

  private deposit(event: TransactionEvent): ApplyOutcome {
    this.getOrCreateAccount(event.clientId).credit(amountOf(event));
    return 'applied';
  }

  private withdraw(event: TransactionEvent): ApplyOutcome {
    const account = this.accountMap.get(event.clientId);
    if (!account) return 'ignored';

    const amount = amountOf(event);
    if (account.available.lessThan(amount)) return 'ignored';

    account.debit(amount);
    return 'applied';
  }

  private dispute(event: TransactionEvent): ApplyOutcome {
    const amount = this.postedAmount(event);
    if (!amount) return 'ignored';

    // A withdrawal dropped for lack of an account is still disputable
    this.getOrCreateAccount(event.clientId).hold(amount);
    return 'applied';
  }

  private resolve(event: TransactionEvent): ApplyOutcome {
    const amount = this.disputedAmount(event);
    const account = this.accountMap.get(event.clientId);
    if (!amount || !account) return 'ignored';

    account.release(amount);
    return 'applied';
  }

  private chargeBack(event: TransactionEvent): ApplyOutcome {
    const amount = this.disputedAmount(event);
    const account = this.accountMap.get(event.clientId);
    if (!amount || !account) return 'ignored';

    account.chargeBack(amount);
    return 'applied';
  }

  private postedAmount(event: TransactionEvent): Decimal | undefined {
    const events = this.transactionHistory.bucket(event.clientId, event.txId);
    return events ? referencedAmount(events) : undefined;
  }

  private disputedAmount(event: TransactionEvent): Decimal | undefined {
    const events = this.transactionHistory.bucket(event.clientId, event.txId);
    if (!events || !hasDispute(events)) return undefined;
    return referencedAmount(events);
  }

  private getOrCreateAccount(clientId: number): ClientAccount {
    let account = this.accountMap.get(clientId);
    if (!account) {
      account = new ClientAccount(clientId);
      this.accountMap.set(clientId, account);
    }
    return account;
  }
}
