import type { Account } from '@tallyledger/core';
import { Decimal } from 'decimal.js';

/**
 * Mutable balance aggregate for one client.
 *
 * `total` is derived from `available` and `held` on every read, so it can
 * never drift from its components. None of the mutators check preconditions;
 * the engine decides whether a mutation happens.
 */
export class ClientAccount implements Account {
  private availableFunds = new Decimal(0);
  private heldFunds = new Decimal(0);
  private isLocked = false;

  constructor(readonly clientId: number) {}

  get available(): Decimal {
    return this.availableFunds;
  }

  get held(): Decimal {
    return this.heldFunds;
  }

  get total(): Decimal {
    return this.availableFunds.plus(this.heldFunds);
  }

  get locked(): boolean {
    return this.isLocked;
  }

  credit(amount: Decimal): void {
    this.availableFunds = this.availableFunds.plus(amount);
  }

  debit(amount: Decimal): void {
    this.availableFunds = this.availableFunds.minus(amount);
  }

  /** Move funds from available to held. */
  hold(amount: Decimal): void {
    this.availableFunds = this.availableFunds.minus(amount);
    this.heldFunds = this.heldFunds.plus(amount);
  }

  /** Move funds from held back to available. */
  release(amount: Decimal): void {
    this.heldFunds = this.heldFunds.minus(amount);
    this.availableFunds = this.availableFunds.plus(amount);
  }

  /**
   * Reverse a disputed posting: the amount leaves both held and available,
   * and the account is locked for good.
   */
  chargeBack(amount: Decimal): void {
    this.heldFunds = this.heldFunds.minus(amount);
    this.availableFunds = this.availableFunds.minus(amount);
    this.isLocked = true;
  }
}
