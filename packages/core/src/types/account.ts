import type { Decimal } from 'decimal.js';

/**
 * Read-only view of a client account as rendered by sinks.
 */
export interface Account {
  readonly clientId: number;
  /** Funds the client can withdraw */
  readonly available: Decimal;
  /** Funds frozen by open disputes */
  readonly held: Decimal;
  /** Always `available + held` */
  readonly total: Decimal;
  /** Set by a chargeback, never cleared */
  readonly locked: boolean;
}

export type AccountMap = ReadonlyMap<number, Account>;
