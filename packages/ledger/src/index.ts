export { ClientAccount } from './client-account.js';
export { LedgerEngine, type ApplyOutcome } from './ledger-engine.js';
export { runLedger, type LedgerRunSummary } from './ledger-runner.js';
export { TransactionHistory, type TransactionBucket, type TransactionHistoryView } from './transaction-history.js';
export {
  findPosting,
  hasDispute,
  referencedAmount,
  transactionState,
  type TransactionState,
} from './transaction-state-utils.js';
