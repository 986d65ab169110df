// Pure rendering of the final account map
// All functions are pure - no side effects

import { formatBalance, type Account, type AccountMap } from '@tallyledger/core';

/**
 * Supported output formats.
 */
export const ACCOUNT_FORMATS = ['csv', 'json'] as const;
export type AccountFormat = (typeof ACCOUNT_FORMATS)[number];

export const ACCOUNT_CSV_HEADER = 'client,available,held,total,locked';

/**
 * One rendered account: balances as fixed four-digit decimal strings.
 */
export interface AccountRow {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

/**
 * Accounts ordered by client id. Map order is insertion order, which depends
 * on the log, so renderers sort to keep output stable.
 */
export function sortAccounts(accounts: AccountMap): Account[] {
  return [...accounts.values()].sort((a, b) => a.clientId - b.clientId);
}

export function toAccountRow(account: Account): AccountRow {
  return {
    client: account.clientId,
    available: formatBalance(account.available),
    held: formatBalance(account.held),
    total: formatBalance(account.total),
    locked: account.locked,
  };
}

/**
 * Convert accounts to CSV, one line per account, newline terminated.
 */
export function convertToCSV(accounts: AccountMap): string {
  const lines = sortAccounts(accounts)
    .map(toAccountRow)
    .map((row) => [row.client, row.available, row.held, row.total, row.locked].join(','));

  return [ACCOUNT_CSV_HEADER, ...lines].join('\n') + '\n';
}

/**
 * Convert accounts to a JSON array of rows.
 */
export function convertToJSON(accounts: AccountMap): string {
  return JSON.stringify(sortAccounts(accounts).map(toAccountRow), undefined, 2) + '\n';
}

export function renderAccounts(accounts: AccountMap, format: AccountFormat): string {
  return format === 'csv' ? convertToCSV(accounts) : convertToJSON(accounts);
}
