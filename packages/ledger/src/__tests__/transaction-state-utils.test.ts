import { describe, expect, it } from 'vitest';

import { findPosting, hasDispute, referencedAmount, transactionState } from '../transaction-state-utils.js';

import { chargeback, deposit, dispute, resolve, withdrawal } from './test-utils.js';

describe('findPosting', () => {
  it('should return the first deposit or withdrawal', () => {
    const first = withdrawal(1, 1, '5');
    expect(findPosting([dispute(1, 1), first, deposit(1, 1, '9')])).toBe(first);
  });

  it('should return undefined when the bucket only holds references', () => {
    expect(findPosting([dispute(1, 1), resolve(1, 1)])).toBeUndefined();
  });
});

describe('referencedAmount', () => {
  it('should return the posting amount', () => {
    expect(referencedAmount([deposit(1, 1, '12.5'), dispute(1, 1)])?.toString()).toBe('12.5');
  });

  it('should return zero for a posting without amount', () => {
    expect(referencedAmount([{ kind: 'withdrawal', clientId: 1, txId: 1 }])?.isZero()).toBe(true);
  });

  it('should return undefined without a posting', () => {
    expect(referencedAmount([dispute(1, 1)])).toBeUndefined();
  });
});

describe('hasDispute', () => {
  it('should detect a dispute anywhere in the bucket', () => {
    expect(hasDispute([deposit(1, 1, '1'), dispute(1, 1), resolve(1, 1)])).toBe(true);
    expect(hasDispute([deposit(1, 1, '1')])).toBe(false);
  });
});

describe('transactionState', () => {
  it('should follow posted, disputed, resolved', () => {
    expect(transactionState([deposit(1, 1, '1')])).toBe('posted');
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1)])).toBe('disputed');
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1), resolve(1, 1)])).toBe('resolved');
  });

  it('should end in charged_back after a chargeback', () => {
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1), chargeback(1, 1)])).toBe('charged_back');
  });

  it('should skip events that arrive out of order', () => {
    expect(transactionState([deposit(1, 1, '1'), resolve(1, 1)])).toBe('posted');
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1), resolve(1, 1), chargeback(1, 1)])).toBe('resolved');
  });

  it('should reopen a settled posting on a later dispute', () => {
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1), resolve(1, 1), dispute(1, 1)])).toBe('disputed');
    expect(transactionState([deposit(1, 1, '1'), dispute(1, 1), chargeback(1, 1), dispute(1, 1)])).toBe('disputed');
  });

  it('should ignore a dispute that arrives before its posting', () => {
    expect(transactionState([dispute(1, 1), deposit(1, 1, '1')])).toBe('posted');
  });

  it('should be undefined for a bucket without a posting', () => {
    expect(transactionState([dispute(1, 1)])).toBeUndefined();
  });
});
