import { createTransactionEvent, type TransactionEvent, type TransactionKind } from '@tallyledger/core';
import { describe, expect, it } from 'vitest';

import { LedgerEngine } from '../ledger-engine.js';
import { findPosting } from '../transaction-state-utils.js';

// mulberry32: small deterministic PRNG so failures reproduce from the seed
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const KIND_WEIGHTS: [TransactionKind, number][] = [
  ['deposit', 0.35],
  ['withdrawal', 0.25],
  ['dispute', 0.2],
  ['resolve', 0.1],
  ['chargeback', 0.1],
];

function generateEvents(seed: number, count: number): TransactionEvent[] {
  const random = createRandom(seed);
  const events: TransactionEvent[] = [];
  let nextTxId = 1;

  const pickKind = (): TransactionKind => {
    let roll = random();
    for (const [kind, weight] of KIND_WEIGHTS) {
      if (roll < weight) return kind;
      roll -= weight;
    }
    return 'deposit';
  };

  for (let i = 0; i < count; i++) {
    const kind = pickKind();
    const clientId = 1 + Math.floor(random() * 3);

    if (kind === 'deposit' || kind === 'withdrawal') {
      const amount = (random() * 100).toFixed(4);
      events.push(createTransactionEvent({ kind, clientId, txId: nextTxId++, amount })._unsafeUnwrap());
    } else {
      // Reach past the ids issued so far to exercise unknown references
      const txId = 1 + Math.floor(random() * (nextTxId + 5));
      events.push(createTransactionEvent({ kind, clientId, txId })._unsafeUnwrap());
    }
  }

  return events;
}

interface AccountSnapshot {
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

function snapshot(engine: LedgerEngine): Map<number, AccountSnapshot> {
  const result = new Map<number, AccountSnapshot>();
  for (const [clientId, account] of engine.accounts()) {
    result.set(clientId, {
      available: account.available.toString(),
      held: account.held.toString(),
      total: account.total.toString(),
      locked: account.locked,
    });
  }
  return result;
}

describe('LedgerEngine invariants', () => {
  const seeds = [1, 7, 42, 1234, 99991];

  it.each(seeds)('should hold for every prefix of a generated log (seed %i)', (seed) => {
    const engine = new LedgerEngine();

    for (const event of generateEvents(seed, 400)) {
      const before = snapshot(engine);
      const bucket = engine.history().bucket(event.clientId, event.txId);
      const referencesPosting = bucket !== undefined && findPosting(bucket) !== undefined;
      const hasPriorDispute = bucket?.some((e) => e.kind === 'dispute') ?? false;

      const outcome = engine.apply(event);
      const after = snapshot(engine);

      // total is always available + held
      for (const account of engine.accounts().values()) {
        expect(account.total.equals(account.available.plus(account.held))).toBe(true);
      }

      // locked never goes back to false
      for (const [clientId, previous] of before) {
        if (previous.locked) {
          expect(after.get(clientId)?.locked).toBe(true);
        }
      }

      if (event.kind === 'withdrawal') {
        const account = engine.account(event.clientId);
        if (outcome === 'applied') {
          expect(account?.available.isNegative()).toBe(false);
        } else {
          expect(after).toEqual(before);
        }
      }

      // references to unknown postings change nothing
      if (event.kind !== 'deposit' && event.kind !== 'withdrawal' && !referencesPosting) {
        expect(outcome).toBe('ignored');
        expect(after).toEqual(before);
      }

      // resolve and chargeback need a dispute first
      if ((event.kind === 'resolve' || event.kind === 'chargeback') && !hasPriorDispute) {
        expect(outcome).toBe('ignored');
        expect(after).toEqual(before);
      }
    }

    expect(engine.history().size).toBe(400);
  });
});
