import { formatCurrency } from '@clientledger/core';
import type { Currency, TransactionId } from '@clientledger/core';

/**
 * Events the account aggregate emits. Every balance change is one of these;
 * account state is the fold of its event log.
 */
export type AccountEvent =
  | { type: 'Credited'; tx: TransactionId; amount: Currency }
  | { type: 'Debited'; tx: TransactionId; amount: Currency }
  | { type: 'Held'; tx: TransactionId; amount: Currency }
  | { type: 'Released'; tx: TransactionId; amount: Currency }
  | { type: 'Reversed'; tx: TransactionId; amount: Currency }
  | { type: 'Locked' };

export type AccountEventType = AccountEvent['type'];

export type MonetaryEvent = Exclude<AccountEvent, { type: 'Locked' }>;

/** Deposit/withdraw outcomes a dispute can refer back to */
export type GenesisEvent = Extract<AccountEvent, { type: 'Credited' | 'Debited' }>;

export function isGenesisEvent(event: AccountEvent): event is GenesisEvent {
  return event.type === 'Credited' || event.type === 'Debited';
}

/**
 * Structural identity: variant, tx and amount. Two events with the same key
 * are duplicates regardless of when they were produced.
 */
export function eventKey(event: AccountEvent): string {
  if (event.type === 'Locked') {
    return event.type;
  }
  return `${event.type}:${event.tx}:${formatCurrency(event.amount)}`;
}

export function eventsEqual(a: AccountEvent, b: AccountEvent): boolean {
  return eventKey(a) === eventKey(b);
}
