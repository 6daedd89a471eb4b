import { formatCurrency, parseCurrency, type Currency } from '@clientledger/core';
import { describe, expect, it } from 'vitest';

import { Account } from '../account.aggregate.js';
import type { AccountCommand } from '../account.commands.js';
import {
  DuplicateTransactionError,
  InsufficientFundsError,
  LockedAccountError,
  MissingAmountError,
  UnknownDisputeError,
  UnknownTransactionError,
} from '../account.errors.js';
import type { AccountEvent } from '../account.events.js';

const amount = (value: string): Currency => parseCurrency(value)._unsafeUnwrap();

function execute(account: Account, command: AccountCommand) {
  const result = account.handle(command);
  if (result.isOk()) {
    account.apply(result.value);
  }
  return result;
}

function balances(account: Account) {
  return {
    available: formatCurrency(account.available),
    held: formatCurrency(account.held),
    total: formatCurrency(account.total),
    locked: account.locked,
  };
}

describe('Account Aggregate', () => {
  describe('open', () => {
    it('should start with zero balances, unlocked and empty', () => {
      const account = Account.open(7);

      expect(account.client).toBe(7);
      expect(balances(account)).toEqual({ available: '0.0000', held: '0.0000', total: '0.0000', locked: false });
      expect(account.version).toBe(0);
      expect(account.getEvents()).toEqual([]);
    });
  });

  describe('deposit', () => {
    it('should credit available funds', () => {
      const account = Account.open(1);

      const result = execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('99.0000') });

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toEqual([{ type: 'Credited', tx: 10, amount: amount('99') }]);
      expect(balances(account)).toEqual({ available: '99.0000', held: '0.0000', total: '99.0000', locked: false });
      expect(account.version).toBe(1);
    });

    it('should fail without an amount', () => {
      const account = Account.open(1);

      const result = account.handle({ type: 'deposit', client: 1, tx: 10 });

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(MissingAmountError);
      expect(error.code).toBe('MISSING_AMOUNT');
      expect(error.message).toBe('Amount is required for deposit on account 1 transaction 10');
    });

    it('should reject the same deposit applied twice', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('5.5') });

      const result = execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('5.5000') });

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(DuplicateTransactionError);
      expect(result._unsafeUnwrapErr().code).toBe('DUPLICATE_TRANSACTION');
      expect(balances(account).available).toBe('5.5000');
      expect(account.version).toBe(1);
    });

    it('should accept the same tx with a different amount', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('5') });

      const result = execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('6') });

      expect(result.isOk()).toBe(true);
      expect(balances(account).available).toBe('11.0000');
    });

    it('should add without binary rounding drift', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('0.1') });
      execute(account, { type: 'deposit', client: 1, tx: 2, amount: amount('0.2') });

      expect(account.available.equals(amount('0.3'))).toBe(true);
    });
  });

  describe('withdraw', () => {
    it('should reject a withdrawal above available funds and leave state unchanged', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('99.0000') });

      const result = execute(account, { type: 'withdraw', client: 1, tx: 11, amount: amount('150.0000') });

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InsufficientFundsError);
      expect(error.message).toBe('Withdrawal of 150.0000 exceeds available 99.0000 on account 1 transaction 11');
      expect(balances(account)).toEqual({ available: '99.0000', held: '0.0000', total: '99.0000', locked: false });
      expect(account.version).toBe(1);
    });

    it('should allow withdrawing exactly the available funds', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('20') });

      const result = execute(account, { type: 'withdraw', client: 1, tx: 2, amount: amount('20') });

      expect(result._unsafeUnwrap()).toEqual([{ type: 'Debited', tx: 2, amount: amount('20') }]);
      expect(balances(account)).toEqual({ available: '0.0000', held: '0.0000', total: '0.0000', locked: false });
    });

    it('should fail without an amount', () => {
      const account = Account.open(1);

      const error = account.handle({ type: 'withdraw', client: 1, tx: 2 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(MissingAmountError);
      expect(error.message).toBe('Amount is required for withdraw on account 1 transaction 2');
    });

    it('should report a duplicate before checking funds', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('10') });
      execute(account, { type: 'withdraw', client: 1, tx: 2, amount: amount('10') });

      const error = account.handle({ type: 'withdraw', client: 1, tx: 2, amount: amount('10') })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(DuplicateTransactionError);
    });
  });

  describe('dispute', () => {
    it('should hold the disputed deposit and release it on resolve', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('99.0000') });

      execute(account, { type: 'dispute', client: 1, tx: 10 });
      expect(balances(account)).toEqual({ available: '0.0000', held: '99.0000', total: '99.0000', locked: false });

      execute(account, { type: 'resolve', client: 1, tx: 10 });
      expect(balances(account)).toEqual({ available: '99.0000', held: '0.0000', total: '99.0000', locked: false });
      expect(account.version).toBe(3);
    });

    it('should ignore an amount given on the dispute itself', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('12') });

      const result = account.handle({ type: 'dispute', client: 1, tx: 10, amount: amount('1') });

      expect(result._unsafeUnwrap()).toEqual([{ type: 'Held', tx: 10, amount: amount('12') }]);
    });

    it('should fail for a transaction that never happened', () => {
      const account = Account.open(1);

      const error = account.handle({ type: 'dispute', client: 1, tx: 99 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UnknownTransactionError);
      expect(error.code).toBe('UNKNOWN_TRANSACTION');
      expect(error.message).toBe('No transaction 99 on account 1 to dispute');
    });

    it('should use the first matching genesis transaction', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 5, amount: amount('10') });
      execute(account, { type: 'deposit', client: 1, tx: 5, amount: amount('20') });

      execute(account, { type: 'dispute', client: 1, tx: 5 });

      expect(balances(account)).toEqual({ available: '20.0000', held: '10.0000', total: '30.0000', locked: false });
    });

    it('should reject disputing the same transaction twice', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('50') });
      execute(account, { type: 'dispute', client: 1, tx: 10 });

      const result = execute(account, { type: 'dispute', client: 1, tx: 10 });

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(DuplicateTransactionError);
      expect(balances(account).held).toBe('50.0000');
    });

    it('should reject a second dispute after the first was resolved', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('50') });
      execute(account, { type: 'dispute', client: 1, tx: 10 });
      execute(account, { type: 'resolve', client: 1, tx: 10 });

      const error = account.handle({ type: 'dispute', client: 1, tx: 10 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(DuplicateTransactionError);
    });

    it('should hold a disputed withdrawal', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('100') });
      execute(account, { type: 'withdraw', client: 1, tx: 2, amount: amount('40') });

      execute(account, { type: 'dispute', client: 1, tx: 2 });

      expect(balances(account)).toEqual({ available: '20.0000', held: '40.0000', total: '60.0000', locked: false });
    });
  });

  describe('resolve', () => {
    it('should fail when the transaction was never disputed', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('50') });

      const error = account.handle({ type: 'resolve', client: 1, tx: 10 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UnknownDisputeError);
      expect(error.code).toBe('UNKNOWN_DISPUTE');
      expect(error.message).toBe('No disputed transaction 10 on account 1 to resolve');
    });

    it('should reject resolving the same dispute twice', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('50') });
      execute(account, { type: 'dispute', client: 1, tx: 10 });
      execute(account, { type: 'resolve', client: 1, tx: 10 });

      const error = account.handle({ type: 'resolve', client: 1, tx: 10 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(DuplicateTransactionError);
    });
  });

  describe('chargeback', () => {
    it('should reverse held funds and lock the account', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('99.0000') });
      execute(account, { type: 'dispute', client: 1, tx: 10 });

      const result = execute(account, { type: 'chargeback', client: 1, tx: 10 });

      expect(result._unsafeUnwrap()).toEqual([{ type: 'Reversed', tx: 10, amount: amount('99') }, { type: 'Locked' }]);
      expect(balances(account)).toEqual({ available: '0.0000', held: '0.0000', total: '0.0000', locked: true });
      expect(account.version).toBe(4);
    });

    it('should fail when the transaction was never disputed', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('50') });

      const error = account.handle({ type: 'chargeback', client: 1, tx: 10 })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UnknownDisputeError);
      expect(error.message).toBe('No disputed transaction 10 on account 1 to chargeback');
    });

    it('should reject a chargeback once the dispute was resolved', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('10') });
      execute(account, { type: 'dispute', client: 1, tx: 1 });
      execute(account, { type: 'resolve', client: 1, tx: 1 });

      const result = execute(account, { type: 'chargeback', client: 1, tx: 1 });

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(UnknownDisputeError);
      expect(error.message).toBe('No disputed transaction 1 on account 1 to chargeback');
      expect(balances(account)).toEqual({ available: '10.0000', held: '0.0000', total: '10.0000', locked: false });
      expect(account.version).toBe(3);
    });

    it('should keep funds outside the dispute after a chargeback of a withdrawal', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('100') });
      execute(account, { type: 'withdraw', client: 1, tx: 2, amount: amount('40') });
      execute(account, { type: 'dispute', client: 1, tx: 2 });

      execute(account, { type: 'chargeback', client: 1, tx: 2 });

      expect(balances(account)).toEqual({ available: '20.0000', held: '0.0000', total: '20.0000', locked: true });
    });
  });

  describe('locked account', () => {
    function lockedAccount(): Account {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 10, amount: amount('99') });
      execute(account, { type: 'deposit', client: 1, tx: 11, amount: amount('1') });
      execute(account, { type: 'dispute', client: 1, tx: 10 });
      execute(account, { type: 'chargeback', client: 1, tx: 10 });
      return account;
    }

    it('should reject every command once locked', () => {
      const account = lockedAccount();
      const commands: AccountCommand[] = [
        { type: 'deposit', client: 1, tx: 20, amount: amount('5') },
        { type: 'withdraw', client: 1, tx: 21, amount: amount('1') },
        { type: 'dispute', client: 1, tx: 11 },
        { type: 'resolve', client: 1, tx: 10 },
        { type: 'chargeback', client: 1, tx: 10 },
      ];

      for (const command of commands) {
        const error = execute(account, command)._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(LockedAccountError);
        expect(error.code).toBe('LOCKED_ACCOUNT');
      }

      expect(balances(account)).toEqual({ available: '1.0000', held: '0.0000', total: '1.0000', locked: true });
      expect(account.version).toBe(5);
    });

    it('should name the rejected command in the error', () => {
      const error = lockedAccount().handle({ type: 'withdraw', client: 1, tx: 30, amount: amount('1') })._unsafeUnwrapErr();

      expect(error.message).toBe('Account 1 is locked; withdraw for transaction 30 rejected');
    });
  });

  describe('handle', () => {
    it('should never mutate state', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('10') });
      const before = { ...balances(account), version: account.version, events: account.getEvents().length };

      account.handle({ type: 'deposit', client: 1, tx: 2, amount: amount('5') });
      account.handle({ type: 'withdraw', client: 1, tx: 3, amount: amount('5') });
      account.handle({ type: 'dispute', client: 1, tx: 1 });

      expect({ ...balances(account), version: account.version, events: account.getEvents().length }).toEqual(before);
    });
  });

  describe('invariants', () => {
    it('should keep total equal to available plus held after every command', () => {
      const account = Account.open(3);
      const commands: AccountCommand[] = [
        { type: 'deposit', client: 3, tx: 1, amount: amount('10.1234') },
        { type: 'deposit', client: 3, tx: 2, amount: amount('0.0001') },
        { type: 'withdraw', client: 3, tx: 3, amount: amount('3.5') },
        { type: 'dispute', client: 3, tx: 1 },
        { type: 'withdraw', client: 3, tx: 4, amount: amount('50') },
        { type: 'dispute', client: 3, tx: 3 },
        { type: 'resolve', client: 3, tx: 1 },
        { type: 'chargeback', client: 3, tx: 1 },
        { type: 'chargeback', client: 3, tx: 3 },
      ];

      for (const command of commands) {
        execute(account, command);
        expect(account.total.equals(account.available.plus(account.held))).toBe(true);
        expect(account.held.isNegative()).toBe(false);
      }

      expect(account.version).toBe(account.getEvents().length);
    });
  });

  describe('replay', () => {
    it('should stop at the first Locked event', () => {
      const history: AccountEvent[] = [
        { type: 'Credited', tx: 1, amount: amount('10') },
        { type: 'Held', tx: 1, amount: amount('10') },
        { type: 'Reversed', tx: 1, amount: amount('10') },
        { type: 'Locked' },
        { type: 'Credited', tx: 2, amount: amount('5') },
        { type: 'Debited', tx: 3, amount: amount('1') },
      ];

      const rebuilt = Account.replay(1, history);

      expect(balances(rebuilt)).toEqual({ available: '0.0000', held: '0.0000', total: '0.0000', locked: true });
      expect(rebuilt.version).toBe(4);
      expect(rebuilt.getEvents()).toEqual(history.slice(0, 4));
    });

    it('should rebuild the same state from the event log', () => {
      const account = Account.open(1);
      execute(account, { type: 'deposit', client: 1, tx: 1, amount: amount('100') });
      execute(account, { type: 'withdraw', client: 1, tx: 2, amount: amount('25.5') });
      execute(account, { type: 'dispute', client: 1, tx: 1 });

      const rebuilt = Account.replay(1, account.getEvents());

      expect(rebuilt.toView()).toEqual(account.toView());
      expect(rebuilt.version).toBe(3);
      expect(rebuilt.handle({ type: 'resolve', client: 1, tx: 1 }).isOk()).toBe(true);
      expect(rebuilt.handle({ type: 'dispute', client: 1, tx: 1 })._unsafeUnwrapErr()).toBeInstanceOf(
        DuplicateTransactionError
      );
    });
  });
});
