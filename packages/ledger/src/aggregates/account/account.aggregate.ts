import { zeroCurrency } from '@clientledger/core';
import type { ClientId, Currency, TransactionId } from '@clientledger/core';
import { err, ok, type Result } from 'neverthrow';

import type { Actor } from '../../actor.js';

import type { AccountCommand, CommandType } from './account.commands.js';
import {
  DuplicateTransactionError,
  InsufficientFundsError,
  LockedAccountError,
  MissingAmountError,
  UnknownDisputeError,
  UnknownTransactionError,
  type AccountError,
} from './account.errors.js';
import { eventKey, isGenesisEvent, type AccountEvent, type MonetaryEvent } from './account.events.js';

/**
 * Public read model of an account. Version and history stay internal.
 */
export interface AccountView {
  client: ClientId;
  available: Currency;
  held: Currency;
  total: Currency;
  locked: boolean;
}

/**
 * Account Aggregate
 *
 * One client's balances, derived by folding the client's event log.
 *
 * Domain Rules:
 * - A locked account rejects every command
 * - Deposits and withdrawals need an amount; withdrawals cannot exceed available funds
 * - Disputes refer to the first deposit/withdraw with the same tx and hold its amount
 * - Resolves and chargebacks refer to the first hold with the same tx, and only
 *   while that hold is still open (not yet released or reversed)
 * - A chargeback reverses the held amount and locks the account
 * - No event is applied twice (same variant, tx and amount)
 * - total == available + held after every apply
 */
export class Account implements Actor<AccountCommand, AccountEvent, AccountError> {
  /**
   * Factory method for an account seen for the first time
   */
  static open(client: ClientId): Account {
    return new Account(client);
  }

  /**
   * Rebuild an account from its event history. Nothing after the first
   * `Locked` event is applied.
   */
  static replay(client: ClientId, events: readonly AccountEvent[]): Account {
    const account = new Account(client);
    const lockedAt = events.findIndex((event) => event.type === 'Locked');
    account.apply(lockedAt === -1 ? events : events.slice(0, lockedAt + 1));
    return account;
  }

  private _available: Currency = zeroCurrency();
  private _held: Currency = zeroCurrency();
  private _total: Currency = zeroCurrency();
  private _locked = false;
  private _version = 0;

  private readonly events: AccountEvent[] = [];

  // Lookup indexes over `events`; each keeps only the first match per tx
  private readonly eventKeys = new Set<string>();
  private readonly genesisAmounts = new Map<TransactionId, Currency>();
  private readonly heldAmounts = new Map<TransactionId, Currency>();
  private readonly settledHolds = new Set<TransactionId>();

  private constructor(private readonly _client: ClientId) {}

  // Getters
  get client(): ClientId {
    return this._client;
  }

  get available(): Currency {
    return this._available;
  }

  get held(): Currency {
    return this._held;
  }

  get total(): Currency {
    return this._total;
  }

  get locked(): boolean {
    return this._locked;
  }

  get version(): number {
    return this._version;
  }

  getEvents(): readonly AccountEvent[] {
    return [...this.events];
  }

  toView(): AccountView {
    return {
      client: this._client,
      available: this._available,
      held: this._held,
      total: this._total,
      locked: this._locked,
    };
  }

  /**
   * Decide which events a command produces. Never mutates the account.
   */
  handle(command: AccountCommand): Result<AccountEvent[], AccountError> {
    const { client, tx } = command;

    if (this._locked) {
      return err(new LockedAccountError(client, tx, command.type));
    }

    switch (command.type) {
      case 'deposit': {
        if (command.amount === undefined) {
          return err(new MissingAmountError(client, tx, command.type));
        }
        return this.unlessDuplicate(command, { type: 'Credited', tx, amount: command.amount }).map(
          (event): AccountEvent[] => [event]
        );
      }

      case 'withdraw': {
        const amount = command.amount;
        if (amount === undefined) {
          return err(new MissingAmountError(client, tx, command.type));
        }
        return this.unlessDuplicate(command, { type: 'Debited', tx, amount }).andThen(
          (event): Result<AccountEvent[], InsufficientFundsError> =>
            amount.greaterThan(this._available)
              ? err(new InsufficientFundsError(client, tx, amount, this._available))
              : ok([event])
        );
      }

      case 'dispute': {
        const genesisAmount = this.genesisAmounts.get(tx);
        if (genesisAmount === undefined) {
          return err(new UnknownTransactionError(client, tx));
        }
        return this.unlessDuplicate(command, { type: 'Held', tx, amount: genesisAmount }).map(
          (event): AccountEvent[] => [event]
        );
      }

      case 'resolve': {
        const heldAmount = this.heldAmounts.get(tx);
        if (heldAmount === undefined) {
          return err(new UnknownDisputeError(client, tx, command.type));
        }
        return this.unlessDuplicate(command, { type: 'Released', tx, amount: heldAmount }).andThen(
          (event): Result<AccountEvent[], UnknownDisputeError> =>
            this.settledHolds.has(tx) ? err(new UnknownDisputeError(client, tx, command.type)) : ok([event])
        );
      }

      case 'chargeback': {
        const heldAmount = this.heldAmounts.get(tx);
        if (heldAmount === undefined) {
          return err(new UnknownDisputeError(client, tx, command.type));
        }
        return this.unlessDuplicate(command, { type: 'Reversed', tx, amount: heldAmount }).andThen(
          (event): Result<AccountEvent[], UnknownDisputeError> =>
            this.settledHolds.has(tx)
              ? err(new UnknownDisputeError(client, tx, command.type))
              : ok([event, { type: 'Locked' }])
        );
      }

      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }

  /**
   * Fold validated events into state, in order.
   */
  apply(events: readonly AccountEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case 'Credited':
          this._available = this._available.plus(event.amount);
          break;
        case 'Debited':
          this._available = this._available.minus(event.amount);
          break;
        case 'Held':
          this._available = this._available.minus(event.amount);
          this._held = this._held.plus(event.amount);
          break;
        case 'Released':
          this._available = this._available.plus(event.amount);
          this._held = this._held.minus(event.amount);
          break;
        case 'Reversed':
          this._held = this._held.minus(event.amount);
          break;
        case 'Locked':
          this._locked = true;
          break;
      }

      this._total = this._available.plus(this._held);
      this._version += 1;
      this.events.push(event);
      this.index(event);
    }
  }

  private index(event: AccountEvent): void {
    this.eventKeys.add(eventKey(event));

    if (isGenesisEvent(event) && !this.genesisAmounts.has(event.tx)) {
      this.genesisAmounts.set(event.tx, event.amount);
    }
    if (event.type === 'Held' && !this.heldAmounts.has(event.tx)) {
      this.heldAmounts.set(event.tx, event.amount);
    }
    if (event.type === 'Released' || event.type === 'Reversed') {
      this.settledHolds.add(event.tx);
    }
  }

  private unlessDuplicate<TEvent extends MonetaryEvent>(
    command: { client: ClientId; tx: TransactionId; type: CommandType },
    event: TEvent
  ): Result<TEvent, DuplicateTransactionError> {
    if (this.eventKeys.has(eventKey(event))) {
      return err(new DuplicateTransactionError(command.client, command.tx, command.type));
    }
    return ok(event);
  }
}
