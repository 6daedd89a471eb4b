import { DomainError, formatCurrency } from '@clientledger/core';
import type { ClientId, Currency, TransactionId } from '@clientledger/core';

import type { CommandType } from './account.commands.js';

/**
 * Account is locked after a chargeback; it accepts nothing further
 */
export class LockedAccountError extends DomainError {
  readonly code = 'LOCKED_ACCOUNT';

  constructor(client: ClientId, tx: TransactionId, commandType: CommandType) {
    super(`Account ${client} is locked; ${commandType} for transaction ${tx} rejected`, {
      additionalContext: { commandType },
      client,
      tx,
    });
  }
}

/**
 * Deposit or withdraw without an amount
 */
export class MissingAmountError extends DomainError {
  readonly code = 'MISSING_AMOUNT';

  constructor(client: ClientId, tx: TransactionId, commandType: CommandType) {
    super(`Amount is required for ${commandType} on account ${client} transaction ${tx}`, {
      additionalContext: { commandType },
      client,
      tx,
    });
  }
}

/**
 * The event this command would produce has already been applied
 */
export class DuplicateTransactionError extends DomainError {
  readonly code = 'DUPLICATE_TRANSACTION';

  constructor(client: ClientId, tx: TransactionId, commandType: CommandType) {
    super(`Duplicate ${commandType} on account ${client} transaction ${tx}`, {
      additionalContext: { commandType },
      client,
      tx,
    });
  }
}

export class InsufficientFundsError extends DomainError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    client: ClientId,
    tx: TransactionId,
    public readonly requested: Currency,
    public readonly available: Currency
  ) {
    super(
      `Withdrawal of ${formatCurrency(requested)} exceeds available ${formatCurrency(available)} on account ${client} transaction ${tx}`,
      {
        additionalContext: { available: formatCurrency(available), requested: formatCurrency(requested) },
        client,
        tx,
      }
    );
  }
}

/**
 * Dispute names a tx with no deposit/withdraw in this account's history
 */
export class UnknownTransactionError extends DomainError {
  readonly code = 'UNKNOWN_TRANSACTION';

  constructor(client: ClientId, tx: TransactionId) {
    super(`No transaction ${tx} on account ${client} to dispute`, { client, tx });
  }
}

/**
 * Resolve or chargeback names a tx that was never held
 */
export class UnknownDisputeError extends DomainError {
  readonly code = 'UNKNOWN_DISPUTE';

  constructor(client: ClientId, tx: TransactionId, commandType: CommandType) {
    super(`No disputed transaction ${tx} on account ${client} to ${commandType}`, {
      additionalContext: { commandType },
      client,
      tx,
    });
  }
}

export type AccountError =
  | LockedAccountError
  | MissingAmountError
  | DuplicateTransactionError
  | InsufficientFundsError
  | UnknownTransactionError
  | UnknownDisputeError;

export type AccountErrorCode = AccountError['code'];
