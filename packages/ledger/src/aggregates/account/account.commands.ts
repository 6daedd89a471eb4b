import type { ClientId, Currency, TransactionId } from '@clientledger/core';

/**
 * Wire tokens of the commands an account accepts.
 */
export const COMMAND_TYPES = ['deposit', 'withdraw', 'dispute', 'resolve', 'chargeback'] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

interface CommandShape<TType extends CommandType> {
  type: TType;
  client: ClientId;
  tx: TransactionId;
  /** Present for deposit/withdraw; ignored by the other commands */
  amount?: Currency | undefined;
}

export type DepositCommand = CommandShape<'deposit'>;
export type WithdrawCommand = CommandShape<'withdraw'>;
export type DisputeCommand = CommandShape<'dispute'>;
export type ResolveCommand = CommandShape<'resolve'>;
export type ChargebackCommand = CommandShape<'chargeback'>;

export type AccountCommand = DepositCommand | WithdrawCommand | DisputeCommand | ResolveCommand | ChargebackCommand;

export function isCommandType(value: string): value is CommandType {
  return (COMMAND_TYPES as readonly string[]).includes(value);
}
