export type { Actor } from './actor.js';
export { Account, type AccountView } from './aggregates/account/account.aggregate.js';
export {
  COMMAND_TYPES,
  isCommandType,
  type AccountCommand,
  type ChargebackCommand,
  type CommandType,
  type DepositCommand,
  type DisputeCommand,
  type ResolveCommand,
  type WithdrawCommand,
} from './aggregates/account/account.commands.js';
export {
  DuplicateTransactionError,
  InsufficientFundsError,
  LockedAccountError,
  MissingAmountError,
  UnknownDisputeError,
  UnknownTransactionError,
  type AccountError,
  type AccountErrorCode,
} from './aggregates/account/account.errors.js';
export {
  eventKey,
  eventsEqual,
  isGenesisEvent,
  type AccountEvent,
  type AccountEventType,
  type GenesisEvent,
  type MonetaryEvent,
} from './aggregates/account/account.events.js';
export { IngestionRouter, type RouterStats } from './router/ingestion-router.js';
