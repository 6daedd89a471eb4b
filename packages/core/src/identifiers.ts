/**
 * Client identifier (unsigned 16-bit). Doubles as the account aggregate id.
 */
export type ClientId = number;

/**
 * Identifier of the genesis deposit/withdraw a dispute, resolve or chargeback refers to (unsigned 32-bit).
 */
export type TransactionId = number;

export const CLIENT_ID_MAX = 0xffff;
export const TRANSACTION_ID_MAX = 0xffffffff;

export function isClientId(value: number): value is ClientId {
  return Number.isInteger(value) && value >= 0 && value <= CLIENT_ID_MAX;
}

export function isTransactionId(value: number): value is TransactionId {
  return Number.isInteger(value) && value >= 0 && value <= TRANSACTION_ID_MAX;
}
