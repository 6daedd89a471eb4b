import { currencyFromUnits, formatCurrency, type ClientId, type Currency, type TransactionId } from '@clientledger/core';
import type { CommandType } from '@clientledger/ledger';

/** Uniform value in [0, 1) */
export type RandomSource = () => number;

export interface GeneratedTransaction {
  type: CommandType;
  client: ClientId;
  tx: TransactionId;
  amount?: Currency | undefined;
}

export interface TransactionMix {
  deposits: number;
  withdrawals: number;
  disputes: number;
  resolves: number;
  chargebacks: number;
}

export const TRANSACTION_CSV_HEADER = 'type,client,tx,amount';

const OPENING_CHUNK_SIZE = 50;

// Amount ranges in ten-thousandths, upper bound exclusive
const DEPOSIT_UNITS: readonly [number, number] = [300_000, 5_000_000];
const WITHDRAW_UNITS: readonly [number, number] = [100_000, 4_000_000];

/** Integer in [min, max) */
export function randomInt(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min));
}

/** In-place Fisher-Yates shuffle */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(0, i + 1, random);
    const current = items[i];
    const swap = items[j];
    if (current !== undefined && swap !== undefined) {
      items[i] = swap;
      items[j] = current;
    }
  }
  return items;
}

/**
 * Split the budget left after opening deposits: 40% deposits, 40% withdrawals,
 * 15% disputes, 2.5% resolves and 2.5% chargebacks, each floored.
 */
export function planTransactionMix(remaining: number): TransactionMix {
  return {
    deposits: Math.floor((remaining * 40) / 100),
    withdrawals: Math.floor((remaining * 40) / 100),
    disputes: Math.floor((remaining * 15) / 100),
    resolves: Math.floor((remaining * 25) / 1000),
    chargebacks: Math.floor((remaining * 25) / 1000),
  };
}

export function formatTransactionRow(transaction: GeneratedTransaction): string {
  const amount = transaction.amount ? formatCurrency(transaction.amount) : '';
  return `${transaction.type},${transaction.client},${transaction.tx},${amount}`;
}

/**
 * Yield exactly `transactions` synthetic rows over client ids 1..clients-1.
 *
 * Every client first gets an opening deposit, then a mixed stream follows in
 * which each dispute names the row two slots back, and resolves or chargebacks
 * follow their dispute. Tx ids are sequence numbers; dispute, resolve and
 * chargeback rows use up a number without owning it.
 */
export function* generateTransactions(options: {
  clients: number;
  transactions: number;
  random?: RandomSource | undefined;
}): Generator<GeneratedTransaction> {
  const { clients, transactions } = options;
  const random = options.random ?? Math.random;
  let written = 0;

  const deposit = (client: ClientId): GeneratedTransaction => ({
    type: 'deposit',
    client,
    tx: ++written,
    amount: currencyFromUnits(randomInt(DEPOSIT_UNITS[0], DEPOSIT_UNITS[1], random)),
  });
  const withdraw = (client: ClientId): GeneratedTransaction => ({
    type: 'withdraw',
    client,
    tx: ++written,
    amount: currencyFromUnits(randomInt(WITHDRAW_UNITS[0], WITHDRAW_UNITS[1], random)),
  });
  const follow = (type: CommandType, client: ClientId, tx: TransactionId): GeneratedTransaction => {
    written++;
    return { type, client, tx };
  };

  const clientIds = Array.from({ length: clients - 1 }, (_, index) => index + 1);
  for (let start = 0; start < clientIds.length && written < transactions; start += OPENING_CHUNK_SIZE) {
    for (const client of shuffle(clientIds.slice(start, start + OPENING_CHUNK_SIZE), random)) {
      if (written >= transactions) break;
      yield deposit(client);
    }
  }

  const mix = planTransactionMix(transactions - written);
  while (mix.deposits > 0 || mix.withdrawals > 0 || mix.disputes > 0) {
    const client = randomInt(1, clients, random);

    if (mix.deposits > 0) {
      mix.deposits--;
      yield deposit(client);
    }
    if (mix.withdrawals > 0) {
      mix.withdrawals--;
      yield withdraw(client);
    }
    if (mix.disputes > 0) {
      mix.disputes--;
      const disputed = written - 1;
      yield follow('dispute', client, disputed);

      if (mix.resolves > 0) {
        mix.resolves--;
        yield follow('resolve', client, disputed);
      } else if (mix.chargebacks > 0) {
        mix.chargebacks--;
        yield follow('chargeback', client, disputed);
      }
    }
  }

  while (written < transactions) {
    yield deposit(randomInt(1, clients, random));
  }
}
