import { once } from 'node:events';
import type { Writable } from 'node:stream';

import { formatCurrency } from '@clientledger/core';
import type { AccountView } from '@clientledger/ledger';

export const BALANCE_REPORT_HEADER = 'client,available,held,total,locked';

export function formatBalanceRow(view: AccountView): string {
  return [
    String(view.client),
    formatCurrency(view.available),
    formatCurrency(view.held),
    formatCurrency(view.total),
    String(view.locked),
  ].join(',');
}

/**
 * Full report, header first, one newline-terminated line per account
 */
export function formatBalancesCsv(views: Iterable<AccountView>): string {
  const lines = [BALANCE_REPORT_HEADER];
  for (const view of views) {
    lines.push(formatBalanceRow(view));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write the report line by line, waiting on `drain` when the destination is full.
 */
export async function writeBalances(views: Iterable<AccountView>, out: Writable): Promise<void> {
  await writeLine(out, BALANCE_REPORT_HEADER);
  for (const view of views) {
    await writeLine(out, formatBalanceRow(view));
  }
}

async function writeLine(out: Writable, line: string): Promise<void> {
  if (out.errored) {
    throw out.errored;
  }
  if (!out.write(`${line}\n`)) {
    await once(out, 'drain');
  }
}
