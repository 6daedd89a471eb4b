import type { ClientId } from '@clientledger/core';
import { getLogger } from '@clientledger/logger';
import type { Result } from 'neverthrow';

import { Account, type AccountView } from '../aggregates/account/account.aggregate.js';
import type { AccountCommand } from '../aggregates/account/account.commands.js';
import type { AccountError, AccountErrorCode } from '../aggregates/account/account.errors.js';
import type { AccountEvent } from '../aggregates/account/account.events.js';

const logger = getLogger('IngestionRouter');

export interface RouterStats {
  accepted: number;
  rejected: number;
  rejectedByCode: Partial<Record<AccountErrorCode, number>>;
}

/**
 * Routes commands to the account of their client, in arrival order.
 *
 * Accounts are opened on first reference and kept for the whole run, even when
 * that first command is rejected. A rejected command changes nothing; the
 * rejection is logged and returned so callers can count or report it.
 *
 * The account table is owned by the caller, which lets a run start from
 * pre-built accounts and lets tests inspect aggregates directly.
 */
export class IngestionRouter {
  private accepted = 0;
  private rejected = 0;
  private readonly rejectedByCode = new Map<AccountErrorCode, number>();

  constructor(private readonly accounts: Map<ClientId, Account> = new Map()) {}

  route(command: AccountCommand): Result<AccountEvent[], AccountError> {
    const account = this.getOrOpen(command.client);
    const result = account.handle(command);

    if (result.isErr()) {
      const error = result.error;
      this.rejected++;
      this.rejectedByCode.set(error.code, (this.rejectedByCode.get(error.code) ?? 0) + 1);
      logger.warn({ client: command.client, code: error.code, tx: command.tx, type: command.type }, error.message);
      return result;
    }

    account.apply(result.value);
    this.accepted++;
    if (logger.isLevelEnabled('trace')) {
      logger.trace(
        { client: command.client, events: result.value.map((event) => event.type), tx: command.tx, version: account.version },
        `Applied ${command.type}`
      );
    }
    return result;
  }

  /**
   * Current balances of every known account, in first-seen order
   */
  snapshot(): ReadonlyMap<ClientId, AccountView> {
    const views = new Map<ClientId, AccountView>();
    for (const [client, account] of this.accounts) {
      views.set(client, account.toView());
    }
    return views;
  }

  stats(): RouterStats {
    return {
      accepted: this.accepted,
      rejected: this.rejected,
      rejectedByCode: Object.fromEntries(this.rejectedByCode),
    };
  }

  private getOrOpen(client: ClientId): Account {
    const existing = this.accounts.get(client);
    if (existing) {
      return existing;
    }

    const account = Account.open(client);
    this.accounts.set(client, account);
    logger.debug({ client }, 'Opened account');
    return account;
  }
}
