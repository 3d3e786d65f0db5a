import { NoBalanceAvailableError, ValidationError } from '../domain/errors.js';
import {
  aggregatorTransactionSchema,
  balancesResponseSchema,
  toTransactionRecord,
  transactionsResponseSchema,
  type AggregatorBalance,
  type TransactionGroup,
  type TransactionRecord,
} from '../domain/entities/TransactionRecord.js';
import type { AggregatorTransport } from '../infra/AggregatorClient.js';
import { logger } from '../infra/logger.js';

/**
 * Balance types in order of preference, most authoritative first
 */
export const BALANCE_PRIORITY = [
  'expectedClosed',
  'interimBooked',
  'closingBooked',
  'openingBooked',
  'information',
  'interimAvailable',
  'closingAvailable',
  'openingAvailable',
] as const;

export interface AccountDownload {
  balance: number;
  transactions: TransactionGroup;
}

export interface DownloaderOptions {
  concurrency: number;
}

/**
 * Picks the first balance type from BALANCE_PRIORITY the bank reported
 */
export function selectBalance(accountId: string, balances: AggregatorBalance[]): number {
  const byType = new Map(balances.map((balance) => [balance.balanceType, balance]));
  for (const type of BALANCE_PRIORITY) {
    const balance = byType.get(type);
    if (balance) {
      return Number(balance.balanceAmount.amount);
    }
  }
  throw new NoBalanceAvailableError(
    accountId,
    balances.map((balance) => balance.balanceType)
  );
}

function parseBooked(accountId: string, raw: unknown[]): TransactionRecord[] {
  return raw.map((item, index) => {
    const result = aggregatorTransactionSchema.safeParse(item);
    if (!result.success) {
      throw new ValidationError(`Malformed booked transaction for account ${accountId}`, {
        accountId,
        index,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return toTransactionRecord(result.data);
  });
}

function parsePending(accountId: string, raw: unknown[]): TransactionRecord[] {
  const records: TransactionRecord[] = [];
  for (const item of raw) {
    const result = aggregatorTransactionSchema.safeParse(item);
    if (result.success) {
      records.push(toTransactionRecord(result.data));
    }
  }
  if (records.length < raw.length) {
    logger.debug('Dropped incomplete pending transactions', {
      accountId,
      dropped: raw.length - records.length,
    });
  }
  return records;
}

/**
 * Downloader - fetches balances and transactions for every configured account
 * Fan-out is bounded by `concurrency`; the first failure cancels outstanding
 * requests and is rethrown once every worker has stopped
 */
export class Downloader {
  constructor(
    private readonly transport: AggregatorTransport,
    private readonly options: DownloaderOptions
  ) {}

  async fetchAll(accountIds: string[]): Promise<Map<string, AccountDownload>> {
    const queue = [...new Set(accountIds)];
    const results = new Map<string, AccountDownload>();
    const controller = new AbortController();
    const state: { failure: { error: unknown } | null; nextIndex: number } = {
      failure: null,
      nextIndex: 0,
    };

    logger.info('Downloading accounts', {
      accounts: queue.length,
      concurrency: this.options.concurrency,
    });

    const worker = async (): Promise<void> => {
      while (!state.failure && state.nextIndex < queue.length) {
        const accountId = queue[state.nextIndex++];
        try {
          results.set(accountId, await this.fetchAccount(accountId, controller.signal));
        } catch (error) {
          if (!state.failure) {
            state.failure = { error };
            controller.abort();
            logger.error('Account download failed, cancelling remaining downloads', {
              accountId,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.options.concurrency, queue.length); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    if (state.failure) {
      throw state.failure.error;
    }
    return results;
  }

  async fetchAccount(accountId: string, signal?: AbortSignal): Promise<AccountDownload> {
    const encoded = encodeURIComponent(accountId);
    const [balancesData, transactionsData] = await Promise.all([
      this.transport.get(`accounts/${encoded}/balances/`, { signal }),
      this.transport.get(`accounts/${encoded}/transactions/`, { signal }),
    ]);

    const balances = balancesResponseSchema.safeParse(balancesData);
    if (!balances.success) {
      throw new ValidationError(`Malformed balances response for account ${accountId}`, {
        accountId,
        issues: balances.error.issues,
      });
    }
    const transactions = transactionsResponseSchema.safeParse(transactionsData);
    if (!transactions.success) {
      throw new ValidationError(`Malformed transactions response for account ${accountId}`, {
        accountId,
        issues: transactions.error.issues,
      });
    }

    const download: AccountDownload = {
      balance: selectBalance(accountId, balances.data.balances),
      transactions: {
        booked: parseBooked(accountId, transactions.data.transactions.booked),
        pending: parsePending(accountId, transactions.data.transactions.pending),
      },
    };
    logger.debug('Account downloaded', {
      accountId,
      booked: download.transactions.booked.length,
      pending: download.transactions.pending.length,
    });
    return download;
  }
}
