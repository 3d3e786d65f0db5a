import { appendAnnotation, formatAnnotation } from '../domain/annotation.js';
import { daysBetween } from '../domain/dates.js';
import {
  AccountNotFoundError,
  DivisionUndefinedError,
  UnknownCurrencyError,
} from '../domain/errors.js';
import { fromScaled, isClose, toScaled } from '../domain/numeric.js';
import type { AccountConfig, LedgerAccounts } from '../domain/entities/AccountConfig.js';
import type { LedgerAccount, LedgerSplit } from '../domain/entities/Ledger.js';
import {
  describeWarning,
  type AccountReconcileResult,
  type LedgerReconcileResult,
  type ReconciliationWarning,
} from '../domain/entities/ReconciliationResult.js';
import {
  authoritativeDate,
  type DateKey,
  type TransactionRecord,
} from '../domain/entities/TransactionRecord.js';
import { withEntry, type LedgerStore } from '../infra/ledger/LedgerStore.js';
import { logger } from '../infra/logger.js';
import type { AccountDownload } from './Downloader.js';
import { SplitIndex } from './SplitIndex.js';

/** Inclusive distance, in calendar days, for date-proximity matching */
export const MATCH_WINDOW_DAYS = 5;

type RecordOutcome =
  | { kind: 'reconciled' }
  | { kind: 'matched' }
  | { kind: 'created' }
  | { kind: 'skipped'; warning: ReconciliationWarning };

/**
 * Closest untagged split of equal value within the window; on equal distance
 * the earlier candidate wins
 */
export function findFuzzyMatch(
  candidates: readonly LedgerSplit[],
  amount: number,
  date: string,
  windowDays = MATCH_WINDOW_DAYS
): LedgerSplit | undefined {
  let best: { split: LedgerSplit; distance: number } | undefined;
  for (const split of candidates) {
    if (!isClose(split.value, amount)) {
      continue;
    }
    const distance = daysBetween(split.entry.date, date);
    if (distance > windowDays) {
      continue;
    }
    if (!best || distance < best.distance) {
      best = { split, distance };
    }
  }
  return best?.split;
}

/**
 * Rescales one leg of a previous entry to a new total
 */
export function rescaleSplit(amount: number, otherValue: number, previous: LedgerSplit): number {
  if (previous.value === 0) {
    throw new DivisionUndefinedError(previous.id);
  }
  return amount * (otherValue / previous.value);
}

/**
 * Reconciler - merges downloaded bank records into one ledger file
 *
 * Per record: reconcile an exact TXID hit, annotate a date/amount match, or
 * create a new entry (fanning out a previous entry with the same description).
 * Accounts and records are processed strictly in order because matching
 * consumes the candidate pool.
 */
export class Reconciler {
  constructor(private readonly store: LedgerStore) {}

  reconcileLedger(
    ledgerPath: string,
    accounts: LedgerAccounts,
    downloads: ReadonlyMap<string, AccountDownload>
  ): LedgerReconcileResult {
    // Resolve every target before the first mutation
    const targets = Object.entries(accounts).map(([accountId, config]) => {
      const account = this.store.lookupAccount(config.ledgerAccount);
      if (!account) {
        throw new AccountNotFoundError(config.ledgerAccount);
      }
      return { accountId, config, account };
    });

    const results: AccountReconcileResult[] = [];
    for (const { accountId, config, account } of targets) {
      const download = downloads.get(accountId);
      if (!download) {
        logger.warn('No download for configured account, skipping', {
          ledgerPath,
          accountId,
        });
        continue;
      }

      const result = this.reconcileAccount(accountId, config, account, download.transactions.booked);
      result.pendingIgnored = download.transactions.pending.length;

      const divergence = this.verifyBalance(account, download.balance);
      if (divergence) {
        result.warnings.push(divergence);
        logger.warn(describeWarning(divergence), { ledgerPath, accountId });
      }
      results.push(result);
    }

    return { ledgerPath, accounts: results };
  }

  reconcileAccount(
    accountId: string,
    config: AccountConfig,
    account: LedgerAccount,
    booked: TransactionRecord[]
  ): AccountReconcileResult {
    const index = new SplitIndex(this.store.listSplits(account));
    const result: AccountReconcileResult = {
      accountId,
      accountPath: account.fullName,
      reconciled: 0,
      matched: 0,
      created: 0,
      skipped: 0,
      pendingIgnored: 0,
      warnings: [],
    };

    for (const record of booked) {
      const outcome = this.processRecord(record, config.dateKey, account, index);
      if (outcome.kind === 'skipped') {
        result.skipped++;
        result.warnings.push(outcome.warning);
        logger.warn(describeWarning(outcome.warning), { accountId });
      } else {
        result[outcome.kind]++;
      }
    }

    logger.info('Account reconciled', {
      accountId,
      accountPath: result.accountPath,
      reconciled: result.reconciled,
      matched: result.matched,
      created: result.created,
      skipped: result.skipped,
    });
    return result;
  }

  /**
   * Compares the ledger balance with the bank's; null when they agree
   */
  verifyBalance(account: LedgerAccount, expected: number): ReconciliationWarning | null {
    const actual = this.store.getBalance(account);
    if (isClose(actual, expected)) {
      return null;
    }
    return { kind: 'balance_divergence', accountPath: account.fullName, expected, actual };
  }

  private processRecord(
    record: TransactionRecord,
    dateKey: DateKey,
    account: LedgerAccount,
    index: SplitIndex
  ): RecordOutcome {
    const date = authoritativeDate(record, dateKey);
    const amount = this.storedAmount(record);

    const existing = index.findTagged(record.internalId);
    if (existing) {
      if (!isClose(existing.value, amount)) {
        return {
          kind: 'skipped',
          warning: {
            kind: 'amount_mismatch',
            accountPath: account.fullName,
            transactionId: record.internalId,
            description: record.description,
            ledgerValue: existing.value,
            recordAmount: record.amount,
          },
        };
      }
      this.store.setReconciled(existing, 'reconciled');
      return { kind: 'reconciled' };
    }

    const match = findFuzzyMatch(index.candidates(), amount, date);
    if (match) {
      this.store.setMemo(match, appendAnnotation(match.memo, record.internalId, record.description));
      this.store.setDate(match.entry, date);
      index.consume(match);
      index.addTagged(record.internalId, match);
      logger.debug('Matched existing split', {
        transactionId: record.internalId,
        splitId: match.id,
        date,
      });
      return { kind: 'matched' };
    }

    const previous = index.latestByName(record.description);
    try {
      const primary = this.createEntry(record, date, account, previous);
      index.addTagged(record.internalId, primary);
    } catch (error) {
      if (error instanceof DivisionUndefinedError && previous) {
        return {
          kind: 'skipped',
          warning: {
            kind: 'division_undefined',
            accountPath: account.fullName,
            transactionId: record.internalId,
            description: record.description,
            previousEntryId: previous.entry.id,
          },
        };
      }
      throw error;
    }
    return { kind: 'created' };
  }

  /**
   * Record amount as the ledger would store it, rounded to the currency
   * fraction; unchanged when the currency is unknown
   */
  private storedAmount(record: TransactionRecord): number {
    const currency = this.store.lookupCurrency(record.currency);
    if (!currency) {
      return record.amount;
    }
    return fromScaled(toScaled(record.amount, currency.fraction), currency.fraction);
  }

  /**
   * Creates the entry for an unmatched record and returns its primary split
   */
  private createEntry(
    record: TransactionRecord,
    date: string,
    account: LedgerAccount,
    previous: LedgerSplit | undefined
  ): LedgerSplit {
    const currency = this.store.lookupCurrency(record.currency);
    if (!currency) {
      throw new UnknownCurrencyError(record.currency);
    }

    const entry = withEntry(this.store, currency, (draft) => {
      this.store.addSplit(
        draft,
        account,
        record.amount,
        formatAnnotation(record.internalId, record.description)
      );

      let description = record.description;
      if (previous) {
        for (const other of this.store.listEntrySplits(previous.entry)) {
          if (other.id === previous.id) {
            continue;
          }
          const target = this.store.getAccountById(other.accountId);
          if (!target) {
            throw new AccountNotFoundError(other.accountId);
          }
          this.store.addSplit(draft, target, rescaleSplit(record.amount, other.value, previous));
        }
        description = previous.entry.description;
      }

      this.store.setDescription(draft, description);
      this.store.setDate(draft, date);
    });

    logger.debug('Created ledger entry', {
      transactionId: record.internalId,
      entryId: entry.id,
      date,
      fannedOutFrom: previous?.entry.id ?? null,
    });

    const [primary] = this.store.listEntrySplits(entry);
    return primary;
  }
}
