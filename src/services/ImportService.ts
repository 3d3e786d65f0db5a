import { isLedgerFatal } from '../domain/errors.js';
import { configuredAccountIds, type ImportConfig } from '../domain/entities/AccountConfig.js';
import type {
  ImportReport,
  LedgerReconcileResult,
} from '../domain/entities/ReconciliationResult.js';
import { expandHome } from '../infra/AccountConfigStore.js';
import type { LedgerStore } from '../infra/ledger/LedgerStore.js';
import { logger } from '../infra/logger.js';
import type { AccountDownload } from './Downloader.js';
import { Reconciler } from './Reconciler.js';

export interface AccountFetcher {
  fetchAll(accountIds: string[]): Promise<Map<string, AccountDownload>>;
}

export type LedgerOpener = (filePath: string) => LedgerStore;

/**
 * ImportService - downloads every configured account, then reconciles each
 * ledger file in turn
 *
 * A download failure aborts the whole import. A ledger-level failure (missing
 * account, unknown currency, storage error) is recorded and the next ledger
 * file still runs.
 */
export class ImportService {
  constructor(
    private readonly downloader: AccountFetcher,
    private readonly openLedger: LedgerOpener
  ) {}

  async run(config: ImportConfig): Promise<ImportReport> {
    const report: ImportReport = { ledgers: [], failures: [], warnings: [] };
    const accountIds = configuredAccountIds(config);
    if (accountIds.length === 0) {
      logger.warn('No accounts configured, nothing to import');
      return report;
    }

    const downloads = await this.downloader.fetchAll(accountIds);

    for (const [ledgerPath, accounts] of Object.entries(config.ledgers)) {
      try {
        const result = this.reconcileFile(ledgerPath, accounts, downloads);
        report.ledgers.push(result);
        for (const account of result.accounts) {
          report.warnings.push(...account.warnings);
        }
      } catch (error) {
        if (!isLedgerFatal(error)) {
          throw error;
        }
        logger.error('Ledger reconciliation failed', {
          ledgerPath,
          code: error.code,
          error: error.message,
        });
        report.failures.push({ ledgerPath, code: error.code, message: error.message });
      }
    }

    logger.info('Import finished', {
      ledgers: report.ledgers.length,
      failures: report.failures.length,
      warnings: report.warnings.length,
    });
    return report;
  }

  private reconcileFile(
    ledgerPath: string,
    accounts: ImportConfig['ledgers'][string],
    downloads: ReadonlyMap<string, AccountDownload>
  ): LedgerReconcileResult {
    const store = this.openLedger(expandHome(ledgerPath));
    try {
      return new Reconciler(store).reconcileLedger(ledgerPath, accounts, downloads);
    } finally {
      store.close();
    }
  }
}
