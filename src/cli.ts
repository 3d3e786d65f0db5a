#!/usr/bin/env node
/**
 * ledger-bank-sync CLI
 *
 * Commands:
 *   import        - Download bank transactions and reconcile configured ledgers (default)
 *   token         - Request a new aggregator token pair and store the refresh token
 *   schedule      - Run imports periodically until interrupted
 *   ledger init   - Create a ledger file with a currency and accounts
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { isAppError } from './domain/errors.js';
import { describeWarning, type ImportReport } from './domain/entities/ReconciliationResult.js';
import { validateEnv } from './infra/env.js';
import { createLogger, logger, setLogger } from './infra/logger.js';
import { AccountConfigStore, expandHome } from './infra/AccountConfigStore.js';
import { AggregatorClient } from './infra/AggregatorClient.js';
import { AggregatorTokenProvider } from './infra/AggregatorTokenProvider.js';
import { SqliteLedgerStore } from './infra/ledger/SqliteLedgerStore.js';
import { Downloader } from './services/Downloader.js';
import { ImportService } from './services/ImportService.js';
import { ImportScheduler } from './scheduler/ImportScheduler.js';

dotenv.config();

const env = validateEnv();
setLogger(createLogger(env));

/**
 * Wires the collaborators for one command invocation
 */
async function bootstrap() {
  const configStore = new AccountConfigStore(env.CONFIG_PATH);
  const config = await configStore.load();

  const client = new AggregatorClient({
    baseUrl: env.AGGREGATOR_BASE_URL,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  });
  const tokens = new AggregatorTokenProvider(client, config, configStore, {
    secretId: env.AGGREGATOR_SECRET_ID,
    secretKey: env.AGGREGATOR_SECRET_KEY,
  });
  client.useTokenSource(tokens);

  const downloader = new Downloader(client, { concurrency: env.DOWNLOAD_CONCURRENCY });
  const importService = new ImportService(downloader, (filePath) => SqliteLedgerStore.open(filePath));

  return { config, tokens, importService };
}

function printReport(report: ImportReport): void {
  for (const warning of report.warnings) {
    console.log(`WARNING: ${describeWarning(warning)}`);
  }
  for (const failure of report.failures) {
    console.log(`ERROR: ${failure.ledgerPath}: ${failure.message}`);
  }
  for (const ledger of report.ledgers) {
    for (const account of ledger.accounts) {
      console.log(
        `${account.accountPath}: ${account.created} created, ${account.matched} matched, ` +
          `${account.reconciled} reconciled, ${account.skipped} skipped`
      );
    }
  }
}

async function runImport(): Promise<number> {
  const { config, importService } = await bootstrap();
  const report = await importService.run(config);
  printReport(report);
  return report.failures.length > 0 ? 1 : 0;
}

function collectAccount(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command()
  .name('ledger-bank-sync')
  .description('Import open-banking transactions into a double-entry ledger')
  .version('0.1.0', '-v, --version', 'Show version number');

program
  .command('import', { isDefault: true })
  .description('Download transactions and reconcile every configured ledger')
  .action(async () => {
    process.exitCode = await runImport();
  });

program
  .command('token')
  .description('Request a new aggregator token pair and store the refresh token')
  .action(async () => {
    const { tokens } = await bootstrap();
    await tokens.obtainNewToken();
    console.log(`Refresh token saved to ${env.CONFIG_PATH}`);
  });

program
  .command('schedule')
  .description(`Run imports every IMPORT_INTERVAL_MINUTES (currently ${env.IMPORT_INTERVAL_MINUTES})`)
  .action(() => {
    const scheduler = new ImportScheduler(env.IMPORT_INTERVAL_MINUTES, runImport);
    scheduler.start();
    const shutdown = () => {
      scheduler.stop();
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

const ledger = program.command('ledger').description('Ledger file administration');

ledger
  .command('init <file>')
  .description('Create a ledger file with a currency and accounts')
  .requiredOption('-c, --currency <code>', 'ISO currency code, e.g. GBP')
  .option(
    '-a, --account <path:type>',
    'account to create, e.g. "Assets.Current Account:BANK" (repeatable)',
    collectAccount,
    []
  )
  .action((file: string, options: { currency: string; account: string[] }) => {
    const store = SqliteLedgerStore.open(expandHome(file), { create: true });
    try {
      store.createCurrency(options.currency);
      for (const accountArg of options.account) {
        const separator = accountArg.lastIndexOf(':');
        const accountPath = separator === -1 ? accountArg : accountArg.slice(0, separator);
        const type = separator === -1 ? 'BANK' : accountArg.slice(separator + 1);
        const account = store.createAccount(accountPath, type, options.currency);
        console.log(`Created ${account.fullName} (${account.type})`);
      }
    } finally {
      store.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', {
    code: isAppError(error) ? error.code : undefined,
    error: error instanceof Error ? error.message : String(error),
    details: isAppError(error) ? error.details : undefined,
  });
  process.exitCode = 1;
});
