import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ImportService, type AccountFetcher } from '../../../src/services/ImportService.js';
import type { AccountDownload } from '../../../src/services/Downloader.js';
import type { ImportConfig } from '../../../src/domain/entities/AccountConfig.js';
import { TransportError } from '../../../src/domain/errors.js';
import { createTestLedger, makeRecord } from '../../helpers/ledger.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const CONFIG: ImportConfig = {
  ledgers: {
    '/books/a.ledger': {
      'acc-1': { ledgerAccount: 'Assets.Current Account', dateKey: 'booking' },
    },
    '/books/b.ledger': {
      'acc-2': { ledgerAccount: 'Assets.Nope', dateKey: 'booking' },
    },
  },
};

describe('ImportService', () => {
  let first: ReturnType<typeof createTestLedger>;
  let second: ReturnType<typeof createTestLedger>;

  beforeEach(() => {
    first = createTestLedger();
    second = createTestLedger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    first.store.close();
    second.store.close();
  });

  function createService(fetchAll: AccountFetcher['fetchAll']) {
    const closeFirst = vi.spyOn(first.store, 'close').mockImplementation(() => {});
    const closeSecond = vi.spyOn(second.store, 'close').mockImplementation(() => {});
    const openLedger = vi.fn((filePath: string) =>
      filePath === '/books/a.ledger' ? first.store : second.store
    );
    const downloader = { fetchAll: vi.fn(fetchAll) };
    return {
      service: new ImportService(downloader, openLedger),
      downloader,
      openLedger,
      closeFirst,
      closeSecond,
    };
  }

  it('should record a failing ledger and still import the others', async () => {
    const downloads = new Map<string, AccountDownload>([
      [
        'acc-1',
        { balance: -10, transactions: { booked: [makeRecord({ internalId: 'tx-1' })], pending: [] } },
      ],
      ['acc-2', { balance: 0, transactions: { booked: [], pending: [] } }],
    ]);
    const { service, downloader, closeFirst, closeSecond } = createService(async () => downloads);

    const report = await service.run(CONFIG);

    expect(downloader.fetchAll).toHaveBeenCalledWith(['acc-1', 'acc-2']);
    expect(report.ledgers).toHaveLength(1);
    expect(report.ledgers[0].ledgerPath).toBe('/books/a.ledger');
    expect(report.ledgers[0].accounts[0]).toMatchObject({ accountId: 'acc-1', created: 1 });
    expect(report.failures).toEqual([
      {
        ledgerPath: '/books/b.ledger',
        code: 'ACCOUNT_NOT_FOUND',
        message: 'Account name not found: Assets.Nope',
      },
    ]);
    expect(report.warnings).toEqual([]);
    expect(closeFirst).toHaveBeenCalledTimes(1);
    expect(closeSecond).toHaveBeenCalledTimes(1);
  });

  it('should collect warnings from every account', async () => {
    const config: ImportConfig = { ledgers: { '/books/a.ledger': CONFIG.ledgers['/books/a.ledger'] } };
    const downloads = new Map<string, AccountDownload>([
      ['acc-1', { balance: 25, transactions: { booked: [], pending: [] } }],
    ]);
    const { service } = createService(async () => downloads);

    const report = await service.run(config);

    expect(report.warnings).toEqual([
      { kind: 'balance_divergence', accountPath: 'Assets.Current Account', expected: 25, actual: 0 },
    ]);
  });

  it('should abort before opening any ledger when a download fails', async () => {
    const { service, openLedger } = createService(async () => {
      throw new TransportError('GET accounts/acc-1/balances/ returned 503', {
        method: 'GET',
        path: 'accounts/acc-1/balances/',
        status: 503,
      });
    });

    await expect(service.run(CONFIG)).rejects.toThrow('GET accounts/acc-1/balances/ returned 503');
    expect(openLedger).not.toHaveBeenCalled();
  });

  it('should do nothing without configured accounts', async () => {
    const { service, downloader } = createService(async () => new Map());

    const report = await service.run({ ledgers: {} });

    expect(report).toEqual({ ledgers: [], failures: [], warnings: [] });
    expect(downloader.fetchAll).not.toHaveBeenCalled();
  });
});
