import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SqliteLedgerStore } from '../../../src/infra/ledger/SqliteLedgerStore.js';
import { withEntry } from '../../../src/infra/ledger/LedgerStore.js';
import { LedgerStoreError, UnknownCurrencyError } from '../../../src/domain/errors.js';
import { addEntry, createTestLedger } from '../../helpers/ledger.js';
import { logger } from '../../../src/infra/logger.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('SqliteLedgerStore', () => {
  let ledger: ReturnType<typeof createTestLedger>;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  afterEach(() => {
    ledger.store.close();
  });

  describe('accounts', () => {
    it('should look up accounts by dotted path', () => {
      const account = ledger.store.lookupAccount('Assets.Current Account');

      expect(account?.id).toBe(ledger.bank.id);
      expect(account?.fullName).toBe('Assets.Current Account');
      expect(account?.type).toBe('BANK');
    });

    it('should create missing parents', () => {
      const parent = ledger.store.lookupAccount('Assets');

      expect(parent?.fullName).toBe('Assets');
      expect(ledger.store.getAccountById(ledger.savings.id)?.fullName).toBe('Assets.Savings');
    });

    it('should return null for unknown paths', () => {
      expect(ledger.store.lookupAccount('Assets.Pension')).toBeNull();
      expect(ledger.store.lookupAccount('Liabilities.Card')).toBeNull();
    });

    it('should refuse accounts in an unknown currency', () => {
      expect(() => ledger.store.createAccount('Assets.Dollars', 'BANK', 'USD')).toThrow(
        UnknownCurrencyError
      );
    });
  });

  describe('entries', () => {
    it('should commit every split with the entry', () => {
      const entry = addEntry(ledger.store, '2024-03-01', 'Weekly shop', [
        { account: ledger.bank, value: -42.1, memo: 'card' },
        { account: ledger.groceries, value: 42.1 },
      ]);

      const splits = ledger.store.listEntrySplits(entry);
      expect(entry.description).toBe('Weekly shop');
      expect(entry.date).toBe('2024-03-01');
      expect(splits.map((split) => split.value)).toEqual([-42.1, 42.1]);
      expect(splits.map((split) => split.memo)).toEqual(['card', '']);
      expect(splits.map((split) => split.reconcileState)).toEqual(['unreconciled', 'unreconciled']);
    });

    it('should round values to the currency fraction', () => {
      const entry = addEntry(ledger.store, '2024-03-01', 'Interest', [
        { account: ledger.bank, value: 10.005 },
      ]);

      expect(ledger.store.listEntrySplits(entry)[0].value).toBe(10.01);
      expect(logger.debug).toHaveBeenCalledWith(
        'Split value rounded to currency fraction',
        expect.objectContaining({ account: 'Assets.Current Account', value: 10.005, stored: 10.01 })
      );
    });

    it('should write nothing when the scoped edit throws', () => {
      const build = () =>
        withEntry(ledger.store, ledger.gbp, (draft) => {
          ledger.store.addSplit(draft, ledger.bank, 12);
          ledger.store.setDate(draft, '2024-03-01');
          throw new Error('interrupted');
        });

      expect(build).toThrow('interrupted');
      expect(ledger.store.listSplits(ledger.bank)).toEqual([]);
    });

    it('should require a date before commit', () => {
      const draft = ledger.store.beginEntry(ledger.gbp);
      ledger.store.addSplit(draft, ledger.bank, 5);

      expect(() => ledger.store.commit(draft)).toThrow(LedgerStoreError);
    });

    it('should not commit a draft twice', () => {
      const draft = ledger.store.beginEntry(ledger.gbp);
      ledger.store.setDate(draft, '2024-03-01');
      ledger.store.commit(draft);

      expect(draft.state).toBe('committed');
      expect(() => ledger.store.commit(draft)).toThrow(LedgerStoreError);
    });
  });

  describe('split updates', () => {
    it('should persist memo, reconcile state and entry date', () => {
      addEntry(ledger.store, '2024-03-01', 'Coffee', [{ account: ledger.bank, value: -3 }]);
      const [split] = ledger.store.listSplits(ledger.bank);

      ledger.store.setMemo(split, 'TXID: tx-1; TXNAME: CAFE;');
      ledger.store.setReconciled(split, 'reconciled');
      ledger.store.setDate(split.entry, '2024-03-04');

      const [reloaded] = ledger.store.listSplits(ledger.bank);
      expect(reloaded.memo).toBe('TXID: tx-1; TXNAME: CAFE;');
      expect(reloaded.reconcileState).toBe('reconciled');
      expect(reloaded.entry.date).toBe('2024-03-04');
    });

    it('should list an account in date order', () => {
      addEntry(ledger.store, '2024-03-09', 'Second', [{ account: ledger.bank, value: -2 }]);
      addEntry(ledger.store, '2024-03-02', 'First', [{ account: ledger.bank, value: -1 }]);

      expect(ledger.store.listSplits(ledger.bank).map((split) => split.entry.description)).toEqual([
        'First',
        'Second',
      ]);
    });
  });

  describe('getBalance', () => {
    it('should sum the account splits', () => {
      addEntry(ledger.store, '2024-03-01', 'Salary', [{ account: ledger.bank, value: 10 }]);
      addEntry(ledger.store, '2024-03-02', 'Bus', [{ account: ledger.bank, value: -2.5 }]);

      expect(ledger.store.getBalance(ledger.bank)).toBe(7.5);
      expect(ledger.store.getBalance(ledger.savings)).toBe(0);
    });
  });
});

describe('SqliteLedgerStore files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ledger-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should refuse to open a missing file without create', () => {
    expect(() => SqliteLedgerStore.open(path.join(dir, 'missing.ledger'))).toThrow(LedgerStoreError);
  });

  it('should reopen a created ledger with its accounts', () => {
    const filePath = path.join(dir, 'books.ledger');
    const created = SqliteLedgerStore.open(filePath, { create: true });
    created.createCurrency('EUR');
    created.createAccount('Assets.Girokonto', 'BANK', 'EUR');
    created.close();

    const reopened = SqliteLedgerStore.open(filePath);
    expect(reopened.lookupAccount('Assets.Girokonto')?.fullName).toBe('Assets.Girokonto');
    expect(reopened.lookupCurrency('EUR')?.fraction).toBe(100);
    reopened.close();
  });
});
