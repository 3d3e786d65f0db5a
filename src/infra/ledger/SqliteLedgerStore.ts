import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { isAppError, LedgerStoreError, UnknownCurrencyError } from '../../domain/errors.js';
import { toCalendarDate } from '../../domain/dates.js';
import { fromScaled, isClose, toScaled } from '../../domain/numeric.js';
import {
  fromStateCode,
  toStateCode,
  type LedgerAccount,
  type LedgerCurrency,
  type LedgerEntry,
  type LedgerSplit,
  type ReconcileState,
} from '../../domain/entities/Ledger.js';
import { logger } from '../logger.js';
import { isDraft, type DraftSplit, type EntryDraft, type LedgerStore } from './LedgerStore.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const SCHEMA_PATH = path.join(__dirname, '..', 'db', 'ledger-schema.sql');
const CURRENCY_NAMESPACE = 'CURRENCY';
const ROOT_TYPE = 'ROOT';
const ACCOUNT_SEPARATOR = '.';

type CommodityRow = {
  guid: string;
  mnemonic: string;
  fraction: number;
};

type AccountRow = {
  guid: string;
  name: string;
  account_type: string;
  commodity_guid: string | null;
  parent_guid: string | null;
};

type SplitRow = {
  guid: string;
  tx_guid: string;
  account_guid: string;
  memo: string;
  reconcile_state: string;
  value_num: number;
  value_denom: number;
  quantity_num: number;
  quantity_denom: number;
  post_date: string;
  description: string;
  currency_guid: string;
};

const SPLIT_COLUMNS = `
  s.guid, s.tx_guid, s.account_guid, s.memo, s.reconcile_state,
  s.value_num, s.value_denom, s.quantity_num, s.quantity_denom,
  t.post_date, t.description, t.currency_guid
`;

function newGuid(): string {
  return randomUUID().replace(/-/g, '');
}

export interface OpenOptions {
  /** Create the file and its schema when missing */
  create?: boolean;
}

/**
 * SQLite ledger book behind the LedgerStore port
 * Entries are written in one SQLite transaction at commit; annotations and
 * reconcile states are written immediately
 */
export class SqliteLedgerStore implements LedgerStore {
  private nextDraftId = 1;

  private constructor(
    private readonly db: Database.Database,
    readonly filePath: string
  ) {}

  static open(filePath: string, options: OpenOptions = {}): SqliteLedgerStore {
    let db: Database.Database;
    try {
      db = new Database(filePath, { fileMustExist: !options.create });
      db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new LedgerStoreError('Failed to open ledger file', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const store = new SqliteLedgerStore(db, filePath);
    try {
      if (options.create) {
        store.initializeSchema();
      } else {
        store.assertSchema();
      }
    } catch (error) {
      db.close();
      throw error;
    }
    logger.debug('Ledger opened', { path: filePath });
    return store;
  }

  private initializeSchema(): void {
    try {
      this.db.exec(readFileSync(SCHEMA_PATH, 'utf-8'));
    } catch (error) {
      throw new LedgerStoreError('Failed to initialize ledger schema', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (!this.rootRow()) {
      this.execute(
        'INSERT INTO accounts (guid, name, account_type, commodity_guid, parent_guid) VALUES (?, ?, ?, NULL, NULL)',
        [newGuid(), 'Root Account', ROOT_TYPE]
      );
    }
  }

  private assertSchema(): void {
    const tables = this.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('commodities', 'accounts', 'transactions', 'splits')"
    );
    if (tables.length !== 4 || !this.rootRow()) {
      throw new LedgerStoreError('File is not a ledger book', { path: this.filePath });
    }
  }

  // Book administration

  createCurrency(code: string, fraction = 100): LedgerCurrency {
    const existing = this.lookupCurrency(code);
    if (existing) {
      return existing;
    }
    const guid = newGuid();
    this.execute('INSERT INTO commodities (guid, namespace, mnemonic, fraction) VALUES (?, ?, ?, ?)', [
      guid,
      CURRENCY_NAMESPACE,
      code,
      fraction,
    ]);
    return { id: guid, code, fraction };
  }

  /**
   * Creates the account at `accountPath`, adding missing parents of the same type
   */
  createAccount(accountPath: string, type: string, currencyCode: string): LedgerAccount {
    const currency = this.lookupCurrency(currencyCode);
    if (!currency) {
      throw new UnknownCurrencyError(currencyCode);
    }
    let parent = this.rootRow();
    if (!parent) {
      throw new LedgerStoreError('Ledger has no root account', { path: this.filePath });
    }

    for (const name of accountPath.split(ACCOUNT_SEPARATOR)) {
      let child = this.childRow(parent.guid, name);
      if (!child) {
        child = {
          guid: newGuid(),
          name,
          account_type: type,
          commodity_guid: currency.id,
          parent_guid: parent.guid,
        };
        this.execute(
          'INSERT INTO accounts (guid, name, account_type, commodity_guid, parent_guid) VALUES (?, ?, ?, ?, ?)',
          [child.guid, child.name, child.account_type, child.commodity_guid, child.parent_guid]
        );
      }
      parent = child;
    }
    return this.toAccount(parent);
  }

  // LedgerStore

  lookupAccount(accountPath: string): LedgerAccount | null {
    let current = this.rootRow();
    for (const name of accountPath.split(ACCOUNT_SEPARATOR)) {
      if (!current) {
        return null;
      }
      current = this.childRow(current.guid, name);
    }
    return current ? this.toAccount(current) : null;
  }

  getAccountById(id: string): LedgerAccount | null {
    const row = this.queryOne<AccountRow>('SELECT * FROM accounts WHERE guid = ?', [id]);
    return row ? this.toAccount(row) : null;
  }

  listSplits(account: LedgerAccount): LedgerSplit[] {
    const rows = this.query<SplitRow>(
      `SELECT ${SPLIT_COLUMNS}
       FROM splits s JOIN transactions t ON t.guid = s.tx_guid
       WHERE s.account_guid = ?
       ORDER BY t.post_date, s.rowid`,
      [account.id]
    );
    const entries = new Map<string, LedgerEntry>();
    return rows.map((row) => {
      let entry = entries.get(row.tx_guid);
      if (!entry) {
        entry = this.toEntry(row);
        entries.set(row.tx_guid, entry);
      }
      return this.toSplit(row, entry);
    });
  }

  listEntrySplits(entry: LedgerEntry): LedgerSplit[] {
    const rows = this.query<SplitRow>(
      `SELECT ${SPLIT_COLUMNS}
       FROM splits s JOIN transactions t ON t.guid = s.tx_guid
       WHERE s.tx_guid = ?
       ORDER BY s.rowid`,
      [entry.id]
    );
    return rows.map((row) => this.toSplit(row, entry));
  }

  lookupCurrency(code: string): LedgerCurrency | null {
    const row = this.queryOne<CommodityRow>(
      'SELECT guid, mnemonic, fraction FROM commodities WHERE namespace = ? AND mnemonic = ?',
      [CURRENCY_NAMESPACE, code]
    );
    return row ? { id: row.guid, code: row.mnemonic, fraction: row.fraction } : null;
  }

  beginEntry(currency: LedgerCurrency): EntryDraft {
    return {
      draftId: this.nextDraftId++,
      currency,
      date: null,
      description: '',
      splits: [],
      state: 'open',
    };
  }

  addSplit(draft: EntryDraft, account: LedgerAccount, value: number, memo = ''): DraftSplit {
    this.assertOpen(draft);
    if (!Number.isFinite(value)) {
      throw new LedgerStoreError('Split value must be a finite number', { value });
    }
    const split: DraftSplit = { account, value, memo };
    draft.splits.push(split);
    return split;
  }

  setDate(target: EntryDraft | LedgerEntry, date: string): void {
    const calendarDate = toCalendarDate(date);
    if (isDraft(target)) {
      this.assertOpen(target);
      target.date = calendarDate;
      return;
    }
    this.execute('UPDATE transactions SET post_date = ? WHERE guid = ?', [calendarDate, target.id]);
    target.date = calendarDate;
  }

  setDescription(draft: EntryDraft, text: string): void {
    this.assertOpen(draft);
    draft.description = text;
  }

  commit(draft: EntryDraft): LedgerEntry {
    this.assertOpen(draft);
    if (!draft.date) {
      throw new LedgerStoreError('Entry has no date', { draftId: draft.draftId });
    }

    const entry: LedgerEntry = {
      id: newGuid(),
      date: draft.date,
      description: draft.description,
      currencyId: draft.currency.id,
    };
    const denom = draft.currency.fraction;

    this.transaction(() => {
      this.execute(
        'INSERT INTO transactions (guid, currency_guid, post_date, enter_date, description) VALUES (?, ?, ?, ?, ?)',
        [entry.id, entry.currencyId, entry.date, new Date().toISOString(), entry.description]
      );
      for (const split of draft.splits) {
        const num = toScaled(split.value, denom);
        if (!isClose(fromScaled(num, denom), split.value)) {
          logger.debug('Split value rounded to currency fraction', {
            entryId: entry.id,
            account: split.account.fullName,
            value: split.value,
            stored: fromScaled(num, denom),
          });
        }
        this.execute(
          `INSERT INTO splits (
            guid, tx_guid, account_guid, memo, reconcile_state,
            value_num, value_denom, quantity_num, quantity_denom
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [newGuid(), entry.id, split.account.id, split.memo, toStateCode('unreconciled'), num, denom, num, denom]
        );
      }
    });

    draft.state = 'committed';
    logger.debug('Ledger entry committed', {
      entryId: entry.id,
      date: entry.date,
      splits: draft.splits.length,
    });
    return entry;
  }

  abandon(draft: EntryDraft): void {
    if (draft.state === 'open') {
      draft.state = 'abandoned';
    }
  }

  setMemo(split: LedgerSplit, memo: string): void {
    this.execute('UPDATE splits SET memo = ? WHERE guid = ?', [memo, split.id]);
    split.memo = memo;
  }

  setReconciled(split: LedgerSplit, state: ReconcileState): void {
    this.execute('UPDATE splits SET reconcile_state = ? WHERE guid = ?', [toStateCode(state), split.id]);
    split.reconcileState = state;
  }

  getBalance(account: LedgerAccount): number {
    const rows = this.query<{ num: number; denom: number }>(
      `SELECT SUM(quantity_num) AS num, quantity_denom AS denom
       FROM splits WHERE account_guid = ?
       GROUP BY quantity_denom`,
      [account.id]
    );
    return rows.reduce((total, row) => total + fromScaled(row.num, row.denom), 0);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.debug('Ledger closed', { path: this.filePath });
    }
  }

  // Row mapping

  private rootRow(): AccountRow | null {
    return this.queryOne<AccountRow>(
      'SELECT * FROM accounts WHERE parent_guid IS NULL AND account_type = ? ORDER BY rowid LIMIT 1',
      [ROOT_TYPE]
    );
  }

  private childRow(parentGuid: string, name: string): AccountRow | null {
    return this.queryOne<AccountRow>(
      'SELECT * FROM accounts WHERE parent_guid = ? AND name = ? ORDER BY rowid LIMIT 1',
      [parentGuid, name]
    );
  }

  private toAccount(row: AccountRow): LedgerAccount {
    const names: string[] = [];
    let current: AccountRow | null = row;
    while (current && current.account_type !== ROOT_TYPE) {
      names.unshift(current.name);
      current = current.parent_guid
        ? this.queryOne<AccountRow>('SELECT * FROM accounts WHERE guid = ?', [current.parent_guid])
        : null;
    }
    return {
      id: row.guid,
      name: row.name,
      fullName: names.join(ACCOUNT_SEPARATOR),
      type: row.account_type,
      currencyId: row.commodity_guid,
    };
  }

  private toEntry(row: SplitRow): LedgerEntry {
    return {
      id: row.tx_guid,
      date: toCalendarDate(row.post_date),
      description: row.description,
      currencyId: row.currency_guid,
    };
  }

  private toSplit(row: SplitRow, entry: LedgerEntry): LedgerSplit {
    return {
      id: row.guid,
      entry,
      accountId: row.account_guid,
      value: fromScaled(row.value_num, row.value_denom),
      quantity: fromScaled(row.quantity_num, row.quantity_denom),
      memo: row.memo,
      reconcileState: fromStateCode(row.reconcile_state),
    };
  }

  private assertOpen(draft: EntryDraft): void {
    if (draft.state !== 'open') {
      throw new LedgerStoreError(`Entry draft ${draft.draftId} is already ${draft.state}`, {
        draftId: draft.draftId,
      });
    }
  }

  // SQL helpers

  private query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      return this.db.prepare(sql).all(...params) as T[];
    } catch (error) {
      logger.error('Ledger query failed', { sql, error });
      throw new LedgerStoreError('Query execution failed', { sql, error });
    }
  }

  private queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      return (this.db.prepare(sql).get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Ledger queryOne failed', { sql, error });
      throw new LedgerStoreError('QueryOne execution failed', { sql, error });
    }
  }

  private execute(sql: string, params: unknown[] = []): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      logger.error('Ledger execute failed', { sql, error });
      throw new LedgerStoreError('Execute failed', { sql, error });
    }
  }

  /**
   * Runs fn in one SQLite transaction, rolling back on any error
   */
  private transaction(fn: () => void): void {
    try {
      this.db.transaction(fn)();
    } catch (error) {
      logger.error('Ledger transaction failed, rolling back', { error });
      if (isAppError(error)) {
        throw error;
      }
      throw new LedgerStoreError('Transaction failed', { error });
    }
  }
}
