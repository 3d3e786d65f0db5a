import type {
  LedgerAccount,
  LedgerCurrency,
  LedgerEntry,
  LedgerSplit,
  ReconcileState,
} from '../../domain/entities/Ledger.js';
import { logger } from '../logger.js';

export interface DraftSplit {
  account: LedgerAccount;
  value: number;
  memo: string;
}

/**
 * An entry being built; nothing reaches the ledger until commit
 */
export interface EntryDraft {
  readonly draftId: number;
  readonly currency: LedgerCurrency;
  date: string | null;
  description: string;
  readonly splits: DraftSplit[];
  state: 'open' | 'committed' | 'abandoned';
}

/**
 * Ledger store port consumed by the reconciler
 */
export interface LedgerStore {
  lookupAccount(path: string): LedgerAccount | null;
  getAccountById(id: string): LedgerAccount | null;
  listSplits(account: LedgerAccount): LedgerSplit[];
  listEntrySplits(entry: LedgerEntry): LedgerSplit[];
  lookupCurrency(code: string): LedgerCurrency | null;
  beginEntry(currency: LedgerCurrency): EntryDraft;
  addSplit(draft: EntryDraft, account: LedgerAccount, value: number, memo?: string): DraftSplit;
  setDate(target: EntryDraft | LedgerEntry, date: string): void;
  setDescription(draft: EntryDraft, text: string): void;
  commit(draft: EntryDraft): LedgerEntry;
  abandon(draft: EntryDraft): void;
  setMemo(split: LedgerSplit, memo: string): void;
  setReconciled(split: LedgerSplit, state: ReconcileState): void;
  getBalance(account: LedgerAccount): number;
  close(): void;
}

export function isDraft(target: EntryDraft | LedgerEntry): target is EntryDraft {
  return 'draftId' in target;
}

/**
 * Scoped edit: builds an entry and commits it, or abandons the draft when
 * build throws so no partial entry is ever written
 */
export function withEntry(
  store: LedgerStore,
  currency: LedgerCurrency,
  build: (draft: EntryDraft) => void
): LedgerEntry {
  const draft = store.beginEntry(currency);
  try {
    build(draft);
    return store.commit(draft);
  } catch (error) {
    if (draft.state === 'open') {
      store.abandon(draft);
      logger.debug('Ledger entry abandoned', {
        draftId: draft.draftId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    throw error;
  }
}
