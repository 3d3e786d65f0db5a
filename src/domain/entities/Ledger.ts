/**
 * Ledger entities as exposed by a ledger store
 * The store owns them; services change them only through store methods
 */

export type ReconcileState = 'unreconciled' | 'cleared' | 'reconciled';

export interface LedgerCurrency {
  id: string;
  code: string;
  /** Smallest units per major unit, e.g. 100 for GBP */
  fraction: number;
}

export interface LedgerAccount {
  id: string;
  name: string;
  /** Dot-separated path from the root, e.g. "Assets.Current Account" */
  fullName: string;
  type: string;
  currencyId: string | null;
}

/**
 * LedgerEntry - an accounting transaction made of splits
 */
export interface LedgerEntry {
  id: string;
  date: string; // YYYY-MM-DD
  description: string;
  currencyId: string;
}

/**
 * LedgerSplit - one leg of an entry
 * `entry` is a back reference; splits of the same entry listed together share it
 */
export interface LedgerSplit {
  id: string;
  entry: LedgerEntry;
  accountId: string;
  value: number;
  quantity: number;
  memo: string;
  reconcileState: ReconcileState;
}

const STATE_CODES: Record<ReconcileState, string> = {
  unreconciled: 'n',
  cleared: 'c',
  reconciled: 'y',
};

export function toStateCode(state: ReconcileState): string {
  return STATE_CODES[state];
}

export function fromStateCode(code: string): ReconcileState {
  switch (code) {
    case 'y':
      return 'reconciled';
    case 'c':
      return 'cleared';
    default:
      return 'unreconciled';
  }
}
