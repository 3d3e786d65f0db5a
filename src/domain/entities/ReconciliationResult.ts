/**
 * Recoverable findings of a reconciliation run
 * Warnings never abort processing and never roll back ledger changes
 */
export type ReconciliationWarning =
  | {
      kind: 'amount_mismatch';
      accountPath: string;
      transactionId: string;
      description: string;
      ledgerValue: number;
      recordAmount: number;
    }
  | {
      kind: 'division_undefined';
      accountPath: string;
      transactionId: string;
      description: string;
      previousEntryId: string;
    }
  | {
      kind: 'balance_divergence';
      accountPath: string;
      expected: number;
      actual: number;
    };

export interface AccountReconcileResult {
  accountId: string;
  accountPath: string;
  reconciled: number;
  matched: number;
  created: number;
  skipped: number;
  pendingIgnored: number;
  warnings: ReconciliationWarning[];
}

export interface LedgerReconcileResult {
  ledgerPath: string;
  accounts: AccountReconcileResult[];
}

export interface LedgerFailure {
  ledgerPath: string;
  code: string;
  message: string;
}

export interface ImportReport {
  ledgers: LedgerReconcileResult[];
  failures: LedgerFailure[];
  warnings: ReconciliationWarning[];
}

export function describeWarning(warning: ReconciliationWarning): string {
  switch (warning.kind) {
    case 'amount_mismatch':
      return (
        `Can't reconcile ${warning.transactionId} (${warning.description}) in ${warning.accountPath}: ` +
        `ledger has ${warning.ledgerValue}, bank reports ${warning.recordAmount}`
      );
    case 'division_undefined':
      return (
        `Can't split ${warning.transactionId} (${warning.description}) in ${warning.accountPath}: ` +
        `previous entry ${warning.previousEntryId} has a zero-valued split`
      );
    case 'balance_divergence':
      return (
        `${warning.accountPath} balance out of sync, please reconcile. ` +
        `Expected: ${warning.expected}, actual: ${warning.actual}`
      );
  }
}
