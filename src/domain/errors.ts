/**
 * Application error types
 * Each error carries a stable code; callers decide whether a kind is fatal for
 * the run, for one ledger file or only for one account
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface TransportErrorDetails {
  method: string;
  path: string;
  status: number | null;
  body?: string;
  cause?: string;
}

/**
 * Network or HTTP failure talking to the aggregator (fatal for the run)
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly request: TransportErrorDetails
  ) {
    super(message, 'TRANSPORT_ERROR', request);
  }

  get status(): number | null {
    return this.request.status;
  }
}

/**
 * None of the known balance types were reported for an account
 */
export class NoBalanceAvailableError extends AppError {
  constructor(accountId: string, reportedTypes: string[]) {
    super(`No usable balance reported for account ${accountId}`, 'NO_BALANCE_AVAILABLE', {
      accountId,
      reportedTypes,
    });
  }
}

/**
 * Currency code missing from the ledger's commodity table
 */
export class UnknownCurrencyError extends AppError {
  constructor(public readonly currencyCode: string) {
    super(`Currency ${currencyCode} not found in ledger`, 'UNKNOWN_CURRENCY', { currencyCode });
  }
}

/**
 * Configured ledger account path does not exist in the ledger file
 */
export class AccountNotFoundError extends AppError {
  constructor(public readonly accountPath: string) {
    super(`Account name not found: ${accountPath}`, 'ACCOUNT_NOT_FOUND', { accountPath });
  }
}

/**
 * Fan-out ratio against a zero-valued previous split
 */
export class DivisionUndefinedError extends AppError {
  constructor(public readonly previousSplitId: string) {
    super(
      `Cannot rescale splits: previous split ${previousSplitId} has zero value`,
      'DIVISION_UNDEFINED',
      { previousSplitId }
    );
  }
}

/**
 * Malformed payloads from the aggregator
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Ledger file operation errors
 */
export class LedgerStoreError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'LEDGER_STORE_ERROR', details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Errors that stop one ledger file but leave the remaining files to run
 */
export function isLedgerFatal(error: unknown): error is AppError {
  return (
    error instanceof AccountNotFoundError ||
    error instanceof UnknownCurrencyError ||
    error instanceof LedgerStoreError
  );
}
