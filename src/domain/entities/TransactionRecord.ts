import { z } from 'zod';
import { isCalendarDate } from '../dates.js';

/**
 * TransactionRecord - one transaction as reported by the aggregator
 * Immutable; internalId is the deduplication key across runs
 */
export interface TransactionRecord {
  internalId: string;
  bookingDate: string; // YYYY-MM-DD
  valueDate: string; // YYYY-MM-DD, bookingDate when the bank omits it
  description: string;
  amount: number; // signed, in major units of currency
  currency: string; // ISO 4217
}

export interface TransactionGroup {
  booked: TransactionRecord[];
  pending: TransactionRecord[];
}

/** Which record date is authoritative for an account */
export type DateKey = 'booking' | 'value';

export function authoritativeDate(record: TransactionRecord, dateKey: DateKey): string {
  return dateKey === 'value' ? record.valueDate : record.bookingDate;
}

const amountSchema = z.object({
  amount: z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, { message: 'amount must be a decimal string' }),
  currency: z.string().length(3),
});

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}/, { message: 'must be an ISO date' })
  .refine(isCalendarDate, { message: 'must be a real calendar date' });

/**
 * Raw transaction as returned by GET accounts/{id}/transactions/
 */
export const aggregatorTransactionSchema = z.object({
  internalTransactionId: z.string().min(1),
  bookingDate: isoDate,
  valueDate: isoDate.optional(),
  remittanceInformationUnstructured: z.string().optional(),
  remittanceInformationUnstructuredArray: z.array(z.string()).optional(),
  creditorName: z.string().optional(),
  debtorName: z.string().optional(),
  transactionAmount: amountSchema,
});

export type AggregatorTransaction = z.infer<typeof aggregatorTransactionSchema>;

export const transactionsResponseSchema = z.object({
  transactions: z.object({
    booked: z.array(z.unknown()).default([]),
    pending: z.array(z.unknown()).default([]),
  }),
});

const balanceSchema = z.object({
  balanceAmount: amountSchema,
  balanceType: z.string(),
});

export type AggregatorBalance = z.infer<typeof balanceSchema>;

export const balancesResponseSchema = z.object({
  balances: z.array(balanceSchema),
});

function describe(tx: AggregatorTransaction): string {
  if (tx.remittanceInformationUnstructured) {
    return tx.remittanceInformationUnstructured;
  }
  if (tx.remittanceInformationUnstructuredArray && tx.remittanceInformationUnstructuredArray.length > 0) {
    return tx.remittanceInformationUnstructuredArray.join(' ');
  }
  return tx.creditorName ?? tx.debtorName ?? '';
}

/**
 * Maps a validated aggregator transaction onto the domain record
 */
export function toTransactionRecord(tx: AggregatorTransaction): TransactionRecord {
  const bookingDate = tx.bookingDate.slice(0, 10);
  return {
    internalId: tx.internalTransactionId,
    bookingDate,
    valueDate: tx.valueDate ? tx.valueDate.slice(0, 10) : bookingDate,
    description: describe(tx),
    amount: Number(tx.transactionAmount.amount),
    currency: tx.transactionAmount.currency,
  };
}
