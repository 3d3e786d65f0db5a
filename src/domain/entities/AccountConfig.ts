import { z } from 'zod';

/**
 * AccountConfig - maps an aggregator account onto a ledger account
 * Created at registration, read at import start, never changed by an import
 */
export const accountConfigSchema = z.object({
  ledgerAccount: z.string().min(1, { message: 'ledgerAccount must be a non-empty account path' }),
  dateKey: z.enum(['booking', 'value']).default('booking'),
  iban: z.string().optional(),
  institution: z.string().optional(),
});

export type AccountConfig = z.infer<typeof accountConfigSchema>;

/** Aggregator account id -> account mapping, for one ledger file */
export type LedgerAccounts = Record<string, AccountConfig>;

export const importConfigSchema = z.object({
  secretId: z.string().optional(),
  secretKey: z.string().optional(),
  refreshToken: z.string().optional(),
  ledgers: z.record(z.string(), z.record(z.string(), accountConfigSchema)).default({}),
});

/**
 * Whole configuration file: credentials plus ledger file path -> accounts
 */
export type ImportConfig = z.infer<typeof importConfigSchema>;

export function emptyImportConfig(): ImportConfig {
  return { ledgers: {} };
}

/**
 * Every aggregator account id across all ledger files, first occurrence order
 */
export function configuredAccountIds(config: ImportConfig): string[] {
  const ids = new Set<string>();
  for (const accounts of Object.values(config.ledgers)) {
    for (const accountId of Object.keys(accounts)) {
      ids.add(accountId);
    }
  }
  return [...ids];
}
