import os from 'node:os';
import path from 'node:path';
import { z, ZodError } from 'zod';

function defaultConfigPath(): string {
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, 'ledger-bank-sync', 'config.json');
}

const optionalSecret = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional()
);

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Account configuration file
  CONFIG_PATH: z.string().min(1).default(defaultConfigPath),

  // Open-banking aggregator
  AGGREGATOR_BASE_URL: z
    .string()
    .url()
    .default('https://bankaccountdata.gocardless.com/api/v2/')
    .transform((url) => (url.endsWith('/') ? url : `${url}/`)),
  AGGREGATOR_SECRET_ID: optionalSecret,
  AGGREGATOR_SECRET_KEY: optionalSecret,

  // Downloads
  DOWNLOAD_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'DOWNLOAD_CONCURRENCY must be at least 1' })
    .default(4),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1, { message: 'REQUEST_TIMEOUT_MS must be at least 1' })
    .default(30000),

  // Scheduled imports
  IMPORT_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'IMPORT_INTERVAL_MINUTES must be at least 1' })
    .default(360),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables, throwing ZodError on invalid input
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for supported variables');
      process.exit(1);
    }
    throw error;
  }
}
