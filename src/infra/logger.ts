import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Logs to console, plus a JSON file in production when LOG_FILE is set
 */

const SECRET_PATTERNS = [
  /secret[_-]?(?:id|key)["']?[=:]\s*["']?([^"'\s,}]+)/gi,
  /refresh["']?[=:]\s*["']?([^"'\s,}]+)/gi,
  /access["']?[=:]\s*["']?([^"'\s,}]+)/gi,
  /Bearer\s+([A-Za-z0-9._~+/=-]+)/g,
];

const SECRET_KEYS = new Set([
  'secretId',
  'secretKey',
  'secret_id',
  'secret_key',
  'refreshToken',
  'refresh',
  'access',
  'token',
  'authorization',
  'Authorization',
]);

const REDACTED = '***REDACTED***';

/**
 * Redacts sensitive information from log messages
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) => {
        return match.replace(secret, REDACTED);
      });
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_KEYS.has(key) ? REDACTED : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

/**
 * Redacts the message and every metadata field winston merged into the entry
 */
const redactFormat = winston.format((info) => {
  info.message = redactSecrets(info.message);
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') {
      continue;
    }
    info[key] = SECRET_KEYS.has(key) ? REDACTED : redactSecrets(info[key]);
  }
  return info;
})();

type LoggerOptions = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>;

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(redactFormat, winston.format.errors({ stack: true })),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (initialized by the CLI)
 */
export let logger: winston.Logger;

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
