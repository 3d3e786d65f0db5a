import os from 'node:os';
import path from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';
import {
  emptyImportConfig,
  importConfigSchema,
  type ImportConfig,
} from '../domain/entities/AccountConfig.js';
import { logger } from './logger.js';

/**
 * Expands a leading `~` to the current user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * AccountConfigStore - reads and writes the JSON configuration file
 * The config is loaded once and handed around explicitly; nothing is written
 * unless save() is called
 */
export class AccountConfigStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<ImportConfig> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No configuration file found, starting empty', { path: this.filePath });
        return emptyImportConfig();
      }
      throw new ConfigError('Failed to read configuration file', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON5.parse(raw);
    } catch (error) {
      throw new ConfigError('Configuration file is not valid JSON', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      const config = importConfigSchema.parse(parsed);
      logger.debug('Configuration loaded', {
        path: this.filePath,
        ledgers: Object.keys(config.ledgers).length,
      });
      return config;
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigError('Configuration file failed validation', {
          path: this.filePath,
          issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      throw error;
    }
  }

  async save(config: ImportConfig): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, `${JSON.stringify(config, null, 4)}\n`, 'utf-8');
      logger.debug('Configuration saved', { path: this.filePath });
    } catch (error) {
      throw new ConfigError('Failed to write configuration file', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
