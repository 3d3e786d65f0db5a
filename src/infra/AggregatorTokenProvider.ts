import { z } from 'zod';
import { ConfigError, TransportError, ValidationError } from '../domain/errors.js';
import type { ImportConfig } from '../domain/entities/AccountConfig.js';
import type { AccessTokenSource, AggregatorTransport } from './AggregatorClient.js';
import { logger } from './logger.js';

const accessSchema = z.object({
  access: z.string().min(1),
  access_expires: z.number().int().positive(),
});

const tokenPairSchema = accessSchema.extend({
  refresh: z.string().min(1),
});

/** Renew this long before the aggregator's stated expiry */
const EXPIRY_MARGIN_MS = 60_000;

export interface AggregatorSecrets {
  secretId?: string;
  secretKey?: string;
}

export interface ConfigWriter {
  save(config: ImportConfig): Promise<void>;
}

interface CachedToken {
  token: string;
  expiresAt: number;
}

/**
 * AggregatorTokenProvider - supplies bearer tokens to the aggregator client
 * Refreshes with the stored refresh token; falls back to a new token pair from
 * the secret id/key and persists the new refresh token
 */
export class AggregatorTokenProvider implements AccessTokenSource {
  private cached: CachedToken | null = null;
  private inFlight: Promise<string> | null = null;

  constructor(
    private readonly transport: AggregatorTransport,
    private readonly config: ImportConfig,
    private readonly configWriter: ConfigWriter,
    private readonly secrets: AggregatorSecrets,
    private readonly now: () => number = Date.now
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.token;
    }
    if (!this.inFlight) {
      this.inFlight = this.renew().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Requests a new token pair with the configured secrets
   */
  async obtainNewToken(): Promise<string> {
    const secretId = this.secrets.secretId ?? this.config.secretId;
    const secretKey = this.secrets.secretKey ?? this.config.secretKey;
    if (!secretId || !secretKey) {
      throw new ConfigError(
        'Aggregator secrets missing: set AGGREGATOR_SECRET_ID and AGGREGATOR_SECRET_KEY'
      );
    }

    const data = await this.transport.post(
      'token/new/',
      { secret_id: secretId, secret_key: secretKey },
      { auth: false }
    );
    const pair = tokenPairSchema.safeParse(data);
    if (!pair.success) {
      throw new ValidationError('Unexpected token/new response', { issues: pair.error.issues });
    }

    this.config.refreshToken = pair.data.refresh;
    await this.configWriter.save(this.config);
    logger.info('Obtained new aggregator token pair');

    return this.remember(pair.data.access, pair.data.access_expires);
  }

  private async renew(): Promise<string> {
    const refreshToken = this.config.refreshToken;
    if (!refreshToken) {
      return this.obtainNewToken();
    }

    let data: unknown;
    try {
      data = await this.transport.post('token/refresh/', { refresh: refreshToken }, { auth: false });
    } catch (error) {
      if (error instanceof TransportError && error.status === 401) {
        logger.info('Refresh token rejected, requesting a new token pair');
        return this.obtainNewToken();
      }
      throw error;
    }

    const access = accessSchema.safeParse(data);
    if (!access.success) {
      throw new ValidationError('Unexpected token/refresh response', { issues: access.error.issues });
    }
    logger.debug('Aggregator access token refreshed');
    return this.remember(access.data.access, access.data.access_expires);
  }

  private remember(token: string, expiresInSeconds: number): string {
    this.cached = {
      token,
      expiresAt: this.now() + expiresInSeconds * 1000 - EXPIRY_MARGIN_MS,
    };
    return token;
  }
}
