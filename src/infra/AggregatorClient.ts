import { ConfigError, TransportError } from '../domain/errors.js';
import { logger } from './logger.js';

export interface RequestOptions {
  params?: Record<string, string>;
  signal?: AbortSignal;
  /** Attach the bearer token (default true) */
  auth?: boolean;
}

/**
 * Transport seam used by the downloader and the token provider
 */
export interface AggregatorTransport {
  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<unknown>;
}

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
}

export interface AggregatorClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Links a caller's signal with a per-request timeout
 */
function withTimeout(parent: AbortSignal | undefined, timeoutMs: number) {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onAbort = () => controller.abort(parent?.reason);

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Open-banking aggregator REST client on the global fetch
 * Bearer tokens come from an AccessTokenSource; retries are left to callers
 */
export class AggregatorClient implements AggregatorTransport {
  private tokens: AccessTokenSource | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: AggregatorClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  useTokenSource(tokens: AccessTokenSource): void {
    this.tokens = tokens;
  }

  get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('GET', path, undefined, options);
  }

  post(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.request('POST', path, body, options);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    { params, signal, auth = true }: RequestOptions
  ): Promise<unknown> {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (auth) {
      if (!this.tokens) {
        throw new ConfigError('Aggregator client has no token source');
      }
      headers.Authorization = `Bearer ${await this.tokens.getAccessToken()}`;
    }

    const timeout = withTimeout(signal, this.options.timeoutMs);
    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: timeout.signal,
        });
        // The timeout also covers the body stream
        text = await response.text();
      } catch (error) {
        const cause = timeout.signal.aborted ? errorMessage(timeout.signal.reason) : errorMessage(error);
        throw new TransportError(`${method} ${path} failed: ${cause}`, {
          method,
          path,
          status: null,
          cause,
        });
      }

      if (!response.ok) {
        logger.error('Aggregator request failed', { method, path, status: response.status });
        throw new TransportError(`${method} ${path} returned ${response.status}`, {
          method,
          path,
          status: response.status,
          body: text,
        });
      }

      logger.debug('Aggregator request completed', { method, path, status: response.status });
      if (text === '') {
        return null;
      }
      try {
        const data: unknown = JSON.parse(text);
        return data;
      } catch (error) {
        throw new TransportError(`${method} ${path} returned invalid JSON`, {
          method,
          path,
          status: response.status,
          body: text,
          cause: errorMessage(error),
        });
      }
    } finally {
      timeout.dispose();
    }
  }
}
