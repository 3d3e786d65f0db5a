import { describe, expect, it, vi } from 'vitest';
import { AggregatorClient } from '../../../src/infra/AggregatorClient.js';
import { ConfigError, TransportError } from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const BASE_URL = 'https://bank.example/api/v2/';

function createClient(response: (init?: RequestInit) => Promise<Response>, timeoutMs = 1000) {
  const fetchImpl = vi.fn((_input: string | URL | Request, init?: RequestInit) => response(init));
  const client = new AggregatorClient({ baseUrl: BASE_URL, timeoutMs, fetchImpl });
  client.useTokenSource({ getAccessToken: async () => 'access-1' });
  return { client, fetchImpl };
}

describe('AggregatorClient', () => {
  it('should send authenticated GET requests with query parameters', async () => {
    const { client, fetchImpl } = createClient(async () =>
      new Response(JSON.stringify({ balances: [] }), { status: 200 })
    );

    const data = await client.get('accounts/acc-1/transactions/', {
      params: { date_from: '2024-01-01' },
    });

    expect(data).toEqual({ balances: [] });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(String(url)).toBe(`${BASE_URL}accounts/acc-1/transactions/?date_from=2024-01-01`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer access-1',
    });
  });

  it('should post JSON without a token when auth is off', async () => {
    const { client, fetchImpl } = createClient(async () =>
      new Response(JSON.stringify({ access: 'a' }), { status: 200 })
    );

    await client.post('token/refresh/', { refresh: 'test-refresh' }, { auth: false });

    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.body).toBe('{"refresh":"test-refresh"}');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
    });
  });

  it('should raise TransportError with status and body on HTTP errors', async () => {
    const { client } = createClient(async () => new Response('Not found', { status: 404 }));

    const error = await client.get('accounts/acc-9/balances/').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'GET accounts/acc-9/balances/ returned 404',
      request: { method: 'GET', path: 'accounts/acc-9/balances/', status: 404, body: 'Not found' },
    });
  });

  it('should raise TransportError without status on network failures', async () => {
    const { client } = createClient(() => Promise.reject(new TypeError('fetch failed')));

    await expect(client.get('accounts/acc-1/balances/')).rejects.toMatchObject({
      message: 'GET accounts/acc-1/balances/ failed: fetch failed',
      request: { status: null, cause: 'fetch failed' },
    });
  });

  it('should raise TransportError when the request times out before headers arrive', async () => {
    const { client } = createClient(
      (init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
      20
    );

    const error = await client.get('accounts/acc-1/balances/').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'GET accounts/acc-1/balances/ failed: Request timed out after 20ms',
      request: { status: null, cause: 'Request timed out after 20ms' },
    });
  });

  it('should raise TransportError when the body read times out', async () => {
    const { client } = createClient(async (init) => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          init?.signal?.addEventListener('abort', () => controller.error(new Error('body aborted')), {
            once: true,
          });
        },
      });
      return new Response(stream, { status: 200 });
    }, 20);

    const error = await client.get('accounts/acc-1/transactions/').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'GET accounts/acc-1/transactions/ failed: Request timed out after 20ms',
      request: { status: null },
    });
  });

  it('should raise TransportError when the body stream fails', async () => {
    const { client } = createClient(async () => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.error(new TypeError('terminated'));
        },
      });
      return new Response(stream, { status: 200 });
    });

    const error = await client.get('accounts/acc-1/transactions/').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'GET accounts/acc-1/transactions/ failed: terminated',
      request: { status: null, cause: 'terminated' },
    });
  });

  it('should return null for empty bodies', async () => {
    const { client } = createClient(async () => new Response('', { status: 200 }));

    await expect(client.post('agreements/enduser/x/accept/', {})).resolves.toBeNull();
  });

  it('should require a token source for authenticated requests', async () => {
    const client = new AggregatorClient({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      fetchImpl: vi.fn(),
    });

    await expect(client.get('accounts/acc-1/balances/')).rejects.toBeInstanceOf(ConfigError);
  });
});
