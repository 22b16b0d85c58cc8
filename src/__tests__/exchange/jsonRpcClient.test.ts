import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { z } from 'zod';
import { AuthManager } from '../../exchange/authManager';
import { JsonRpcClient } from '../../exchange/jsonRpcClient';
import { AuthenticationError, RpcError } from '../../lib/errors';

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function sentBody(fetchMock: Mock<FetchFn>, call = 0): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('JsonRpcClient', () => {
  let fetchMock: Mock<FetchFn>;
  let rpc: JsonRpcClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    rpc = new JsonRpcClient({ baseUrl: 'https://exchange.test/api/v2/', timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a JSON-RPC envelope to the method URL', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ jsonrpc: '2.0', id: 1, result: { ok: true } }));

    const result = await rpc.call('public/test', { currency: 'BTC' }, z.object({ ok: z.boolean() }));

    expect(result).toEqual({ ok: true });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://exchange.test/api/v2/public/test');
    expect(sentBody(fetchMock)).toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'public/test',
      params: { currency: 'BTC' },
    });
  });

  it('sends the bearer token and increments ids', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ jsonrpc: '2.0', result: 1 }));

    await rpc.call('private/a', {}, z.number(), { accessToken: 'test-token' });
    await rpc.call('private/b', {}, z.number(), { accessToken: 'test-token' });

    const headers = fetchMock.mock.calls[0]?.[1].headers;
    expect(headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
    expect(sentBody(fetchMock, 1)).toMatchObject({ id: 2, method: 'private/b' });
  });

  it('raises RpcError with the exchange error code', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ jsonrpc: '2.0', id: 1, error: { code: 10004, message: 'order_not_found' } }, 400),
    );

    const call = rpc.call('private/cancel', { order_id: 'ETH-1' }, z.unknown());

    await expect(call).rejects.toBeInstanceOf(RpcError);
    await expect(call).rejects.toMatchObject({
      message: 'private/cancel: order_not_found',
      rpcCode: 10004,
    });
  });

  it('raises RpcError for non-JSON bodies', async () => {
    fetchMock.mockResolvedValue(new Response('<html>bad gateway</html>', { status: 502 }));

    await expect(rpc.call('public/test', {}, z.unknown())).rejects.toMatchObject({
      message: 'public/test: HTTP 502 with non-JSON body',
      rpcCode: 502,
    });
  });

  it('raises RpcError when the transport fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(rpc.call('public/test', {}, z.unknown())).rejects.toThrow(
      'public/test: request failed: fetch failed',
    );
  });

  it('raises RpcError when reading the body fails', async () => {
    const response = new Response('{}', { status: 200 });
    vi.spyOn(response, 'text').mockRejectedValue(new Error('The operation was aborted due to timeout'));
    fetchMock.mockResolvedValue(response);

    await expect(rpc.call('public/test', {}, z.unknown())).rejects.toMatchObject({
      name: 'RpcError',
      message: 'public/test: reading reply failed: The operation was aborted due to timeout',
      rpcCode: 200,
    });
  });

  it('raises RpcError when the result does not match the schema', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ jsonrpc: '2.0', id: 1, result: 'nope' }));

    await expect(rpc.call('public/test', {}, z.number())).rejects.toThrow(/^public\/test: unexpected result/);
  });
});

describe('AuthManager', () => {
  let fetchMock: Mock<FetchFn>;
  let rpc: JsonRpcClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    rpc = new JsonRpcClient({ baseUrl: 'https://exchange.test/api/v2', timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('exchanges client credentials for an access token', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ jsonrpc: '2.0', id: 1, result: { access_token: 'test-token', expires_in: 900 } }),
    );
    const auth = new AuthManager(rpc, { clientId: 'test-id', clientSecret: 'test-secret', scope: 'trade:read_write' });

    await expect(auth.authenticate()).resolves.toBe('test-token');

    expect(auth.getAccessToken()).toBe('test-token');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://exchange.test/api/v2/public/auth');
    expect(sentBody(fetchMock)).toMatchObject({
      method: 'public/auth',
      params: {
        grant_type: 'client_credentials',
        client_id: 'test-id',
        client_secret: 'test-secret',
        scope: 'trade:read_write',
      },
    });
  });

  it('fails with AuthenticationError on an error reply', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ jsonrpc: '2.0', id: 1, error: { code: 13004, message: 'invalid_credentials' } }, 400),
    );
    const auth = new AuthManager(rpc, { clientId: 'test-id', clientSecret: 'wrong', scope: 'trade:read_write' });

    await expect(auth.authenticate()).rejects.toThrow(
      'Authentication failed: public/auth: invalid_credentials',
    );
    expect(() => auth.getAccessToken()).toThrow(AuthenticationError);
  });

  it('fails without credentials before calling the exchange', async () => {
    const auth = new AuthManager(rpc, { clientId: '', clientSecret: '', scope: 'trade:read_write' });

    await expect(auth.authenticate()).rejects.toThrow('Client id and secret are required');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
