import { describe, expect, it } from 'vitest';
import { TokenError } from '../errors.js';
import { AuthService } from '../services/auth.js';
import { createMockAdapter, json, TOKEN_URL } from './test_utils.js';

const oauth = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh',
  authHost: 'accounts.zoho.in',
};

describe('AuthService', () => {
  it('posts a refresh_token grant and returns the access token', async () => {
    const { adapter, calls } = createMockAdapter(() => json(200, { access_token: 'access-1', expires_in: 3600 }));
    const auth = new AuthService(oauth, { timeoutMs: 1000, adapter });

    await expect(auth.acquireAccessToken()).resolves.toBe('access-1');

    expect(calls).toHaveLength(1);
    const req = calls[0]!;
    expect(req.url).toBe(TOKEN_URL);
    expect(req.method).toBe('post');
    expect(req.timeout).toBe(1000);
    expect(req.headers['Content-Type']).toBe('application/x-www-form-urlencoded;charset=UTF-8');
    expect(Object.fromEntries(new URLSearchParams(req.body))).toEqual({
      refresh_token: 'test-refresh',
      client_id: 'test-client',
      client_secret: 'test-secret',
      grant_type: 'refresh_token',
    });
  });

  it('targets the configured data center', async () => {
    const { adapter, calls } = createMockAdapter(() => json(200, { access_token: 'access-1' }));
    await new AuthService({ ...oauth, authHost: 'accounts.zoho.com' }, { timeoutMs: 1000, adapter }).acquireAccessToken();
    expect(calls[0]!.url).toBe('https://accounts.zoho.com/oauth/v2/token');
  });

  it('includes the whole response when access_token is missing', async () => {
    const { adapter } = createMockAdapter(() => json(200, { error: 'invalid_code' }));
    const auth = new AuthService(oauth, { timeoutMs: 1000, adapter });

    await expect(auth.acquireAccessToken()).rejects.toThrow(
      new TokenError('Failed to get access token. Response: {"error":"invalid_code"}')
    );
  });

  it('fails on a body that is not JSON', async () => {
    const { adapter } = createMockAdapter(() => ({ status: 200, body: '<html>maintenance</html>' }));
    const auth = new AuthService(oauth, { timeoutMs: 1000, adapter });

    await expect(auth.acquireAccessToken()).rejects.toThrow(/response is not JSON/);
  });

  it('wraps transport errors without HTTP details', async () => {
    const { adapter } = createMockAdapter(() => new Error('connect ECONNREFUSED'));
    const auth = new AuthService(oauth, { timeoutMs: 1000, adapter });

    const error = await auth.acquireAccessToken().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TokenError);
    expect(error).toMatchObject({ message: 'Error getting access token: connect ECONNREFUSED', http: undefined });
  });

  it('keeps status and body of an HTTP error', async () => {
    const { adapter } = createMockAdapter(() => json(401, { error: 'invalid_client' }, 'Unauthorized'));
    const auth = new AuthService(oauth, { timeoutMs: 1000, adapter });

    const error = await auth.acquireAccessToken().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TokenError);
    expect(error).toMatchObject({
      http: { status: 401, statusText: 'Unauthorized', body: '{"error":"invalid_client"}' },
    });
  });
});
