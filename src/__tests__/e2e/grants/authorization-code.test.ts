import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  accessTokenFor,
  formRequest,
  readJson,
  field,
  generateCodeVerifier,
  generateCodeChallenge,
  WEB_REDIRECT_URI,
  type TestContext,
} from '../test-setup.js';

describe('Authorization Code Grant', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  function authorizeUrl(params: Record<string, string>): string {
    const url = new URL('http://localhost/auth/authorize');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.pathname + url.search;
  }

  async function authorize(params: Record<string, string>, userId = 'user-1') {
    const bearer = await accessTokenFor(ctx, userId);
    return ctx.app.request(authorizeUrl(params), {
      headers: { Authorization: `Bearer ${bearer}` },
    });
  }

  async function obtainCode(codeVerifier: string, extra: Record<string, string> = {}) {
    const res = await authorize({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: WEB_REDIRECT_URI,
      scope: 'read profile',
      state: 'xyz',
      code_challenge: generateCodeChallenge(codeVerifier),
      code_challenge_method: 'S256',
      ...extra,
    });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    const code = location.searchParams.get('code');
    if (!code) {
      throw new Error(`No code in redirect ${location.toString()}`);
    }
    return { code, location };
  }

  function exchange(code: string, codeVerifier: string, overrides: Record<string, string> = {}) {
    return ctx.app.request(
      '/auth/token',
      formRequest({
        grant_type: 'authorization_code',
        code,
        code_verifier: codeVerifier,
        redirect_uri: WEB_REDIRECT_URI,
        client_id: 'web-app',
        ...overrides,
      })
    );
  }

  it('should complete full authorization code flow with PKCE', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code, location } = await obtainCode(codeVerifier);

    expect(location.origin).toBe('http://localhost:5173');
    expect(location.pathname).toBe('/callback');
    expect(location.searchParams.get('state')).toBe('xyz');
    expect(await ctx.memory.get('pkce:xyz')).not.toBeNull();

    const tokenRes = await exchange(code, codeVerifier);
    expect(tokenRes.status).toBe(200);
    expect(tokenRes.headers.get('Cache-Control')).toBe('no-store');

    const tokens = await readJson(tokenRes);
    expect(tokens.token_type).toBe('Bearer');
    expect(tokens.expires_in).toBe(3600);
    expect(tokens.scope).toBe('read profile');

    const claims = await ctx.core.tokenIssuer.verifyAccessToken(field(tokens, 'access_token'));
    expect(claims.sub).toBe('user-1');
    expect(claims.scopes).toEqual(['read', 'profile']);
    expect(claims.client_id).toBe('web-app');
    expect(claims.iss).toBe('http://localhost:3000');

    const refresh = await ctx.core.tokenIssuer.verifyRefreshToken(field(tokens, 'refresh_token'));
    expect(refresh.token_use).toBe('refresh');

    expect(await ctx.memory.get('pkce:xyz')).toBeNull();
  });

  it('should fall back to the client default scopes', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier, { scope: '' });

    const tokens = await readJson(await exchange(code, codeVerifier));
    expect(tokens.scope).toBe('read');
  });

  it('should generate a state when the client sends none', async () => {
    const res = await authorize({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: WEB_REDIRECT_URI,
      code_challenge: generateCodeChallenge(generateCodeVerifier()),
      code_challenge_method: 'S256',
    });

    expect(res.status).toBe(302);
    const state = new URL(res.headers.get('Location') ?? '').searchParams.get('state');
    expect(state).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  function refresh(refreshToken: string) {
    return ctx.app.request(
      '/auth/token',
      formRequest({ grant_type: 'refresh_token', refresh_token: refreshToken })
    );
  }

  function listSessions(accessToken: string) {
    return ctx.app.request('/auth/sessions', {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
  }

  it('should let exactly one of two concurrent exchanges succeed', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const responses = await Promise.all([
      exchange(code, codeVerifier),
      exchange(code, codeVerifier),
    ]);
    const statuses = responses.map((r) => r.status).sort();
    expect(statuses).toEqual([200, 400]);

    const failed = responses.find((r) => r.status === 400);
    if (!failed) throw new Error('expected a failed exchange');
    expect(await readJson(failed)).toEqual({
      error: 'invalid_grant',
      error_description: 'Authorization code already used',
    });
  });

  it('should revoke the tokens of the winner when a replay races the exchange', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const responses = await Promise.all([
      exchange(code, codeVerifier),
      exchange(code, codeVerifier),
    ]);
    const winner = responses.find((r) => r.status === 200);
    if (!winner) throw new Error('expected a successful exchange');
    const tokens = await readJson(winner);

    const refreshRes = await refresh(field(tokens, 'refresh_token'));
    expect(refreshRes.status).toBe(401);
    expect(await readJson(refreshRes)).toEqual({
      error: 'invalid_token',
      error_description: 'Token revoked',
    });

    const sessionsRes = await listSessions(field(tokens, 'access_token'));
    expect(sessionsRes.status).toBe(401);
    expect(await readJson(sessionsRes)).toEqual({
      error: 'invalid_token',
      error_description: 'Token revoked',
    });
  });

  it('should revoke tokens minted from a replayed code', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const first = await readJson(await exchange(code, codeVerifier));
    const accessToken = field(first, 'access_token');
    const refreshToken = field(first, 'refresh_token');
    expect((await listSessions(accessToken)).status).toBe(200);

    const replay = await exchange(code, codeVerifier);
    expect(replay.status).toBe(400);
    expect((await readJson(replay)).error_description).toBe('Authorization code already used');

    const refreshRes = await refresh(refreshToken);
    expect(refreshRes.status).toBe(401);
    expect(await readJson(refreshRes)).toEqual({
      error: 'invalid_token',
      error_description: 'Token revoked',
    });

    const sessionsRes = await listSessions(accessToken);
    expect(sessionsRes.status).toBe(401);
    expect(await readJson(sessionsRes)).toEqual({
      error: 'invalid_token',
      error_description: 'Token revoked',
    });
  });

  it('should detect a replay presented by another client', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const first = await readJson(await exchange(code, codeVerifier));

    const replay = await exchange(code, codeVerifier, { client_id: 'cli' });
    expect(replay.status).toBe(400);
    expect(await readJson(replay)).toEqual({
      error: 'invalid_grant',
      error_description: 'Authorization code already used',
    });

    const refreshRes = await refresh(field(first, 'refresh_token'));
    expect(refreshRes.status).toBe(401);
    expect((await readJson(refreshRes)).error_description).toBe('Token revoked');
  });

  it('should still check the client of an unused code', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const res = await exchange(code, codeVerifier, { client_id: 'cli' });
    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe('unauthorized_client');

    expect((await exchange(code, codeVerifier)).status).toBe(200);
  });

  it('should reject an incorrect code verifier without consuming the code', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const wrong = await exchange(code, generateCodeVerifier());
    expect(wrong.status).toBe(400);
    expect(await readJson(wrong)).toEqual({
      error: 'invalid_grant',
      error_description: 'Invalid code verifier',
    });

    expect((await exchange(code, codeVerifier)).status).toBe(200);
  });

  it('should reject a different redirect URI', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    const res = await exchange(code, codeVerifier, {
      redirect_uri: 'http://localhost:5173/other',
    });
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_grant',
      error_description: 'Grant was issued to a different client or redirect URI',
    });
  });

  it('should reject a code after it expired', async () => {
    const codeVerifier = generateCodeVerifier();
    const { code } = await obtainCode(codeVerifier);

    ctx.advance(301);

    const res = await exchange(code, codeVerifier);
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_grant',
      error_description: 'Invalid authorization code',
    });
  });

  it('should report missing parameters', async () => {
    const res = await ctx.app.request(
      '/auth/token',
      formRequest({ grant_type: 'authorization_code', code: 'abc', redirect_uri: WEB_REDIRECT_URI, client_id: 'web-app' })
    );
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_request',
      error_description: 'Missing code_verifier parameter (PKCE required)',
    });
  });

  it('should reject unknown grant types', async () => {
    const res = await ctx.app.request('/auth/token', formRequest({ grant_type: 'password' }));
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'unsupported_grant_type',
      error_description: 'Unsupported grant type: password',
    });
  });

  it('should answer an unregistered redirect URI directly', async () => {
    const res = await authorize({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: 'http://evil.example/callback',
      code_challenge: generateCodeChallenge(generateCodeVerifier()),
      code_challenge_method: 'S256',
    });

    expect(res.status).toBe(400);
    expect(res.headers.get('Location')).toBeNull();
    expect(await readJson(res)).toEqual({
      error: 'invalid_request',
      error_description: 'Invalid redirect URI',
    });
  });

  it('should require an authenticated user', async () => {
    const res = await ctx.app.request(
      authorizeUrl({
        response_type: 'code',
        client_id: 'web-app',
        redirect_uri: WEB_REDIRECT_URI,
        code_challenge: generateCodeChallenge(generateCodeVerifier()),
        code_challenge_method: 'S256',
      })
    );

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: 'invalid_token',
      error_description: 'Invalid token: authentication required',
    });
  });

  it('should send an unauthenticated user to the login page', async () => {
    ctx = setupTestContext({}, {
      authenticate: () => Promise.resolve(null),
      loginUrl: (returnTo) => `https://login.example.com/?return_to=${encodeURIComponent(returnTo)}`,
    });

    const path = authorizeUrl({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: WEB_REDIRECT_URI,
    });
    const res = await ctx.app.request(path);

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(
      `https://login.example.com/?return_to=${encodeURIComponent(`http://localhost${path}`)}`
    );
  });

  it('should redirect PKCE errors back to the client', async () => {
    const res = await authorize({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: WEB_REDIRECT_URI,
      state: 'xyz',
      code_challenge: generateCodeChallenge(generateCodeVerifier()),
      code_challenge_method: 'plain',
    });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    expect(location.origin + location.pathname).toBe(WEB_REDIRECT_URI);
    expect(location.searchParams.get('error')).toBe('invalid_request');
    expect(location.searchParams.get('error_description')).toBe(
      'code_challenge_method must be S256'
    );
    expect(location.searchParams.get('state')).toBe('xyz');
  });

  it('should redirect scope errors back to the client', async () => {
    const res = await authorize({
      response_type: 'code',
      client_id: 'web-app',
      redirect_uri: WEB_REDIRECT_URI,
      scope: 'read admin',
      state: 'xyz',
      code_challenge: generateCodeChallenge(generateCodeVerifier()),
      code_challenge_method: 'S256',
    });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    expect(location.searchParams.get('error')).toBe('invalid_scope');
    expect(location.searchParams.get('error_description')).toBe('Invalid scope: admin');
  });
});
