import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  formRequest,
  readJson,
  field,
  type TestContext,
} from '../test-setup.js';

describe('Refresh Token Grant', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  async function issueTokens(scopes = ['read', 'write']) {
    const { response } = await ctx.core.tokenService.generateTokenResponse({
      userId: 'user-1',
      scopes,
      clientId: 'cli',
    });
    return response;
  }

  function refresh(refreshToken: string, extra: Record<string, string> = {}) {
    return ctx.app.request(
      '/auth/token',
      formRequest({ grant_type: 'refresh_token', refresh_token: refreshToken, ...extra })
    );
  }

  it('should rotate refresh tokens', async () => {
    const initial = await issueTokens();

    const res = await refresh(initial.refresh_token);
    expect(res.status).toBe(200);

    const rotated = await readJson(res);
    expect(rotated.token_type).toBe('Bearer');
    expect(rotated.scope).toBe('read write');
    expect(rotated.refresh_token).not.toBe(initial.refresh_token);

    const claims = await ctx.core.tokenIssuer.verifyRefreshToken(field(rotated, 'refresh_token'));
    expect(claims.sub).toBe('user-1');
    expect(claims.client_id).toBe('cli');
    expect(claims.roles).toEqual(['premium_user']);
  });

  it('should reject the old refresh token after rotation', async () => {
    const initial = await issueTokens();
    const rotated = await readJson(await refresh(initial.refresh_token));

    const replay = await refresh(initial.refresh_token);
    expect(replay.status).toBe(401);
    expect(await readJson(replay)).toEqual({
      error: 'invalid_token',
      error_description: 'Token revoked',
    });

    expect((await refresh(field(rotated, 'refresh_token'))).status).toBe(200);
  });

  it('should let only one of two concurrent refreshes succeed', async () => {
    const initial = await issueTokens();

    const responses = await Promise.all([
      refresh(initial.refresh_token),
      refresh(initial.refresh_token),
    ]);
    expect(responses.map((r) => r.status).sort()).toEqual([200, 401]);
  });

  it('should narrow the scope on request', async () => {
    const initial = await issueTokens();

    const res = await refresh(initial.refresh_token, { scope: 'read' });
    expect(res.status).toBe(200);

    const body = await readJson(res);
    expect(body.scope).toBe('read');

    const claims = await ctx.core.tokenIssuer.verifyAccessToken(field(body, 'access_token'));
    expect(claims.scopes).toEqual(['read']);
  });

  it('should reject widening the scope and keep the token usable', async () => {
    const initial = await issueTokens(['read']);

    const res = await refresh(initial.refresh_token, { scope: 'read admin' });
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_scope',
      error_description: 'Invalid scope: admin',
    });

    expect((await refresh(initial.refresh_token)).status).toBe(200);
  });

  it('should reject an access token presented as a refresh token', async () => {
    const initial = await issueTokens();

    const res = await refresh(initial.access_token);
    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: 'invalid_token',
      error_description: 'Invalid token: expected refresh token',
    });
  });

  it('should reject a refresh token for another client', async () => {
    const initial = await issueTokens();

    const res = await refresh(initial.refresh_token, { client_id: 'web-app' });
    expect(res.status).toBe(400);
    expect((await readJson(res)).error_description).toBe(
      'Grant was issued to a different client or redirect URI'
    );
  });

  it('should report an expired refresh token', async () => {
    const initial = await issueTokens();
    ctx.advance(2592000 + 1);

    const res = await refresh(initial.refresh_token);
    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: 'invalid_token',
      error_description: 'Token expired',
    });
  });

  it('should reject garbage', async () => {
    const res = await refresh('not-a-jwt');
    expect(res.status).toBe(401);
    expect((await readJson(res)).error).toBe('invalid_token');
  });

  it('should require the refresh_token parameter', async () => {
    const res = await ctx.app.request('/auth/token', formRequest({ grant_type: 'refresh_token' }));
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_request',
      error_description: 'Missing refresh_token parameter',
    });
  });
});
