import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../index.js';
import { loadClients } from '../clients.js';
import { isAuthError } from '../../errors/auth-error.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 3000,
      host: '0.0.0.0',
      nodeEnv: 'development',
      issuer: 'http://localhost:3000',
      verificationUri: 'http://localhost:3000/device',
    });
    expect(config.rateLimit).toEqual({
      token: { maxRequests: 10, windowSeconds: 60 },
      device: { maxRequests: 5, windowSeconds: 60 },
      authorize: { maxRequests: 20, windowSeconds: 60 },
      revoke: { maxRequests: 10, windowSeconds: 60 },
    });
    expect(config.tokens).toEqual({
      accessTokenTtl: 3600,
      refreshTokenTtl: 2592000,
      deviceCodeInterval: 5,
    });
    expect(config.store.redisUrl).toBeUndefined();
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      ISSUER: 'https://auth.example.test',
      RATE_LIMIT_TOKEN: '3',
      RATE_LIMIT_WINDOW_SECONDS: '30',
      INTERNAL_SERVICE_SECRET: 'test-internal-secret',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.verificationUri).toBe('https://auth.example.test/device');
    expect(config.rateLimit.token).toEqual({ maxRequests: 3, windowSeconds: 30 });
    expect(config.rateLimit.device).toEqual({ maxRequests: 5, windowSeconds: 30 });
    expect(config.secrets.internalServiceSecret).toBe('test-internal-secret');
  });

  it('should require a signing secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(
      'Configuration error: JWT_SECRET is required in production'
    );
  });

  it('should require the Redis URL and token together', () => {
    expect(() => loadConfig({ UPSTASH_REDIS_REST_URL: 'https://redis.test' })).toThrow(
      'Configuration error: UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together'
    );
  });

  it('should reject malformed values', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'eighty' });
    } catch (error) {
      caught = error;
    }
    expect(isAuthError(caught, 'config_invalid')).toBe(true);
  });

  describe('file secrets', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'credential-core-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read secrets from *_FILE paths', () => {
      const path = join(dir, 'jwt');
      writeFileSync(path, 'test-secret-from-a-file\n');

      expect(loadConfig({ JWT_SECRET_FILE: path }).secrets.jwtSecret).toBe('test-secret-from-a-file');
    });

    it('should fail on a missing secret file', () => {
      expect(() => loadConfig({ JWT_SECRET_FILE: join(dir, 'missing') })).toThrow(
        `Configuration error: JWT_SECRET_FILE points to a missing file: ${join(dir, 'missing')}`
      );
    });
  });
});

describe('loadClients', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'credential-core-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(content: string): string {
    const path = join(dir, 'clients.json');
    writeFileSync(path, content);
    return path;
  }

  it('should load registered clients', () => {
    const path = write(
      JSON.stringify({
        clients: [
          {
            clientId: 'cli',
            name: 'Command-line client',
            allowedGrants: ['urn:ietf:params:oauth:grant-type:device_code'],
            allowedScopes: ['read'],
          },
        ],
      })
    );

    expect(loadClients(path)).toEqual([
      {
        clientId: 'cli',
        name: 'Command-line client',
        redirectUris: [],
        allowedGrants: ['urn:ietf:params:oauth:grant-type:device_code'],
        allowedScopes: ['read'],
      },
    ]);
  });

  it('should reject unknown grant types', () => {
    const path = write(
      JSON.stringify({
        clients: [{ clientId: 'x', name: 'X', allowedGrants: ['password'] }],
      })
    );
    expect(() => loadClients(path)).toThrow(/^Configuration error: .*clients\.0\.allowedGrants\.0/);
  });

  it('should reject duplicate client ids', () => {
    const client = { clientId: 'x', name: 'X', allowedGrants: ['refresh_token'] };
    const path = write(JSON.stringify({ clients: [client, client] }));

    expect(() => loadClients(path)).toThrow(`Configuration error: ${path}: duplicate clientId x`);
  });

  it('should reject invalid JSON and missing files', () => {
    const path = write('{ not json');
    expect(() => loadClients(path)).toThrow(`Configuration error: clients file is not valid JSON: ${path}`);
    expect(() => loadClients(join(dir, 'none.json'))).toThrow('clients file not found');
  });
});
