import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createAuthCore } from './core.js';
import { getConfig } from './config/index.js';
import { loadClients } from './config/clients.js';
import { createLogger } from './utils/logger.js';
import type { ICredentialStore } from './storage/interfaces/credential-store.js';
import { MemoryCredentialStore, MemoryClientRegistry } from './storage/memory/index.js';
import { RedisCredentialStore } from './storage/redis/credential-store.js';

// Load configuration
const config = getConfig();
const logger = createLogger(config.logging.level);

// Create the credential store based on environment
let store: ICredentialStore;

if (config.store.redisUrl && config.store.redisToken) {
  logger.info('Using Upstash Redis credential store');
  store = new RedisCredentialStore({
    url: config.store.redisUrl,
    token: config.store.redisToken,
    timeoutMs: config.store.timeoutMs,
  });
} else {
  logger.warn('Using in-memory credential store; state is lost on restart and not shared');
  store = new MemoryCredentialStore();
}

const clients = new MemoryClientRegistry(loadClients(config.clientsFile));

const core = createAuthCore({ config, store, clients, logger });

const app = createAuthServer(core, {
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Authorization server listening', {
      address: info.address,
      port: info.port,
      issuer: config.server.issuer,
    });
  }
);
