export type { ICredentialStore, StoreEntry, CounterState } from './credential-store.js';
export type { IClientRegistry } from './client-registry.js';
export type { IUserDirectory } from './user-directory.js';
export type { IUserAuthenticator } from './user-authenticator.js';
