export { MemoryCredentialStore } from './credential-store.js';
export { MemoryClientRegistry } from './client-registry.js';
export { MemoryUserDirectory } from './user-directory.js';
