export { PkceStorage } from './pkce-storage.js';
export { AuthorizationCodeStorage } from './authorization-code-storage.js';
export { DeviceCodeStorage } from './device-code-storage.js';
export type { Versioned } from './schemas.js';
