export * from './hash.js';
export * from './jwt.js';
export * from './pkce.js';
export * from './random.js';
